import type { AssetFieldMap, AssetRecord, AssetVisibility, MetadataValue } from "../../core/assets/types.js";
import { metadataText } from "../../core/assets/types.js";

/** The parts of a FotoWare asset representation the gateway reads. */
export interface FotowareAsset {
  href: string;
  archiveHREF?: string;
  filename: string;
  filesize?: number;
  created?: string;
  modified?: string;
  doctype?: string;
  metadata?: Record<string, { value: MetadataValue }>;
  builtinFields?: FotowareBuiltinField[];
  renditions?: FotowareRendition[];
}

/** Title, description, tags and the like, outside the metadata fields. */
export interface FotowareBuiltinField {
  field: string;
  value?: unknown;
}

export interface FotowareRendition {
  href: string;
  original: boolean;
  width?: number;
  height?: number;
  profile?: string;
}

export interface FotowareMappingOptions {
  fields: AssetFieldMap;
  publicFilter?: { field: string; value: string };
}

const CONTENT_TYPES: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  webp: "image/webp",
  tif: "image/tiff",
  tiff: "image/tiff",
  svg: "image/svg+xml",
  pdf: "application/pdf",
  mp4: "video/mp4",
  mov: "video/quicktime",
  mp3: "audio/mpeg",
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return (
    typeof value === "string" ||
    (Array.isArray(value) && value.every((v) => typeof v === "string"))
  );
}

function optional(value: unknown, type: "string" | "number"): boolean {
  return value === undefined || typeof value === type;
}

export function isFotowareAsset(value: unknown): value is FotowareAsset {
  if (!isRecord(value)) return false;
  if (typeof value.href !== "string" || typeof value.filename !== "string") return false;
  if (!optional(value.archiveHREF, "string")) return false;
  if (!optional(value.filesize, "number")) return false;
  if (!optional(value.created, "string") || !optional(value.modified, "string")) return false;
  if (!optional(value.doctype, "string")) return false;

  const { metadata, renditions, builtinFields } = value;
  if (metadata !== undefined) {
    if (!isRecord(metadata)) return false;
    for (const field of Object.values(metadata)) {
      if (!isRecord(field) || !isMetadataValue(field.value)) return false;
    }
  }
  if (builtinFields !== undefined) {
    if (!Array.isArray(builtinFields)) return false;
    if (!builtinFields.every((f) => isRecord(f) && typeof f.field === "string")) return false;
  }
  if (renditions !== undefined) {
    if (!Array.isArray(renditions)) return false;
    const valid = renditions.every(
      (r) => isRecord(r) && typeof r.href === "string" && typeof r.original === "boolean"
    );
    if (!valid) return false;
  }
  return true;
}

export function contentTypeFor(filename: string): string {
  const dot = filename.lastIndexOf(".");
  const ext = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : "";
  return CONTENT_TYPES[ext] ?? "application/octet-stream";
}

// "/fotoweb/archives/5000-Archive/" -> "5000"
export function archiveIdFrom(href: string): string {
  const match = /\/fotoweb\/archives\/(\d+)/.exec(href);
  return match ? match[1] : "";
}

function parseDate(value: string | undefined): Date {
  const date = value ? new Date(value) : new Date(0);
  return Number.isNaN(date.getTime()) ? new Date(0) : date;
}

export function originalRendition(asset: FotowareAsset): FotowareRendition | undefined {
  return asset.renditions?.find((r) => r.original === true);
}

function builtinText(asset: FotowareAsset, name: string): string | undefined {
  const value = asset.builtinFields?.find((f) => f.field === name)?.value;
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

function builtinList(asset: FotowareAsset, name: string): string[] {
  const value = asset.builtinFields?.find((f) => f.field === name)?.value;
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

export function toAssetRecord(asset: FotowareAsset, options: FotowareMappingOptions): AssetRecord {
  const metadata: Record<string, MetadataValue> = {};
  for (const [field, entry] of Object.entries(asset.metadata ?? {})) {
    metadata[field] = entry.value;
  }

  let visibility: AssetVisibility = "public";
  if (options.publicFilter) {
    const value = metadata[options.publicFilter.field];
    const values = typeof value === "string" ? [value] : value ?? [];
    visibility = values.includes(options.publicFilter.value) ? "public" : "private";
  }

  const publicIdentifier = metadataText(metadata[options.fields.identifier]);
  const contentHash = metadataText(metadata[options.fields.contentHash]);
  const title = builtinText(asset, "title");
  const description = builtinText(asset, "description");
  const keywords = builtinList(asset, "tags");

  return {
    backendId: asset.href,
    ...(publicIdentifier ? { publicIdentifier } : {}),
    archiveId: archiveIdFrom(asset.archiveHREF ?? asset.href),
    filename: asset.filename,
    filePath: asset.href.replace(/\.info$/, ""),
    contentType: contentTypeFor(asset.filename),
    ...(contentHash ? { contentHash } : {}),
    size: asset.filesize ?? 0,
    createdAt: parseDate(asset.created),
    modifiedAt: parseDate(asset.modified),
    metadata,
    visibility,
    ...(asset.doctype ? { documentType: asset.doctype } : {}),
    ...(title ? { title } : {}),
    ...(description ? { description } : {}),
    ...(keywords.length > 0 ? { keywords } : {}),
  };
}
