import type { BackendClient } from "./contracts.js";
import type { AssetRecord } from "./types.js";
import type { PublicIdentifier } from "../identifiers/identifierCodec.js";
import { InvalidRequestError } from "../errors/gatewayErrors.js";
import { writeLog, type GatewayLogger } from "../logging/createLogger.js";
import { baseName, slugFilename } from "../utils/normalizeFilename.js";

export const JSONLD_CONTEXT = "https://schema.org/docs/jsonldcontext.json";

export interface ManifestEntry {
  "@id": string;
  "@context": string;
  identifier: PublicIdentifier;
  "dcterms:type"?: string;
  mainEntityOfPage: string;
  url: string;
  name: string;
  "dcterms:title"?: string;
  description?: string;
  keywords?: readonly string[];
  encodingFormat: string;
  fileSize: number;
  dateCreated: string;
  dateModified: string;
}

export interface ManifestLinks {
  /** Prefix of the canonical identifier URI; the identifier is appended. */
  canonicalBase: string;
  /** Where this gateway is reachable, without a trailing slash. */
  publicBaseUrl: string;
  /** Backend origin that asset refs are relative to. */
  backendHost: string;
}

export interface AssetManifestOptions extends ManifestLinks {
  identifierField: string;
  archives?: readonly string[];
}

export interface ManifestPageRequest {
  archives?: readonly string[];
  limit: number;
  /** ISO timestamp; only assets modified strictly after it are listed. */
  since?: string;
}

export interface ManifestPage {
  entries: ManifestEntry[];
  /** Set when the page is full; pass it back as `since` for the next page. */
  nextSince?: string;
}

export function toJsonLd(
  asset: AssetRecord,
  identifier: PublicIdentifier,
  links: ManifestLinks
): ManifestEntry {
  return {
    "@id": links.canonicalBase + identifier,
    "@context": JSONLD_CONTEXT,
    identifier,
    "dcterms:type": asset.documentType,
    mainEntityOfPage: links.backendHost + asset.backendId,
    url: `${links.publicBaseUrl}/doc/${identifier}/${slugFilename(asset.filename)}`,
    name: baseName(asset.filename),
    "dcterms:title": asset.title,
    description: asset.description,
    keywords: asset.keywords,
    encodingFormat: asset.contentType,
    fileSize: asset.size,
    dateCreated: asset.createdAt.toISOString(),
    dateModified: asset.modifiedAt.toISOString(),
  };
}

function parseSince(since: string | undefined): Date | undefined {
  if (since === undefined) return undefined;
  const date = new Date(since);
  if (since.trim() === "" || Number.isNaN(date.getTime())) {
    throw new InvalidRequestError("since must be an ISO 8601 timestamp");
  }
  return date;
}

/**
 * Lists identified assets as JSON-LD, least recently modified first, paged
 * by modification time. Reads go straight to the backend; the manifest is
 * for harvesters and is not cached.
 */
export class AssetManifest {
  constructor(
    private backend: BackendClient,
    private options: AssetManifestOptions,
    private logger?: GatewayLogger,
  ) { }

  async page(request: ManifestPageRequest): Promise<ManifestPage> {
    const { limit } = request;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidRequestError("limit must be a positive integer");
    }
    const modifiedAfter = parseSince(request.since);
    const archives = request.archives && request.archives.length > 0
      ? request.archives
      : this.options.archives;

    const assets = await this.backend.listAssigned(this.options.identifierField, {
      archives,
      limit,
      modifiedAfter,
    });

    const entries: ManifestEntry[] = [];
    for (const asset of assets) {
      if (!asset.publicIdentifier) continue;
      entries.push(toJsonLd(asset, asset.publicIdentifier, this.options));
    }

    const last = assets.at(-1);
    const nextSince = last && assets.length >= limit ? last.modifiedAt.toISOString() : undefined;

    writeLog(this.logger, "debug", "Manifest page listed", {
      event: "MANIFEST_PAGE",
      since: request.since,
      entries: entries.length,
      nextSince,
    });

    return { entries, ...(nextSince ? { nextSince } : {}) };
  }
}
