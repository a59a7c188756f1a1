import type { PublicIdentifier } from "../identifiers/identifierCodec.js";

/** The backend's own reference to an asset. Backend-scoped, not globally unique. */
export type AssetRef = string;

export type AssetVisibility = "private" | "public";

export type MetadataValue = string | readonly string[];

export interface AssetRecord {
 readonly backendId: AssetRef;
 readonly publicIdentifier?: PublicIdentifier;
 readonly archiveId: string;
 readonly filename: string;
 readonly filePath: string;
 readonly contentType: string;
 readonly contentHash?: string;
 readonly size: number;
 readonly createdAt: Date;
 readonly modifiedAt: Date;
 readonly metadata: Readonly<Record<string, MetadataValue>>;
 readonly visibility: AssetVisibility;
 /** Backend document class, such as "image" or "document". */
 readonly documentType?: string;
 readonly title?: string;
 readonly description?: string;
 readonly keywords?: readonly string[];
}

/** Backend field ids the core reads and writes. */
export interface AssetFieldMap {
  identifier: string;
  contentHash: string;
}

export type PublicAssetMetadata = {
  identifier: PublicIdentifier;
  filename: string;
  contentType: string;
  size: number;
  createdAt: Date;
  modifiedAt: Date;
};

export type PrivateAssetMetadata = PublicAssetMetadata & {
  archiveId: string;
  contentHash?: string;
  visibility: AssetVisibility;
  metadata: Readonly<Record<string, MetadataValue>>;
};

export function metadataText(value: MetadataValue | undefined): string | undefined {
  if (value === undefined) return undefined;
  const text = typeof value === "string" ? value : value.join(", ");
  return text.trim() === "" ? undefined : text;
}
