import type { AssetRecord, AssetRef } from "./types.js";

export interface AssetSearchOptions {
  /** Archive ids to search; the client's configured archives when omitted. */
  archives?: readonly string[];
  limit?: number;
}

export interface AssignedListOptions extends AssetSearchOptions {
  /** Exclusive lower bound on the modification time. */
  modifiedAfter?: Date;
}

/**
 * What the core needs from the DAM backend. Transport, authentication and
 * paging stay inside the implementation.
 *
 * Implementations throw BackendUnavailableError on transport failure and
 * WriteConflictError when an update targets a field that already has a value.
 */
export interface BackendClient {
  search(field: string, value: string, options?: AssetSearchOptions): Promise<AssetRecord[]>;

  /** Assets where at least one of `fields` is empty, oldest first. */
  findMissing(fields: readonly string[], options: AssetSearchOptions): Promise<AssetRecord[]>;

  /** Assets that carry a value in `field`, least recently modified first. */
  listAssigned(field: string, options: AssignedListOptions): Promise<AssetRecord[]>;

  /**
   * The ref an externally supplied asset URL names on this backend, or
   * undefined when it points anywhere else.
   */
  toAssetRef(href: string): AssetRef | undefined;

  getAsset(ref: AssetRef): Promise<AssetRecord | null>;

  updateMetadata(ref: AssetRef, fields: Readonly<Record<string, string>>): Promise<AssetRecord>;

  /** Bytes of the asset's original rendition. */
  fetchOriginal(ref: AssetRef): Promise<Buffer>;
}
