import type { BackendClient } from "./contracts.js";
import type { AssetRecord, PrivateAssetMetadata, PublicAssetMetadata } from "./types.js";
import { AssetCache, cacheKey } from "../cache/assetCache.js";
import {
  isPublicIdentifier,
  normalizeIdentifier,
  type PublicIdentifier,
} from "../identifiers/identifierCodec.js";
import { DataIntegrityError, InvalidRequestError } from "../errors/gatewayErrors.js";
import { writeLog, type GatewayLogger } from "../logging/createLogger.js";

export type ResolveOutcome =
  | { status: "ok"; asset: AssetRecord }
  | { status: "invalid_identifier"; input: string }
  | { status: "not_found" }
  | { status: "ambiguous"; backendIds: readonly string[] };

/**
 * What to do when more than one asset carries the same value:
 * `not_found` answers like a miss, `error` raises DataIntegrityError.
 * Both log a warning.
 */
export type AmbiguityPolicy = "not_found" | "error";

export interface AssetResolverOptions {
  identifierField: string;
  ttlMs: number;
  negativeTtlMs: number;
  ambiguityPolicy?: AmbiguityPolicy;
  archives?: readonly string[];
}

export const SEARCH_OPERATION = "search";

export function searchCacheKey(field: string, value: string) {
  return cacheKey(SEARCH_OPERATION, field, value);
}

export class AssetResolver {
  constructor(
    private backend: BackendClient,
    private cache: AssetCache<readonly AssetRecord[]>,
    private options: AssetResolverOptions,
    private logger?: GatewayLogger,
  ) { }

  private log(
    level: "error" | "warn" | "info" | "debug",
    msg: string,
    fields?: Record<string, unknown>
  ) {
    writeLog(this.logger, level, msg, fields);
  }

  async resolveById(input: string): Promise<ResolveOutcome> {
    const identifier = normalizeIdentifier(input);

    if (!isPublicIdentifier(identifier)) {
      this.log("info", "Malformed identifier rejected", {
        event: "RESOLVE_INVALID_IDENTIFIER",
        input,
      });
      return { status: "invalid_identifier", input };
    }

    return this.lookup(this.options.identifierField, identifier);
  }

  async resolveByField(field: string, value: string): Promise<ResolveOutcome> {
    if (field.trim() === "" || value.trim() === "") {
      throw new InvalidRequestError("field and value are required");
    }
    return this.lookup(field, value);
  }

  /** Original bytes of a resolved asset. Never cached. */
  async readOriginal(asset: AssetRecord): Promise<Buffer> {
    return this.backend.fetchOriginal(asset.backendId);
  }

  /** Drops cached lookups for a value, e.g. after it was written. */
  forget(field: string, value: string): void {
    this.cache.invalidate(searchCacheKey(field, value));
  }

  private async lookup(field: string, value: string): Promise<ResolveOutcome> {
    const matches = await this.cache.getOrCompute(
      searchCacheKey(field, value),
      () => this.backend.search(field, value, { archives: this.options.archives }),
      {
        ttlMs: (records) =>
          records.length === 0 ? this.options.negativeTtlMs : this.options.ttlMs,
        tags: (records) => records.map((r) => r.backendId),
      }
    );

    if (matches.length === 0) {
      this.log("debug", "No asset matched", { event: "RESOLVE_NOT_FOUND", field, value });
      return { status: "not_found" };
    }

    if (matches.length > 1) {
      const backendIds = matches.map((r) => r.backendId);
      this.log("warn", "Multiple assets share one value", {
        event: "RESOLVE_AMBIGUOUS",
        field,
        value,
        backendIds,
      });

      if (this.options.ambiguityPolicy === "error") {
        throw new DataIntegrityError(
          `${matches.length} assets match ${field}=${value}`,
          backendIds
        );
      }
      return { status: "ambiguous", backendIds };
    }

    return { status: "ok", asset: matches[0] };
  }
}

export function toPublicMetadata(
  asset: AssetRecord,
  identifier: PublicIdentifier
): PublicAssetMetadata {
  return {
    identifier,
    filename: asset.filename,
    contentType: asset.contentType,
    size: asset.size,
    createdAt: asset.createdAt,
    modifiedAt: asset.modifiedAt,
  };
}

export function toPrivateMetadata(
  asset: AssetRecord,
  identifier: PublicIdentifier
): PrivateAssetMetadata {
  return {
    ...toPublicMetadata(asset, identifier),
    archiveId: asset.archiveId,
    contentHash: asset.contentHash,
    visibility: asset.visibility,
    metadata: asset.metadata,
  };
}
