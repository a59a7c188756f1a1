import crypto from "crypto";
import type { BackendClient } from "./contracts.js";
import type { AssetFieldMap, AssetRecord, AssetRef } from "./types.js";
import { metadataText } from "./types.js";
import { AssetCache } from "../cache/assetCache.js";
import { searchCacheKey } from "./assetResolver.js";
import { mintIdentifier } from "../identifiers/identifierCodec.js";
import {
  AssetNotFoundError,
  InvalidRequestError,
  WriteConflictError,
} from "../errors/gatewayErrors.js";
import { writeLog, type GatewayLogger } from "../logging/createLogger.js";

export const ASSIGN_TASKS = ["uuid4", "sha256"] as const;
export type AssignTask = typeof ASSIGN_TASKS[number];

export function isAssignTask(value: string): value is AssignTask {
  return (ASSIGN_TASKS as readonly string[]).includes(value);
}

export function parseTasks(values: readonly string[]): AssignTask[] {
  const unknown = values.filter((v) => !isAssignTask(v));
  if (unknown.length > 0) {
    throw new InvalidRequestError(`Unknown tasks: ${unknown.join(", ")}`);
  }
  return [...new Set(values.filter(isAssignTask))];
}

export interface SweepRequest {
  archives?: readonly string[];
  limit: number;
  tasks?: readonly AssignTask[];
}

export interface SweepSummary {
  processed: number;
  assigned: number;
  skipped: number;
  failed: number;
  failures: { backendId: string; error: string }[];
}

export interface WebhookPayload {
  data: { href: string };
}

type AssignResult = {
  asset: AssetRecord;
  outcome: "assigned" | "unchanged" | "conflict";
};

type TaskDefinition = {
  field: string;
  compute: (asset: AssetRecord) => Promise<string>;
};

export function isWebhookPayload(value: unknown): value is WebhookPayload {
  if (typeof value !== "object" || value === null || !("data" in value)) return false;
  const data = value.data;
  return (
    typeof data === "object" &&
    data !== null &&
    "href" in data &&
    typeof data.href === "string" &&
    data.href.trim() !== ""
  );
}

/**
 * Write path: fills empty identifier and derived fields on backend assets.
 * Both the sweep and the webhook run through `assign`, so a field that already
 * has a value is never recomputed or overwritten.
 */
export class MetadataAssigner {
  private tasks: Record<AssignTask, TaskDefinition>;

  constructor(
    private backend: BackendClient,
    private cache: AssetCache<readonly AssetRecord[]>,
    private fields: AssetFieldMap,
    private logger?: GatewayLogger,
  ) {
    this.tasks = {
      uuid4: {
        field: fields.identifier,
        compute: async () => mintIdentifier(),
      },
      sha256: {
        field: fields.contentHash,
        compute: async (asset) => contentHash(await this.backend.fetchOriginal(asset.backendId)),
      },
    };
  }

  private log(
    level: "error" | "warn" | "info" | "debug",
    msg: string,
    fields?: Record<string, unknown>
  ) {
    writeLog(this.logger, level, msg, fields);
  }

  /** Backend fields the given tasks write to. */
  fieldsFor(tasks: readonly AssignTask[]): string[] {
    return tasks.map((t) => this.tasks[t].field);
  }

  async assignOne(
    assetRef: AssetRef | AssetRecord,
    tasks: readonly AssignTask[] = ["uuid4"]
  ): Promise<AssetRecord> {
    const { asset } = await this.assign(assetRef, tasks);
    return asset;
  }

  /** Stores a hash computed from bytes the caller already holds. */
  async assignContentHash(asset: AssetRecord, original: Buffer): Promise<AssetRecord> {
    const { asset: updated } = await this.assign(asset, ["sha256"], {
      sha256: contentHash(original),
    });
    return updated;
  }

  async assignViaWebhook(
    payload: unknown,
    tasks: readonly AssignTask[] = ["uuid4"]
  ): Promise<AssetRecord> {
    if (!isWebhookPayload(payload)) {
      throw new InvalidRequestError("Webhook payload must contain data.href");
    }

    const ref = this.backend.toAssetRef(payload.data.href);
    if (!ref) {
      this.log("warn", "Webhook href outside the backend rejected", {
        event: "WEBHOOK_REJECTED",
        href: payload.data.href,
      });
      throw new InvalidRequestError("Webhook href does not name an asset of the configured backend");
    }

    this.log("info", "Webhook assignment requested", {
      event: "WEBHOOK_RECEIVED",
      backendId: ref,
      tasks,
    });

    return this.assignOne(ref, tasks);
  }

  async sweep(request: SweepRequest): Promise<SweepSummary> {
    const { limit } = request;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidRequestError("limit must be a positive integer");
    }
    const tasks = request.tasks ?? ["uuid4"];
    if (tasks.length === 0) {
      throw new InvalidRequestError("at least one task is required");
    }

    const candidates = (
      await this.backend.findMissing(this.fieldsFor(tasks), {
        archives: request.archives,
        limit,
      })
    ).slice(0, limit);

    const summary: SweepSummary = {
      processed: 0,
      assigned: 0,
      skipped: 0,
      failed: 0,
      failures: [],
    };

    for (const candidate of candidates) {
      summary.processed++;
      try {
        const { outcome } = await this.assign(candidate, tasks);
        if (outcome === "assigned") summary.assigned++;
        else summary.skipped++;
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        summary.failed++;
        summary.failures.push({ backendId: candidate.backendId, error });
        this.log("error", "Sweep item failed", {
          event: "SWEEP_ITEM_FAIL",
          backendId: candidate.backendId,
          error,
        });
      }
    }

    this.log("info", "Sweep finished", {
      event: "SWEEP_DONE",
      archives: request.archives,
      tasks,
      processed: summary.processed,
      assigned: summary.assigned,
      skipped: summary.skipped,
      failed: summary.failed,
    });

    return summary;
  }

  private async assign(
    assetRef: AssetRef | AssetRecord,
    tasks: readonly AssignTask[],
    precomputed: Partial<Record<AssignTask, string>> = {}
  ): Promise<AssignResult> {
    const asset =
      typeof assetRef === "string" ? await this.read(assetRef) : assetRef;

    const missing = tasks.filter(
      (t) => metadataText(asset.metadata[this.tasks[t].field]) === undefined
    );
    if (missing.length === 0) {
      return { asset, outcome: "unchanged" };
    }

    // a failing task does not discard the values the others produced
    const updates: Record<string, string> = {};
    const failures: unknown[] = [];
    for (const task of missing) {
      const definition = this.tasks[task];
      try {
        updates[definition.field] = precomputed[task] ?? (await definition.compute(asset));
      } catch (err) {
        failures.push(err);
        this.log("warn", "Assignment task failed", {
          event: "TASK_FAIL",
          backendId: asset.backendId,
          task,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    if (Object.keys(updates).length === 0) throw failures[0];

    let updated: AssetRecord;
    try {
      updated = await this.backend.updateMetadata(asset.backendId, updates);
    } catch (err) {
      if (!(err instanceof WriteConflictError)) throw err;

      this.log("info", "Concurrent assignment detected, keeping stored value", {
        event: "ASSIGN_CONFLICT",
        backendId: asset.backendId,
        fields: err.fields,
      });
      this.invalidate(asset, updates);
      return { asset: await this.read(asset.backendId), outcome: "conflict" };
    }

    this.invalidate(asset, updates);
    this.log("info", "Metadata assigned", {
      event: "ASSIGN_SUCCESS",
      backendId: asset.backendId,
      fields: Object.keys(updates),
      publicIdentifier: updated.publicIdentifier,
    });

    return { asset: updated, outcome: "assigned" };
  }

  private async read(ref: AssetRef): Promise<AssetRecord> {
    const asset = await this.backend.getAsset(ref);
    if (!asset) throw new AssetNotFoundError(ref);
    return asset;
  }

  private invalidate(asset: AssetRecord, written: Readonly<Record<string, string>>) {
    this.cache.invalidateTag(asset.backendId);
    for (const [field, value] of Object.entries(written)) {
      this.cache.invalidate(searchCacheKey(field, value));
    }
  }
}

function contentHash(bytes: Buffer): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}
