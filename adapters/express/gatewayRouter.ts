import express, { type Request, type Response, type Router } from "express";
import {
  AssetResolver,
  toPrivateMetadata,
  toPublicMetadata,
} from "../../core/assets/assetResolver.js";
import { MetadataAssigner, parseTasks, type AssignTask } from "../../core/assets/metadataAssigner.js";
import type { AssetManifest } from "../../core/assets/assetManifest.js";
import type { AssetRecord } from "../../core/assets/types.js";
import type { CapabilityTokenService } from "../../core/security/CapabilityTokenService.js";
import {
  AssetNotFoundError,
  GatewayError,
  InvalidIdentifierError,
  InvalidRequestError,
} from "../../core/errors/gatewayErrors.js";
import { normalizeIdentifier, type PublicIdentifier } from "../../core/identifiers/identifierCodec.js";
import { writeLog, type GatewayLogger } from "../../core/logging/createLogger.js";
import { normalizeFilename } from "../../core/utils/normalizeFilename.js";
import { authorizeRequest, requireCapability } from "./requireCapability.js";

export interface GatewayRouterOptions {
  resolver: AssetResolver;
  assigner: MetadataAssigner;
  manifest: AssetManifest;
  tokens: CapabilityTokenService;
  sweepDefaultLimit: number;
  manifestDefaultLimit: number;
  /** Mounts GET /-/token/new. Development only. */
  enableTokenIssuer?: boolean;
  logger?: GatewayLogger;
}

// --- Forward async failures to the error handler ---
function safeHandler(fn: (req: Request, res: Response) => Promise<void>): express.RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

// ?tasks=uuid4&tasks=sha256 and ?tasks=uuid4,sha256 are equivalent
function queryList(value: unknown): string[] {
  const raw = typeof value === "string" ? [value] : Array.isArray(value) ? value : [];
  return raw
    .filter((v): v is string => typeof v === "string")
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter(Boolean);
}

function queryTasks(req: Request): AssignTask[] {
  const requested = queryList(req.query.tasks);
  return requested.length > 0 ? parseTasks(requested) : ["uuid4"];
}

function queryLimit(value: unknown, fallback: number): number {
  if (value === undefined) return fallback;
  const limit = typeof value === "string" ? Number(value) : NaN;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidRequestError("limit must be a positive integer");
  }
  return limit;
}

function queryString(value: unknown, name: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new InvalidRequestError(`${name} must be given once`);
  }
  return value;
}

export function createGatewayRouter(options: GatewayRouterOptions): Router {
  const router = express.Router();
  const { resolver, assigner, manifest, tokens, logger } = options;
  const updateCapability = requireCapability(tokens, "metadata-update", logger);
  const manifestCapability = requireCapability(tokens, "manifest", logger);

  async function resolveAsset(
    input: string
  ): Promise<{ asset: AssetRecord; identifier: PublicIdentifier }> {
    const outcome = await resolver.resolveById(input);

    switch (outcome.status) {
      case "invalid_identifier":
        throw new InvalidIdentifierError(outcome.input);
      case "not_found":
        throw new AssetNotFoundError(input);
      case "ambiguous":
        throw new GatewayError("AMBIGUOUS", `${outcome.backendIds.length} assets share ${input}`);
    }

    const { asset } = outcome;
    return { asset, identifier: asset.publicIdentifier ?? normalizeIdentifier(input) };
  }

  // --- Resolve a public identifier ---
  router.get(
    "/id/:identifier",
    safeHandler(async (req, res) => {
      const { asset, identifier } = await resolveAsset(req.params.identifier);

      if (asset.visibility === "public") {
        res.json(toPublicMetadata(asset, identifier));
        return;
      }

      authorizeRequest(tokens, req, "preview", identifier, logger);
      res.json(toPrivateMetadata(asset, identifier));
    })
  );

  // --- Original file download ---
  router.get(
    "/doc/:identifier/:filename",
    safeHandler(async (req, res) => {
      const { asset, identifier } = await resolveAsset(req.params.identifier);

      if (asset.visibility !== "public") {
        authorizeRequest(tokens, req, "original", identifier, logger);
      }

      const bytes = await resolver.readOriginal(asset);
      const { filename } = normalizeFilename(req.params.filename, asset.filename);

      res.setHeader("Content-Type", asset.contentType);
      res.setHeader("Content-Disposition", `inline; filename="${encodeURIComponent(filename)}"`);
      res.end(bytes);

      // the original is already in hand, so storing its hash costs one write
      if (asset.contentHash) return;
      try {
        await assigner.assignContentHash(asset, bytes);
      } catch (err) {
        writeLog(logger, "warn", "Content hash not stored after download", {
          event: "DOWNLOAD_HASH_FAIL",
          backendId: asset.backendId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    })
  );

  // --- JSON-LD manifest of identified assets ---
  router.get(
    "/-/data/jsonld-manifest",
    manifestCapability,
    safeHandler(async (req, res) => {
      const archives = queryList(req.query.archives);
      const limit = queryLimit(req.query.limit, options.manifestDefaultLimit);
      const since = queryString(req.query.since, "since");

      const page = await manifest.page({
        archives: archives.length > 0 ? archives : undefined,
        limit,
        since,
      });

      if (page.nextSince) {
        const next = new URLSearchParams({ limit: String(limit), since: page.nextSince });
        for (const archive of archives) next.append("archives", archive);
        res.setHeader("Link", `</-/data/jsonld-manifest?${next.toString()}>; rel="next"`);
      }
      res.json(page.entries);
    })
  );

  // --- Bulk assignment ---
  router.get(
    "/-/background-worker/assign-metadata",
    updateCapability,
    safeHandler(async (req, res) => {
      const archives = queryList(req.query.archives);
      const limit = queryLimit(req.query.limit, options.sweepDefaultLimit);
      const tasks = queryTasks(req);

      const summary = await assigner.sweep({
        archives: archives.length > 0 ? archives : undefined,
        limit,
        tasks,
      });

      res.json({ tasks, limit, ...summary });
    })
  );

  // --- Single asset webhook ---
  router.post(
    "/-/webhooks/assign-metadata",
    updateCapability,
    safeHandler(async (req, res) => {
      const asset = await assigner.assignViaWebhook(req.body, queryTasks(req));
      res.json({ asset });
    })
  );

  if (options.enableTokenIssuer) {
    router.get(
      "/-/token/new",
      safeHandler(async (req, res) => {
        const subject = typeof req.query.subject === "string" && req.query.subject !== ""
          ? req.query.subject
          : undefined;
        res.json(tokens.issueAll(subject));
      })
    );
  }

  return router;
}
