import express from "express";

import type { GatewayConfig } from "../config/gatewayConfig.js";
import type { GatewayLogger } from "../core/logging/createLogger.js";
import { AssetCache } from "../core/cache/assetCache.js";
import { AssetResolver } from "../core/assets/assetResolver.js";
import { MetadataAssigner } from "../core/assets/metadataAssigner.js";
import { AssetManifest } from "../core/assets/assetManifest.js";
import type { AssetRecord } from "../core/assets/types.js";
import type { BackendClient } from "../core/assets/contracts.js";
import { CapabilityTokenService } from "../core/security/CapabilityTokenService.js";
import { createErrorHandler } from "../core/middleware/publicErrorHandler.js";
import { createGatewayRouter } from "../adapters/express/gatewayRouter.js";

export function createTokenService(config: GatewayConfig): CapabilityTokenService {
  const short = config.tokens.maxDurationShortSeconds;
  const long = config.tokens.maxDurationLongSeconds;

  return new CapabilityTokenService({
    secret: config.tokens.secret,
    leewaySeconds: config.tokens.leewaySeconds,
    maxTtlSeconds: {
      preview: short,
      rendition: short,
      original: short,
      manifest: long,
      "metadata-update": long,
    },
  });
}

/** Wires the core services and the HTTP surface around one backend client. */
export function createGatewayApp(
  config: GatewayConfig,
  backend: BackendClient,
  logger?: GatewayLogger
): express.Express {
  const cache = new AssetCache<readonly AssetRecord[]>({
    maxEntries: config.cache.maxEntries,
    defaultTtlMs: config.cache.ttlMs,
  });

  const resolver = new AssetResolver(
    backend,
    cache,
    {
      identifierField: config.fields.identifier,
      ttlMs: config.cache.ttlMs,
      negativeTtlMs: config.cache.negativeTtlMs,
      ambiguityPolicy: config.ambiguityPolicy,
      archives: config.fotoware.archives,
    },
    logger
  );

  const assigner = new MetadataAssigner(backend, cache, config.fields, logger);
  const manifest = new AssetManifest(
    backend,
    {
      identifierField: config.fields.identifier,
      canonicalBase: config.canonicalHostBase,
      publicBaseUrl: config.publicUrl,
      backendHost: config.fotoware.host,
      archives: config.fotoware.archives,
    },
    logger
  );
  const tokens = createTokenService(config);

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "1mb" }));

  // ---- Health check ----
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(
    createGatewayRouter({
      resolver,
      assigner,
      manifest,
      tokens,
      sweepDefaultLimit: config.sweepDefaultLimit,
      manifestDefaultLimit: config.manifestDefaultLimit,
      enableTokenIssuer: config.isDev,
      logger,
    })
  );

  app.use(createErrorHandler({ logger, isProd: config.isProd }));

  return app;
}
