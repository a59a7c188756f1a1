import crypto from "crypto";
import { isLoggerMode, isLogLevel, type LoggerMode, type LogLevel } from "../core/logging/createLogger.js";
import type { AmbiguityPolicy } from "../core/assets/assetResolver.js";

type Env = Record<string, string | undefined>;

export interface GatewayConfig {
  env: string;
  isProd: boolean;
  isDev: boolean;
  serverPort: number;
  /** Where clients reach the gateway; used in download links. */
  publicUrl: string;
  /** Prefix of canonical identifier URIs in the manifest. */
  canonicalHostBase: string;
  logger: LoggerMode;
  logFile: string;
  logLevel: LogLevel;
  fotoware: {
    host: string;
    clientId: string;
    clientSecret: string;
    archives: string[];
    searchExpressionSuffix: string;
    timeoutMs: number;
    publicFilter?: { field: string; value: string };
  };
  fields: {
    identifier: string;
    contentHash: string;
  };
  cache: {
    maxEntries: number;
    ttlMs: number;
    negativeTtlMs: number;
  };
  tokens: {
    secret: string;
    secretIsEphemeral: boolean;
    maxDurationShortSeconds: number;
    maxDurationLongSeconds: number;
    leewaySeconds: number;
  };
  ambiguityPolicy: AmbiguityPolicy;
  sweepDefaultLimit: number;
  manifestDefaultLimit: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function required(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) throw new ConfigError(`${key} is required`);
  return value;
}

function integer(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function list(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (!raw) return fallback;
  const values = raw.split(",").map((v) => v.trim()).filter(Boolean);
  return values.length > 0 ? values : fallback;
}

export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const nodeEnv = env.NODE_ENV ?? "development";

  const logger = env.GATEWAY_LOGGER ?? "console";
  if (!isLoggerMode(logger)) {
    throw new ConfigError(`GATEWAY_LOGGER must be none, console, file or cloud, got "${logger}"`);
  }
  const logLevel = env.GATEWAY_LOG_LEVEL ?? (nodeEnv === "development" ? "debug" : "info");
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`GATEWAY_LOG_LEVEL must be error, warn, info or debug, got "${logLevel}"`);
  }

  const ambiguityPolicy = env.AMBIGUOUS_POLICY ?? "not_found";
  if (ambiguityPolicy !== "not_found" && ambiguityPolicy !== "error") {
    throw new ConfigError(`AMBIGUOUS_POLICY must be not_found or error, got "${ambiguityPolicy}"`);
  }

  const publicField = env.FOTOWARE_PUBLIC_FIELD?.trim();
  const publicValue = env.FOTOWARE_PUBLIC_VALUE?.trim();
  if (Boolean(publicField) !== Boolean(publicValue)) {
    throw new ConfigError("FOTOWARE_PUBLIC_FIELD and FOTOWARE_PUBLIC_VALUE must be set together");
  }

  // unset secret: tokens stop verifying after a restart
  const configuredSecret = env.JWT_SECRET?.trim();

  const serverPort = integer(env, "GATEWAY_SERVER_PORT", 3000);
  const publicUrl = (env.GATEWAY_PUBLIC_URL?.trim() || `http://localhost:${serverPort}`).replace(/\/+$/, "");

  return {
    env: nodeEnv,
    isProd: nodeEnv === "production",
    isDev: nodeEnv === "development",
    serverPort,
    publicUrl,
    canonicalHostBase: env.CANONICAL_HOST_BASE?.trim() || `${publicUrl}/id/`,
    logger,
    logFile: env.GATEWAY_LOG_FILE ?? "./logs/gateway.log",
    logLevel,
    fotoware: {
      host: required(env, "FOTOWARE_HOST").replace(/\/+$/, ""),
      clientId: required(env, "FOTOWARE_CLIENT_ID"),
      clientSecret: required(env, "FOTOWARE_CLIENT_SECRET"),
      archives: list(env, "FOTOWARE_ARCHIVES", ["5000"]),
      searchExpressionSuffix: env.FOTOWARE_SEARCH_EXPRESSION_SUFFIX ?? "",
      timeoutMs: integer(env, "FOTOWARE_TIMEOUT_MS", 30_000, 1),
      ...(publicField && publicValue
        ? { publicFilter: { field: publicField, value: publicValue } }
        : {}),
    },
    fields: {
      identifier: env.FOTOWARE_FIELDNAME_UUID ?? "826",
      contentHash: env.FOTOWARE_FIELDNAME_SHA256 ?? "827",
    },
    cache: {
      maxEntries: integer(env, "CACHE_MAX_ENTRIES", 5_000, 1),
      ttlMs: integer(env, "CACHE_TTL_MS", 300_000), // 5 min
      negativeTtlMs: integer(env, "CACHE_NEGATIVE_TTL_MS", 30_000),
    },
    tokens: {
      secret: configuredSecret || crypto.randomBytes(32).toString("hex"),
      secretIsEphemeral: !configuredSecret,
      maxDurationShortSeconds: integer(env, "TOKEN_MAX_DURATION_SHORT_S", 15 * 60, 1),
      maxDurationLongSeconds: integer(env, "TOKEN_MAX_DURATION_LONG_S", 365 * 24 * 3600, 1),
      leewaySeconds: integer(env, "TOKEN_LEEWAY_S", 0),
    },
    ambiguityPolicy,
    sweepDefaultLimit: integer(env, "SWEEP_DEFAULT_LIMIT", 100, 1),
    manifestDefaultLimit: integer(env, "MANIFEST_DEFAULT_LIMIT", 100, 1),
  };
}
