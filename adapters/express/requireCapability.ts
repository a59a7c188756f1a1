import type { Request, RequestHandler } from "express";
import type { CapabilityAudience, CapabilityTokenService } from "../../core/security/CapabilityTokenService.js";
import { TokenRejectedError } from "../../core/errors/gatewayErrors.js";
import { writeLog, type GatewayLogger } from "../../core/logging/createLogger.js";

/** Token from `Authorization: Bearer ...`, else from `?token=`. */
export function extractToken(req: Request): string | undefined {
  const header = req.header("authorization");
  if (header) {
    const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
    if (match) return match[1];
  }
  const query = req.query.token;
  return typeof query === "string" && query !== "" ? query : undefined;
}

export function authorizeRequest(
  tokens: CapabilityTokenService,
  req: Request,
  audience: CapabilityAudience,
  subject?: string,
  logger?: GatewayLogger
): void {
  const token = extractToken(req);
  const outcome = token
    ? tokens.verify(token, audience, subject)
    : { status: "invalid" as const, reason: "no token presented" };

  if (outcome.status === "authorized") return;

  const detail =
    outcome.status === "invalid"
      ? outcome.reason
      : outcome.status === "expired"
        ? `expired at ${outcome.expiredAt}`
        : outcome.status === "wrong_audience"
          ? `audience ${outcome.audience}, required ${audience}`
          : `subject ${outcome.subject ?? "(none)"}, required ${subject ?? "(none)"}`;

  writeLog(logger, "warn", "Capability token rejected", {
    event: "TOKEN_REJECTED",
    failure: outcome.status,
    audience,
    subject,
    path: req.originalUrl,
    detail,
  });

  throw new TokenRejectedError(outcome.status, detail);
}

export function requireCapability(
  tokens: CapabilityTokenService,
  audience: CapabilityAudience,
  logger?: GatewayLogger
): RequestHandler {
  return (req, _res, next) => {
    try {
      authorizeRequest(tokens, req, audience, undefined, logger);
      next();
    } catch (err) {
      next(err);
    }
  };
}
