import type { ErrorRequestHandler } from "express";
import { isGatewayError, type GatewayErrorKind } from "../errors/gatewayErrors.js";
import { writeLog, type GatewayLogger } from "../logging/createLogger.js";

export interface PublicErrorBody {
  error: string;
  code?: string;
}

export class PublicError extends Error {
  statusCode: number;
  code?: string;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = "BAD_REQUEST"
  ) {
    super(message);
    this.name = "PublicError";
    this.statusCode = statusCode;
    this.code = code;
  }
}

// Token failure kinds collapse into one public answer; the kind only reaches the log.
const PUBLIC_ERRORS: Record<GatewayErrorKind, { status: number; message: string; code: string }> = {
  INVALID_IDENTIFIER: { status: 422, message: "Invalid identifier", code: "INVALID_IDENTIFIER" },
  INVALID_REQUEST: { status: 400, message: "Bad request", code: "BAD_REQUEST" },
  NOT_FOUND: { status: 404, message: "Not found", code: "NOT_FOUND" },
  AMBIGUOUS: { status: 404, message: "Not found", code: "NOT_FOUND" },
  BACKEND_UNAVAILABLE: { status: 502, message: "Backend unavailable", code: "BACKEND_UNAVAILABLE" },
  WRITE_CONFLICT: { status: 409, message: "Conflict", code: "CONFLICT" },
  TOKEN_INVALID: { status: 401, message: "Unauthorized", code: "UNAUTHORIZED" },
  TOKEN_EXPIRED: { status: 401, message: "Unauthorized", code: "UNAUTHORIZED" },
  TOKEN_WRONG_AUDIENCE: { status: 401, message: "Unauthorized", code: "UNAUTHORIZED" },
  TOKEN_WRONG_SUBJECT: { status: 401, message: "Unauthorized", code: "UNAUTHORIZED" },
  INVALID_DURATION: { status: 400, message: "Invalid token duration", code: "INVALID_DURATION" },
  DATA_INTEGRITY: { status: 500, message: "internal server error", code: "DATA_INTEGRITY" },
};

const CLIENT_ERRORS: Record<number, { message: string; code: string }> = {
  413: { message: "Payload too large", code: "PAYLOAD_TOO_LARGE" },
  415: { message: "Unsupported media type", code: "UNSUPPORTED_MEDIA_TYPE" },
};

// express.json and other middleware tag request errors with status/statusCode
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status =
    "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Maps any thrown value to the error a client may see. Request-shaped
 * gateway errors keep their own message so callers can fix the request.
 */
export function toPublicError(err: unknown): PublicError {
  if (err instanceof PublicError) return err;

  if (isGatewayError(err)) {
    const mapped = PUBLIC_ERRORS[err.kind];
    const message =
      err.kind === "INVALID_REQUEST" || err.kind === "INVALID_DURATION"
        ? err.message
        : mapped.message;
    return new PublicError(message, mapped.status, mapped.code);
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    const mapped = CLIENT_ERRORS[status] ?? { message: "Bad request", code: "BAD_REQUEST" };
    return new PublicError(mapped.message, status, mapped.code);
  }

  return new PublicError("internal server error", 500, "INTERNAL");
}

export function createErrorHandler(options: {
  logger?: GatewayLogger;
  isProd: boolean;
}): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const publicError = toPublicError(err);
    const status = publicError.statusCode;
    const known = err instanceof PublicError || isGatewayError(err) || status < 500;
    const internalMessage = err instanceof Error ? err.message : String(err);

    writeLog(options.logger, status >= 500 ? "error" : "warn", "HTTP handler error", {
      method: req.method,
      path: req.originalUrl,
      status,
      kind: isGatewayError(err) ? err.kind : undefined,
      error: internalMessage,
    });

    const body: PublicErrorBody = {
      error:
        known || options.isProd
          ? publicError.message
          : internalMessage,
      ...(publicError.code ? { code: publicError.code } : {}),
    };

    res.status(status).json(body);
  };
}
