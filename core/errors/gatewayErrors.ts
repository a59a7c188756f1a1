export type GatewayErrorKind =
  | "INVALID_IDENTIFIER"
  | "INVALID_REQUEST"
  | "NOT_FOUND"
  | "AMBIGUOUS"
  | "BACKEND_UNAVAILABLE"
  | "WRITE_CONFLICT"
  | "TOKEN_INVALID"
  | "TOKEN_EXPIRED"
  | "TOKEN_WRONG_AUDIENCE"
  | "TOKEN_WRONG_SUBJECT"
  | "INVALID_DURATION"
  | "DATA_INTEGRITY";

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;

  constructor(kind: GatewayErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayError";
    this.kind = kind;
  }
}

export class InvalidIdentifierError extends GatewayError {
  constructor(readonly identifier: string) {
    super("INVALID_IDENTIFIER", `Malformed identifier: ${identifier}`);
    this.name = "InvalidIdentifierError";
  }
}

export class InvalidRequestError extends GatewayError {
  constructor(message: string) {
    super("INVALID_REQUEST", message);
    this.name = "InvalidRequestError";
  }
}

export class AssetNotFoundError extends GatewayError {
  constructor(readonly ref: string) {
    super("NOT_FOUND", `No asset for ${ref}`);
    this.name = "AssetNotFoundError";
  }
}

/** Transport or backend failure. The core never retries these. */
export class BackendUnavailableError extends GatewayError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("BACKEND_UNAVAILABLE", message, { cause: options?.cause });
    this.name = "BackendUnavailableError";
    this.status = options?.status;
  }
}

/** The backend refused a write because the target field already holds a value. */
export class WriteConflictError extends GatewayError {
  constructor(readonly ref: string, readonly fields: readonly string[]) {
    super("WRITE_CONFLICT", `Metadata already set on ${ref}: ${fields.join(", ")}`);
    this.name = "WriteConflictError";
  }
}

export class InvalidDurationError extends GatewayError {
  constructor(readonly requestedSeconds: number, readonly maxSeconds: number) {
    super(
      "INVALID_DURATION",
      `Token duration ${requestedSeconds}s is not within 1..${maxSeconds}s`
    );
    this.name = "InvalidDurationError";
  }
}

/** More than one backend asset carries the same public identifier. */
export class DataIntegrityError extends GatewayError {
  constructor(message: string, readonly backendIds: readonly string[]) {
    super("DATA_INTEGRITY", message);
    this.name = "DataIntegrityError";
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

export type TokenFailure = "invalid" | "expired" | "wrong_audience" | "wrong_subject";

const TOKEN_FAILURE_KINDS: Record<TokenFailure, GatewayErrorKind> = {
  invalid: "TOKEN_INVALID",
  expired: "TOKEN_EXPIRED",
  wrong_audience: "TOKEN_WRONG_AUDIENCE",
  wrong_subject: "TOKEN_WRONG_SUBJECT",
};

/** Any capability token failure. Clients only ever see "unauthorized". */
export class TokenRejectedError extends GatewayError {
  constructor(readonly failure: TokenFailure, detail: string) {
    super(TOKEN_FAILURE_KINDS[failure], `Token rejected (${failure}): ${detail}`);
    this.name = "TokenRejectedError";
  }
}
