import jwt, { type JwtPayload } from "jsonwebtoken";
import { InvalidDurationError, InvalidRequestError } from "../errors/gatewayErrors.js";

/**
 * Capability tokens are HS256 JWTs with exactly four claims:
 *
 * - `sub`: the public identifier the token is bound to (absent for the
 *   manifest and metadata-update capabilities, which span all assets)
 * - `aud`: the capability, as a three-letter code
 * - `iat` / `exp`: issue and expiry time in seconds
 *
 * `exp - iat` may not exceed the audience's maximum. There is no revocation;
 * expiry is the only way a token stops working.
 */

export const AUDIENCE_CODES = {
  preview: "pre",
  rendition: "rnd",
  original: "ori",
  manifest: "jld",
  "metadata-update": "uid",
} as const;

export type CapabilityAudience = keyof typeof AUDIENCE_CODES;

export const AUDIENCES: readonly CapabilityAudience[] = [
  "preview",
  "rendition",
  "original",
  "manifest",
  "metadata-update",
];

export const FILE_ACCESS_AUDIENCES: readonly CapabilityAudience[] = ["preview", "rendition", "original"];

/** File access tokens only ever cover one asset and must carry its identifier. */
export function requiresSubject(audience: CapabilityAudience): boolean {
  return FILE_ACCESS_AUDIENCES.includes(audience);
}

export function isCapabilityAudience(value: string): value is CapabilityAudience {
  return Object.prototype.hasOwnProperty.call(AUDIENCE_CODES, value);
}

function audienceFromCode(code: unknown): CapabilityAudience | undefined {
  return AUDIENCES.find((a) => AUDIENCE_CODES[a] === code);
}

export interface CapabilityClaims {
  sub?: string;
  aud: CapabilityAudience;
  iat: number;
  exp: number;
}

export type VerifyOutcome =
  | { status: "authorized"; claims: CapabilityClaims }
  | { status: "invalid"; reason: string }
  | { status: "expired"; expiredAt: number }
  | { status: "wrong_audience"; audience: CapabilityAudience }
  | { status: "wrong_subject"; subject?: string };

export interface CapabilityTokenServiceOptions {
  secret: string;
  maxTtlSeconds: Record<CapabilityAudience, number>;
  leewaySeconds?: number;
  now?: () => number;
}

export interface IssuedToken {
  token: string;
  audience: CapabilityAudience;
  expiresAt: number;
}

export class CapabilityTokenService {
  private now: () => number;

  constructor(private options: CapabilityTokenServiceOptions) {
    if (!options.secret) {
      throw new Error("token secret is required");
    }
    this.now = options.now ?? Date.now;
  }

  maxTtlFor(audience: CapabilityAudience): number {
    return this.options.maxTtlSeconds[audience];
  }

  issue(audience: CapabilityAudience, subject: string | undefined, ttlSeconds: number): string {
    const max = this.maxTtlFor(audience);
    if (!Number.isInteger(ttlSeconds) || ttlSeconds < 1 || ttlSeconds > max) {
      throw new InvalidDurationError(ttlSeconds, max);
    }
    if (!subject && requiresSubject(audience)) {
      throw new InvalidRequestError(`${audience} tokens must name an identifier`);
    }

    const iat = Math.floor(this.now() / 1000);
    const payload: Record<string, string | number> = {
      aud: AUDIENCE_CODES[audience],
      iat,
      exp: iat + ttlSeconds,
    };
    if (subject) payload.sub = subject;

    return jwt.sign(payload, this.options.secret, { algorithm: "HS256" });
  }

  /**
   * One token per audience at that audience's maximum lifetime. Without a
   * subject only the audiences spanning all assets are issued.
   */
  issueAll(subject: string | undefined): IssuedToken[] {
    const audiences = subject ? AUDIENCES : AUDIENCES.filter((a) => !requiresSubject(a));
    return audiences.map((audience) => {
      const ttl = this.maxTtlFor(audience);
      return {
        token: this.issue(audience, subject, ttl),
        audience,
        expiresAt: Math.floor(this.now() / 1000) + ttl,
      };
    });
  }

  verify(
    token: string,
    requiredAudience: CapabilityAudience,
    requiredSubject?: string
  ): VerifyOutcome {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: ["HS256"],
        clockTimestamp: Math.floor(this.now() / 1000),
        clockTolerance: this.options.leewaySeconds ?? 0,
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        return { status: "expired", expiredAt: Math.floor(err.expiredAt.getTime() / 1000) };
      }
      return { status: "invalid", reason: err instanceof Error ? err.message : String(err) };
    }

    const claims = this.toClaims(decoded);
    if (typeof claims === "string") {
      return { status: "invalid", reason: claims };
    }

    if (claims.aud !== requiredAudience) {
      return { status: "wrong_audience", audience: claims.aud };
    }

    if (requiredSubject !== undefined && claims.sub !== requiredSubject) {
      return { status: "wrong_subject", subject: claims.sub };
    }

    return { status: "authorized", claims };
  }

  // returns the reason as a string when the payload is not a capability token
  private toClaims(decoded: string | JwtPayload): CapabilityClaims | string {
    if (typeof decoded === "string") return "payload is not a claims object";

    const aud = audienceFromCode(decoded.aud);
    if (!aud) return "unknown audience";

    const { iat, exp, sub } = decoded;
    if (typeof iat !== "number" || typeof exp !== "number") {
      return "iat and exp are required";
    }
    if (exp - iat > this.maxTtlFor(aud)) {
      return "token lifetime exceeds the audience maximum";
    }

    return { aud, iat, exp, ...(sub ? { sub } : {}) };
  }
}
