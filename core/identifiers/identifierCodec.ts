import crypto from "crypto";

/**
 * Public identifiers are 128 random bits in unpadded, lowercase base-32
 * (RFC 4648 alphabet), behind one prefix letter so that the identifier never
 * starts with a digit and can serve as an XML/C-style local name.
 */

export type PublicIdentifier = string;

export const IDENTIFIER_PREFIXES = "rjkmtvyz";
export const IDENTIFIER_LENGTH = 27;
export const IDENTIFIER_PATTERN = /^[rjkmtvyz][a-z2-7]+$/;

const BASE32_ALPHABET = "abcdefghijklmnopqrstuvwxyz234567";

export function base32Encode(bytes: Uint8Array): string {
  let out = "";
  let buffer = 0;
  let bits = 0;

  for (const byte of bytes) {
    buffer = (buffer << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      out += BASE32_ALPHABET[(buffer >>> (bits - 5)) & 31];
      bits -= 5;
    }
    buffer &= (1 << bits) - 1;
  }

  if (bits > 0) {
    out += BASE32_ALPHABET[(buffer << (5 - bits)) & 31];
  }

  return out;
}

/**
 * Builds an identifier from 16 bytes and a prefix index. Exposed separately
 * from {@link mintIdentifier} so callers with their own entropy can reuse it.
 */
export function encodeIdentifier(bytes: Uint8Array, prefixIndex: number): PublicIdentifier {
  if (bytes.length !== 16) {
    throw new RangeError(`expected 16 bytes, got ${bytes.length}`);
  }
  const prefix = IDENTIFIER_PREFIXES.charAt(prefixIndex);
  if (!prefix) {
    throw new RangeError(`prefix index out of range: ${prefixIndex}`);
  }
  return prefix + base32Encode(bytes);
}

export function mintIdentifier(): PublicIdentifier {
  return encodeIdentifier(
    crypto.randomBytes(16),
    crypto.randomInt(IDENTIFIER_PREFIXES.length)
  );
}

export function isPublicIdentifier(value: unknown): value is PublicIdentifier {
  return (
    typeof value === "string" &&
    value.length === IDENTIFIER_LENGTH &&
    IDENTIFIER_PATTERN.test(value)
  );
}

// identifiers are case-insensitive; callers fold before validating
export function normalizeIdentifier(raw: string): string {
  return raw.trim().toLowerCase();
}
