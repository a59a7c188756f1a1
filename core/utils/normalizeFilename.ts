/** Path segment that asks for the asset's own name instead of a caller-chosen one. */
export const DEFAULT_FILENAME = "getfile";

const DEFAULT_MAX_LENGTH = 128;
const CONTROL_CHARS_REGEX = /[\x00-\x1F\x7F]/g;
const UNSAFE_CHARS_REGEX = /["\\/]/g;

/** "Harbour View_2024" -> "harbour-view-2024" */
export function slugify(input: string): string {
  return input
    .normalize("NFKC")
    .toLowerCase()
    .trim()
    .replace(/[^\s\p{L}\p{N}_-]/gu, "")
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Slugs the part before the first dot and keeps every extension:
 * "Harbour View.tar.gz" -> "harbour-view.tar.gz".
 */
export function slugFilename(filename: string): string {
  const dot = filename.indexOf(".");
  const base = dot >= 0 ? filename.slice(0, dot) : filename;
  const ext = dot >= 0 ? filename.slice(dot).replace(CONTROL_CHARS_REGEX, "") : "";
  return (slugify(base) || "file") + ext;
}

/** Name before the first dot. */
export function baseName(filename: string): string {
  const dot = filename.indexOf(".");
  return dot >= 0 ? filename.slice(0, dot) : filename;
}

export function normalizeFilename(
  requested: string,
  original: string,
  options: { maxLength?: number } = {}
) {
  const { maxLength = DEFAULT_MAX_LENGTH } = options;

  if (requested === DEFAULT_FILENAME) {
    return { filename: slugFilename(original), sanitized: true, reason: "default_filename" };
  }

  let name = requested.normalize("NFKC");
  name = name.replace(CONTROL_CHARS_REGEX, "");
  name = name.replace(UNSAFE_CHARS_REGEX, "_");
  name = name.trim();

  if (name.length > maxLength) {
    name = name.slice(0, maxLength);
  }

  if (!name) {
    return { filename: slugFilename(original), sanitized: true, reason: "fully_sanitized_empty" };
  }

  return { filename: name, sanitized: name !== requested };
}
