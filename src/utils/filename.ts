/**
 * Filename Normalizer
 * Turns arbitrary video titles into filesystem-safe, length-bounded base names.
 *
 * The same function names output files and compares titles during audits,
 * so any change here invalidates names generated by earlier runs.
 */

/** Characters rejected by common filesystems (plus control characters). */
const ILLEGAL_CHARACTERS = /[|,/\\:*?<>"\u0000-\u001f\u007f]/g;

const IDEOGRAPHIC_SPACE = /\u3000/g;

export const FALLBACK_NAME = "untitled";

/**
 * Cuts a string to at most `maxLength` UTF-16 code units.
 * Never leaves half of a surrogate pair at the end.
 */
export function truncateToLength(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }

  let result = "";
  for (const char of value) {
    if (result.length + char.length > maxLength) {
      break;
    }
    result += char;
  }
  return result;
}

/**
 * Normalizes a title into a base filename (no extension).
 *
 * NFKC, ideographic space to ASCII space, illegal characters removed,
 * whitespace runs joined with "_", then truncated to `maxLength`.
 */
export function normalizeTitle(title: string, maxLength: number): string {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got: ${maxLength}`);
  }

  const cleaned = title
    .normalize("NFKC")
    .replace(IDEOGRAPHIC_SPACE, " ")
    .replace(ILLEGAL_CHARACTERS, "")
    .trim()
    .replace(/\s+/g, "_")
    // removals can leave combining sequences that compose differently
    .normalize("NFKC");

  // fall back after truncating: a leading pair wider than maxLength truncates to ""
  return truncateToLength(cleaned, maxLength) || truncateToLength(FALLBACK_NAME, maxLength);
}

/**
 * Builds the `<base>_<n>` candidate used when a name is already taken,
 * shortening the base so the whole candidate still fits in `maxLength`.
 *
 * Returns null when `_<n>` alone is longer than `maxLength`; every later
 * attempt is at least as long.
 */
export function withNumericSuffix(base: string, attempt: number, maxLength: number): string | null {
  if (attempt === 0) {
    return base;
  }
  const suffix = `_${attempt}`;
  if (suffix.length > maxLength) {
    return null;
  }
  const room = Math.max(0, maxLength - suffix.length);
  return `${truncateToLength(base, room)}${suffix}`;
}
