import { createHash } from "node:crypto";

/** Control characters stripped from every upstream string. */
const CONTROL_CHARACTERS = /[\u0000-\u001F\u007F-\u009F]/gu;

/**
 * Word pattern shared by alias canonicalisation and query tokenisation. Inner
 * hyphens, apostrophes and dots are kept so identifiers such as `INSAT-3D` or
 * `U.S` stay a single token.
 */
const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:[-'.][\p{L}\p{N}]+)*/gu;

/** Function words never worth matching fuzzily against entity aliases. */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  "a", "about", "an", "and", "are", "as", "at", "be", "by", "does", "for", "from",
  "how", "in", "is", "it", "of", "on", "or", "tell", "the", "to", "was", "what",
  "when", "where", "which", "who", "why", "with",
]);

/**
 * Removes control characters and collapses runs of whitespace. Applied to
 * every mention, triple component, chunk and FAQ field before anything else.
 */
export function sanitizeText(value: string): string {
  return value.replace(CONTROL_CHARACTERS, " ").replace(/\s+/gu, " ").trim();
}

/** Splits text into lower-case word tokens. */
export function tokenise(value: string): string[] {
  const normalised = sanitizeText(value).normalize("NFKC").toLowerCase();
  return normalised.match(TOKEN_PATTERN) ?? [];
}

/**
 * Canonical alias key: lower-cased tokens joined by single spaces. Surface
 * forms differing only by case, punctuation or spacing share one key. Returns
 * an empty string when the input carries no word characters.
 */
export function canonicalAlias(value: string): string {
  return tokenise(value).join(" ");
}

/** Short content fingerprint used to deduplicate snippets sharing a document. */
export function fingerprint(value: string): string {
  return createHash("sha256").update(canonicalAlias(value)).digest("hex").slice(0, 16);
}

/** Content-derived identifier: `<prefix>_` followed by a sha256 prefix of the parts. */
export function contentId(prefix: string, ...parts: string[]): string {
  const digest = createHash("sha256").update(parts.join("\u001f")).digest("hex");
  return `${prefix}_${digest.slice(0, 16)}`;
}

/** Truncates text to {@link maxChars}, marking the cut with an ellipsis. */
export function truncateText(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxChars - 1)).trimEnd()}…`;
}

/** Code-point ordering, independent of the host locale. */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
