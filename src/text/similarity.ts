import { distance as levenshteinDistance } from "fastest-levenshtein";

/**
 * Normalised Levenshtein similarity `1 - distance / max(|a|, |b|)`, in [0, 1].
 * Two empty strings are identical.
 */
export function aliasSimilarity(a: string, b: string): number {
  if (a === b) {
    return 1;
  }
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) {
    return 1;
  }
  return 1 - levenshteinDistance(a, b) / maxLength;
}

/**
 * Upper bound of {@link aliasSimilarity} given only the two lengths. Callers
 * skip candidates whose bound already falls below their threshold.
 */
export function similarityUpperBound(lengthA: number, lengthB: number): number {
  const maxLength = Math.max(lengthA, lengthB);
  if (maxLength === 0) {
    return 1;
  }
  return 1 - Math.abs(lengthA - lengthB) / maxLength;
}
