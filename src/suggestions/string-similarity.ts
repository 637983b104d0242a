/**
 * String Similarity Utilities
 *
 * Pure functions for computing string similarity.
 * Used for "did you mean?" suggestions on failed lookups.
 *
 * @module suggestions/string-similarity
 */

import { similarity, type Similarity } from './suggestion-types.js';

/**
 * Separator used to join path segments before scoring.
 * NUL cannot occur inside a real path segment, so `a/b` and `a\b` stay distinct.
 */
export const SEGMENT_SEPARATOR = '\u0000';

/**
 * Weight applied to token-based ratios, so an exact character match always
 * outranks a match that needed token reordering.
 */
const TOKEN_RATIO_WEIGHT = 0.95;

/**
 * Compute Levenshtein (edit) distance between two strings.
 *
 * Minimum number of single-character insertions, deletions and substitutions to
 * transform a into b. O(n * m) time, O(min(n, m)) space.
 */
export function levenshteinDistance(a: string, b: string): number {
  // Ensure a is the shorter string for space optimization
  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  const m = a.length;
  const n = b.length;

  if (m === 0) return n;
  if (n === 0) return m;

  let prevRow = new Array<number>(m + 1);
  let currRow = new Array<number>(m + 1);

  for (let i = 0; i <= m; i++) {
    prevRow[i] = i;
  }

  for (let j = 1; j <= n; j++) {
    currRow[0] = j;

    for (let i = 1; i <= m; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        prevRow[i] + 1,      // deletion
        currRow[i - 1] + 1,  // insertion
        prevRow[i - 1] + cost // substitution
      );
    }

    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[m];
}

/**
 * Normalized similarity: 1 - distance / longest length.
 */
export function computeSimilarity(a: string, b: string): Similarity {
  if (a === b) return similarity(1);
  if (a.length === 0 || b.length === 0) return similarity(0);

  const distance = levenshteinDistance(a, b);
  const maxLength = Math.max(a.length, b.length);

  return similarity(1 - distance / maxLength);
}

/**
 * Join segments into the normalized, case-folded form that gets scored.
 */
export function normalizeSegments(segments: readonly string[]): string {
  return segments.map((s) => s.toLowerCase()).join(SEGMENT_SEPARATOR);
}

function tokensOf(normalized: string): string[] {
  return normalized.split(SEGMENT_SEPARATOR).filter((t) => t.length > 0);
}

function joinTokens(...parts: readonly string[][]): string {
  return parts.flat().join(SEGMENT_SEPARATOR);
}

/**
 * Similarity after sorting both token lists, so reordered segments still match.
 */
export function tokenSortSimilarity(a: string, b: string): Similarity {
  return computeSimilarity(joinTokens(tokensOf(a).sort()), joinTokens(tokensOf(b).sort()));
}

/**
 * Similarity over the shared tokens plus each side's remainder.
 * A query whose tokens are all contained in the candidate scores 1.
 */
export function tokenSetSimilarity(a: string, b: string): Similarity {
  const tokensA = new Set(tokensOf(a));
  const tokensB = new Set(tokensOf(b));

  const shared = [...tokensA].filter((t) => tokensB.has(t)).sort();
  const onlyA = [...tokensA].filter((t) => !tokensB.has(t)).sort();
  const onlyB = [...tokensB].filter((t) => !tokensA.has(t)).sort();

  if (shared.length === 0) {
    return computeSimilarity(joinTokens(onlyA), joinTokens(onlyB));
  }

  const base = joinTokens(shared);
  const withA = joinTokens(shared, onlyA);
  const withB = joinTokens(shared, onlyB);

  return similarity(
    Math.max(
      computeSimilarity(base, withA),
      computeSimilarity(base, withB),
      computeSimilarity(withA, withB)
    )
  );
}

/**
 * Token-aware, case-insensitive score of a candidate against a query.
 *
 * Both arguments are normalized strings (see normalizeSegments).
 * The score is the best of the plain ratio and the weighted token ratios.
 */
export function scoreCandidate(normalizedQuery: string, normalizedCandidate: string): Similarity {
  const plain = computeSimilarity(normalizedQuery, normalizedCandidate);
  if (plain === 1) return plain;

  const sorted = tokenSortSimilarity(normalizedQuery, normalizedCandidate) * TOKEN_RATIO_WEIGHT;
  const set = tokenSetSimilarity(normalizedQuery, normalizedCandidate) * TOKEN_RATIO_WEIGHT;

  return similarity(Math.max(plain, sorted, set));
}
