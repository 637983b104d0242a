/**
 * Domain types for "did you mean" suggestions.
 *
 * @module suggestions/suggestion-types
 */

/**
 * Similarity score: 0 (completely different) to 1 (identical).
 * Branded to prevent accidental mixing with arbitrary numbers.
 */
export type Similarity = number & { readonly __brand: 'Similarity' };

/**
 * Create a Similarity value, clamping to valid range [0, 1].
 */
export function similarity(n: number): Similarity {
  return Math.max(0, Math.min(1, n)) as Similarity;
}

/**
 * A candidate offered to the matcher.
 *
 * `segments` is what gets scored, `display` is what gets shown to the user.
 */
export interface FuzzyCandidate<T> {
  readonly item: T;
  readonly segments: readonly string[];
  readonly display: string;
}

export interface ScoredCandidate<T> {
  readonly item: T;
  readonly display: string;
  readonly score: Similarity;
}
