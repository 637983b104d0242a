/**
 * Ranks candidates against a failed lookup to produce "did you mean" lists.
 *
 * Deterministic for a fixed candidate enumeration order: scores are pure and the
 * sort is stable, so equal scores keep discovery order.
 *
 * @module suggestions/fuzzy-matcher
 */

import type { FuzzyCandidate, ScoredCandidate } from './suggestion-types.js';
import type { SuggestionConfig } from './suggestion-config.js';
import { DEFAULT_SUGGESTION_CONFIG } from './suggestion-config.js';
import { normalizeSegments, scoreCandidate } from './string-similarity.js';

/**
 * Split a relative path on `/` only, dropping empty segments.
 */
export function pathSegments(path: string): string[] {
  return path.split('/').filter((s) => s.length > 0);
}

export class FuzzyMatcher {
  constructor(private readonly config: SuggestionConfig = DEFAULT_SUGGESTION_CONFIG) {}

  get settings(): SuggestionConfig {
    return this.config;
  }

  rank<T>(querySegments: readonly string[], candidates: Iterable<FuzzyCandidate<T>>): readonly ScoredCandidate<T>[] {
    const query = normalizeSegments(querySegments);
    const scored: ScoredCandidate<T>[] = [];

    for (const candidate of candidates) {
      const score = scoreCandidate(query, normalizeSegments(candidate.segments));
      if (score >= this.config.minScore) {
        scored.push({ item: candidate.item, display: candidate.display, score });
      }
    }

    // Array.prototype.sort is stable: ties keep discovery order.
    scored.sort((a, b) => b.score - a.score);

    return scored.slice(0, this.config.maxResults);
  }

  /**
   * Suggest relative paths close to `query`.
   */
  suggestPaths(query: string, paths: Iterable<string>): readonly string[] {
    return this.rank(pathSegments(query), mapIterable(paths, (p) => ({ item: p, segments: pathSegments(p), display: p })))
      .map((c) => c.display);
  }

  /**
   * Suggest opaque names (module names, location names) close to `query`.
   * Names are scored whole; they are never split into segments.
   */
  suggestNames(query: string, names: Iterable<string>): readonly string[] {
    return this.rank([query], mapIterable(names, (n) => ({ item: n, segments: [n], display: n })))
      .map((c) => c.display);
  }
}

function* mapIterable<T, U>(items: Iterable<T>, fn: (item: T) => U): Iterable<U> {
  for (const item of items) {
    yield fn(item);
  }
}
