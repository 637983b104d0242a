export { similarity } from './suggestion-types.js';
export type { Similarity, FuzzyCandidate, ScoredCandidate } from './suggestion-types.js';
export { DEFAULT_SUGGESTION_CONFIG } from './suggestion-config.js';
export type { SuggestionConfig } from './suggestion-config.js';
export {
  SEGMENT_SEPARATOR,
  levenshteinDistance,
  computeSimilarity,
  normalizeSegments,
  tokenSortSimilarity,
  tokenSetSimilarity,
  scoreCandidate,
} from './string-similarity.js';
export { FuzzyMatcher, pathSegments } from './fuzzy-matcher.js';
export { describeNotFound } from './not-found-message.js';
