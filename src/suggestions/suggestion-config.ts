/**
 * Configuration for lookup suggestions.
 *
 * Passed explicitly into container groups and module partitions; there is no
 * process-wide matcher state.
 *
 * @module suggestions/suggestion-config
 */

import { similarity, type Similarity } from './suggestion-types.js';

export interface SuggestionConfig {
  /**
   * Minimum similarity score (0-1) a candidate needs to be suggested.
   */
  readonly minScore: Similarity;

  /**
   * Maximum number of suggestions per failed lookup.
   */
  readonly maxResults: number;
}

export const DEFAULT_SUGGESTION_CONFIG: SuggestionConfig = {
  minScore: similarity(0.75),
  maxResults: 5,
} as const;
