import type { CancellationToken } from "./cancellation.js";
import type { FuzzyCandidate } from "./types.js";

/**
 * Bounded edit-distance search over the vocabulary.
 *
 * Distance is plain Levenshtein: insertion, deletion, substitution, each cost 1.
 * Adjacent transpositions count as two edits.
 */
export interface FuzzyMatcher {
  /**
   * Every vocabulary word within `maxDistance` of `query`, and no other.
   * Throws RequestCancelledError once `token` is cancelled.
   */
  fuzzyMatch(query: string, maxDistance: number, token?: CancellationToken): FuzzyCandidate[];

  /** fuzzyMatch that yields to the event loop while it walks, so a late cancel stops it. */
  fuzzyMatchAsync(query: string, maxDistance: number, token?: CancellationToken): Promise<FuzzyCandidate[]>;
}
