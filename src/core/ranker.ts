import type { CompletionItem, FuzzyCandidate } from "./types.js";
import type { TriePrefixResult } from "./trie.js";

/**
 * Merges the two candidate sources of one completion query into a single
 * ranked, deduplicated list.
 *
 * Ordering: frequency tier (higher first), then prefix before fuzzy, then
 * score, then edit distance, then the word itself. A word present in both
 * sources is kept once, as a prefix match.
 */
export interface Ranker {
  merge(prefix: Iterable<TriePrefixResult>, fuzzy: Iterable<FuzzyCandidate>, limit: number): CompletionItem[];
}
