import type { Word } from "./types.js";

export interface TriePrefixResult {
  word: Word;
  /** frequency score; UNRANKED_SCORE when the word has none */
  score: number;
}

/**
 * Read-only view of one trie node. The fuzzy matcher walks these directly so
 * both candidate sources see the same vocabulary.
 */
export interface TrieNodeView {
  readonly children: ReadonlyMap<string, TrieNodeView>;
  readonly terminal: TriePrefixResult | undefined;
}

/**
 * Prefix trie over the vocabulary.
 *
 * Contract notes:
 * - built once, then frozen; queries never mutate it
 * - `completeByPrefix` is lazy and restartable: each iteration recomputes
 *   the same sequence
 */
export interface PrefixTrie {
  readonly root: TrieNodeView;
  readonly size: number;

  has(word: Word): boolean;

  /** Up to `limit` words starting with `prefix`, score descending then lexicographic. */
  completeByPrefix(prefix: string, limit: number): Iterable<TriePrefixResult>;
}
