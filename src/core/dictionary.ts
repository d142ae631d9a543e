import type { TriePrefixResult } from "./trie.js";
import type { DictionaryEntry, FuzzyCandidate, Word } from "./types.js";

/**
 * Exact, case-insensitive word lookup. An empty result means the word is
 * unknown; that is not an error.
 */
export interface DictionaryStore {
  lookup(word: string): readonly DictionaryEntry[];
}

/** Backend whose whole vocabulary fits in memory and can be enumerated. */
export interface IterableDictionaryStore extends DictionaryStore {
  readonly size: number;
  words(): Iterable<Word>;
}

/**
 * Backend with its own indexed search, used instead of the trie when the
 * vocabulary is not enumerated up front.
 */
export interface SearchableDictionaryStore extends DictionaryStore {
  readonly size: number;
  searchPrefix(prefix: string, limit: number): TriePrefixResult[];
  searchFuzzy(query: string, maxDistance: number, limit: number): FuzzyCandidate[];
  close(): void;
}

/** Chosen once at startup from the configured dictionary path. */
export type DictionaryBackend =
  | { kind: "indexed"; store: IterableDictionaryStore }
  | { kind: "delegated"; store: SearchableDictionaryStore };
