import { NEVER_CANCELLED, throwIfCancelled, type CancellationToken } from "../cancellation.js";
import type { DictionaryBackend, DictionaryStore, IterableDictionaryStore } from "../dictionary.js";
import type { FrequencyTable } from "../frequency.js";
import type { Ranker } from "../ranker.js";
import type { TriePrefixResult } from "../trie.js";
import { normalizeWord, UNRANKED_SCORE, type CompletionItem, type DictionaryEntry, type FuzzyCandidate } from "../types.js";
import { FrequencyRanker } from "./frequencyRanker.js";
import { MemoryTrie } from "./memoryTrie.js";
import { byScoreDesc, byWord } from "./order.js";
import { TrieFuzzyMatcher } from "./trieFuzzyMatcher.js";

export interface LookupOptions {
  /** fuzzy completion bound */
  maxDistance: number;
  /** completion list cap */
  maxItems: number;
  /** shorter prefixes get prefix matches only */
  minFuzzyLength: number;
  /** on an exact miss, define the closest word within min(2, maxDistance) */
  fuzzyFallback: boolean;
}

export const DEFAULT_LOOKUP_OPTIONS: LookupOptions = Object.freeze({
  maxDistance: 2,
  maxItems: 20,
  minFuzzyLength: 3,
  fuzzyFallback: true,
});

/** The two candidate sources, whichever backend provides them. */
export interface CandidateSearch {
  prefix(prefix: string, limit: number): Iterable<TriePrefixResult>;
  fuzzy(query: string, maxDistance: number, token: CancellationToken): Promise<FuzzyCandidate[]>;
}

export interface DefineResult {
  entry: DictionaryEntry;
  /** false when the entry came from the fuzzy fallback */
  exact: boolean;
}

export interface EngineStats {
  kind: DictionaryBackend["kind"];
  vocabulary: number;
  buildMs: number;
}

export interface EngineDeps {
  dictionary: DictionaryStore;
  search: CandidateSearch;
  ranker?: Ranker;
  options?: Partial<LookupOptions>;
  stats: EngineStats;
}

const FALLBACK_DISTANCE = 2;
const DELEGATED_FUZZY_FETCH = 200;

export class LookupEngine {
  readonly options: LookupOptions;
  private readonly ranker: Ranker;

  constructor(private readonly deps: EngineDeps) {
    this.options = Object.freeze({ ...DEFAULT_LOOKUP_OPTIONS, ...deps.options });
    this.ranker = deps.ranker ?? new FrequencyRanker();
  }

  stats(): EngineStats {
    return this.deps.stats;
  }

  lookup(word: string): readonly DictionaryEntry[] {
    return this.deps.dictionary.lookup(word);
  }

  async define(word: string, token: CancellationToken = NEVER_CANCELLED): Promise<DefineResult | undefined> {
    const key = normalizeWord(word);
    if (!key.length) return undefined;

    const exact = this.deps.dictionary.lookup(key)[0];
    if (exact) return { entry: exact, exact: true };
    if (!this.options.fuzzyFallback) return undefined;

    const bound = Math.min(FALLBACK_DISTANCE, this.options.maxDistance);
    if (bound <= 0) return undefined;

    for (const candidate of await this.deps.search.fuzzy(key, bound, token)) {
      const entry = this.deps.dictionary.lookup(candidate.word)[0];
      if (entry) return { entry, exact: false };
    }
    return undefined;
  }

  async complete(prefix: string, token: CancellationToken = NEVER_CANCELLED): Promise<CompletionItem[]> {
    const key = normalizeWord(prefix);
    if (!key.length) return [];
    const { maxItems, maxDistance, minFuzzyLength } = this.options;

    throwIfCancelled(token);
    const byPrefix = Array.from(this.deps.search.prefix(key, maxItems));

    throwIfCancelled(token);
    const fuzzy = maxDistance > 0 && key.length >= minFuzzyLength ? await this.deps.search.fuzzy(key, maxDistance, token) : [];

    return this.ranker.merge(byPrefix, fuzzy, maxItems);
  }
}

/** Vocabulary = dictionary words plus frequency-only words. */
function* vocabulary(store: IterableDictionaryStore, frequencies: FrequencyTable): Generator<TriePrefixResult> {
  for (const word of store.words()) yield { word, score: frequencies.score(word) ?? UNRANKED_SCORE };
  yield* frequencyWords(frequencies);
}

function* frequencyWords(frequencies: FrequencyTable): Generator<TriePrefixResult> {
  for (const word of frequencies.words()) yield { word, score: frequencies.score(word) ?? UNRANKED_SCORE };
}

/**
 * Wires the engine for the configured backend. Indexed backends get a trie
 * and a trie-walking fuzzy matcher built here, once. Delegated backends
 * answer for their own words; a trie over the frequency table adds the
 * frequency-only words, and the ranker folds duplicates.
 */
export function createLookupEngine(
  backend: DictionaryBackend,
  frequencies: FrequencyTable,
  options: Partial<LookupOptions> = {},
): LookupEngine {
  const started = Date.now();

  switch (backend.kind) {
    case "indexed": {
      const trie = MemoryTrie.build(vocabulary(backend.store, frequencies));
      const matcher = new TrieFuzzyMatcher(trie);
      return new LookupEngine({
        dictionary: backend.store,
        search: {
          prefix: (p, limit) => trie.completeByPrefix(p, limit),
          fuzzy: (q, d, token) => matcher.fuzzyMatchAsync(q, d, token),
        },
        options,
        stats: { kind: backend.kind, vocabulary: trie.size, buildMs: Date.now() - started },
      });
    }
    case "delegated": {
      const store = backend.store;
      const extra = MemoryTrie.build(frequencyWords(frequencies));
      const matcher = new TrieFuzzyMatcher(extra);
      return new LookupEngine({
        dictionary: store,
        search: {
          prefix: (p, limit) => [...store.searchPrefix(p, limit), ...extra.completeByPrefix(p, limit)],
          fuzzy: async (q, d, token) => {
            throwIfCancelled(token);
            const own = store.searchFuzzy(q, d, DELEGATED_FUZZY_FETCH);
            const merged = [...own, ...(await matcher.fuzzyMatchAsync(q, d, token))];
            return merged.sort((a, b) => a.distance - b.distance || byScoreDesc(a.score, b.score) || byWord(a.word, b.word));
          },
        },
        options,
        stats: { kind: backend.kind, vocabulary: store.size, buildMs: Date.now() - started },
      });
    }
  }
}
