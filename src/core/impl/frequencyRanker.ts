import type { TopKSelector } from "../heap.js";
import type { Ranker } from "../ranker.js";
import type { TriePrefixResult } from "../trie.js";
import type { CompletionItem, FuzzyCandidate, Word } from "../types.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import { byScoreDesc, byWord } from "./order.js";

/** Order-of-magnitude bucket; unranked words sit below every real tier. */
export function frequencyTier(score: number): number {
  if (!Number.isFinite(score) || score < 0) return -1;
  return Math.floor(Math.log10(score + 1));
}

export function compareCompletions(a: CompletionItem, b: CompletionItem): number {
  return (
    frequencyTier(b.score) - frequencyTier(a.score) ||
    sourceRank(a) - sourceRank(b) ||
    byScoreDesc(a.score, b.score) ||
    a.distance - b.distance ||
    byWord(a.word, b.word)
  );
}

function sourceRank(item: CompletionItem): number {
  return item.source === "prefix" ? 0 : 1;
}

export class FrequencyRanker implements Ranker {
  constructor(private readonly selector: TopKSelector<CompletionItem> = new MinHeapTopKSelector()) {}

  merge(prefix: Iterable<TriePrefixResult>, fuzzy: Iterable<FuzzyCandidate>, limit: number): CompletionItem[] {
    const byWordKey = new Map<Word, CompletionItem>();

    for (const p of prefix) {
      byWordKey.set(p.word, { word: p.word, source: "prefix", score: p.score, distance: 0 });
    }
    for (const f of fuzzy) {
      const seen = byWordKey.get(f.word);
      if (seen && (seen.source === "prefix" || seen.distance <= f.distance)) continue;
      byWordKey.set(f.word, { word: f.word, source: "fuzzy", score: f.score, distance: f.distance });
    }

    return this.selector.topK(byWordKey.values(), limit, compareCompletions);
  }
}
