import type { FrequencyTable } from "../frequency.js";
import { normalizeWord, type FrequencyRecord, type Word } from "../types.js";

export class MemoryFrequencyTable implements FrequencyTable {
  private readonly scores = new Map<Word, number>();

  constructor(records: Iterable<FrequencyRecord> = []) {
    for (const { word, score } of records) {
      const key = normalizeWord(word);
      if (!key.length) continue;
      const prev = this.scores.get(key);
      if (prev === undefined || score > prev) this.scores.set(key, score);
    }
  }

  static empty(): MemoryFrequencyTable {
    return new MemoryFrequencyTable();
  }

  get size(): number {
    return this.scores.size;
  }

  score(word: Word): number | undefined {
    return this.scores.get(normalizeWord(word));
  }

  has(word: Word): boolean {
    return this.scores.has(normalizeWord(word));
  }

  words(): Iterable<Word> {
    return this.scores.keys();
  }
}
