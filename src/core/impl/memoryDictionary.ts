import type { IterableDictionaryStore } from "../dictionary.js";
import { normalizeWord, type DictionaryEntry, type Sense, type Word } from "../types.js";

/**
 * In-memory dictionary keyed by case-folded word.
 *
 * Entries whose keys fold together ("Polish", "polish") are merged: senses
 * for the same part of speech are appended in input order.
 */
export class MemoryDictionaryStore implements IterableDictionaryStore {
  private readonly entries = new Map<Word, DictionaryEntry>();

  constructor(input: Iterable<DictionaryEntry>) {
    const draft = new Map<Word, Map<string, string[]>>();

    for (const entry of input) {
      const key = normalizeWord(entry.word);
      if (!key.length) continue;
      let senses = draft.get(key);
      if (!senses) {
        senses = new Map();
        draft.set(key, senses);
      }
      for (const s of entry.senses) {
        const defs = senses.get(s.partOfSpeech);
        if (defs) defs.push(...s.definitions);
        else senses.set(s.partOfSpeech, [...s.definitions]);
      }
    }

    for (const [word, senses] of draft) {
      const frozen: Sense[] = [];
      for (const [partOfSpeech, definitions] of senses) {
        frozen.push(Object.freeze({ partOfSpeech, definitions: Object.freeze(definitions) }));
      }
      this.entries.set(word, Object.freeze({ word, senses: Object.freeze(frozen) }));
    }
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(word: string): readonly DictionaryEntry[] {
    const entry = this.entries.get(normalizeWord(word));
    return entry ? [entry] : [];
  }

  words(): Iterable<Word> {
    return this.entries.keys();
  }
}
