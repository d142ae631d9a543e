import type { Word } from "./types.js";

/** Word popularity, used only to order otherwise-equal candidates. Loaded once. */
export interface FrequencyTable {
  readonly size: number;
  score(word: Word): number | undefined;
  has(word: Word): boolean;
  words(): Iterable<Word>;
}
