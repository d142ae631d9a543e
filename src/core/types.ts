/** Shared core types used by module contracts. */

/** Case-folded dictionary key. */
export type Word = string;
export type DocumentUri = string;

/** One part of speech and its ordered senses (definition/example text, opaque here). */
export interface Sense {
  partOfSpeech: string;
  definitions: readonly string[];
}

export interface DictionaryEntry {
  word: Word;
  senses: readonly Sense[];
}

/** Higher score = more frequent. */
export interface FrequencyRecord {
  word: Word;
  score: number;
}

/** Score given to vocabulary words that have no frequency record. */
export const UNRANKED_SCORE = Number.NEGATIVE_INFINITY;

export interface FuzzyCandidate {
  word: Word;
  distance: number;
  score: number;
}

export type CompletionSource = "prefix" | "fuzzy";

export interface CompletionItem {
  word: Word;
  source: CompletionSource;
  /** final rank score (the word's frequency score) */
  score: number;
  /** edit distance from the query; 0 for prefix matches */
  distance: number;
}

/** 0-based line and UTF-16 character offset, as editors send them. */
export interface Position {
  line: number;
  character: number;
}

export interface Span {
  start: Position;
  end: Position;
}

export function normalizeWord(word: string): Word {
  return word.toLowerCase();
}
