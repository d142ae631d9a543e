import type { Position, Span } from "./types.js";

/**
 * Which characters make up a word. Joiners (hyphen, apostrophe) only count
 * when both neighbours are word characters.
 */
export interface WordClass {
  isWordChar(ch: string): boolean;
  isJoiner(ch: string): boolean;
}

export interface WordAtResult {
  /** the whole token, as written */
  word: string;
  span: Span;
  /** part of the token left of the cursor */
  prefix: string;
}

/**
 * Resolves the token around a cursor in a document snapshot.
 *
 * Contract notes:
 * - deterministic for given text+position
 * - `wordAt` requires the character right of the cursor to be part of a word
 *   (the hovered character); `wordBefore` requires the one on its left (the
 *   typing position)
 */
export interface WordScanner {
  wordAt(text: string, position: Position): WordAtResult | undefined;
  wordBefore(text: string, position: Position): WordAtResult | undefined;
}
