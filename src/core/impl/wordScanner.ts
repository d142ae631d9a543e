import type { Position } from "../types.js";
import type { WordAtResult, WordClass, WordScanner } from "../tokenizer.js";

const LETTER_OR_DIGIT = /^[\p{L}\p{N}\p{M}]$/u;
const JOINERS = new Set(["-", "'", "’"]);

/** Unicode letters, digits and combining marks; internal hyphen and apostrophes. */
export const DEFAULT_WORD_CLASS: WordClass = {
  isWordChar: (ch) => LETTER_OR_DIGIT.test(ch),
  isJoiner: (ch) => JOINERS.has(ch),
};

const LINE_BREAK = /\r\n|\r|\n/;

/** Code points of one line plus the UTF-16 offset each starts at. */
interface Line {
  chars: string[];
  offsets: number[];
  length: number;
}

function lineAt(text: string, line: number): Line | undefined {
  if (line < 0) return undefined;
  const raw = text.split(LINE_BREAK)[line];
  if (raw === undefined) return undefined;

  const chars: string[] = [];
  const offsets: number[] = [];
  let offset = 0;
  for (const ch of raw) {
    chars.push(ch);
    offsets.push(offset);
    offset += ch.length;
  }
  return { chars, offsets, length: raw.length };
}

/** Index of the code point the UTF-16 `character` falls in; chars.length at end of line. */
function indexOf(line: Line, character: number): number | undefined {
  if (character < 0 || character > line.length) return undefined;
  let k = 0;
  while (k < line.chars.length && line.offsets[k]! + line.chars[k]!.length <= character) k++;
  return k;
}

export class SimpleWordScanner implements WordScanner {
  constructor(private readonly wordClass: WordClass = DEFAULT_WORD_CLASS) {}

  wordAt(text: string, position: Position): WordAtResult | undefined {
    return this.resolve(text, position, 0);
  }

  wordBefore(text: string, position: Position): WordAtResult | undefined {
    return this.resolve(text, position, -1);
  }

  private resolve(text: string, position: Position, shift: 0 | -1): WordAtResult | undefined {
    const line = lineAt(text, position.line);
    if (!line) return undefined;
    const cursor = indexOf(line, position.character);
    if (cursor === undefined) return undefined;

    const anchor = cursor + shift;
    if (!this.inWord(line.chars, anchor)) return undefined;

    let start = anchor;
    while (start > 0 && this.inWord(line.chars, start - 1)) start--;
    let end = anchor + 1;
    while (end < line.chars.length && this.inWord(line.chars, end)) end++;

    const at = (i: number): number => (i < line.chars.length ? line.offsets[i]! : line.length);
    return {
      word: line.chars.slice(start, end).join(""),
      prefix: line.chars.slice(start, Math.min(Math.max(cursor, start), end)).join(""),
      span: {
        start: { line: position.line, character: at(start) },
        end: { line: position.line, character: at(end) },
      },
    };
  }

  private inWord(chars: string[], i: number): boolean {
    const ch = chars[i];
    if (ch === undefined) return false;
    if (this.wordClass.isWordChar(ch)) return true;
    if (!this.wordClass.isJoiner(ch)) return false;
    const before = chars[i - 1];
    const after = chars[i + 1];
    return before !== undefined && after !== undefined && this.wordClass.isWordChar(before) && this.wordClass.isWordChar(after);
  }
}
