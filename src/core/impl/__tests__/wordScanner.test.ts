import { describe, expect, it } from "vitest";
import { SimpleWordScanner } from "../../index.js";

const scanner = new SimpleWordScanner();
const at = (line: number, character: number) => ({ line, character });

describe("SimpleWordScanner.wordAt", () => {
  const text = "the passion play";

  it("returns the word under the cursor and its span", () => {
    expect(scanner.wordAt(text, at(0, 6))).toEqual({
      word: "passion",
      prefix: "pa",
      span: { start: at(0, 4), end: at(0, 11) },
    });
  });

  it("returns nothing on whitespace, punctuation or past the end of a word", () => {
    expect(scanner.wordAt(text, at(0, 3))).toBeUndefined();
    expect(scanner.wordAt("end.", at(0, 3))).toBeUndefined();
    expect(scanner.wordAt(text, at(0, 16))).toBeUndefined();
  });

  it("keeps internal hyphens and apostrophes", () => {
    expect(scanner.wordAt("a well-known fact", at(0, 3))?.word).toBe("well-known");
    expect(scanner.wordAt("I don't know", at(0, 2))?.word).toBe("don't");
    expect(scanner.wordAt("rock’n’roll", at(0, 0))?.word).toBe("rock’n’roll");
  });

  it("drops hyphens at the edge of a word", () => {
    expect(scanner.wordAt("well- done", at(0, 1))?.word).toBe("well");
    expect(scanner.wordAt("-dash", at(0, 0))).toBeUndefined();
    expect(scanner.wordAt("-dash", at(0, 1))?.word).toBe("dash");
  });

  it("reads the requested line whatever the line endings", () => {
    const doc = "first line\r\nsecond word\nthird\rfourth";
    expect(scanner.wordAt(doc, at(1, 8))?.word).toBe("word");
    expect(scanner.wordAt(doc, at(3, 0))?.word).toBe("fourth");
  });

  it("maps UTF-16 offsets onto code points", () => {
    const doc = "😀 café";
    expect(scanner.wordAt(doc, at(0, 3))).toEqual({ word: "café", prefix: "", span: { start: at(0, 3), end: at(0, 7) } });
    expect(scanner.wordAt(doc, at(0, 1))).toBeUndefined();
  });

  it("returns nothing for positions outside the document", () => {
    expect(scanner.wordAt(text, at(4, 0))).toBeUndefined();
    expect(scanner.wordAt(text, at(-1, 0))).toBeUndefined();
    expect(scanner.wordAt(text, at(0, 99))).toBeUndefined();
    expect(scanner.wordAt(text, at(0, -1))).toBeUndefined();
  });
});

describe("SimpleWordScanner.wordBefore", () => {
  it("resolves the word just typed at the end of a line", () => {
    expect(scanner.wordBefore("I feel pass", at(0, 11))).toEqual({
      word: "pass",
      prefix: "pass",
      span: { start: at(0, 7), end: at(0, 11) },
    });
  });

  it("returns the typed part when the cursor is inside a word", () => {
    expect(scanner.wordBefore("passion", at(0, 3))?.prefix).toBe("pas");
    expect(scanner.wordBefore("passion", at(0, 3))?.word).toBe("passion");
  });

  it("returns nothing after whitespace or at the start of a line", () => {
    expect(scanner.wordBefore("word ", at(0, 5))).toBeUndefined();
    expect(scanner.wordBefore("word", at(0, 0))).toBeUndefined();
  });
});
