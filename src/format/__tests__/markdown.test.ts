import { describe, expect, it } from "vitest";
import type { DictionaryEntry } from "../../core/types.js";
import { matchCase } from "../case.js";
import { DEFAULT_FORMATTING, formatEntryMarkdown, formatEntryShort, notFoundLabel, notFoundMarkdown } from "../markdown.js";

const PASS: DictionaryEntry = {
  word: "pass",
  senses: [
    { partOfSpeech: "verb", definitions: ["To go past.", "To succeed."] },
    { partOfSpeech: "noun", definitions: ["A route."] },
  ],
};

describe("formatEntryMarkdown", () => {
  it("renders word, parts of speech and numbered senses", () => {
    expect(formatEntryMarkdown(PASS)).toBe("**pass**\n_verb_\n1. To go past.\n2. To succeed.\n_noun_\n1. A route.\n");
  });

  it("adds a blank line before each part of speech when asked", () => {
    expect(formatEntryMarkdown(PASS, { ...DEFAULT_FORMATTING, addSpacing: true })).toBe(
      "**pass**\n\n_verb_\n1. To go past.\n2. To succeed.\n\n_noun_\n1. A route.\n",
    );
  });

  it("fills custom templates and keeps dollar signs literal", () => {
    const entry: DictionaryEntry = { word: "fee", senses: [{ partOfSpeech: "noun", definitions: ["Costs $& or $1."] }] };
    const out = formatEntryMarkdown(entry, {
      wordFormat: "# {word}",
      partOfSpeechFormat: "({part})",
      definitionFormat: "- [{num}] {definition}",
      addSpacing: false,
    });
    expect(out).toBe("# fee\n(noun)\n- [1] Costs $& or $1.\n");
  });
});

describe("formatEntryShort", () => {
  it("joins the first sense of each part of speech", () => {
    expect(formatEntryShort(PASS)).toBe("**pass** _verb_ To go past.; _noun_ A route.");
  });

  it("falls back to the word when there are no senses", () => {
    expect(formatEntryShort({ word: "bare", senses: [{ partOfSpeech: "noun", definitions: [] }] })).toBe("**bare**");
  });
});

describe("placeholders", () => {
  it("names the missing word", () => {
    expect(notFoundMarkdown("zzz")).toBe("No definition found for **zzz**");
    expect(notFoundLabel("zzz")).toBe("No definition found for 'zzz'");
  });
});

describe("matchCase", () => {
  it("capitalizes after a capitalized prefix", () => {
    expect(matchCase("passion", "Pas")).toBe("Passion");
    expect(matchCase("élan", "Él")).toBe("Élan");
  });

  it("leaves the word alone otherwise", () => {
    expect(matchCase("passion", "pas")).toBe("passion");
    expect(matchCase("passion", "")).toBe("passion");
    expect(matchCase("4th", "4t")).toBe("4th");
  });
});
