import { describe, expect, it } from "vitest";
import { FrequencyRanker, UNRANKED_SCORE, compareCompletions, frequencyTier } from "../../index.js";

describe("frequencyTier", () => {
  it("buckets scores by order of magnitude", () => {
    expect(frequencyTier(0)).toBe(0);
    expect(frequencyTier(8)).toBe(0);
    expect(frequencyTier(9)).toBe(1);
    expect(frequencyTier(99)).toBe(2);
    expect(frequencyTier(12_345)).toBe(4);
  });

  it("puts unranked and negative scores below every tier", () => {
    expect(frequencyTier(UNRANKED_SCORE)).toBe(-1);
    expect(frequencyTier(-5)).toBe(-1);
  });
});

describe("FrequencyRanker", () => {
  const ranker = new FrequencyRanker();

  it("ranks prefix matches before fuzzy ones in the same tier", () => {
    const out = ranker.merge([{ word: "passing", score: 50 }], [{ word: "passion", distance: 1, score: 60 }], 10);
    expect(out).toEqual([
      { word: "passing", source: "prefix", score: 50, distance: 0 },
      { word: "passion", source: "fuzzy", score: 60, distance: 1 },
    ]);
  });

  it("lets a much more frequent fuzzy match outrank a prefix match", () => {
    const out = ranker.merge([{ word: "passing", score: 50 }], [{ word: "passion", distance: 2, score: 500 }], 10);
    expect(out.map((c) => c.word)).toEqual(["passion", "passing"]);
  });

  it("keeps a word found by both sources once, as a prefix match", () => {
    const out = ranker.merge([{ word: "pass", score: 7 }], [{ word: "pass", distance: 0, score: 7 }], 10);
    expect(out).toEqual([{ word: "pass", source: "prefix", score: 7, distance: 0 }]);
  });

  it("keeps the closer of two fuzzy duplicates", () => {
    const out = ranker.merge(
      [],
      [
        { word: "past", distance: 2, score: 3 },
        { word: "past", distance: 1, score: 3 },
      ],
      10,
    );
    expect(out).toEqual([{ word: "past", source: "fuzzy", score: 3, distance: 1 }]);
  });

  it("breaks remaining ties by distance, then word", () => {
    const out = ranker.merge(
      [],
      [
        { word: "bat", distance: 2, score: UNRANKED_SCORE },
        { word: "cat", distance: 1, score: UNRANKED_SCORE },
        { word: "ant", distance: 1, score: UNRANKED_SCORE },
      ],
      10,
    );
    expect(out.map((c) => c.word)).toEqual(["ant", "cat", "bat"]);
  });

  it("caps the merged list", () => {
    const prefix = ["a", "b", "c", "d"].map((word, i) => ({ word, score: i }));
    expect(ranker.merge(prefix, [], 2).map((c) => c.word)).toEqual(["d", "c"]);
    expect(ranker.merge(prefix, [], 0)).toEqual([]);
  });

  it("puts tier ahead of source, and source ahead of score", () => {
    const fuzzy100 = { word: "a", source: "fuzzy" as const, score: 100, distance: 1 };
    const fuzzy98 = { word: "b", source: "fuzzy" as const, score: 98, distance: 1 };
    const prefix97 = { word: "c", source: "prefix" as const, score: 97, distance: 0 };
    const prefix98 = { word: "d", source: "prefix" as const, score: 98, distance: 0 };

    // tier 2 against tier 1: the fuzzy match wins
    expect(compareCompletions(fuzzy100, prefix98)).toBeLessThan(0);
    // both tier 1: the prefix match wins despite its lower score
    expect(compareCompletions(prefix97, fuzzy98)).toBeLessThan(0);
  });
});
