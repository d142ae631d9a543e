import { describe, expect, it, vi } from "vitest";
import {
  CancellationSource,
  MemoryDictionaryStore,
  MemoryFrequencyTable,
  RequestCancelledError,
  createLookupEngine,
  type LookupOptions,
  type SearchableDictionaryStore,
} from "../../index.js";
import { ENTRIES, FREQUENCIES } from "./fixtures.js";

function engine(options: Partial<LookupOptions> = {}) {
  return createLookupEngine(
    { kind: "indexed", store: new MemoryDictionaryStore(ENTRIES) },
    new MemoryFrequencyTable(FREQUENCIES),
    options,
  );
}

describe("LookupEngine (indexed)", () => {
  it("indexes dictionary and frequency-only words", () => {
    expect(engine().stats()).toMatchObject({ kind: "indexed", vocabulary: 5 });
  });

  it("defines an exact word regardless of case", async () => {
    const out = await engine().define("Passion");
    expect(out?.exact).toBe(true);
    expect(out?.entry.word).toBe("passion");
  });

  it("falls back to the closest defined word on a miss", async () => {
    const out = await engine().define("possion");
    expect(out).toEqual({ entry: expect.objectContaining({ word: "passion" }), exact: false });
  });

  it("can be told not to guess", async () => {
    expect(await engine({ fuzzyFallback: false }).define("possion")).toBeUndefined();
    expect(await engine({ maxDistance: 0 }).define("possion")).toBeUndefined();
  });

  it("defines nothing for an empty or far-off word", async () => {
    expect(await engine().define("")).toBeUndefined();
    expect(await engine().define("zzzzzz")).toBeUndefined();
  });

  it("completes a prefix in frequency order", async () => {
    expect(await engine().complete("pass")).toEqual([
      { word: "pass", source: "prefix", score: 1000, distance: 0 },
      { word: "passing", source: "prefix", score: 50, distance: 0 },
      { word: "passport", source: "prefix", score: 30, distance: 0 },
      { word: "passion", source: "prefix", score: 10, distance: 0 },
      { word: "passive", source: "prefix", score: 5, distance: 0 },
    ]);
  });

  it("caps completions at maxItems", async () => {
    expect((await engine({ maxItems: 2 }).complete("pass")).map((c) => c.word)).toEqual(["pass", "passing"]);
  });

  it("adds fuzzy matches for a misspelled prefix", async () => {
    expect(await engine().complete("Possion")).toEqual([{ word: "passion", source: "fuzzy", score: 10, distance: 1 }]);
  });

  it("skips fuzzy matching for short prefixes", async () => {
    expect(await engine().complete("ps")).toEqual([]);
    expect(await engine({ minFuzzyLength: 2 }).complete("ps")).toEqual([{ word: "pass", source: "fuzzy", score: 1000, distance: 2 }]);
  });

  it("stops on a cancelled token", async () => {
    const source = new CancellationSource();
    source.cancel();
    await expect(engine().complete("pass", source.token)).rejects.toBeInstanceOf(RequestCancelledError);
  });
});

describe("LookupEngine (delegated)", () => {
  function fakeStore(): SearchableDictionaryStore {
    const dict = new MemoryDictionaryStore(ENTRIES);
    return {
      size: dict.size,
      lookup: (word) => dict.lookup(word),
      searchPrefix: vi.fn(() => [{ word: "passing", score: 50 }]),
      searchFuzzy: vi.fn(() => [{ word: "passion", distance: 1, score: 10 }]),
      close: vi.fn(),
    };
  }

  it("delegates both searches to the store", async () => {
    const store = fakeStore();
    const e = createLookupEngine({ kind: "delegated", store }, MemoryFrequencyTable.empty(), { maxItems: 7 });

    expect((await e.complete("Pass")).map((c) => c.word)).toEqual(["passing", "passion"]);
    expect(store.searchPrefix).toHaveBeenCalledWith("pass", 7);
    expect(store.searchFuzzy).toHaveBeenCalledWith("pass", 2, 200);
    expect(e.stats()).toMatchObject({ kind: "delegated", vocabulary: 4 });
  });

  it("uses the store's fuzzy search for the definition fallback", async () => {
    const store = fakeStore();
    const e = createLookupEngine({ kind: "delegated", store }, MemoryFrequencyTable.empty());
    expect((await e.define("possion"))?.entry.word).toBe("passion");
    expect(store.searchFuzzy).toHaveBeenCalledWith("possion", 2, 200);
  });

  it("offers frequency-only words alongside the store's own", async () => {
    const store = fakeStore();
    const e = createLookupEngine({ kind: "delegated", store }, new MemoryFrequencyTable(FREQUENCIES));

    expect(await e.complete("passp")).toEqual([
      { word: "pass", source: "fuzzy", score: 1000, distance: 1 },
      { word: "passing", source: "prefix", score: 50, distance: 0 },
      { word: "passport", source: "prefix", score: 30, distance: 0 },
      { word: "passion", source: "fuzzy", score: 10, distance: 1 },
    ]);
  });
});
