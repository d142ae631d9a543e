import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  BackendTransientError,
  DictionaryLoadError,
  MemoryFrequencyTable,
  SqliteDictionaryStore,
  UNRANKED_SCORE,
} from "../../index.js";
import { FREQUENCIES } from "./fixtures.js";

const SCHEMA = `
  CREATE TABLE words (id INTEGER PRIMARY KEY, word TEXT NOT NULL);
  CREATE TABLE parts_of_speech (id INTEGER PRIMARY KEY, name TEXT NOT NULL);
  CREATE TABLE definitions (word_id INTEGER NOT NULL, pos_id INTEGER NOT NULL, definition TEXT);
`;

function seed(db: Database.Database): void {
  db.exec(SCHEMA);
  const word = db.prepare("INSERT INTO words (id, word) VALUES (?, ?)");
  const pos = db.prepare("INSERT INTO parts_of_speech (id, name) VALUES (?, ?)");
  const def = db.prepare("INSERT INTO definitions (word_id, pos_id, definition) VALUES (?, ?, ?)");

  ["Pass", "passing", "passion", "passive", "a_b", "axb"].forEach((w, i) => word.run(i + 1, w));
  pos.run(1, "verb");
  pos.run(2, "noun");
  pos.run(3, "adjective");
  def.run(1, 1, "To go past.");
  def.run(1, 2, "A route through mountains.");
  def.run(1, 1, "To succeed in a test.");
  def.run(3, 2, "Intense emotion.");
  def.run(4, 3, "Accepting without resistance.");
}

describe("SqliteDictionaryStore", () => {
  let db: Database.Database;
  let store: SqliteDictionaryStore;

  beforeEach(() => {
    db = new Database(":memory:");
    seed(db);
    store = new SqliteDictionaryStore(db, new MemoryFrequencyTable(FREQUENCIES));
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it("counts the words it holds", () => {
    expect(store.size).toBe(6);
  });

  it("groups definitions by part of speech", () => {
    expect(store.lookup("PASS")).toEqual([
      {
        word: "pass",
        senses: [
          { partOfSpeech: "noun", definitions: ["A route through mountains."] },
          { partOfSpeech: "verb", definitions: ["To go past.", "To succeed in a test."] },
        ],
      },
    ]);
    expect(store.lookup("zebra")).toEqual([]);
  });

  it("ranks prefix matches by frequency", () => {
    expect(store.searchPrefix("pass", 2)).toEqual([
      { word: "pass", score: 1000 },
      { word: "passing", score: 50 },
    ]);
    expect(store.searchPrefix("pass", 0)).toEqual([]);
  });

  it("treats wildcard characters in the prefix literally", () => {
    expect(store.searchPrefix("a_", 5)).toEqual([{ word: "a_b", score: UNRANKED_SCORE }]);
    expect(store.searchPrefix("a%", 5)).toEqual([]);
  });

  it("ranks every prefix match, however many rows share the prefix", () => {
    const insert = db.prepare("INSERT INTO words (word) VALUES (?)");
    db.transaction(() => {
      for (let i = 0; i < 6000; i++) insert.run(`s${String(i).padStart(4, "0")}`);
      insert.run("sun");
    })();
    const ranked = new SqliteDictionaryStore(db, new MemoryFrequencyTable({ sun: 1_000_000, s5999: 2 }));

    expect(ranked.searchPrefix("s", 3)).toEqual([
      { word: "sun", score: 1_000_000 },
      { word: "s5999", score: 2 },
      { word: "s0000", score: UNRANKED_SCORE },
    ]);
  });

  it("folds non-ASCII letters in lookup and search", () => {
    db.prepare("INSERT INTO words (id, word) VALUES (?, ?)").run(7, "Éclair");
    db.prepare("INSERT INTO definitions (word_id, pos_id, definition) VALUES (?, ?, ?)").run(7, 2, "A filled pastry.");
    const expected = [{ word: "éclair", senses: [{ partOfSpeech: "noun", definitions: ["A filled pastry."] }] }];

    expect(store.lookup("éclair")).toEqual(expected);
    expect(store.lookup("ÉCLAIR")).toEqual(expected);
    expect(store.searchPrefix("ÉC", 5)).toEqual([{ word: "éclair", score: UNRANKED_SCORE }]);
    expect(store.searchFuzzy("éclairs", 1, 5)).toEqual([{ word: "éclair", distance: 1, score: UNRANKED_SCORE }]);
  });

  it("finds fuzzy matches within the bound", () => {
    expect(store.searchFuzzy("possion", 2, 10)).toEqual([{ word: "passion", distance: 1, score: 10 }]);
    expect(store.searchFuzzy("", 2, 10)).toEqual([]);
  });

  it("reports a failing query as transient", () => {
    db.close();
    expect(() => store.lookup("pass")).toThrow(BackendTransientError);
  });

  it("rejects a database without the dictionary tables", () => {
    const empty = new Database(":memory:");
    try {
      expect(() => new SqliteDictionaryStore(empty, MemoryFrequencyTable.empty())).toThrow(DictionaryLoadError);
    } finally {
      empty.close();
    }
  });
});
