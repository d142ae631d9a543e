import type Database from "better-sqlite3";

import type { SearchableDictionaryStore } from "../dictionary.js";
import { BackendTransientError, DictionaryLoadError } from "../errors.js";
import type { FrequencyTable } from "../frequency.js";
import type { TriePrefixResult } from "../trie.js";
import { normalizeWord, UNRANKED_SCORE, type DictionaryEntry, type FuzzyCandidate, type Word } from "../types.js";
import { levenshtein } from "./levenshtein.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import { byScoreDesc, byScoreThenWord, byWord } from "./order.js";

type DefinitionRow = { word: string; pos: string | null; definition: string | null };
type WordRow = { word: string };

const REQUIRED_TABLES = ["words", "parts_of_speech", "definitions"] as const;

// SQLite's NOCASE, lower() and LIKE fold ASCII only; `fold` is normalizeWord,
// registered on the connection
const LOOKUP_SQL = `
  SELECT w.word AS word, p.name AS pos, d.definition AS definition
  FROM words w
  JOIN definitions d ON w.id = d.word_id
  JOIN parts_of_speech p ON d.pos_id = p.id
  WHERE fold(w.word) = ?
  ORDER BY p.name, d.rowid`;

// substr and length count characters, so no LIKE pattern to escape
const PREFIX_SQL = `
  SELECT DISTINCT fold(word) AS word FROM words
  WHERE substr(fold(word), 1, ?) = ?`;

// same length window and first letter as the query; exact distance is
// computed in process
const FUZZY_SQL = `
  SELECT DISTINCT fold(word) AS word FROM words
  WHERE length(word) BETWEEN ? AND ?
    AND substr(fold(word), 1, 1) = ?`;

/**
 * Read-only dictionary on an indexed SQLite database.
 *
 * Schema: words(id, word), parts_of_speech(id, name),
 * definitions(word_id, pos_id, definition). Query-time failures surface as
 * BackendTransientError so only the request at hand fails.
 */
export class SqliteDictionaryStore implements SearchableDictionaryStore {
  private readonly lookupStmt: Database.Statement<[string], DefinitionRow>;
  private readonly prefixStmt: Database.Statement<[number, string], WordRow>;
  private readonly fuzzyStmt: Database.Statement<[number, number, string], WordRow>;
  private readonly selector = new MinHeapTopKSelector<TriePrefixResult>();
  readonly size: number;

  constructor(
    private readonly db: Database.Database,
    private readonly frequencies: FrequencyTable,
    source = db.name,
  ) {
    const present = new Set(
      db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
        .all()
        .map((r) => r.name),
    );
    const missing = REQUIRED_TABLES.filter((t) => !present.has(t));
    if (missing.length) {
      throw new DictionaryLoadError(source, `missing table(s): ${missing.join(", ")}`);
    }

    db.function("fold", { deterministic: true }, (s: unknown) => (typeof s === "string" ? normalizeWord(s) : null));
    this.lookupStmt = db.prepare<[string], DefinitionRow>(LOOKUP_SQL);
    this.prefixStmt = db.prepare<[number, string], WordRow>(PREFIX_SQL);
    this.fuzzyStmt = db.prepare<[number, number, string], WordRow>(FUZZY_SQL);

    const count = db.prepare<[], { n: number }>("SELECT count(*) AS n FROM words").get();
    this.size = count?.n ?? 0;
  }

  lookup(word: string): readonly DictionaryEntry[] {
    const rows = this.guard("lookup", () => this.lookupStmt.all(normalizeWord(word)));

    const grouped = new Map<Word, Map<string, string[]>>();
    for (const row of rows) {
      const key = normalizeWord(row.word);
      let senses = grouped.get(key);
      if (!senses) {
        senses = new Map();
        grouped.set(key, senses);
      }
      const pos = row.pos ?? "unknown";
      const defs = senses.get(pos) ?? [];
      if (row.definition && !defs.includes(row.definition)) defs.push(row.definition);
      senses.set(pos, defs);
    }

    return Array.from(grouped, ([key, senses]) => ({
      word: key,
      senses: Array.from(senses, ([partOfSpeech, definitions]) => ({ partOfSpeech, definitions })),
    }));
  }

  /** Streams every match through the top-K heap: O(n log limit), no row cap. */
  searchPrefix(prefix: string, limit: number): TriePrefixResult[] {
    if (limit <= 0) return [];
    const q = normalizeWord(prefix);
    return this.guard("prefix search", () =>
      this.selector.topK(this.scored(this.prefixStmt.iterate(Array.from(q).length, q)), limit, byScoreThenWord),
    );
  }

  searchFuzzy(query: string, maxDistance: number, limit: number): FuzzyCandidate[] {
    const q = normalizeWord(query);
    const first = Array.from(q)[0];
    if (first === undefined || maxDistance < 0 || limit <= 0) return [];

    const n = Array.from(q).length;
    const rows = this.guard("fuzzy search", () => this.fuzzyStmt.all(Math.max(1, n - maxDistance), n + maxDistance, first));

    const out: FuzzyCandidate[] = [];
    for (const { word } of rows) {
      const distance = levenshtein(q, word);
      if (distance <= maxDistance) out.push({ word, distance, score: this.scoreOf(word) });
    }
    out.sort((a, b) => a.distance - b.distance || byScoreDesc(a.score, b.score) || byWord(a.word, b.word));
    return out.slice(0, limit);
  }

  close(): void {
    this.db.close();
  }

  private *scored(rows: Iterable<WordRow>): Generator<TriePrefixResult> {
    for (const { word } of rows) yield { word, score: this.scoreOf(word) };
  }

  private scoreOf(word: Word): number {
    return this.frequencies.score(word) ?? UNRANKED_SCORE;
  }

  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new BackendTransientError(`${op} failed: ${reason}`, { cause: e });
    }
  }
}
