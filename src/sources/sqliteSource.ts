import Database from "better-sqlite3";

import { DictionaryLoadError } from "../core/errors.js";
import type { FrequencyTable } from "../core/frequency.js";
import { SqliteDictionaryStore } from "../core/impl/sqliteDictionary.js";
import type { FrequencyRecord } from "../core/types.js";

export function openReadOnly(file: string): Database.Database {
  try {
    return new Database(file, { readonly: true, fileMustExist: true });
  } catch (e) {
    throw new DictionaryLoadError(file, `cannot open database: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

export function openSqliteDictionary(file: string, frequencies: FrequencyTable): SqliteDictionaryStore {
  const db = openReadOnly(file);
  try {
    return new SqliteDictionaryStore(db, frequencies, file);
  } catch (e) {
    db.close();
    if (e instanceof DictionaryLoadError) throw e;
    throw new DictionaryLoadError(file, `unusable dictionary database: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

/** Rows of `word_frequencies(word, frequency)`. */
export function readFrequencyRows(db: Database.Database, source = db.name): FrequencyRecord[] {
  try {
    return db
      .prepare<[], { word: string; frequency: number }>("SELECT word, frequency FROM word_frequencies")
      .all()
      .filter((r) => typeof r.word === "string" && typeof r.frequency === "number")
      .map((r) => ({ word: r.word, score: r.frequency }));
  } catch (e) {
    throw new DictionaryLoadError(source, `cannot read word_frequencies: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

export function readFrequencyDb(file: string): FrequencyRecord[] {
  const db = openReadOnly(file);
  try {
    return readFrequencyRows(db, file);
  } finally {
    db.close();
  }
}
