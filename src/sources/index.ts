import type { DictionaryBackend } from "../core/dictionary.js";
import type { FrequencyTable } from "../core/frequency.js";
import { MemoryDictionaryStore } from "../core/impl/memoryDictionary.js";
import { MemoryFrequencyTable } from "../core/impl/memoryFrequencyTable.js";
import { readDictionaryJson, readFrequencyJson } from "./jsonSource.js";
import { openSqliteDictionary, readFrequencyDb } from "./sqliteSource.js";

const SQLITE_EXTENSIONS = [".db", ".sqlite", ".sqlite3"];

export function isSqlitePath(file: string | undefined): boolean {
  if (!file) return false;
  const lower = file.toLowerCase();
  return SQLITE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/** Empty table when no path is configured. */
export async function loadFrequencyTable(file: string | undefined): Promise<FrequencyTable> {
  if (!file) return MemoryFrequencyTable.empty();
  const records = isSqlitePath(file) ? readFrequencyDb(file) : await readFrequencyJson(file);
  return new MemoryFrequencyTable(records);
}

/**
 * JSON files load fully into memory and get the trie; SQLite databases keep
 * their own indexed search.
 */
export async function loadDictionaryBackend(file: string, frequencies: FrequencyTable): Promise<DictionaryBackend> {
  if (isSqlitePath(file)) {
    return { kind: "delegated", store: openSqliteDictionary(file, frequencies) };
  }
  return { kind: "indexed", store: new MemoryDictionaryStore(await readDictionaryJson(file)) };
}
