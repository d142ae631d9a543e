import { readFile } from "node:fs/promises";

import { DictionaryLoadError } from "../core/errors.js";
import type { DictionaryEntry, FrequencyRecord, Sense } from "../core/types.js";
import { isRecord } from "../config/validation.js";

async function readJson(file: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (e) {
    throw new DictionaryLoadError(file, "cannot read file", { cause: e });
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new DictionaryLoadError(file, `malformed JSON: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

/**
 * `{ "word": { "noun": ["sense", ...], ... }, ... }` → entries, in file order.
 * Any value of the wrong shape rejects the whole file.
 */
export function parseDictionaryJson(data: unknown, source = "dictionary"): DictionaryEntry[] {
  if (!isRecord(data)) throw new DictionaryLoadError(source, "top level must be an object of words");

  const entries: DictionaryEntry[] = [];
  for (const [word, parts] of Object.entries(data)) {
    if (!isRecord(parts)) throw new DictionaryLoadError(source, `${JSON.stringify(word)} must map parts of speech to sense lists`);

    const senses: Sense[] = [];
    for (const [partOfSpeech, defs] of Object.entries(parts)) {
      if (!Array.isArray(defs) || !defs.every((d): d is string => typeof d === "string")) {
        throw new DictionaryLoadError(source, `${JSON.stringify(word)}.${JSON.stringify(partOfSpeech)} must be an array of strings`);
      }
      senses.push({ partOfSpeech, definitions: defs });
    }
    entries.push({ word, senses });
  }
  return entries;
}

/** `{ "word": 1234, ... }`, higher = more frequent. */
export function parseFrequencyJson(data: unknown, source = "frequencies"): FrequencyRecord[] {
  if (!isRecord(data)) throw new DictionaryLoadError(source, "top level must be an object of word → number");

  const records: FrequencyRecord[] = [];
  for (const [word, score] of Object.entries(data)) {
    if (typeof score !== "number" || !Number.isFinite(score)) {
      throw new DictionaryLoadError(source, `${JSON.stringify(word)} must have a finite numeric frequency`);
    }
    records.push({ word, score });
  }
  return records;
}

export async function readDictionaryJson(file: string): Promise<DictionaryEntry[]> {
  return parseDictionaryJson(await readJson(file), file);
}

export async function readFrequencyJson(file: string): Promise<FrequencyRecord[]> {
  return parseFrequencyJson(await readJson(file), file);
}
