import type { DictionaryEntry, FrequencyRecord } from "../../types.js";

export const ENTRIES: DictionaryEntry[] = [
  { word: "pass", senses: [{ partOfSpeech: "verb", definitions: ["To go past.", "To succeed in a test."] }, { partOfSpeech: "noun", definitions: ["A route through mountains."] }] },
  { word: "passing", senses: [{ partOfSpeech: "adjective", definitions: ["Brief."] }] },
  { word: "passion", senses: [{ partOfSpeech: "noun", definitions: ["Intense emotion."] }] },
  { word: "passive", senses: [{ partOfSpeech: "adjective", definitions: ["Accepting without resistance."] }] },
];

export const FREQUENCIES: FrequencyRecord[] = [
  { word: "pass", score: 1000 },
  { word: "passing", score: 50 },
  { word: "passion", score: 10 },
  { word: "passive", score: 5 },
  // known to the frequency list only
  { word: "passport", score: 30 },
];
