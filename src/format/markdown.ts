import type { DictionaryEntry } from "../core/types.js";

/** Templates for rendering an entry. Placeholders: {word}, {part}, {num}, {definition}. */
export interface FormattingConfig {
  wordFormat: string;
  partOfSpeechFormat: string;
  definitionFormat: string;
  /** blank line before each part of speech */
  addSpacing: boolean;
}

export const DEFAULT_FORMATTING: FormattingConfig = Object.freeze({
  wordFormat: "**{word}**",
  partOfSpeechFormat: "_{part}_",
  definitionFormat: "{num}. {definition}",
  addSpacing: false,
});

function fill(template: string, values: Record<string, string>): string {
  let out = template;
  for (const [key, value] of Object.entries(values)) {
    // function replacer: `$` in dictionary text must stay literal
    out = out.replaceAll(`{${key}}`, () => value);
  }
  return out;
}

export function formatEntryMarkdown(entry: DictionaryEntry, formatting: FormattingConfig = DEFAULT_FORMATTING): string {
  let md = fill(formatting.wordFormat, { word: entry.word }) + "\n";

  for (const sense of entry.senses) {
    if (formatting.addSpacing) md += "\n";
    md += fill(formatting.partOfSpeechFormat, { part: sense.partOfSpeech }) + "\n";
    sense.definitions.forEach((definition, i) => {
      md += fill(formatting.definitionFormat, { num: String(i + 1), definition }) + "\n";
    });
  }

  return md;
}

/** One line: the word, then each part of speech with its first definition. */
export function formatEntryShort(entry: DictionaryEntry, formatting: FormattingConfig = DEFAULT_FORMATTING): string {
  const parts = entry.senses
    .filter((s) => s.definitions.length > 0)
    .map((s) => `${fill(formatting.partOfSpeechFormat, { part: s.partOfSpeech })} ${s.definitions[0]}`);
  const head = fill(formatting.wordFormat, { word: entry.word });
  return parts.length ? `${head} ${parts.join("; ")}` : head;
}

export function notFoundMarkdown(word: string): string {
  return `No definition found for **${word}**`;
}

export function notFoundLabel(word: string): string {
  return `No definition found for '${word}'`;
}
