import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";

import * as toml from "@iarna/toml";

import { ConfigError, type FieldError } from "../core/errors.js";
import { DEFAULT_FORMATTING, type FormattingConfig } from "../format/markdown.js";
import { asBoolean, asString, field, intInRange, isRecord, pushErr } from "./validation.js";

export interface CompletionConfig {
  enabled: boolean;
  maxDistance: number;
  maxItems: number;
  minFuzzyLength: number;
}

export interface HoverConfig {
  /** on an exact miss, show the closest word within distance 2 */
  fuzzyFallback: boolean;
}

export interface AppConfig {
  dictionaryPath: string;
  freqPath?: string;
  completion: CompletionConfig;
  hover: HoverConfig;
  formatting: FormattingConfig;
}

export const CONFIG_ENV = "LEXICON_LSP_CONFIG";
export const DEFAULT_CONFIG_PATH = path.join(".config", "dictionary-lsp", "config.toml");

export const DEFAULT_COMPLETION: CompletionConfig = Object.freeze({
  enabled: true,
  maxDistance: 2,
  maxItems: 20,
  minFuzzyLength: 3,
});

function resolvePath(p: string, baseDir: string | undefined): string {
  if (p === "~" || p.startsWith("~/")) return path.join(homedir(), p.slice(1));
  if (path.isAbsolute(p) || !baseDir) return p;
  return path.resolve(baseDir, p);
}

/**
 * Validates a parsed config document (snake_case keys, as written in the
 * TOML file). Relative paths resolve against `baseDir`. Throws ConfigError
 * listing every problem found.
 */
export function parseConfig(raw: unknown, file?: string, baseDir?: string): AppConfig {
  const errors: FieldError[] = [];
  const root = isRecord(raw) ? raw : {};
  if (!isRecord(raw)) pushErr(errors, "$", "must be a table");

  const dictionaryPath = asString(root.dictionary_path);
  if (!dictionaryPath) pushErr(errors, "$.dictionary_path", "must be a non-empty string");

  const freqPath = field<string | undefined>(errors, root, "freq_path", "$", asString, "a string", undefined);

  const cmpRaw = root.completion ?? {};
  if (!isRecord(cmpRaw)) pushErr(errors, "$.completion", "must be a table");
  const cmp = isRecord(cmpRaw) ? cmpRaw : {};
  const completion: CompletionConfig = {
    enabled: field(errors, cmp, "enabled", "$.completion", asBoolean, "a boolean", DEFAULT_COMPLETION.enabled),
    maxDistance: intInRange(errors, cmp, "max_distance", "$.completion", 0, 3, DEFAULT_COMPLETION.maxDistance),
    maxItems: intInRange(errors, cmp, "max_items", "$.completion", 1, 200, DEFAULT_COMPLETION.maxItems),
    minFuzzyLength: intInRange(errors, cmp, "min_fuzzy_length", "$.completion", 1, 32, DEFAULT_COMPLETION.minFuzzyLength),
  };

  const hoverRaw = root.hover ?? {};
  if (!isRecord(hoverRaw)) pushErr(errors, "$.hover", "must be a table");
  const hover: HoverConfig = {
    fuzzyFallback: field(errors, isRecord(hoverRaw) ? hoverRaw : {}, "fuzzy_fallback", "$.hover", asBoolean, "a boolean", true),
  };

  const fmtRaw = root.formatting ?? {};
  if (!isRecord(fmtRaw)) pushErr(errors, "$.formatting", "must be a table");
  const fmt = isRecord(fmtRaw) ? fmtRaw : {};
  const formatting: FormattingConfig = {
    wordFormat: field(errors, fmt, "word_format", "$.formatting", asString, "a string", DEFAULT_FORMATTING.wordFormat),
    partOfSpeechFormat: field(errors, fmt, "part_of_speech_format", "$.formatting", asString, "a string", DEFAULT_FORMATTING.partOfSpeechFormat),
    definitionFormat: field(errors, fmt, "definition_format", "$.formatting", asString, "a string", DEFAULT_FORMATTING.definitionFormat),
    addSpacing: field(errors, fmt, "add_spacing", "$.formatting", asBoolean, "a boolean", DEFAULT_FORMATTING.addSpacing),
  };

  if (errors.length || !dictionaryPath) throw new ConfigError(file, errors);

  return Object.freeze({
    dictionaryPath: resolvePath(dictionaryPath, baseDir),
    freqPath: freqPath ? resolvePath(freqPath, baseDir) : undefined,
    completion: Object.freeze(completion),
    hover: Object.freeze(hover),
    formatting: Object.freeze(formatting),
  });
}

export function parseConfigToml(text: string, file?: string): AppConfig {
  let raw: unknown;
  try {
    raw = toml.parse(text);
  } catch (e) {
    throw new ConfigError(file, [{ path: "$", message: `invalid TOML: ${e instanceof Error ? e.message : String(e)}` }], { cause: e });
  }
  return parseConfig(raw, file, file ? path.dirname(file) : undefined);
}

export interface ConfigLocation {
  path: string;
  /** named on the command line or in the environment; must exist */
  explicit: boolean;
}

export function locateConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): ConfigLocation {
  const flag = argv.indexOf("--config");
  const fromArg = flag >= 0 ? argv[flag + 1] : undefined;
  if (fromArg) return { path: fromArg, explicit: true };

  const fromEnv = env[CONFIG_ENV];
  if (fromEnv) return { path: fromEnv, explicit: true };

  return { path: path.join(home, DEFAULT_CONFIG_PATH), explicit: false };
}

export async function loadConfig(location: ConfigLocation = locateConfig()): Promise<AppConfig> {
  let text: string;
  try {
    text = await readFile(location.path, "utf8");
  } catch (e) {
    const missing = isRecord(e) && e.code === "ENOENT";
    if (!missing || location.explicit) {
      throw new ConfigError(location.path, [{ path: "$", message: "cannot read configuration file" }], { cause: e });
    }
    // no file at the default location: defaults, which still need a dictionary
    return parseConfig({}, location.path);
  }
  return parseConfigToml(text, location.path);
}
