import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import {
  CONFIG_FILENAME,
  CORPUS_PATH_ENV,
  DEFAULT_CORPUS_PATH,
  DEFAULT_FORMAT,
  DEFAULT_LANGUAGE,
  DEFAULT_LIMIT,
  DEFAULT_MIN_WORD_LENGTH,
  DEFAULT_STOP_WORD_COUNT,
  LANGUAGE_ENV,
  MAX_LIMIT,
} from "./constants.ts";
import { ConfigError } from "./errors.ts";
import { isLanguage, isOutputFormat } from "./parsing.ts";
import type { Language, OutputFormat } from "./types.ts";

export interface KeywordConfig {
  corpus?: string;
  language?: Language;
  format?: OutputFormat;
  limit?: number;
  stopWordCount?: number;
  minWordLength?: number;
}

export interface ResolvedSettings {
  corpusPath: string;
  language: Language;
  format: OutputFormat;
  limit: number;
  stopWordCount: number;
  minWordLength: number;
}

export type SettingsOverrides = {
  [K in keyof ResolvedSettings]?: ResolvedSettings[K] | undefined;
};

export interface ConfigLocations {
  cwd: string;
  home: string;
}

export function interpolateEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  // Replace $$ with a placeholder, interpolate env vars, then restore literal $
  const PLACEHOLDER = "\x00DOLLAR\x00";
  return value
    .replaceAll("$$", PLACEHOLDER)
    .replace(/\$\{([^}]+)\}|\$([A-Z_][A-Z0-9_]*)/g, (_match, braced: string | undefined, bare: string | undefined) => {
      const varName = braced ?? bare ?? "";
      return env[varName] ?? "";
    })
    .replaceAll(PLACEHOLDER, "$");
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function validateConfig(
  raw: unknown,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): KeywordConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Invalid ${source}: expected a JSON object.`);
  }

  const value = raw as Record<string, unknown>;
  const config: KeywordConfig = {};

  if (value.corpus !== undefined) {
    if (typeof value.corpus !== "string" || value.corpus.length === 0) {
      throw new ConfigError(`Invalid ${source}: "corpus" must be a non-empty string.`);
    }
    config.corpus = interpolateEnvVars(value.corpus, env);
  }

  if (value.language !== undefined) {
    if (!isLanguage(value.language)) {
      throw new ConfigError(`Invalid ${source}: "language" must be "cze" or "eng".`);
    }
    config.language = value.language;
  }

  if (value.format !== undefined) {
    if (!isOutputFormat(value.format)) {
      throw new ConfigError(`Invalid ${source}: "format" must be "text", "plain" or "json".`);
    }
    config.format = value.format;
  }

  if (value.limit !== undefined) {
    if (!isCount(value.limit) || value.limit === 0 || value.limit > MAX_LIMIT) {
      throw new ConfigError(`Invalid ${source}: "limit" must be an integer between 1 and ${MAX_LIMIT}.`);
    }
    config.limit = value.limit;
  }

  if (value.stopWordCount !== undefined) {
    if (!isCount(value.stopWordCount)) {
      throw new ConfigError(`Invalid ${source}: "stopWordCount" must be a non-negative integer.`);
    }
    config.stopWordCount = value.stopWordCount;
  }

  if (value.minWordLength !== undefined) {
    if (!isCount(value.minWordLength)) {
      throw new ConfigError(`Invalid ${source}: "minWordLength" must be a non-negative integer.`);
    }
    config.minWordLength = value.minWordLength;
  }

  return config;
}

function loadConfigFile(filePath: string, env: NodeJS.ProcessEnv): KeywordConfig | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read ${filePath}: ${message}`, { cause: error });
  }

  return validateConfig(parsed, filePath, env);
}

export function configPaths(locations: ConfigLocations): { global: string; local: string } {
  return {
    global: path.join(locations.home, CONFIG_FILENAME),
    local: path.join(locations.cwd, CONFIG_FILENAME),
  };
}

/** Working-directory config overrides the home-directory config key by key. */
export function loadKeywordConfig(
  locations: ConfigLocations = { cwd: process.cwd(), home: homedir() },
  env: NodeJS.ProcessEnv = process.env,
): KeywordConfig {
  const paths = configPaths(locations);
  const globalConfig = loadConfigFile(paths.global, env);
  const localConfig = paths.local === paths.global ? null : loadConfigFile(paths.local, env);

  return { ...globalConfig, ...localConfig };
}

/**
 * Flag > environment > config file > default. A relative corpus path from a
 * config file or the environment resolves against the working directory.
 */
export function resolveSettings(
  flags: SettingsOverrides,
  config: KeywordConfig,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ResolvedSettings {
  const envCorpus = env[CORPUS_PATH_ENV];
  const envLanguage = env[LANGUAGE_ENV];
  if (envLanguage !== undefined && envLanguage !== "" && !isLanguage(envLanguage)) {
    throw new ConfigError(`Invalid ${LANGUAGE_ENV}: ${envLanguage}. Allowed values: cze, eng.`);
  }

  const corpusPath = flags.corpusPath ?? (envCorpus || undefined) ?? config.corpus ?? DEFAULT_CORPUS_PATH;
  const language =
    flags.language ?? (isLanguage(envLanguage) ? envLanguage : undefined) ?? config.language ?? DEFAULT_LANGUAGE;

  return {
    corpusPath: path.resolve(cwd, corpusPath),
    language,
    format: flags.format ?? config.format ?? DEFAULT_FORMAT,
    limit: flags.limit ?? config.limit ?? DEFAULT_LIMIT,
    stopWordCount: flags.stopWordCount ?? config.stopWordCount ?? DEFAULT_STOP_WORD_COUNT,
    minWordLength: flags.minWordLength ?? config.minWordLength ?? DEFAULT_MIN_WORD_LENGTH,
  };
}
