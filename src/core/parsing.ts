import { MAX_LIMIT } from "./constants.ts";
import type { Language, OutputFormat } from "./types.ts";

export function parseLimitOption(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid limit: ${value}. Limit must be a positive integer.`);
  }

  if (parsed > MAX_LIMIT) {
    throw new Error(`Invalid limit: ${value}. Limit must be <= ${MAX_LIMIT}.`);
  }

  return parsed;
}

export function parseCountOption(value: string, flagName: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`Invalid ${flagName} value: ${value}. Expected a non-negative integer.`);
  }

  return Number.parseInt(value, 10);
}

export function isLanguage(value: unknown): value is Language {
  return value === "cze" || value === "eng";
}

export function parseLanguageOption(value: string): Language {
  if (isLanguage(value)) {
    return value;
  }

  throw new Error(
    `Definovaný jazyk (--language) musí být 'cze' nebo 'eng', ne '${value}'.\n` +
      `The defined --language has to be 'cze' or 'eng', not '${value}'.`,
  );
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === "text" || value === "plain" || value === "json";
}

export function parseOutputFormat(value: string): OutputFormat {
  if (isOutputFormat(value)) {
    return value;
  }

  throw new Error(`Invalid format: ${value}. Allowed values: text, plain, json.`);
}
