import { existsSync } from "node:fs";
import { type ConfigLocations, configPaths, loadKeywordConfig } from "./config.ts";
import { DEFAULT_MIN_WORD_LENGTH } from "./constants.ts";
import { CorpusIndex } from "./corpus-index.ts";
import { type ParsedCorpus, readCorpusFile } from "./corpus-store.ts";
import { FileDocumentSource } from "./io.ts";
import { tokenize } from "./tokenizer.ts";
import type { CorpusEntry } from "./types.ts";
import { removeShortWords, removeStopWords } from "./word-filter.ts";

export interface DoctorCheck {
  name: string;
  ok: boolean;
  detail: string;
}

export interface DoctorTarget {
  corpusPath: string;
  stopWordCount: number;
  minWordLength?: number | undefined;
  inputPath?: string | undefined;
  configLocations?: ConfigLocations | undefined;
}

const PREVIEW_LIMIT = 5;

function preview(values: readonly (string | number)[]): string {
  const shown = values.slice(0, PREVIEW_LIMIT).join(", ");
  return values.length > PREVIEW_LIMIT ? `${shown}, ...` : shown;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message.split("\n").pop() ?? error.message : String(error);
}

export function findRankInversion(entries: readonly CorpusEntry[]): number | undefined {
  for (let i = 1; i < entries.length; i += 1) {
    const previous = entries[i - 1];
    const current = entries[i];
    if (previous && current && current.rank < previous.rank) {
      return i;
    }
  }
  return undefined;
}

function configCheck(locations: ConfigLocations | undefined): DoctorCheck {
  try {
    loadKeywordConfig(locations);
    const paths = locations ? configPaths(locations) : undefined;
    return {
      name: "config",
      ok: true,
      detail: paths ? `readable (${paths.local}, ${paths.global})` : "readable",
    };
  } catch (error) {
    return { name: "config", ok: false, detail: errorMessage(error) };
  }
}

function corpusChecks(parsed: ParsedCorpus, index: CorpusIndex, stopWordCount: number): DoctorCheck[] {
  const checks: DoctorCheck[] = [];

  checks.push({
    name: "corpus rows",
    ok: true,
    detail:
      parsed.skippedLines.length > 0
        ? `${index.size} entries, skipped lines ${preview(parsed.skippedLines)}`
        : `${index.size} entries`,
  });

  const inversion = findRankInversion(parsed.entries);
  const inverted = inversion === undefined ? undefined : parsed.entries[inversion];
  checks.push({
    name: "rank order",
    ok: inverted === undefined,
    detail: inverted
      ? `rank ${inverted.rank} ("${inverted.word}") follows a higher rank; file order is used as-is`
      : "ascending",
  });

  const duplicates = index.duplicateWords();
  checks.push({
    name: "duplicate words",
    ok: duplicates.length === 0,
    detail:
      duplicates.length === 0
        ? "none"
        : `${duplicates.length} repeated (first occurrence wins): ${preview(duplicates)}`,
  });

  checks.push({
    name: "stop words",
    ok: index.size >= stopWordCount,
    detail:
      index.size >= stopWordCount
        ? `top ${stopWordCount} corpus words are stop words`
        : `corpus has only ${index.size} entries; all of them are stop words`,
  });

  return checks;
}

/** Applies the same filters as extraction; without a corpus only short words are dropped. */
function inputCheck(
  inputPath: string,
  index: CorpusIndex | undefined,
  stopWordCount: number,
  minWordLength: number,
): DoctorCheck {
  try {
    const tokens = tokenize(new FileDocumentSource(inputPath).readAll());
    if (tokens.length === 0) {
      return { name: "input", ok: false, detail: "no words found" };
    }

    const stopWords = index ? index.topByRank(stopWordCount) : new Set<string>();
    const remaining = removeShortWords(removeStopWords(tokens, stopWords), minWordLength);
    return {
      name: "input",
      ok: remaining.length > 0,
      detail:
        remaining.length > 0
          ? `${tokens.length} words, ${remaining.length} left after filtering`
          : `${tokens.length} words, none left after removing stop words and short words`,
    };
  } catch (error) {
    return { name: "input", ok: false, detail: errorMessage(error) };
  }
}

export function runDoctorChecks(target: DoctorTarget): DoctorCheck[] {
  const checks: DoctorCheck[] = [configCheck(target.configLocations)];

  const corpusExists = existsSync(target.corpusPath);
  checks.push({
    name: "corpus file",
    ok: corpusExists,
    detail: corpusExists ? `found at ${target.corpusPath}` : `missing at ${target.corpusPath}`,
  });

  let index: CorpusIndex | undefined;
  if (corpusExists) {
    try {
      const parsed = readCorpusFile(target.corpusPath);
      index = new CorpusIndex(parsed.entries);
      checks.push(...corpusChecks(parsed, index, target.stopWordCount));
    } catch (error) {
      checks.push({ name: "corpus rows", ok: false, detail: errorMessage(error) });
    }
  }

  if (target.inputPath !== undefined) {
    checks.push(
      inputCheck(
        target.inputPath,
        index,
        target.stopWordCount,
        target.minWordLength ?? DEFAULT_MIN_WORD_LENGTH,
      ),
    );
  }

  return checks;
}
