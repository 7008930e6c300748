import { readFileSync } from "node:fs";
import { CorpusFileError, CorpusFormatError } from "./errors.ts";
import type { CorpusEntry, CorpusSource } from "./types.ts";

export interface ParsedCorpus {
  entries: CorpusEntry[];
  /** Non-blank lines that did not hold a rank, a word and a frequency. */
  skippedLines: number[];
}

const INTEGER = /^\d+$/;

function parseCorpusLine(line: string): CorpusEntry | undefined {
  const [rankRaw, wordRaw, frequencyRaw] = line.split("\t");
  if (rankRaw === undefined || wordRaw === undefined || frequencyRaw === undefined) {
    return undefined;
  }

  const rankText = rankRaw.trim();
  const frequencyText = frequencyRaw.trim();
  if (!INTEGER.test(rankText) || !INTEGER.test(frequencyText)) {
    return undefined;
  }

  const word = wordRaw.trim().toLowerCase();
  if (!word) {
    return undefined;
  }

  return {
    rank: Number.parseInt(rankText, 10),
    word,
    frequency: Number.parseInt(frequencyText, 10),
  };
}

/**
 * Parses `rank<TAB>word<TAB>frequency` rows. Extra columns are ignored, a
 * header row lands in `skippedLines` like any other unparseable row, and the
 * file order is kept as-is.
 */
export function parseCorpusTsv(raw: string): ParsedCorpus {
  const entries: CorpusEntry[] = [];
  const skippedLines: number[] = [];

  const lines = raw.replace(/^\uFEFF/, "").split(/\r?\n/);
  for (const [index, line] of lines.entries()) {
    if (!line.trim()) {
      continue;
    }

    const entry = parseCorpusLine(line);
    if (!entry) {
      skippedLines.push(index + 1);
      continue;
    }
    entries.push(entry);
  }

  return { entries, skippedLines };
}

export function readCorpusFile(corpusPath: string): ParsedCorpus {
  let raw: string;
  try {
    raw = readFileSync(corpusPath, "utf8");
  } catch (error) {
    throw new CorpusFileError(corpusPath, { cause: error });
  }

  const parsed = parseCorpusTsv(raw);
  if (parsed.entries.length === 0) {
    throw new CorpusFormatError(
      `Korpus ${corpusPath} neobsahuje žádný platný řádek (pořadí, slovo, frekvence).\n` +
        `Corpus ${corpusPath} contains no valid rank/word/frequency rows.`,
    );
  }

  return parsed;
}

export class FileCorpusSource implements CorpusSource {
  private parsed: ParsedCorpus | undefined;

  constructor(readonly corpusPath: string) {}

  loadEntries(): CorpusEntry[] {
    return this.load().entries;
  }

  skippedLines(): number[] {
    return this.load().skippedLines;
  }

  private load(): ParsedCorpus {
    if (!this.parsed) {
      this.parsed = readCorpusFile(this.corpusPath);
    }
    return this.parsed;
  }
}
