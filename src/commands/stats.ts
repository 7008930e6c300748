import { performance } from "node:perf_hooks";
import { CorpusIndex } from "../core/corpus-index.ts";
import { FileCorpusSource } from "../core/corpus-store.ts";
import { resolveExtractSettings } from "./extract.ts";

export interface StatsOptions {
  corpus?: string | undefined;
  stopWords?: number | undefined;
}

export interface CorpusStats {
  corpusPath: string;
  entries: number;
  skippedLines: number;
  duplicateWords: string[];
  stopWordCount: number;
  stopWordPreview: string[];
  loadMs: number;
}

const STOP_WORD_PREVIEW = 10;

export function collectCorpusStats(corpusPath: string, stopWordCount: number): CorpusStats {
  const source = new FileCorpusSource(corpusPath);

  const loadStart = performance.now();
  const index = CorpusIndex.fromSource(source);
  const loadEnd = performance.now();

  return {
    corpusPath,
    entries: index.size,
    skippedLines: source.skippedLines().length,
    duplicateWords: index.duplicateWords(),
    stopWordCount: Math.min(stopWordCount, index.size),
    stopWordPreview: index.head(Math.min(stopWordCount, STOP_WORD_PREVIEW)).map((entry) => entry.word),
    loadMs: loadEnd - loadStart,
  };
}

export async function runStats(options: StatsOptions = {}): Promise<void> {
  const settings = resolveExtractSettings({ corpus: options.corpus, stopWords: options.stopWords });
  const stats = collectCorpusStats(settings.corpusPath, settings.stopWordCount);

  console.log(`Corpus          : ${stats.corpusPath}`);
  console.log(`Entries         : ${stats.entries}`);
  console.log(`Skipped lines   : ${stats.skippedLines}`);
  console.log(
    `Duplicate words : ${stats.duplicateWords.length}${stats.duplicateWords.length > 0 ? " (first occurrence wins)" : ""}`,
  );
  console.log(`Stop words      : ${stats.stopWordCount}`);
  if (stats.stopWordPreview.length > 0) {
    console.log(`Most frequent   : ${stats.stopWordPreview.join(", ")}`);
  }
  console.log(`Load time       : ${stats.loadMs.toFixed(2)} ms`);
}
