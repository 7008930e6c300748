import type { CorpusIndex } from "./corpus-index.ts";
import { totalFrequency } from "./frequency.ts";
import type { FrequencyTable, ImportanceScores } from "./types.ts";

/** Per-pass constants, computed once from the pruned table and the corpus. */
export interface ImportanceContext {
  uniqueWordCount: number;
  totalFrequency: number;
  corpusSize: number;
}

export function buildImportanceContext(table: FrequencyTable, corpus: CorpusIndex): ImportanceContext {
  return {
    uniqueWordCount: table.size,
    totalFrequency: totalFrequency(table),
    corpusSize: corpus.size,
  };
}

/**
 * (docFrequency / uniqueWordCount) * ln(((totalFrequency + corpusSize) / 2) / (1 + corpusFrequency) + 1)
 *
 * Words frequent in the document score higher; the log term grows as the word
 * gets rarer in the corpus.
 */
export function importanceOf(
  docFrequency: number,
  corpusFrequency: number,
  context: ImportanceContext,
): number {
  const rarity = Math.log((context.totalFrequency + context.corpusSize) / 2 / (1 + corpusFrequency) + 1);
  return (docFrequency / context.uniqueWordCount) * rarity;
}

/** Words missing from the corpus get no score at all. */
export function scoreImportance(table: FrequencyTable, corpus: CorpusIndex): ImportanceScores {
  const scores: ImportanceScores = new Map();
  if (table.size === 0) {
    return scores;
  }

  const context = buildImportanceContext(table, corpus);

  for (const [word, docFrequency] of table) {
    const corpusFrequency = corpus.lookup(word);
    if (corpusFrequency === undefined) {
      continue;
    }

    scores.set(word, importanceOf(docFrequency, corpusFrequency, context));
  }

  return scores;
}
