import { EmptyInputError } from "./errors.ts";
import type { FrequencyTable } from "./types.ts";

export interface ThresholdPruneResult {
  table: FrequencyTable;
  threshold: number;
  removedWords: number;
}

export function countTokens(tokens: readonly string[]): FrequencyTable {
  const frequencies: FrequencyTable = new Map();
  for (const token of tokens) {
    frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
  }
  return frequencies;
}

/**
 * Minimum occurrence count a word needs to stay a candidate:
 * round(log10(n) + 0.5), halves rounding up, so 1000 tokens give 4.
 */
export function frequencyThreshold(totalTokenCount: number): number {
  if (!Number.isFinite(totalTokenCount) || totalTokenCount < 1) {
    throw new EmptyInputError();
  }

  return Math.round(Math.log10(totalTokenCount) + 0.5);
}

/**
 * Deletes, in place, every word seen fewer times than the threshold.
 * `totalTokenCount` is the filtered token count before any pruning, not the
 * number of distinct words.
 */
export function pruneByThreshold(table: FrequencyTable, totalTokenCount: number): ThresholdPruneResult {
  const threshold = frequencyThreshold(totalTokenCount);

  let removedWords = 0;
  for (const [word, count] of table) {
    if (count < threshold) {
      table.delete(word);
      removedWords += 1;
    }
  }

  return { table, threshold, removedWords };
}

export function totalFrequency(table: FrequencyTable): number {
  let total = 0;
  for (const count of table.values()) {
    total += count;
  }
  return total;
}
