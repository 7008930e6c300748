import { DEFAULT_LIMIT, DEFAULT_MIN_WORD_LENGTH, DEFAULT_STOP_WORD_COUNT } from "./constants.ts";
import type { CorpusIndex } from "./corpus-index.ts";
import { EmptyInputError } from "./errors.ts";
import { countTokens, pruneByThreshold } from "./frequency.ts";
import { scoreImportance } from "./importance.ts";
import { normalizeScores } from "./normalize.ts";
import { countWordRuns, tokenize } from "./tokenizer.ts";
import type { KeywordReport, PipelineOptions, PipelineWarning } from "./types.ts";
import { removeShortWords, removeStopWords } from "./word-filter.ts";

export function resolvePipelineOptions(options: Partial<PipelineOptions> = {}): PipelineOptions {
  return {
    stopWordCount: options.stopWordCount ?? DEFAULT_STOP_WORD_COUNT,
    minWordLength: options.minWordLength ?? DEFAULT_MIN_WORD_LENGTH,
    limit: options.limit ?? DEFAULT_LIMIT,
  };
}

/**
 * Runs the whole scoring pipeline over one document.
 *
 * Throws EmptyInputError when filtering leaves nothing to count. A document
 * whose candidates are all missing from the corpus, or whose scores are all
 * equal, still produces a report; those cases are listed in `warnings`.
 */
export function extractKeywords(
  text: string,
  corpus: CorpusIndex,
  options: Partial<PipelineOptions> = {},
): KeywordReport {
  const resolved = resolvePipelineOptions(options);

  const wordRuns = countWordRuns(text);
  const tokens = tokenize(text);

  const withoutStopWords = removeStopWords(tokens, corpus.topByRank(resolved.stopWordCount));
  const filtered = removeShortWords(withoutStopWords, resolved.minWordLength);
  if (filtered.length === 0) {
    throw new EmptyInputError();
  }

  const table = countTokens(filtered);
  const uniqueWordCount = table.size;
  const { threshold, removedWords } = pruneByThreshold(table, filtered.length);

  const raw = scoreImportance(table, corpus);
  const { keywords, degenerate } = normalizeScores(raw, resolved.limit);

  const warnings: PipelineWarning[] = [];
  if (raw.size === 0) {
    warnings.push({ code: "no-scorable-words", candidateCount: table.size });
  } else if (degenerate) {
    const [first] = raw.values();
    warnings.push({ code: "degenerate-score-range", rawScore: first ?? 0, wordCount: raw.size });
  }

  return {
    documentTokenCount: wordRuns,
    stopWordsRemoved: tokens.length - withoutStopWords.length,
    // Runs of bare punctuation or digits count as short words.
    shortWordsRemoved: wordRuns - tokens.length + withoutStopWords.length - filtered.length,
    filteredTokenCount: filtered.length,
    uniqueWordCount,
    threshold,
    unusualWordsRemoved: removedWords,
    candidateCount: table.size,
    scoredWordCount: raw.size,
    keywords,
    warnings,
  };
}
