export interface CorpusEntry {
  rank: number;
  word: string;
  frequency: number;
}

export interface DocumentSource {
  readAll(): string;
}

/** Entries come back ordered by ascending rank, most frequent word first. */
export interface CorpusSource {
  loadEntries(): CorpusEntry[];
}

export interface ResultSink {
  writeLine(line: string): void;
}

export type FrequencyTable = Map<string, number>;

export type ImportanceScores = Map<string, number>;

export interface ScoredWord {
  word: string;
  score: number;
}

export interface RankedKeyword {
  rank: number;
  word: string;
  score: number;
}

export interface PipelineOptions {
  stopWordCount: number;
  minWordLength: number;
  limit: number;
}

export type PipelineWarning =
  | { code: "no-scorable-words"; candidateCount: number }
  | { code: "degenerate-score-range"; rawScore: number; wordCount: number };

export interface KeywordReport {
  /** Whitespace-separated runs in the document, before any normalization. */
  documentTokenCount: number;
  stopWordsRemoved: number;
  shortWordsRemoved: number;
  /** Tokens left after stop-word and short-word filtering; drives the threshold. */
  filteredTokenCount: number;
  uniqueWordCount: number;
  threshold: number;
  unusualWordsRemoved: number;
  /** Distinct words that survived the threshold. */
  candidateCount: number;
  scoredWordCount: number;
  keywords: RankedKeyword[];
  warnings: PipelineWarning[];
}

export type Language = "cze" | "eng";

export type OutputFormat = "text" | "plain" | "json";

export interface PresentationConfig {
  format: OutputFormat;
  language: Language;
}
