export { runExtract, executeExtraction } from "./commands/extract.ts";
export { runStats, collectCorpusStats } from "./commands/stats.ts";
export { runDoctor } from "./commands/doctor.ts";
export { extractKeywords } from "./core/pipeline.ts";
export { tokenize } from "./core/tokenizer.ts";
export { CorpusIndex } from "./core/corpus-index.ts";
export { FileCorpusSource, parseCorpusTsv } from "./core/corpus-store.ts";
export { ConsoleResultSink, FileDocumentSource, FileResultSink, MemoryResultSink } from "./core/io.ts";
export { removeShortWords, removeStopWords } from "./core/word-filter.ts";
export { countTokens, frequencyThreshold, pruneByThreshold } from "./core/frequency.ts";
export { scoreImportance } from "./core/importance.ts";
export { normalizeScores } from "./core/normalize.ts";
export { renderPayload } from "./core/format.ts";
export {
  ConfigError,
  CorpusFileError,
  CorpusFormatError,
  EmptyInputError,
  InputFileError,
  KeywordExtractionError,
  OutputFileError,
} from "./core/errors.ts";
export type {
  CorpusEntry,
  CorpusSource,
  DocumentSource,
  KeywordReport,
  PipelineOptions,
  PipelineWarning,
  RankedKeyword,
  ResultSink,
} from "./core/types.ts";
