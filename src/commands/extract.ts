import { homedir } from "node:os";
import { type ResolvedSettings, loadKeywordConfig, resolveSettings } from "../core/config.ts";
import { CorpusIndex } from "../core/corpus-index.ts";
import { FileCorpusSource } from "../core/corpus-store.ts";
import { type ExtractionPayload, renderPayload } from "../core/format.ts";
import { FileDocumentSource, createResultSink } from "../core/io.ts";
import { extractKeywords } from "../core/pipeline.ts";
import type { DocumentSource, Language, OutputFormat, ResultSink } from "../core/types.ts";

export interface ExtractOptions {
  input: string;
  output?: string | undefined;
  corpus?: string | undefined;
  language?: Language | undefined;
  format?: OutputFormat | undefined;
  simplePrint?: boolean | undefined;
  limit?: number | undefined;
  stopWords?: number | undefined;
  minLength?: number | undefined;
}

export interface ExtractContext {
  cwd?: string | undefined;
  home?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  /** Replaces the console/file sink chosen from --output. */
  sink?: ResultSink | undefined;
}

export function resolveExtractSettings(
  options: Omit<ExtractOptions, "input">,
  context: ExtractContext = {},
): ResolvedSettings {
  const cwd = context.cwd ?? process.cwd();
  const env = context.env ?? process.env;
  const config = loadKeywordConfig({ cwd, home: context.home ?? homedir() }, env);

  return resolveSettings(
    {
      corpusPath: options.corpus,
      language: options.language,
      format: options.simplePrint ? "plain" : options.format,
      limit: options.limit,
      stopWordCount: options.stopWords,
      minWordLength: options.minLength,
    },
    config,
    env,
    cwd,
  );
}

export function executeExtraction(
  document: DocumentSource,
  corpus: CorpusIndex,
  settings: ResolvedSettings,
  inputLabel: string,
): ExtractionPayload {
  const report = extractKeywords(document.readAll(), corpus, {
    stopWordCount: settings.stopWordCount,
    minWordLength: settings.minWordLength,
    limit: settings.limit,
  });

  return {
    input: inputLabel,
    corpus: settings.corpusPath,
    language: settings.language,
    corpusSize: corpus.size,
    report,
  };
}

export async function runExtract(options: ExtractOptions, context: ExtractContext = {}): Promise<void> {
  const settings = resolveExtractSettings(options, context);

  const document = new FileDocumentSource(options.input);
  const text = document.readAll();
  const sink = context.sink ?? createResultSink(options.output);

  const corpus = CorpusIndex.fromSource(new FileCorpusSource(settings.corpusPath));
  const payload = executeExtraction({ readAll: () => text }, corpus, settings, options.input);

  for (const line of renderPayload(payload, { format: settings.format, language: settings.language })) {
    sink.writeLine(line);
  }
}
