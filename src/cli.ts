#!/usr/bin/env tsx
import { Command, InvalidArgumentError } from "commander";
import { runDoctor } from "./commands/doctor.ts";
import { runExtract } from "./commands/extract.ts";
import { runStats } from "./commands/stats.ts";
import { DEFAULT_LIMIT, DEFAULT_MIN_WORD_LENGTH, DEFAULT_STOP_WORD_COUNT, VERSION } from "./core/constants.ts";
import { HELP_TEXT, MISSING_INPUT_MESSAGE } from "./core/messages.ts";
import { parseCountOption, parseLanguageOption, parseLimitOption, parseOutputFormat } from "./core/parsing.ts";
import type { Language, OutputFormat } from "./core/types.ts";

function toOptionParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };
}

function toCountParser(flagName: string): (value: string) => number {
  return toOptionParser((value) => parseCountOption(value, flagName));
}

const program = new Command();

program
  .name("ckw")
  .description("Extract keywords from a Czech document using a reference word-frequency corpus")
  .version(VERSION)
  .addHelpText("after", HELP_TEXT);

program
  .command("extract", { isDefault: true })
  .description("Rank the keywords of one document (default command)")
  .option("-i, --input <path>", "Document to analyze")
  .option("-o, --output <path>", "Write results to this file instead of stdout")
  .option("-c, --corpus <path>", "Corpus TSV file: rank, word, frequency")
  .option("-l, --language <lang>", "Status message language: cze or eng (default: cze)", toOptionParser(parseLanguageOption))
  .option("-f, --format <format>", "Output format: text, plain, json (default: text)", toOptionParser(parseOutputFormat))
  .option("-s, --simple-print", "Print only the keywords, same as --format plain")
  .option("-n, --limit <count>", `Max keywords (default: ${DEFAULT_LIMIT})`, toOptionParser(parseLimitOption))
  .option(
    "--stop-words <count>",
    `Top-ranked corpus words treated as stop words (default: ${DEFAULT_STOP_WORD_COUNT})`,
    toCountParser("--stop-words"),
  )
  .option(
    "--min-length <count>",
    `Minimum keyword length in characters (default: ${DEFAULT_MIN_WORD_LENGTH})`,
    toCountParser("--min-length"),
  )
  .action(
    async (options: {
      input?: string;
      output?: string;
      corpus?: string;
      language?: Language;
      format?: OutputFormat;
      simplePrint?: boolean;
      limit?: number;
      stopWords?: number;
      minLength?: number;
    }) => {
      if (!options.input) {
        console.error(MISSING_INPUT_MESSAGE);
        return;
      }

      await runExtract({ ...options, input: options.input });
    },
  );

program
  .command("stats")
  .description("Show reference corpus statistics")
  .option("-c, --corpus <path>", "Corpus TSV file")
  .option("--stop-words <count>", "Stop-word count to preview", toCountParser("--stop-words"))
  .action(async (options: { corpus?: string; stopWords?: number }) => {
    await runStats(options);
  });

program
  .command("doctor")
  .description("Check config, corpus and input readiness")
  .option("-c, --corpus <path>", "Corpus TSV file")
  .option("-i, --input <path>", "Document to check as well")
  .option("--stop-words <count>", "Stop-word count to check coverage for", toCountParser("--stop-words"))
  .option("--min-length <count>", "Minimum keyword length used for the input check", toCountParser("--min-length"))
  .action(async (options: { corpus?: string; input?: string; stopWords?: number; minLength?: number }) => {
    await runDoctor(options);
  });

program.showHelpAfterError();

async function main(argv: string[]): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

main(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
