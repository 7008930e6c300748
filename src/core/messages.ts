import { VERSION } from "./constants.ts";
import type { KeywordReport, Language, PipelineWarning } from "./types.ts";

export interface StatusMessages {
  loadedDocument(count: number): string;
  loadedCorpus(count: number): string;
  removedStopWords(count: number): string;
  removedShortWords(count: number): string;
  uniqueWords(count: number): string;
  cutoff(threshold: number): string;
  removedUnusualWords(count: number): string;
  scored(scored: number, candidates: number): string;
  noScorableWords(candidates: number): string;
  degenerateRange(words: number): string;
}

const czech: StatusMessages = {
  loadedDocument: (count) => `Načetl jsem ${count} slov z input dokumentu.`,
  loadedCorpus: (count) => `Načetl jsem referenční korpus s ${count} slovy.`,
  removedStopWords: (count) => `Odstranil jsem ${count} stop slov ze seznamu.`,
  removedShortWords: (count) => `Odstranil jsem ${count} krátkých slov ze seznamu.`,
  uniqueWords: (count) => `Načetl jsem ${count} unikátních slov z input dokumentu.`,
  cutoff: (threshold) => `Odstraňuji slova s frekvencí méně než ${threshold}.`,
  removedUnusualWords: (count) => `Odstranil jsem ${count} neobvyklých slov ze seznamu frekvencí.`,
  scored: (scored, candidates) => `Přiřadil jsem důležitost ${scored} z ${candidates} slov.`,
  noScorableWords: (candidates) =>
    `Žádné z ${candidates} zbývajících slov se nenachází v korpusu, nemám co vypsat.`,
  degenerateRange: (words) =>
    `Všech ${words} slov má stejnou důležitost, každé dostává střední hodnotu škály.`,
};

const english: StatusMessages = {
  loadedDocument: (count) => `Loaded ${count} words from input document.`,
  loadedCorpus: (count) => `Loaded reference corpus with ${count} words.`,
  removedStopWords: (count) => `Removed ${count} stop words from the word list.`,
  removedShortWords: (count) => `Removed ${count} short words from the word list.`,
  uniqueWords: (count) => `Loaded ${count} unique words from input document.`,
  cutoff: (threshold) => `Cutting off words with an occurrence less than ${threshold}.`,
  removedUnusualWords: (count) => `Removed ${count} unusual words from the frequencies list.`,
  scored: (scored, candidates) => `Assigned an importance value to ${scored} of ${candidates} words.`,
  noScorableWords: (candidates) =>
    `None of the ${candidates} remaining words appear in the corpus; there are no keywords to print.`,
  degenerateRange: (words) =>
    `All ${words} words share the same importance; each gets the middle of the scale.`,
};

export function statusMessages(language: Language): StatusMessages {
  return language === "cze" ? czech : english;
}

export function describeWarning(warning: PipelineWarning, language: Language): string {
  const messages = statusMessages(language);
  switch (warning.code) {
    case "no-scorable-words":
      return messages.noScorableWords(warning.candidateCount);
    case "degenerate-score-range":
      return messages.degenerateRange(warning.wordCount);
  }
}

export function statusLines(report: KeywordReport, corpusSize: number, language: Language): string[] {
  const messages = statusMessages(language);
  return [
    messages.loadedDocument(report.documentTokenCount),
    messages.loadedCorpus(corpusSize),
    messages.removedStopWords(report.stopWordsRemoved),
    messages.removedShortWords(report.shortWordsRemoved),
    messages.uniqueWords(report.uniqueWordCount),
    messages.cutoff(report.threshold),
    messages.removedUnusualWords(report.unusualWordsRemoved),
    messages.scored(report.scoredWordCount, report.candidateCount),
    ...report.warnings.map((warning) => describeWarning(warning, language)),
  ];
}

export const MISSING_INPUT_MESSAGE =
  "Pro extrahování slov spusťte program s parametry --input (a --output).\n" +
  "To extract keywords, run the program with the --input (and --output) parameters.";

export const HELP_TEXT = `
ckw extrahuje klíčová slova z českého dokumentu. Používáte verzi ${VERSION}.

Slova se řadí podle toho, jak často se objevují v dokumentu a jak vzácná jsou
v referenčním korpusu (TSV soubor: pořadí, slovo, frekvence). Parametr
--simple-print vypíše pouze samotná klíčová slova; jinak program vypíše
i informace o průběhu analýzy v jazyce zvoleném parametrem --language.
Nápověda a chybové zprávy se vždy zobrazí v obou jazycích.

ckw extracts keywords from a Czech document. You are using version ${VERSION}.

Words are ranked by how often they occur in the document and how rare they are
in the reference corpus (TSV file: rank, word, frequency). The --simple-print
flag prints only the keywords; otherwise the program also prints information
about the analysis in the language chosen with --language. This help and the
error messages are always shown in both languages.

Příklad / Example:
  ckw --input text.txt --output keywords.txt --simple-print --language eng
`;
