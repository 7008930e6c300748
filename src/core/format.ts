import { statusLines } from "./messages.ts";
import type { KeywordReport, Language, PresentationConfig, RankedKeyword } from "./types.ts";

export interface ExtractionPayload {
  input: string;
  corpus: string;
  language: Language;
  corpusSize: number;
  report: KeywordReport;
}

/** Shortest decimal at 15 significant digits, so 100 prints as "100" and 57.73 as "57.73". */
export function formatScore(score: number): string {
  return String(Number(score.toPrecision(15)));
}

export function formatKeywordLine(keyword: RankedKeyword, verbose: boolean): string {
  return verbose ? `${keyword.rank}. ${keyword.word} (${formatScore(keyword.score)})` : keyword.word;
}

/**
 * Output lines for one run. Only presentation settings come in here; the
 * report is already final.
 */
export function renderPayload(payload: ExtractionPayload, presentation: PresentationConfig): string[] {
  if (presentation.format === "json") {
    const keywords = payload.report.keywords.map((keyword) => ({
      ...keyword,
      score: Number(formatScore(keyword.score)),
    }));
    return [JSON.stringify({ ...payload, report: { ...payload.report, keywords } }, null, 2)];
  }

  const keywordLines = payload.report.keywords.map((keyword) =>
    formatKeywordLine(keyword, presentation.format === "text"),
  );

  if (presentation.format === "plain") {
    return keywordLines;
  }

  return [...statusLines(payload.report, payload.corpusSize, presentation.language), "", ...keywordLines];
}
