import { DEFAULT_LIMIT, SCORE_FLOOR, SCORE_MIDPOINT, SCORE_SPAN } from "./constants.ts";
import type { ImportanceScores, RankedKeyword, ScoredWord } from "./types.ts";

export interface NormalizedRanking {
  keywords: RankedKeyword[];
  /** Every raw score was equal, so all words sit at the midpoint. */
  degenerate: boolean;
}

/** Score descending, then word descending by code unit. */
export function compareScoredWords(a: ScoredWord, b: ScoredWord): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }

  if (a.word === b.word) {
    return 0;
  }

  return a.word < b.word ? 1 : -1;
}

export function rankScores(raw: ImportanceScores): ScoredWord[] {
  return [...raw].map(([word, score]) => ({ word, score })).sort(compareScoredWords);
}

export function roundTo2(value: number): number {
  return Number(value.toFixed(2));
}

/**
 * Rescales raw importances onto 0.5..100. The rounding to two decimals happens
 * before the 0.5 offset is added, and the sum is not rounded again.
 */
export function normalizeScores(raw: ImportanceScores, limit: number = DEFAULT_LIMIT): NormalizedRanking {
  const ranked = rankScores(raw);
  const top = ranked[0];
  const bottom = ranked[ranked.length - 1];

  if (!top || !bottom) {
    return { keywords: [], degenerate: false };
  }

  const maxScore = top.score;
  const minScore = bottom.score;
  const degenerate = maxScore === minScore;
  const range = maxScore - minScore;

  const keywords = ranked.slice(0, Math.max(0, limit)).map((entry, index) => {
    const score = degenerate
      ? SCORE_MIDPOINT
      : roundTo2(((entry.score - minScore) / range) * SCORE_SPAN) + SCORE_FLOOR;

    return { rank: index + 1, word: entry.word, score };
  });

  return { keywords, degenerate };
}
