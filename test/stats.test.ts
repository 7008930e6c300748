import { rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { collectCorpusStats } from "../src/commands/stats.ts";
import { corpusAfterStopWords, makeTempDir, toCorpusTsv } from "./support/corpus.ts";

describe("collectCorpusStats", () => {
  it("summarizes a corpus and previews its most frequent words", () => {
    const dir = makeTempDir("stats");
    try {
      const corpusPath = path.join(dir, "corpus.tsv");
      writeFileSync(corpusPath, toCorpusTsv(corpusAfterStopWords([["kočka", 5]])), "utf8");

      const stats = collectCorpusStats(corpusPath, 150);

      expect(stats.entries).toBe(151);
      expect(stats.skippedLines).toBe(0);
      expect(stats.duplicateWords).toEqual([]);
      expect(stats.stopWordCount).toBe(150);
      expect(stats.stopWordPreview).toEqual([
        "filler0",
        "filler1",
        "filler2",
        "filler3",
        "filler4",
        "filler5",
        "filler6",
        "filler7",
        "filler8",
        "filler9",
      ]);
      expect(stats.loadMs).toBeGreaterThanOrEqual(0);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("counts skipped lines and duplicates and caps stop words at the corpus size", () => {
    const dir = makeTempDir("stats-small");
    try {
      const corpusPath = path.join(dir, "corpus.tsv");
      writeFileSync(corpusPath, "1\tje\t10\n2\tse\t9\n3\tje\t5\nbad\n", "utf8");

      const stats = collectCorpusStats(corpusPath, 150);

      expect(stats).toMatchObject({
        corpusPath,
        entries: 3,
        skippedLines: 1,
        duplicateWords: ["je"],
        stopWordCount: 3,
        stopWordPreview: ["je", "se", "je"],
      });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
