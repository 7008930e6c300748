import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { formatCheck } from "../src/commands/doctor.ts";
import { findRankInversion, runDoctorChecks } from "../src/core/doctor.ts";
import { corpusAfterStopWords, makeTempDir, toCorpusTsv } from "./support/corpus.ts";

function layout(dir: string): { cwd: string; home: string } {
  const cwd = path.join(dir, "project");
  const home = path.join(dir, "home");
  mkdirSync(cwd, { recursive: true });
  mkdirSync(home, { recursive: true });
  return { cwd, home };
}

describe("runDoctorChecks", () => {
  it("passes every check for a clean corpus and readable input", () => {
    const dir = makeTempDir("doctor");
    try {
      const configLocations = layout(dir);
      const corpusPath = path.join(dir, "corpus.tsv");
      const inputPath = path.join(dir, "input.txt");
      writeFileSync(corpusPath, toCorpusTsv(corpusAfterStopWords([["kočka", 5]])), "utf8");
      writeFileSync(inputPath, "Ahoj, světe 42!", "utf8");

      const checks = runDoctorChecks({ corpusPath, stopWordCount: 150, inputPath, configLocations });

      expect(checks).toEqual([
        {
          name: "config",
          ok: true,
          detail: `readable (${path.join(configLocations.cwd, ".ckwrc.json")}, ${path.join(configLocations.home, ".ckwrc.json")})`,
        },
        { name: "corpus file", ok: true, detail: `found at ${corpusPath}` },
        { name: "corpus rows", ok: true, detail: "151 entries" },
        { name: "rank order", ok: true, detail: "ascending" },
        { name: "duplicate words", ok: true, detail: "none" },
        { name: "stop words", ok: true, detail: "top 150 corpus words are stop words" },
        { name: "input", ok: true, detail: "2 words, 2 left after filtering" },
      ]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("warns about skipped rows, rank inversions, duplicates and a small corpus", () => {
    const dir = makeTempDir("doctor-warn");
    try {
      const configLocations = layout(dir);
      const corpusPath = path.join(dir, "corpus.tsv");
      writeFileSync(corpusPath, "rank\tword\tfrequency\n1\tje\t10\n3\tse\t9\n2\tje\t5\n", "utf8");

      const byName = new Map(
        runDoctorChecks({ corpusPath, stopWordCount: 150, configLocations }).map((check) => [check.name, check]),
      );

      expect(byName.get("corpus rows")).toEqual({ name: "corpus rows", ok: true, detail: "3 entries, skipped lines 1" });
      expect(byName.get("rank order")?.ok).toBe(false);
      expect(byName.get("rank order")?.detail).toBe('rank 2 ("je") follows a higher rank; file order is used as-is');
      expect(byName.get("duplicate words")?.detail).toBe("1 repeated (first occurrence wins): je");
      expect(byName.get("stop words")).toEqual({
        name: "stop words",
        ok: false,
        detail: "corpus has only 3 entries; all of them are stop words",
      });
      expect(byName.has("input")).toBe(false);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("warns when stop words and short words leave nothing to extract", () => {
    const dir = makeTempDir("doctor-input");
    try {
      const configLocations = layout(dir);
      const corpusPath = path.join(dir, "corpus.tsv");
      const inputPath = path.join(dir, "input.txt");
      writeFileSync(corpusPath, "1\tproto\t100\n2\tkočka\t5\n", "utf8");

      writeFileSync(inputPath, "Proto, proto.", "utf8");
      const stopOnly = runDoctorChecks({ corpusPath, stopWordCount: 1, inputPath, configLocations });
      expect(stopOnly.find((check) => check.name === "input")).toEqual({
        name: "input",
        ok: false,
        detail: "2 words, none left after removing stop words and short words",
      });

      writeFileSync(inputPath, "a b c", "utf8");
      const shortOnly = runDoctorChecks({ corpusPath, stopWordCount: 1, inputPath, configLocations });
      expect(shortOnly.find((check) => check.name === "input")).toEqual({
        name: "input",
        ok: false,
        detail: "3 words, none left after removing stop words and short words",
      });

      const relaxed = runDoctorChecks({
        corpusPath,
        stopWordCount: 1,
        minWordLength: 1,
        inputPath,
        configLocations,
      });
      expect(relaxed.find((check) => check.name === "input")?.detail).toBe("3 words, 3 left after filtering");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("reports missing files and a broken config", () => {
    const dir = makeTempDir("doctor-missing");
    try {
      const configLocations = layout(dir);
      writeFileSync(path.join(configLocations.cwd, ".ckwrc.json"), "{ broken", "utf8");
      const corpusPath = path.join(dir, "missing.tsv");
      const inputPath = path.join(dir, "missing.txt");

      const checks = runDoctorChecks({ corpusPath, stopWordCount: 150, inputPath, configLocations });

      expect(checks.map((check) => [check.name, check.ok])).toEqual([
        ["config", false],
        ["corpus file", false],
        ["input", false],
      ]);
      expect(checks[1]?.detail).toBe(`missing at ${corpusPath}`);
      expect(checks[2]?.detail).toBe(`I could not find or open the --input file: ${inputPath}`);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("findRankInversion", () => {
  it("returns the index of the first entry ranked above its predecessor", () => {
    expect(
      findRankInversion([
        { rank: 1, word: "a", frequency: 3 },
        { rank: 2, word: "b", frequency: 2 },
      ]),
    ).toBeUndefined();
    expect(
      findRankInversion([
        { rank: 2, word: "a", frequency: 3 },
        { rank: 1, word: "b", frequency: 2 },
      ]),
    ).toBe(1);
  });
});

describe("formatCheck", () => {
  it("pads the status and name columns", () => {
    expect(formatCheck({ name: "rank order", ok: true, detail: "ascending" })).toBe(
      "OK   rank order           ascending",
    );
    expect(formatCheck({ name: "input", ok: false, detail: "no words found" })).toBe(
      "WARN input                no words found",
    );
  });
});
