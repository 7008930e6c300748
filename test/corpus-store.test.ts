import { rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileCorpusSource, parseCorpusTsv, readCorpusFile } from "../src/core/corpus-store.ts";
import { CorpusFileError, CorpusFormatError } from "../src/core/errors.ts";
import { makeTempDir } from "./support/corpus.ts";

describe("parseCorpusTsv", () => {
  it("parses rank, word and frequency, lowercasing words and keeping file order", () => {
    const raw = "rank\tword\tfrequency\n1\tA\t100\n3\tb\t50\textra\n\nbad line\n2\tČas\t7\n";

    const parsed = parseCorpusTsv(raw);

    expect(parsed.entries).toEqual([
      { rank: 1, word: "a", frequency: 100 },
      { rank: 3, word: "b", frequency: 50 },
      { rank: 2, word: "čas", frequency: 7 },
    ]);
    expect(parsed.skippedLines).toEqual([1, 5]);
  });

  it("handles CRLF line endings and a byte order mark", () => {
    const parsed = parseCorpusTsv("\uFEFF1\tje\t10\r\n2\tse\t9\r\n");
    expect(parsed.entries.map((entry) => entry.word)).toEqual(["je", "se"]);
    expect(parsed.skippedLines).toEqual([]);
  });

  it("skips rows with non-integer numbers or an empty word", () => {
    const parsed = parseCorpusTsv("1\tje\t1.5\nx\tse\t9\n2\t \t4\n3\tna\n");
    expect(parsed.entries).toEqual([]);
    expect(parsed.skippedLines).toEqual([1, 2, 3, 4]);
  });
});

describe("readCorpusFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("corpus");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("throws CorpusFileError for a missing file", () => {
    expect(() => readCorpusFile(path.join(dir, "missing.tsv"))).toThrow(CorpusFileError);
  });

  it("throws CorpusFormatError when no row parses", () => {
    const corpusPath = path.join(dir, "empty.tsv");
    writeFileSync(corpusPath, "rank\tword\tfrequency\n", "utf8");
    expect(() => readCorpusFile(corpusPath)).toThrow(CorpusFormatError);
  });

  it("loads entries through FileCorpusSource", () => {
    const corpusPath = path.join(dir, "corpus.tsv");
    writeFileSync(corpusPath, "rank\tword\tfrequency\n1\tA\t100\n2\tkočka\t5\n", "utf8");

    const source = new FileCorpusSource(corpusPath);

    expect(source.loadEntries()).toEqual([
      { rank: 1, word: "a", frequency: 100 },
      { rank: 2, word: "kočka", frequency: 5 },
    ]);
    expect(source.skippedLines()).toEqual([1]);
  });
});
