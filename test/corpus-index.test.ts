import { describe, expect, it } from "vitest";
import { CorpusIndex } from "../src/core/corpus-index.ts";
import type { CorpusEntry } from "../src/core/types.ts";

const entries: CorpusEntry[] = [
  { rank: 1, word: "a", frequency: 9000 },
  { rank: 2, word: "být", frequency: 8000 },
  { rank: 4, word: "hrad", frequency: 300 },
  { rank: 3, word: "se", frequency: 7000 },
  { rank: 5, word: "hrad", frequency: 1 },
];

describe("CorpusIndex", () => {
  it("takes the top words in supplied order without re-sorting", () => {
    const index = new CorpusIndex(entries);
    expect([...index.topByRank(3)]).toEqual(["a", "být", "hrad"]);
  });

  it("returns every word when asking for more than the corpus holds", () => {
    const index = new CorpusIndex(entries);
    expect(index.topByRank(150)).toEqual(new Set(["a", "být", "hrad", "se"]));
  });

  it("returns an empty set for a non-positive count", () => {
    const index = new CorpusIndex(entries);
    expect(index.topByRank(0).size).toBe(0);
    expect(index.topByRank(-2).size).toBe(0);
  });

  it("looks up the first occurrence of a duplicated word", () => {
    const index = new CorpusIndex(entries);
    expect(index.lookup("hrad")).toBe(300);
    expect(index.duplicateWords()).toEqual(["hrad"]);
  });

  it("reports missing words as undefined and matches case-sensitively", () => {
    const index = new CorpusIndex(entries);
    expect(index.lookup("zámek")).toBeUndefined();
    expect(index.lookup("Hrad")).toBeUndefined();
  });

  it("counts duplicates in size", () => {
    expect(new CorpusIndex(entries).size).toBe(5);
    expect(new CorpusIndex([]).size).toBe(0);
  });

  it("builds from a corpus source", () => {
    const index = CorpusIndex.fromSource({ loadEntries: () => entries.slice(0, 2) });
    expect(index.size).toBe(2);
    expect(index.lookup("být")).toBe(8000);
    expect(index.head(1)).toEqual([{ rank: 1, word: "a", frequency: 9000 }]);
  });
});
