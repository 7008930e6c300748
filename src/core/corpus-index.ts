import type { CorpusEntry, CorpusSource } from "./types.ts";

/**
 * Read-only view over the ranked corpus.
 *
 * Entries keep the order the source supplied them in; that order alone decides
 * which words are "most frequent". When a word appears more than once, lookups
 * see only its first occurrence. Later duplicates still count towards `size`
 * and are reported by `duplicateWords()`.
 */
export class CorpusIndex {
  private readonly entries: readonly CorpusEntry[];
  private readonly firstByWord = new Map<string, CorpusEntry>();
  private readonly duplicates = new Set<string>();

  constructor(entries: readonly CorpusEntry[]) {
    this.entries = entries;

    for (const entry of entries) {
      if (this.firstByWord.has(entry.word)) {
        this.duplicates.add(entry.word);
        continue;
      }
      this.firstByWord.set(entry.word, entry);
    }
  }

  static fromSource(source: CorpusSource): CorpusIndex {
    return new CorpusIndex(source.loadEntries());
  }

  get size(): number {
    return this.entries.length;
  }

  topByRank(n: number): Set<string> {
    if (n <= 0) {
      return new Set();
    }

    return new Set(this.entries.slice(0, n).map((entry) => entry.word));
  }

  lookup(word: string): number | undefined {
    return this.firstByWord.get(word)?.frequency;
  }

  duplicateWords(): string[] {
    return [...this.duplicates];
  }

  /** First `n` entries in supplied order. */
  head(n: number): CorpusEntry[] {
    return this.entries.slice(0, Math.max(0, n));
  }
}
