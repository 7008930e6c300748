/** Punctuation, the en dash and ASCII digits; deleted in place, never replaced by a separator. */
const STRIPPED_CHARACTERS = /[.,!?;:"'()–[\]{}|0-9]/g;

const WORD_RUN = /\S+/gu;

export function normalizeWord(raw: string): string {
  return raw.replace(STRIPPED_CHARACTERS, "").toLowerCase();
}

/**
 * Splits text on whitespace and normalizes each run. Diacritics are kept, so
 * "kočka" and "kocka" stay distinct tokens. Runs made only of stripped
 * characters ("123", "...") produce no token.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.matchAll(WORD_RUN)) {
    const token = normalizeWord(match[0]);
    if (token.length > 0) {
      tokens.push(token);
    }
  }
  return tokens;
}

/** Whitespace-separated runs, including those that normalize to nothing. */
export function countWordRuns(text: string): number {
  return text.match(WORD_RUN)?.length ?? 0;
}

/** Length in code points rather than UTF-16 units. */
export function wordLength(token: string): number {
  return [...token].length;
}
