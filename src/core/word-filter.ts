import { DEFAULT_MIN_WORD_LENGTH } from "./constants.ts";
import { wordLength } from "./tokenizer.ts";

export function removeStopWords(tokens: readonly string[], stopWords: ReadonlySet<string>): string[] {
  return tokens.filter((token) => !stopWords.has(token));
}

export function removeShortWords(
  tokens: readonly string[],
  minLength: number = DEFAULT_MIN_WORD_LENGTH,
): string[] {
  return tokens.filter((token) => wordLength(token) >= minLength);
}
