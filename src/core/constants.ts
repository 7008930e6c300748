import type { Language, OutputFormat } from "./types.ts";

export const DEFAULT_STOP_WORD_COUNT = 150;
export const DEFAULT_MIN_WORD_LENGTH = 4;
export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 200;

export const DEFAULT_LANGUAGE: Language = "cze";
export const DEFAULT_FORMAT: OutputFormat = "text";
export const DEFAULT_CORPUS_PATH = "corpus/word-frequencies.tsv";

export const CONFIG_FILENAME = ".ckwrc.json";
export const CORPUS_PATH_ENV = "CKW_CORPUS_PATH";
export const LANGUAGE_ENV = "CKW_LANGUAGE";

/** Normalized scores span [SCORE_FLOOR, SCORE_FLOOR + SCORE_SPAN]. */
export const SCORE_FLOOR = 0.5;
export const SCORE_SPAN = 99.5;
export const SCORE_MIDPOINT = SCORE_FLOOR + SCORE_SPAN / 2;

export const VERSION = "0.1.0";
