/**
 * Error classes raised by the extraction pipeline and its file collaborators.
 * Messages aimed at the user carry both Czech and English text, since the
 * --language flag only applies to status output.
 */

export class KeywordExtractionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "KeywordExtractionError";
  }
}

/** No tokens survived stop-word and short-word filtering, so no threshold exists. */
export class EmptyInputError extends KeywordExtractionError {
  constructor() {
    super(
      "Po odstranění stop slov a krátkých slov nezbylo v dokumentu žádné slovo.\n" +
        "No words remain in the document after removing stop words and short words.",
    );
    this.name = "EmptyInputError";
  }
}

export class InputFileError extends KeywordExtractionError {
  public readonly filePath: string;

  constructor(filePath: string, options?: ErrorOptions) {
    super(
      `Zadaný --input soubor nebyl nalezen či se ho nepovedlo otevřít: ${filePath}\n` +
        `I could not find or open the --input file: ${filePath}`,
      options,
    );
    this.name = "InputFileError";
    this.filePath = filePath;
  }
}

export class OutputFileError extends KeywordExtractionError {
  public readonly filePath: string;

  constructor(filePath: string, options?: ErrorOptions) {
    super(
      `Zadaný --output soubor se nepovedlo otevřít či vytvořit: ${filePath}\n` +
        `I could not open or create the --output file: ${filePath}`,
      options,
    );
    this.name = "OutputFileError";
    this.filePath = filePath;
  }
}

export class CorpusFileError extends KeywordExtractionError {
  public readonly filePath: string;

  constructor(filePath: string, options?: ErrorOptions) {
    super(
      `Soubor korpusu nebyl nalezen či se ho nepovedlo otevřít: ${filePath}\n` +
        `I could not find or open the corpus file: ${filePath}`,
      options,
    );
    this.name = "CorpusFileError";
    this.filePath = filePath;
  }
}

export class CorpusFormatError extends KeywordExtractionError {
  constructor(message: string) {
    super(message);
    this.name = "CorpusFormatError";
  }
}

export class ConfigError extends KeywordExtractionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}
