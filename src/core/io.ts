import { appendFileSync, readFileSync, writeFileSync } from "node:fs";
import { InputFileError, OutputFileError } from "./errors.ts";
import type { DocumentSource, ResultSink } from "./types.ts";

export class FileDocumentSource implements DocumentSource {
  constructor(readonly filePath: string) {}

  readAll(): string {
    try {
      return readFileSync(this.filePath, "utf8");
    } catch (error) {
      throw new InputFileError(this.filePath, { cause: error });
    }
  }
}

export class ConsoleResultSink implements ResultSink {
  writeLine(line: string): void {
    console.log(line);
  }
}

/** Creates or truncates the file as soon as it is constructed. */
export class FileResultSink implements ResultSink {
  constructor(readonly filePath: string) {
    try {
      writeFileSync(filePath, "", "utf8");
    } catch (error) {
      throw new OutputFileError(filePath, { cause: error });
    }
  }

  writeLine(line: string): void {
    try {
      appendFileSync(this.filePath, `${line}\n`, "utf8");
    } catch (error) {
      throw new OutputFileError(this.filePath, { cause: error });
    }
  }
}

export class MemoryResultSink implements ResultSink {
  readonly lines: string[] = [];

  writeLine(line: string): void {
    this.lines.push(line);
  }
}

export function createResultSink(outputPath: string | undefined): ResultSink {
  return outputPath ? new FileResultSink(outputPath) : new ConsoleResultSink();
}
