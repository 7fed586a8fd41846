import type { ZodError } from "zod";

export class TabulaReaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Options object with unknown keys, wrong types or values out of range. */
export class InvalidOptionError extends TabulaReaderError {}

export class InvalidRegionError extends TabulaReaderError {}

export class UnsortedColumnsError extends TabulaReaderError {}

export class TemplateFormatError extends TabulaReaderError {}

/** The input PDF could not be found, downloaded or is empty. */
export class InputFileError extends TabulaReaderError {}

export class EngineNotFoundError extends TabulaReaderError {}

export class EngineExecutionError extends TabulaReaderError {
  readonly stderr: string;
  readonly exitCode: number | null;

  constructor(
    message: string,
    stderr: string,
    exitCode: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.stderr = stderr;
    this.exitCode = exitCode;
  }
}

/**
 * Raised while probing the in-process runtime. The dispatcher catches it and
 * falls back to the subprocess backend.
 */
export class EmbeddedRuntimeUnavailableError extends TabulaReaderError {}

export class TableParseError extends TabulaReaderError {}

export function describeIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
