/**
 * Error classes raised by the subtitle compiler
 */

import type { TrackFormat } from "../types/subtitle";

export interface SchemaIssue {
  path: string;
  message: string;
}

/**
 * Base class for all compiler errors
 */
export class SubtitleError extends Error {
  code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "SubtitleError";
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Transcript document failed validation
 */
export class SchemaValidationError extends SubtitleError {
  issues: SchemaIssue[];

  constructor(issues: SchemaIssue[]) {
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join("; ");
    super(`Invalid transcript: ${summary}`, "SCHEMA_VALIDATION");
    this.name = "SchemaValidationError";
    this.issues = issues;
  }
}

/**
 * Entries of one format were handed to the renderer of another
 */
export class FormatMismatchError extends SubtitleError {
  expected: TrackFormat;
  actual: TrackFormat;

  constructor(expected: TrackFormat, actual: TrackFormat) {
    super(
      `Cannot render ${actual} entries with the ${expected} renderer`,
      "FORMAT_MISMATCH"
    );
    this.name = "FormatMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class UnsupportedFormatError extends SubtitleError {
  value: string;

  constructor(value: string) {
    super(
      `Unsupported subtitle format "${value}", expected one of srt, vtt, ass`,
      "UNSUPPORTED_FORMAT"
    );
    this.name = "UnsupportedFormatError";
    this.value = value;
  }
}
