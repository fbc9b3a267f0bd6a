import { SubtitleError } from "@diarized-subtitles/core";
import type { SchemaIssue } from "@diarized-subtitles/core";

/**
 * No transcript at the given path or URL
 */
export class TranscriptNotFoundError extends SubtitleError {
  locator: string;

  constructor(locator: string) {
    super(`Transcript not found: ${locator}`, "TRANSCRIPT_NOT_FOUND");
    this.name = "TranscriptNotFoundError";
    this.locator = locator;
  }
}

/**
 * Environment variables failed validation
 */
export class ConfigurationError extends SubtitleError {
  issues: SchemaIssue[];

  constructor(issues: SchemaIssue[]) {
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
    super(`Invalid configuration: ${summary}`, "INVALID_CONFIG");
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class InvalidOptionError extends SubtitleError {
  constructor(message: string) {
    super(message, "INVALID_OPTION");
    this.name = "InvalidOptionError";
  }
}

/** Logs a failed run; compiler errors are reduced to their code and message */
export const reportError = (error: unknown) => {
  console.error(
    "[CLI Error]",
    error instanceof SubtitleError ? { code: error.code, message: error.message } : error
  );
};
