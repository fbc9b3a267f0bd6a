import { z } from "zod";
import {
  DEFAULT_CHUNK_OPTIONS,
  DEFAULT_TRACK_FORMAT,
  TRACK_FORMATS,
  isTrackFormat,
} from "@diarized-subtitles/core";
import type { ChunkOptions, TrackFormat } from "@diarized-subtitles/core";
import { ConfigurationError } from "./errors";

export interface FetchConfig {
  timeoutMs: number;
  retries: number;
}

export interface CliConfig {
  format: TrackFormat;
  chunk: Required<ChunkOptions>;
  outputDir: string;
  fetch: FetchConfig;
}

const trackFormat = z
  .string()
  .default(DEFAULT_TRACK_FORMAT)
  .transform((value, ctx): TrackFormat => {
    const normalized = value.trim().toLowerCase().replace(/^\./, "");
    if (isTrackFormat(normalized)) {
      return normalized;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected one of ${TRACK_FORMATS.join(", ")}`,
    });
    return z.NEVER;
  });

const envSchema = z.object({
  SUBTITLES_FORMAT: trackFormat,
  SUBTITLES_MAX_DURATION: z.coerce.number().positive().default(DEFAULT_CHUNK_OPTIONS.maxDuration),
  SUBTITLES_MAX_LENGTH: z.coerce.number().int().positive().default(DEFAULT_CHUNK_OPTIONS.maxLength),
  SUBTITLES_MAX_WORDS: z.coerce.number().int().min(1).default(DEFAULT_CHUNK_OPTIONS.maxWords),
  SUBTITLES_MIN_DURATION: z.coerce.number().min(0).default(DEFAULT_CHUNK_OPTIONS.minDuration),
  SUBTITLES_OUTPUT_DIR: z.string().min(1).default("output"),
  TRANSCRIPT_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TRANSCRIPT_FETCH_RETRIES: z.coerce.number().int().min(0).default(2),
});

/**
 * Reads CLI defaults from the environment. Call `dotenv.config()` first to
 * pick up a `.env` file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }

  const parsed = result.data;
  return {
    format: parsed.SUBTITLES_FORMAT,
    chunk: {
      maxDuration: parsed.SUBTITLES_MAX_DURATION,
      maxLength: parsed.SUBTITLES_MAX_LENGTH,
      maxWords: parsed.SUBTITLES_MAX_WORDS,
      minDuration: parsed.SUBTITLES_MIN_DURATION,
    },
    outputDir: parsed.SUBTITLES_OUTPUT_DIR,
    fetch: {
      timeoutMs: parsed.TRANSCRIPT_FETCH_TIMEOUT_MS,
      retries: parsed.TRANSCRIPT_FETCH_RETRIES,
    },
  };
}
