import { z } from "zod";
import type { Transcript, TranscriptStats } from "../types/transcript";
import { SchemaValidationError } from "./errors";

const UNKNOWN_SPEAKER = "Unknown";

const endAfterStart = {
  message: "end must not be before start",
  path: ["end"],
};

const wordSchema = z
  .object({
    word: z.string(),
    start: z.number().finite(),
    end: z.number().finite(),
    speaker: z.string().optional(),
    probability: z.number().optional(),
  })
  .refine((word) => word.end >= word.start, endAfterStart);

const segmentSchema = z
  .object({
    id: z.number().int().optional(),
    start: z.number().finite(),
    end: z.number().finite(),
    text: z.string(),
    speaker: z.string().optional(),
    words: z.array(wordSchema).optional(),
  })
  .refine((segment) => segment.end >= segment.start, endAfterStart);

export const transcriptSchema: z.ZodType<Transcript, z.ZodTypeDef, unknown> =
  z.object({
    language: z.string().default("en"),
    segments: z.array(segmentSchema),
  });

/**
 * Validates a transcript document. Nothing is coerced: a missing timing field
 * or a segment ending before it starts rejects the whole document.
 */
export function parseTranscript(input: unknown): Transcript {
  const result = transcriptSchema.safeParse(input);
  if (!result.success) {
    throw new SchemaValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export function getTranscriptStats(transcript: Transcript): TranscriptStats {
  const speakerCounts: Record<string, number> = {};
  const wordCounts: Record<string, number> = {};
  let totalWords = 0;

  for (const segment of transcript.segments) {
    const speaker = segment.speaker ?? UNKNOWN_SPEAKER;
    const wordCount = segment.words?.length ?? 0;
    totalWords += wordCount;
    speakerCounts[speaker] = (speakerCounts[speaker] ?? 0) + 1;
    wordCounts[speaker] = (wordCounts[speaker] ?? 0) + wordCount;
  }

  return {
    language: transcript.language,
    segmentCount: transcript.segments.length,
    totalWords,
    speakerCounts,
    wordCounts,
  };
}
