import { getTranscriptStats } from "@diarized-subtitles/core";
import type { TranscriptStats } from "@diarized-subtitles/core";
import type { TranscriptSource } from "../lib/transcript-source";

export const loadTranscriptStats = async (
  locator: string,
  source: TranscriptSource
): Promise<TranscriptStats> => {
  console.log("[Stats Request]", { transcript: locator });
  return getTranscriptStats(await source.load(locator));
};

export const formatStats = (stats: TranscriptStats): string => {
  const lines = [
    `Language: ${stats.language}`,
    `Segments: ${stats.segmentCount}`,
    `Words: ${stats.totalWords}`,
  ];
  for (const [speaker, segments] of Object.entries(stats.speakerCounts)) {
    lines.push(`  ${speaker}: ${segments} segments, ${stats.wordCounts[speaker] ?? 0} words`);
  }
  return lines.join("\n");
};
