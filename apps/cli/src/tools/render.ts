import path from "path";
import { createSubtitleTrack, getRenderer, renderTrack } from "@diarized-subtitles/core";
import type { SubtitleTrackOptions, TrackFormat } from "@diarized-subtitles/core";
import type { ContentSink } from "../lib/content-sink";
import type { TranscriptSource } from "../lib/transcript-source";

export interface RenderRequest extends Omit<SubtitleTrackOptions, "format" | "sourceFile"> {
  transcript: string;
  format: TrackFormat;
  // File name under the sink's output directory
  out?: string;
}

export interface RenderResult {
  path: string;
  format: TrackFormat;
  entryCount: number;
  speakerCount: number;
  wordCount: number;
  duration: number;
}

export interface RenderDependencies {
  source: TranscriptSource;
  sink: ContentSink;
}

/**
 * `talk.json` becomes `talk.subtitles.vtt`; for URLs the query and fragment
 * are ignored.
 */
export const defaultOutputName = (locator: string, extension: string) => {
  const cleaned = locator.replace(/[?#].*$/, "");
  const baseName = path.basename(cleaned, path.extname(cleaned)) || "transcript";
  return `${baseName}.subtitles.${extension}`;
};

export const renderTranscript = async (
  request: RenderRequest,
  { source, sink }: RenderDependencies
): Promise<RenderResult> => {
  const { transcript: locator, out, ...trackOptions } = request;
  console.log("[Render Request]", {
    transcript: locator,
    format: trackOptions.format,
    out,
  });

  const transcript = await source.load(locator);
  const track = createSubtitleTrack(transcript, { ...trackOptions, sourceFile: locator });
  const renderer = getRenderer(track.metadata.format);

  const savedPath = await sink.save(
    renderTrack(track),
    out ?? defaultOutputName(locator, renderer.fileExtension),
    renderer.contentType
  );

  const result: RenderResult = {
    path: savedPath,
    format: track.metadata.format,
    entryCount: track.entries.length,
    speakerCount: Object.keys(track.metadata.speakers).length,
    wordCount: track.metadata.wordCount,
    duration: track.metadata.duration,
  };
  console.log("[Render Complete]", result);
  return result;
};
