import type { Transcript } from "../types/transcript";
import type {
  AssStyle,
  Chunk,
  ChunkOptions,
  SpeakerInfo,
  SubtitleEntry,
  SubtitleTrack,
  TrackFormat,
  TrackMetadata,
} from "../types/subtitle";
import { DEFAULT_ASS_STYLE } from "../renderers/ass";
import { getRenderer, renderTrack, resolveTrackFormat } from "../renderers";
import type { EntryRenderOptions } from "../renderers";
import { chunkTranscript } from "./chunker";
import { getSpeakerColor } from "./speaker-colors";
import { createSpeakerLabeler } from "./speakers";
import type { SpeakerLabelMode } from "./speakers";

export const DEFAULT_TRACK_FORMAT: TrackFormat = "vtt";

export interface SubtitleTrackOptions extends ChunkOptions {
  // "srt" | "vtt" | "ass", case-insensitive
  format?: string;
  includeSpeakerPrefix?: boolean;
  speakerLabels?: SpeakerLabelMode;
  speakerColorMap?: Readonly<Record<string, string>>;
  style?: Partial<AssStyle>;
  vttCueIds?: boolean;
  assInlineColors?: boolean;
  title?: string;
  sourceFile?: string;
}

const mergeDefined = <T extends object>(defaults: T, overrides?: Partial<T>): T => {
  const result = { ...defaults };
  if (!overrides) {
    return result;
  }
  for (const key in defaults) {
    const value = overrides[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
};

export const resolveAssStyle = (overrides?: Partial<AssStyle>): AssStyle =>
  Object.freeze(mergeDefined<AssStyle>(DEFAULT_ASS_STYLE, overrides));

/** Word timings when the chunk has them, whitespace tokens otherwise */
export const countChunkWords = (chunk: Chunk): number =>
  chunk.words.length || chunk.text.split(/\s+/).filter(Boolean).length;

/**
 * Compiles a transcript into an immutable subtitle track of one format.
 *
 * Speakers are registered in order of first appearance, each with a palette
 * color (or the one from `speakerColorMap`) and a display label. Nothing is
 * cached between calls.
 */
export function createSubtitleTrack(
  transcript: Transcript,
  options: SubtitleTrackOptions = {}
): SubtitleTrack {
  const format = resolveTrackFormat(options.format ?? DEFAULT_TRACK_FORMAT);
  const renderer = getRenderer(format);
  const chunks = chunkTranscript(transcript, options);
  const labelSpeaker = createSpeakerLabeler(options.speakerLabels);

  const entryOptions: EntryRenderOptions = {
    includeSpeakerPrefix: options.includeSpeakerPrefix ?? false,
    vttCueIds: options.vttCueIds ?? true,
    assInlineColors: options.assInlineColors ?? true,
  };

  const speakers = new Map<string, SpeakerInfo>();
  const registerSpeaker = (speakerId: string): SpeakerInfo => {
    let speaker = speakers.get(speakerId);
    if (!speaker) {
      speaker = Object.freeze({
        id: speakerId,
        color: getSpeakerColor(speakerId, options.speakerColorMap),
        displayName: labelSpeaker(speakerId),
      });
      speakers.set(speakerId, speaker);
    }
    return speaker;
  };

  let wordCount = 0;
  let duration = 0;

  const entries: SubtitleEntry[] = chunks.map((chunk, i) => {
    const speaker = chunk.speaker ? registerSpeaker(chunk.speaker) : undefined;
    const chunkWords = countChunkWords(chunk);
    wordCount += chunkWords;
    duration = Math.max(duration, chunk.end);

    const text =
      speaker && entryOptions.includeSpeakerPrefix
        ? `[${speaker.displayName ?? speaker.id}] ${chunk.text}`
        : chunk.text;

    return Object.freeze(
      renderer.createEntry(chunk, {
        index: i + 1,
        text,
        wordCount: chunkWords,
        ...(speaker ? { speaker } : {}),
        options: entryOptions,
      })
    );
  });

  const metadata: TrackMetadata = {
    format,
    language: transcript.language,
    ...(options.title !== undefined ? { title: options.title } : {}),
    ...(options.sourceFile !== undefined ? { sourceFile: options.sourceFile } : {}),
    speakers: Object.freeze(Object.fromEntries(speakers)),
    ...(format === "ass" || options.style ? { style: resolveAssStyle(options.style) } : {}),
    wordCount,
    duration,
  };

  return Object.freeze({
    metadata: Object.freeze(metadata),
    entries: Object.freeze(entries),
  });
}

/**
 * The whole contract with the surrounding pipeline: transcript in, subtitle
 * document out.
 */
export function renderSubtitles(
  transcript: Transcript,
  options: SubtitleTrackOptions = {}
): string {
  return renderTrack(createSubtitleTrack(transcript, options));
}
