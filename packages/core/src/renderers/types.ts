import type {
  Chunk,
  EntryFor,
  SpeakerInfo,
  SubtitleEntry,
  TrackFormat,
  TrackMetadata,
} from "../types/subtitle";
import { FormatMismatchError } from "../utils/errors";

export interface EntryRenderOptions {
  includeSpeakerPrefix: boolean;
  vttCueIds: boolean;
  assInlineColors: boolean;
}

/** Per-cue input to `createEntry`, resolved by the track assembler. */
export interface EntryContext {
  index: number;
  // Chunk text, already carrying the speaker prefix when one was requested
  text: string;
  wordCount: number;
  speaker?: SpeakerInfo;
  options: EntryRenderOptions;
}

/** 字幕格式渲染器：构建该格式的条目，并输出完整的字幕文档。 */
export interface SubtitleRenderer<F extends TrackFormat> {
  format: F;
  fileExtension: string;
  contentType: string;
  createEntry(chunk: Chunk, context: EntryContext): EntryFor<F>;
  render(metadata: TrackMetadata, entries: readonly SubtitleEntry[]): string;
}

const isEntryOf = <F extends TrackFormat>(
  format: F,
  entry: SubtitleEntry
): entry is EntryFor<F> => entry.format === format;

/**
 * Narrows a track's entries to the renderer's variant, failing on the first
 * entry of another format.
 */
export function expectEntries<F extends TrackFormat>(
  format: F,
  entries: readonly SubtitleEntry[]
): EntryFor<F>[] {
  const matched: EntryFor<F>[] = [];
  for (const entry of entries) {
    if (!isEntryOf(format, entry)) {
      throw new FormatMismatchError(format, entry.format);
    }
    matched.push(entry);
  }
  return matched;
}

export const baseEntryFields = (chunk: Chunk, context: EntryContext) => ({
  index: context.index,
  start: chunk.start,
  end: chunk.end,
  text: context.text,
  ...(context.speaker ? { speakerId: context.speaker.id } : {}),
  wordCount: context.wordCount,
});

/** Cue text without blank lines, which would end an SRT or WebVTT cue early */
export const cueText = (text: string): string =>
  text
    .split(/\r\n?|\n/)
    .map((line) => line.trimEnd())
    .filter(Boolean)
    .join("\n");
