import { TRACK_FORMATS } from "../types/subtitle";
import type { SubtitleTrack, TrackFormat } from "../types/subtitle";
import { UnsupportedFormatError } from "../utils/errors";
import { AssRenderer } from "./ass";
import { SrtRenderer } from "./srt";
import type { SubtitleRenderer } from "./types";
import { VttRenderer } from "./vtt";

// 各字幕格式的渲染器集合
export const subtitleRenderers: { readonly [F in TrackFormat]: SubtitleRenderer<F> } =
  Object.freeze({
    srt: SrtRenderer,
    vtt: VttRenderer,
    ass: AssRenderer,
  });

export const isTrackFormat = (value: string): value is TrackFormat =>
  TRACK_FORMATS.some((format) => format === value);

/**
 * Resolves a user-supplied format name such as `"VTT"` or `".srt"`.
 */
export function resolveTrackFormat(value: string): TrackFormat {
  const normalized = value.trim().toLowerCase().replace(/^\./, "");
  if (!isTrackFormat(normalized)) {
    throw new UnsupportedFormatError(value);
  }
  return normalized;
}

export const getRenderer = <F extends TrackFormat>(format: F): SubtitleRenderer<F> =>
  subtitleRenderers[format];

export function renderTrack(track: SubtitleTrack): string {
  return getRenderer(track.metadata.format).render(track.metadata, track.entries);
}

export { AssRenderer, DEFAULT_ASS_STYLE, assColorTag, assStyleName } from "./ass";
export { SrtRenderer } from "./srt";
export { VttRenderer, escapeVttText } from "./vtt";
export { expectEntries } from "./types";
export type { EntryContext, EntryRenderOptions, SubtitleRenderer } from "./types";
