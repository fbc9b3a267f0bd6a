export const TRACK_FORMATS = ["srt", "vtt", "ass"] as const;

export type TrackFormat = (typeof TRACK_FORMATS)[number];

export interface ChunkWord {
  word: string;
  start: number;
  end: number;
  speaker?: string;
}

/**
 * A timed text unit produced by the chunker, before any format-specific
 * rendering. `words` is empty for chunks cut from segments without word timing.
 */
export interface Chunk {
  start: number;
  end: number;
  text: string;
  speaker?: string;
  words: ChunkWord[];
}

export interface ChunkOptions {
  maxDuration?: number;
  maxLength?: number;
  maxWords?: number;
  minDuration?: number;
}

export interface SpeakerInfo {
  id: string;
  color: string;
  displayName?: string;
}

export interface AssStyle {
  fontName: string;
  fontSize: number;
  // BGR hex, without the "&H" prefix
  primaryColor: string;
  secondaryColor: string;
  outlineColor: string;
  backColor: string;
  backOpacity: number;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikeOut: boolean;
  scaleX: number;
  scaleY: number;
  spacing: number;
  angle: number;
  borderStyle: number;
  outline: number;
  shadow: number;
  // numpad layout, 2 = bottom center
  alignment: number;
  marginL: number;
  marginR: number;
  marginV: number;
  encoding: number;
  playResX: number;
  playResY: number;
}

export interface TrackMetadata {
  format: TrackFormat;
  language: string;
  title?: string;
  sourceFile?: string;
  speakers: Readonly<Record<string, SpeakerInfo>>;
  style?: AssStyle;
  wordCount: number;
  duration: number;
}

interface BaseSubtitleEntry {
  index: number;
  start: number;
  end: number;
  text: string;
  speakerId?: string;
  wordCount: number;
}

export interface SrtEntry extends BaseSubtitleEntry {
  format: "srt";
}

export interface VttEntry extends BaseSubtitleEntry {
  format: "vtt";
  cueId?: string;
  // Display name for the <v> voice span
  voice?: string;
}

export interface AssEntry extends BaseSubtitleEntry {
  format: "ass";
  layer: number;
  // Base style name; rendering suffixes it when two speakers' names collide
  style: string;
  name: string;
  marginL: number;
  marginR: number;
  marginV: number;
  effect: string;
  styledText?: string;
}

export type SubtitleEntry = SrtEntry | VttEntry | AssEntry;

export type EntryFor<F extends TrackFormat> = Extract<SubtitleEntry, { format: F }>;

export interface SubtitleTrack {
  readonly metadata: Readonly<TrackMetadata>;
  readonly entries: readonly SubtitleEntry[];
}
