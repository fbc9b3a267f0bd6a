import { createHash } from "node:crypto";

// Easy to tell apart on video; order is part of the color assignment
export const SPEAKER_COLORS = Object.freeze([
  "yellow",
  "cyan",
  "lime",
  "magenta",
  "red",
  "aqua",
  "chartreuse",
  "coral",
  "gold",
  "pink",
  "lavender",
  "orange",
  "orchid",
  "plum",
  "salmon",
] as const);

export type SpeakerColor = (typeof SPEAKER_COLORS)[number];

// ASS colours are written blue-green-red
const ASS_BGR_COLORS: Readonly<Record<string, string>> = Object.freeze({
  white: "FFFFFF",
  yellow: "00FFFF",
  cyan: "FFFF00",
  lime: "00FF00",
  magenta: "FF00FF",
  red: "0000FF",
  aqua: "FFFF00",
  chartreuse: "00FF7F",
  coral: "507FFF",
  gold: "00D7FF",
  pink: "CBC0FF",
  lavender: "FAE6E6",
  orange: "00A5FF",
  orchid: "D670DA",
  plum: "DDA0DD",
  salmon: "7280FA",
});

const DEFAULT_ASS_COLOR = "FFFFFF";
const HEX_COLOR = /^[0-9a-f]{6}$/i;

/**
 * Returns the display color for a speaker.
 *
 * An entry in `colorMap` wins. Otherwise the md5 digest of the id, read as a
 * 128-bit integer, indexes the palette, so the same id gets the same color in
 * every process.
 */
export function getSpeakerColor(
  speakerId: string,
  colorMap?: Readonly<Record<string, string>>
): string {
  if (colorMap && Object.hasOwn(colorMap, speakerId)) {
    return colorMap[speakerId];
  }

  const digest = createHash("md5").update(speakerId, "utf8").digest("hex");
  const index = Number(BigInt(`0x${digest}`) % BigInt(SPEAKER_COLORS.length));
  return SPEAKER_COLORS[index];
}

/**
 * Converts a color name to the BGR hex used by ASS colour fields. Six hex
 * digits pass through, uppercased.
 */
export function getAssColorCode(color: string): string {
  if (HEX_COLOR.test(color)) {
    return color.toUpperCase();
  }
  const name = color.toLowerCase();
  return Object.hasOwn(ASS_BGR_COLORS, name) ? ASS_BGR_COLORS[name] : DEFAULT_ASS_COLOR;
}
