import type { AssEntry, AssStyle, SpeakerInfo, TrackMetadata } from "../types/subtitle";
import { getAssColorCode, getSpeakerColor } from "../utils/speaker-colors";
import { formatAssTime } from "../utils/timestamps";
import { baseEntryFields, expectEntries } from "./types";
import type { SubtitleRenderer } from "./types";

export const DEFAULT_ASS_STYLE: Readonly<AssStyle> = Object.freeze({
  fontName: "Arial",
  fontSize: 24,
  primaryColor: "FFFFFF",
  secondaryColor: "FFFFFF",
  outlineColor: "000000",
  backColor: "000000",
  backOpacity: 0.5,
  bold: false,
  italic: false,
  underline: false,
  strikeOut: false,
  scaleX: 100,
  scaleY: 100,
  spacing: 0,
  angle: 0,
  borderStyle: 1,
  outline: 1,
  shadow: 0,
  alignment: 2,
  marginL: 10,
  marginR: 10,
  marginV: 20,
  encoding: 1,
  playResX: 384,
  playResY: 288,
});

const STYLE_FORMAT =
  "Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding";
const EVENT_FORMAT =
  "Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text";

// Fields are comma separated; only Text, the last one, may contain commas
const stripCommas = (value: string) => value.replace(/,/g, " ");

export const assStyleName = (speakerId: string): string =>
  `Speaker_${stripCommas(speakerId.replace(/^SPEAKER_/, ""))}`;

export const assColorTag = (color: string): string =>
  `{\\c&H${getAssColorCode(color)}&}`;

const flag = (value: boolean) => (value ? 1 : 0);

const backAlpha = (opacity: number) =>
  Math.floor(Math.min(1, Math.max(0, opacity)) * 255)
    .toString(16)
    .toUpperCase()
    .padStart(2, "0");

const formatStyleLine = (name: string, primaryColor: string, style: AssStyle) =>
  `Style: ${name},${style.fontName},${style.fontSize},` +
  `&H00${primaryColor},&H00${style.secondaryColor},&H00${style.outlineColor},` +
  `&H${backAlpha(style.backOpacity)}${style.backColor},` +
  `${flag(style.bold)},${flag(style.italic)},${flag(style.underline)},${flag(style.strikeOut)},` +
  `${style.scaleX},${style.scaleY},${style.spacing},${style.angle},` +
  `${style.borderStyle},${style.outline},${style.shadow},${style.alignment},` +
  `${style.marginL},${style.marginR},${style.marginV},${style.encoding}`;

const formatDialogue = (entry: AssEntry, style: string): string => {
  const text = (entry.styledText ?? entry.text).replace(/\r?\n/g, "\\N");
  return (
    `Dialogue: ${entry.layer},${formatAssTime(entry.start)},${formatAssTime(entry.end)},` +
    `${style},${entry.name},${entry.marginL},${entry.marginR},${entry.marginV},` +
    `${entry.effect},${text}`
  );
};

/**
 * Speakers that own at least one entry, in order of first appearance. Colors
 * come from the track's registry when it knows the speaker.
 */
const collectEntrySpeakers = (
  metadata: TrackMetadata,
  entries: readonly AssEntry[]
): SpeakerInfo[] => {
  const speakers = new Map<string, SpeakerInfo>();
  for (const { speakerId } of entries) {
    if (speakerId === undefined || speakers.has(speakerId)) {
      continue;
    }
    const known = Object.hasOwn(metadata.speakers, speakerId)
      ? metadata.speakers[speakerId]
      : undefined;
    speakers.set(speakerId, known ?? { id: speakerId, color: getSpeakerColor(speakerId) });
  }
  return [...speakers.values()];
};

/**
 * One style name per speaker. Ids such as `SPEAKER_01` and `01` share a base
 * name; later speakers get `_2`, `_3`, ... appended.
 */
const assignStyleNames = (speakers: readonly SpeakerInfo[]): Map<string, string> => {
  const names = new Map<string, string>();
  const taken = new Set<string>();
  for (const { id } of speakers) {
    const base = assStyleName(id);
    let name = base;
    for (let n = 2; taken.has(name); n++) {
      name = `${base}_${n}`;
    }
    taken.add(name);
    names.set(id, name);
  }
  return names;
};

export const AssRenderer: SubtitleRenderer<"ass"> = {
  format: "ass",
  fileExtension: "ass",
  contentType: "text/x-ssa",
  createEntry(chunk, context) {
    const { speaker, options } = context;
    return {
      format: "ass",
      ...baseEntryFields(chunk, context),
      layer: 0,
      style: speaker ? assStyleName(speaker.id) : "Default",
      name: speaker ? stripCommas(speaker.displayName ?? speaker.id) : "",
      marginL: 0,
      marginR: 0,
      marginV: 0,
      effect: "",
      ...(speaker && options.assInlineColors
        ? { styledText: `${assColorTag(speaker.color)}${context.text}` }
        : {}),
    };
  },
  render(metadata, entries) {
    const dialogues = expectEntries("ass", entries);
    const style = metadata.style ?? DEFAULT_ASS_STYLE;
    const speakers = collectEntrySpeakers(metadata, dialogues);
    const styleNames = assignStyleNames(speakers);
    const styleOf = (entry: AssEntry) =>
      (entry.speakerId !== undefined ? styleNames.get(entry.speakerId) : undefined) ??
      entry.style;

    const lines = [
      "[Script Info]",
      ...(metadata.title ? [`Title: ${metadata.title.replace(/\r?\n/g, " ")}`] : []),
      "ScriptType: v4.00+",
      `PlayResX: ${style.playResX}`,
      `PlayResY: ${style.playResY}`,
      "ScaledBorderAndShadow: yes",
      "",
      "[V4+ Styles]",
      STYLE_FORMAT,
      formatStyleLine("Default", style.primaryColor, style),
      ...speakers.map((speaker) =>
        formatStyleLine(
          styleNames.get(speaker.id) ?? assStyleName(speaker.id),
          getAssColorCode(speaker.color),
          style
        )
      ),
      "",
      "[Events]",
      EVENT_FORMAT,
      "",
    ];

    return (
      lines.join("\n") +
      "\n" +
      dialogues.map((entry) => `${formatDialogue(entry, styleOf(entry))}\n`).join("")
    );
  },
};
