import type { VttEntry } from "../types/subtitle";
import { formatVttTime } from "../utils/timestamps";
import { baseEntryFields, cueText, expectEntries } from "./types";
import type { SubtitleRenderer } from "./types";

const HEADER = "WEBVTT\n\n";

// Cue payloads are markup; "-->" can't survive unescaped either
export const escapeVttText = (text: string): string =>
  text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

const formatCueText = (entry: VttEntry): string => {
  const text = escapeVttText(cueText(entry.text));
  return entry.voice ? `<v ${escapeVttText(entry.voice)}>${text}</v>` : text;
};

const formatCue = (entry: VttEntry): string =>
  (entry.cueId !== undefined ? `${entry.cueId}\n` : "") +
  `${formatVttTime(entry.start)} --> ${formatVttTime(entry.end)}\n` +
  `${formatCueText(entry)}\n\n`;

export const VttRenderer: SubtitleRenderer<"vtt"> = {
  format: "vtt",
  fileExtension: "vtt",
  contentType: "text/vtt",
  createEntry(chunk, context) {
    const { speaker, options } = context;
    // A prefixed text already names the speaker; a voice span would repeat it
    const voice =
      speaker && !options.includeSpeakerPrefix
        ? speaker.displayName ?? speaker.id
        : undefined;

    return {
      format: "vtt",
      ...baseEntryFields(chunk, context),
      ...(options.vttCueIds ? { cueId: String(context.index) } : {}),
      ...(voice !== undefined ? { voice } : {}),
    };
  },
  render(_metadata, entries) {
    return HEADER + expectEntries("vtt", entries).map(formatCue).join("");
  },
};
