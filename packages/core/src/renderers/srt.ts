import type { SrtEntry } from "../types/subtitle";
import { formatSrtTime } from "../utils/timestamps";
import { baseEntryFields, cueText, expectEntries } from "./types";
import type { SubtitleRenderer } from "./types";

const formatCue = (entry: SrtEntry): string =>
  `${entry.index}\n` +
  `${formatSrtTime(entry.start)} --> ${formatSrtTime(entry.end)}\n` +
  `${cueText(entry.text)}\n\n`;

export const SrtRenderer: SubtitleRenderer<"srt"> = {
  format: "srt",
  fileExtension: "srt",
  contentType: "application/x-subrip",
  createEntry(chunk, context) {
    return { format: "srt", ...baseEntryFields(chunk, context) };
  },
  render(_metadata, entries) {
    return expectEntries("srt", entries).map(formatCue).join("");
  },
};
