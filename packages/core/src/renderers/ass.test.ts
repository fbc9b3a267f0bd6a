import { describe, it, expect } from "vitest";
import type { Transcript } from "../types/transcript";
import { createSubtitleTrack } from "../utils/track";
import { FormatMismatchError } from "../utils/errors";
import { AssRenderer, assStyleName } from "./ass";
import { renderTrack } from "./index";

const transcript: Transcript = {
  language: "en",
  segments: [
    {
      start: 0,
      end: 1.5,
      text: "Hello there.",
      speaker: "SPEAKER_00",
      words: [
        { word: "Hello", start: 0, end: 0.5 },
        { word: "there.", start: 0.6, end: 1.5 },
      ],
    },
    {
      start: 2,
      end: 3.25,
      text: "Hi!",
      speaker: "SPEAKER_01",
      words: [{ word: "Hi!", start: 2, end: 3.25 }],
    },
    {
      start: 4,
      end: 5,
      text: "Welcome back.",
      speaker: "SPEAKER_00",
    },
  ],
};

const STYLE_TAIL = ",&H00FFFFFF,&H00000000,&H7F000000,0,0,0,0,100,100,0,0,1,1,0,2,10,10,20,1";

describe("AssRenderer", () => {
  it("should render script info, styles and dialogue lines", () => {
    const content = renderTrack(
      createSubtitleTrack(transcript, { format: "ass", title: "Council meeting" })
    );

    expect(content).toBe(
      [
        "[Script Info]",
        "Title: Council meeting",
        "ScriptType: v4.00+",
        "PlayResX: 384",
        "PlayResY: 288",
        "ScaledBorderAndShadow: yes",
        "",
        "[V4+ Styles]",
        "Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding",
        `Style: Default,Arial,24,&H00FFFFFF${STYLE_TAIL}`,
        `Style: Speaker_00,Arial,24,&H00FF00FF${STYLE_TAIL}`,
        `Style: Speaker_01,Arial,24,&H00CBC0FF${STYLE_TAIL}`,
        "",
        "[Events]",
        "Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text",
        "",
        "Dialogue: 0,0:00:00.00,0:00:01.50,Speaker_00,Speaker 0,0,0,0,,{\\c&HFF00FF&}Hello there.",
        "Dialogue: 0,0:00:02.00,0:00:03.25,Speaker_01,Speaker 1,0,0,0,,{\\c&HCBC0FF&}Hi!",
        "Dialogue: 0,0:00:04.00,0:00:05.00,Speaker_00,Speaker 0,0,0,0,,{\\c&HFF00FF&}Welcome back.",
        "",
      ].join("\n")
    );
  });

  it("should emit one style per distinct speaker plus the default", () => {
    const content = renderTrack(createSubtitleTrack(transcript, { format: "ass" }));
    const styleLines = content.split("\n").filter((line) => line.startsWith("Style:"));

    expect(styleLines.filter((line) => line.startsWith("Style: Default,"))).toHaveLength(1);
    expect(styleLines).toHaveLength(3);
  });

  it("should give colliding speaker ids distinct style names", () => {
    const content = renderTrack(
      createSubtitleTrack(
        {
          language: "en",
          segments: [
            { start: 0, end: 1, text: "First", speaker: "SPEAKER_01" },
            { start: 1, end: 2, text: "Second", speaker: "01" },
            { start: 2, end: 3, text: "Third", speaker: "SPEAKER_01" },
          ],
        },
        { format: "ass", assInlineColors: false }
      )
    );
    const lines = content.split("\n");

    expect(
      lines.filter((line) => line.startsWith("Style:")).map((line) => line.split(",")[0])
    ).toEqual(["Style: Default", "Style: Speaker_01", "Style: Speaker_01_2"]);
    expect(
      lines.filter((line) => line.startsWith("Dialogue:")).map((line) => line.split(",")[3])
    ).toEqual(["Speaker_01", "Speaker_01_2", "Speaker_01"]);
  });

  it("should use named styles only when inline colors are off", () => {
    const content = renderTrack(
      createSubtitleTrack(
        { language: "en", segments: [{ start: 0, end: 1, text: "Plain", speaker: "SPEAKER_02" }] },
        { format: "ass", assInlineColors: false }
      )
    );

    expect(content.endsWith("Dialogue: 0,0:00:00.00,0:00:01.00,Speaker_02,Speaker 2,0,0,0,,Plain\n")).toBe(
      true
    );
  });

  it("should apply color map overrides and style options", () => {
    const content = renderTrack(
      createSubtitleTrack(transcript, {
        format: "ass",
        speakerColorMap: { SPEAKER_00: "orange" },
        style: { fontName: "Verdana", fontSize: 32, backOpacity: 0, marginV: 40 },
      })
    );

    expect(content).toContain(
      "Style: Speaker_00,Verdana,32,&H0000A5FF,&H00FFFFFF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,1,0,2,10,10,40,1"
    );
    expect(content).toContain(
      "Dialogue: 0,0:00:00.00,0:00:01.50,Speaker_00,Speaker 0,0,0,0,,{\\c&H00A5FF&}Hello there."
    );
  });

  it("should turn line breaks into ASS hard breaks", () => {
    const content = renderTrack(
      createSubtitleTrack(
        { language: "en", segments: [{ start: 0, end: 2, text: "line one\nline two" }] },
        { format: "ass" }
      )
    );

    expect(content.endsWith("Dialogue: 0,0:00:00.00,0:00:02.00,Default,,0,0,0,,line one\\Nline two\n")).toBe(
      true
    );
  });

  it("should render the header alone for an empty transcript", () => {
    const content = renderTrack(
      createSubtitleTrack({ language: "en", segments: [] }, { format: "ass" })
    );
    const lines = content.split("\n");

    expect(lines.filter((line) => line.startsWith("Style:"))).toEqual([
      `Style: Default,Arial,24,&H00FFFFFF${STYLE_TAIL}`,
    ]);
    expect(lines.some((line) => line.startsWith("Dialogue:"))).toBe(false);
    expect(content.endsWith("Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text\n\n")).toBe(
      true
    );
  });

  it("should build style names from speaker ids", () => {
    expect(assStyleName("SPEAKER_03")).toBe("Speaker_03");
    expect(assStyleName("Smith, J.")).toBe("Speaker_Smith  J.");
  });

  it("should refuse entries of another format", () => {
    const srtTrack = createSubtitleTrack(transcript, { format: "srt" });

    expect(() => AssRenderer.render(srtTrack.metadata, srtTrack.entries)).toThrow(
      new FormatMismatchError("ass", "srt")
    );
    expect(() => AssRenderer.render(srtTrack.metadata, srtTrack.entries)).toThrow(
      "Cannot render srt entries with the ass renderer"
    );
  });
});
