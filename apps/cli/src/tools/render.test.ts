import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Transcript } from "@diarized-subtitles/core";
import type { ContentSink } from "../lib/content-sink";
import type { TranscriptSource } from "../lib/transcript-source";
import { defaultOutputName, renderTranscript } from "./render";

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
    { start: 2, end: 3.25, text: "Hi!", speaker: "SPEAKER_01" },
  ],
};

describe("render tool", () => {
  const load = vi.fn<TranscriptSource["load"]>();
  const save = vi.fn<ContentSink["save"]>();
  const deps = { source: { load }, sink: { save } };

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    load.mockResolvedValue(transcript);
    save.mockImplementation(async (_content, destination) => `/srv/subs/${destination}`);
  });

  it("renders the transcript and saves it under the default name", async () => {
    const result = await renderTranscript(
      { transcript: "meetings/standup.json", format: "srt" },
      deps
    );

    expect(load).toHaveBeenCalledWith("meetings/standup.json");
    expect(save).toHaveBeenCalledWith(
      "1\n00:00:00,000 --> 00:00:01,500\nHello there.\n\n" +
        "2\n00:00:02,000 --> 00:00:03,250\nHi!\n\n",
      "standup.subtitles.srt",
      "application/x-subrip"
    );
    expect(result).toEqual({
      path: "/srv/subs/standup.subtitles.srt",
      format: "srt",
      entryCount: 2,
      speakerCount: 2,
      wordCount: 3,
      duration: 3.25,
    });
  });

  it("passes track options through and honors an explicit name", async () => {
    await renderTranscript(
      {
        transcript: "standup.json",
        format: "vtt",
        out: "custom.vtt",
        includeSpeakerPrefix: true,
        vttCueIds: false,
      },
      deps
    );

    expect(save).toHaveBeenCalledWith(
      "WEBVTT\n\n" +
        "00:00:00.000 --> 00:00:01.500\n[Speaker 0] Hello there.\n\n" +
        "00:00:02.000 --> 00:00:03.250\n[Speaker 1] Hi!\n\n",
      "custom.vtt",
      "text/vtt"
    );
  });

  it("logs the request and the result", async () => {
    await renderTranscript({ transcript: "standup.json", format: "ass" }, deps);

    expect(console.log).toHaveBeenCalledWith("[Render Request]", {
      transcript: "standup.json",
      format: "ass",
      out: undefined,
    });
    expect(console.log).toHaveBeenCalledWith(
      "[Render Complete]",
      expect.objectContaining({ path: "/srv/subs/standup.subtitles.ass", format: "ass" })
    );
  });

  it("does not save when the transcript cannot be loaded", async () => {
    load.mockRejectedValue(new Error("disk on fire"));

    await expect(
      renderTranscript({ transcript: "standup.json", format: "vtt" }, deps)
    ).rejects.toThrow("disk on fire");
    expect(save).not.toHaveBeenCalled();
  });

  describe("defaultOutputName", () => {
    it("derives the name from the transcript locator", () => {
      expect(defaultOutputName("meetings/standup.json", "vtt")).toBe("standup.subtitles.vtt");
      expect(defaultOutputName("https://example.com/api/talk.json?v=2#t", "ass")).toBe(
        "talk.subtitles.ass"
      );
      expect(defaultOutputName("notes", "srt")).toBe("notes.subtitles.srt");
    });
  });
});
