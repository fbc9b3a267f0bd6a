import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("./tools/render", async (importOriginal) => ({
  ...(await importOriginal<typeof import("./tools/render")>()),
  renderTranscript: vi.fn(),
}));

vi.mock("./tools/stats", async (importOriginal) => ({
  ...(await importOriginal<typeof import("./tools/stats")>()),
  loadTranscriptStats: vi.fn(),
}));

import { createCli } from "./commands";
import type { CliConfig } from "./config";
import { FileContentSink } from "./lib/content-sink";
import { FileTranscriptSource, HttpTranscriptSource } from "./lib/transcript-source";
import { renderTranscript } from "./tools/render";
import { loadTranscriptStats } from "./tools/stats";

const config: CliConfig = {
  format: "vtt",
  chunk: { maxDuration: 5, maxLength: 80, maxWords: 14, minDuration: 1 },
  outputDir: "output",
  fetch: { timeoutMs: 5000, retries: 1 },
};

const run = async (argv: string[]) => createCli(config, argv).parseAsync();

describe("subtitles command line", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.mocked(renderTranscript).mockResolvedValue({
      path: "/srv/output/talk.subtitles.vtt",
      format: "vtt",
      entryCount: 1,
      speakerCount: 1,
      wordCount: 2,
      duration: 1,
    });
  });

  it("renders with config defaults", async () => {
    await run(["render", "talk.json"]);

    expect(renderTranscript).toHaveBeenCalledTimes(1);
    const [request, deps] = vi.mocked(renderTranscript).mock.calls[0];
    expect(request).toEqual({
      transcript: "talk.json",
      format: "vtt",
      out: undefined,
      maxDuration: 5,
      maxLength: 80,
      maxWords: 14,
      minDuration: 1,
      includeSpeakerPrefix: false,
      speakerLabels: "normalized",
      speakerColorMap: {},
      vttCueIds: true,
      assInlineColors: true,
      title: undefined,
      style: undefined,
    });
    expect(deps.source).toBeInstanceOf(FileTranscriptSource);
    expect(deps.sink).toBeInstanceOf(FileContentSink);
    expect(deps.sink).toMatchObject({ outputDir: "output" });
    expect(console.log).toHaveBeenCalledWith(
      "Subtitles saved to /srv/output/talk.subtitles.vtt"
    );
  });

  it("maps flags onto the render request", async () => {
    await run([
      "render",
      "https://example.com/talk.json",
      "--format",
      "ASS",
      "--out",
      "talk.ass",
      "--out-dir",
      "subs",
      "--max-words",
      "6",
      "--speaker-prefix",
      "--speaker-labels",
      "sequential",
      "--color",
      "SPEAKER_00=orange",
      "--color",
      "SPEAKER_01=gold",
      "--no-inline-colors",
      "--title",
      "Weekly sync",
      "--font-size",
      "30",
    ]);

    const [request, deps] = vi.mocked(renderTranscript).mock.calls[0];
    expect(request).toMatchObject({
      transcript: "https://example.com/talk.json",
      format: "ass",
      out: "talk.ass",
      maxWords: 6,
      includeSpeakerPrefix: true,
      speakerLabels: "sequential",
      speakerColorMap: { SPEAKER_00: "orange", SPEAKER_01: "gold" },
      assInlineColors: false,
      title: "Weekly sync",
      style: { fontSize: 30 },
    });
    expect(deps.source).toBeInstanceOf(HttpTranscriptSource);
    expect(deps.sink).toMatchObject({ outputDir: "subs" });
  });

  it("rejects an unknown format", async () => {
    await expect(run(["render", "talk.json", "--format", "mp4"])).rejects.toThrow(
      'Unsupported subtitle format "mp4", expected one of srt, vtt, ass'
    );
    expect(renderTranscript).not.toHaveBeenCalled();
  });

  it("rejects a malformed color flag", async () => {
    await expect(run(["render", "talk.json", "--color", "orange"])).rejects.toThrow(
      'Expected SPEAKER=color, got "orange"'
    );
  });

  it("prints transcript stats", async () => {
    vi.mocked(loadTranscriptStats).mockResolvedValue({
      language: "fr",
      segmentCount: 1,
      totalWords: 3,
      speakerCounts: { SPEAKER_00: 1 },
      wordCounts: { SPEAKER_00: 3 },
    });

    await run(["stats", "talk.json"]);

    expect(loadTranscriptStats).toHaveBeenCalledWith("talk.json", expect.any(FileTranscriptSource));
    expect(console.log).toHaveBeenCalledWith(
      "Language: fr\nSegments: 1\nWords: 3\n  SPEAKER_00: 1 segments, 3 words"
    );
  });

  it("requires a command", async () => {
    await expect(run([])).rejects.toThrow();
  });
});
