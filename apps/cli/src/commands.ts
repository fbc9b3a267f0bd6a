import yargs from "yargs";
import { resolveTrackFormat } from "@diarized-subtitles/core";
import type { AssStyle, SpeakerLabelMode } from "@diarized-subtitles/core";
import type { CliConfig } from "./config";
import { InvalidOptionError } from "./errors";
import { FileContentSink } from "./lib/content-sink";
import { createTranscriptSource } from "./lib/transcript-source";
import { renderTranscript } from "./tools/render";
import { formatStats, loadTranscriptStats } from "./tools/stats";
import { parseColorAssignments } from "./utils/options";

const SPEAKER_LABEL_MODES: readonly SpeakerLabelMode[] = ["normalized", "sequential"];

const parseSpeakerLabelMode = (value: string): SpeakerLabelMode => {
  const mode = SPEAKER_LABEL_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new InvalidOptionError(
      `Unknown speaker label mode "${value}", expected ${SPEAKER_LABEL_MODES.join(" or ")}`
    );
  }
  return mode;
};

// Only the flags given on the command line; the rest come from the defaults
const pickStyle = (style: Partial<AssStyle>): Partial<AssStyle> | undefined =>
  Object.values(style).some((value) => value !== undefined) ? style : undefined;

/**
 * Builds the `subtitles` command line. Environment config supplies the
 * defaults that flags override.
 */
export function createCli(config: CliConfig, argv: string[]) {
  return yargs(argv)
    .scriptName("subtitles")
    .command(
      "render <transcript>",
      "Render a diarized transcript to SRT, WebVTT or ASS",
      (command) =>
        command
          .positional("transcript", {
            type: "string",
            demandOption: true,
            describe: "Transcript JSON file or http(s) URL",
          })
          .option("format", {
            alias: "f",
            type: "string",
            default: config.format,
            coerce: resolveTrackFormat,
            describe: "srt, vtt or ass",
          })
          .option("out", { alias: "o", type: "string", describe: "Output file name" })
          .option("out-dir", {
            type: "string",
            default: config.outputDir,
            describe: "Directory for rendered subtitles",
          })
          .option("max-duration", { type: "number", default: config.chunk.maxDuration })
          .option("max-length", { type: "number", default: config.chunk.maxLength })
          .option("max-words", { type: "number", default: config.chunk.maxWords })
          .option("min-duration", { type: "number", default: config.chunk.minDuration })
          .option("speaker-prefix", {
            type: "boolean",
            default: false,
            describe: "Write [Speaker] before each cue",
          })
          .option("speaker-labels", {
            type: "string",
            default: "normalized",
            coerce: parseSpeakerLabelMode,
            describe: "normalized (SPEAKER_01 -> Speaker 1) or sequential",
          })
          .option("color", {
            type: "string",
            array: true,
            default: [],
            coerce: parseColorAssignments,
            describe: "Speaker color override, SPEAKER=color",
          })
          .option("cue-ids", { type: "boolean", default: true, describe: "Number WebVTT cues" })
          .option("inline-colors", {
            type: "boolean",
            default: true,
            describe: "Color ASS dialogue text inline",
          })
          .option("title", { type: "string" })
          .option("font-name", { type: "string" })
          .option("font-size", { type: "number" })
          .option("back-opacity", { type: "number" })
          .option("margin-v", { type: "number" }),
      async (args) => {
        const result = await renderTranscript(
          {
            transcript: args.transcript,
            format: args.format,
            out: args.out,
            maxDuration: args["max-duration"],
            maxLength: args["max-length"],
            maxWords: args["max-words"],
            minDuration: args["min-duration"],
            includeSpeakerPrefix: args["speaker-prefix"],
            speakerLabels: args["speaker-labels"],
            speakerColorMap: args.color,
            vttCueIds: args["cue-ids"],
            assInlineColors: args["inline-colors"],
            title: args.title,
            style: pickStyle({
              fontName: args["font-name"],
              fontSize: args["font-size"],
              backOpacity: args["back-opacity"],
              marginV: args["margin-v"],
            }),
          },
          {
            source: createTranscriptSource(args.transcript, config.fetch),
            sink: new FileContentSink(args["out-dir"]),
          }
        );
        console.log(`Subtitles saved to ${result.path}`);
      }
    )
    .command(
      "stats <transcript>",
      "Print segment and word counts per speaker",
      (command) =>
        command.positional("transcript", {
          type: "string",
          demandOption: true,
          describe: "Transcript JSON file or http(s) URL",
        }),
      async (args) => {
        const stats = await loadTranscriptStats(
          args.transcript,
          createTranscriptSource(args.transcript, config.fetch)
        );
        console.log(formatStats(stats));
      }
    )
    .demandCommand(1)
    .strict()
    .version(false)
    .exitProcess(false)
    .fail((message, error, instance) => {
      if (!error) {
        instance.showHelp();
      }
      throw error ?? new InvalidOptionError(message);
    })
    .help();
}
