import ky, { HTTPError } from "ky";
import type { KyInstance, Options as KyOptions } from "ky";
import { parseTranscript } from "@diarized-subtitles/core";
import type { Transcript } from "@diarized-subtitles/core";
import { TranscriptNotFoundError } from "../errors";
import { readJSON } from "../utils/file";

/** Where transcripts come from: a path on disk or a URL */
export interface TranscriptSource {
  load(locator: string): Promise<Transcript>;
}

export class FileTranscriptSource implements TranscriptSource {
  async load(locator: string): Promise<Transcript> {
    const raw = await readJSON(locator);
    if (raw === undefined) {
      throw new TranscriptNotFoundError(locator);
    }
    return parseTranscript(raw);
  }
}

export interface HttpTranscriptSourceOptions {
  timeoutMs?: number;
  retries?: number;
  fetch?: KyOptions["fetch"];
}

/**
 * Fetches transcript JSON over HTTP. Retries on timeouts and 5xx responses are
 * left to ky.
 */
export class HttpTranscriptSource implements TranscriptSource {
  private client: KyInstance;

  constructor(options: HttpTranscriptSourceOptions = {}) {
    const { timeoutMs = 10_000, retries = 2, fetch } = options;

    const kyOptions: KyOptions = {
      timeout: timeoutMs,
      retry: { limit: retries },
    };
    if (fetch) {
      kyOptions.fetch = fetch;
    }

    this.client = ky.create(kyOptions);
  }

  async load(locator: string): Promise<Transcript> {
    let raw: unknown;
    try {
      raw = await this.client.get(locator).json<unknown>();
    } catch (error) {
      if (error instanceof HTTPError && error.response.status === 404) {
        throw new TranscriptNotFoundError(locator);
      }
      throw error;
    }
    return parseTranscript(raw);
  }
}

const HTTP_LOCATOR = /^https?:\/\//i;

export const isHttpLocator = (locator: string) => HTTP_LOCATOR.test(locator);

export function createTranscriptSource(
  locator: string,
  options?: HttpTranscriptSourceOptions
): TranscriptSource {
  return isHttpLocator(locator)
    ? new HttpTranscriptSource(options)
    : new FileTranscriptSource();
}
