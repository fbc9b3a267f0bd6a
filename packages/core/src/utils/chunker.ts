import type { Transcript, TranscriptSegment } from "../types/transcript";
import type { Chunk, ChunkOptions, ChunkWord } from "../types/subtitle";

export const DEFAULT_CHUNK_OPTIONS: Readonly<Required<ChunkOptions>> =
  Object.freeze({
    maxDuration: 5,
    maxLength: 80,
    maxWords: 14,
    minDuration: 1,
  });

// Segments shorter than this are alignment noise
const MIN_SEGMENT_DURATION = 0.1;

// Whitespace after a break character; "1.5" and "10:30" hold no boundary
const PUNCTUATION_BOUNDARY = /(?<=[.!?,:;])\s+/;

interface PendingChunk {
  speaker?: string;
  words: ChunkWord[];
  text: string;
}

export const normalizeChunkOptions = (
  options?: ChunkOptions
): Required<ChunkOptions> => {
  let maxDuration = options?.maxDuration ?? DEFAULT_CHUNK_OPTIONS.maxDuration;
  let maxLength = options?.maxLength ?? DEFAULT_CHUNK_OPTIONS.maxLength;
  let maxWords = options?.maxWords ?? DEFAULT_CHUNK_OPTIONS.maxWords;
  let minDuration = options?.minDuration ?? DEFAULT_CHUNK_OPTIONS.minDuration;

  if (!(maxDuration > 0)) {
    maxDuration = DEFAULT_CHUNK_OPTIONS.maxDuration;
  }
  if (!(maxLength > 0)) {
    maxLength = DEFAULT_CHUNK_OPTIONS.maxLength;
  }
  if (!(maxWords >= 1)) {
    maxWords = DEFAULT_CHUNK_OPTIONS.maxWords;
  }
  maxWords = Math.floor(maxWords);
  if (!(minDuration >= 0)) {
    minDuration = 0;
  }

  return { maxDuration, maxLength, maxWords, minDuration };
};

/**
 * Cuts text where a run of `. ! ? , : ;` is followed by whitespace, the
 * punctuation staying on the fragment before it.
 */
export function splitOnPunctuation(text: string): string[] {
  return text
    .split(PUNCTUATION_BOUNDARY)
    .map((fragment) => fragment.trim())
    .filter(Boolean);
}

/**
 * Splits text on whitespace into pieces of at most `maxWords` words and
 * `maxLength` characters. A word longer than `maxLength` is kept whole as a
 * piece of its own. `maxChars` optionally tightens the length bound further.
 */
export function splitByWords(
  text: string,
  maxLength: number,
  maxWords: number,
  maxChars: number = Number.POSITIVE_INFINITY
): string[] {
  const limit = Math.min(maxLength, maxChars);
  const pieces: string[] = [];
  let current: string[] = [];
  let currentText = "";

  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = currentText ? `${currentText} ${word}` : word;
    if (current.length && (current.length >= maxWords || candidate.length > limit)) {
      pieces.push(currentText);
      current = [word];
      currentText = word;
    } else {
      current.push(word);
      currentText = candidate;
    }
  }

  if (currentText) {
    pieces.push(currentText);
  }
  return pieces;
}

/**
 * Breaks the text of an overlong segment into subtitle-sized pieces.
 *
 * Punctuation fragments are packed greedily while the packed text stays within
 * `maxLength` and its share of the segment duration stays within
 * `maxDuration`. Packed groups still over either bound are split on words.
 */
export function splitSegmentText(
  text: string,
  duration: number,
  options: Required<ChunkOptions>
): string[] {
  const { maxDuration, maxLength, maxWords } = options;
  const secondsPerChar = text.length > 0 ? duration / text.length : 0;
  const fitsDuration = (candidate: string) =>
    candidate.length * secondsPerChar <= maxDuration;

  const groups: string[] = [];
  let current = "";
  for (const fragment of splitOnPunctuation(text)) {
    if (!current) {
      current = fragment;
      continue;
    }
    const candidate = `${current} ${fragment}`;
    if (candidate.length <= maxLength && fitsDuration(candidate)) {
      current = candidate;
    } else {
      groups.push(current);
      current = fragment;
    }
  }
  if (current) {
    groups.push(current);
  }

  const maxChars =
    secondsPerChar > 0 ? Math.floor(maxDuration / secondsPerChar) : Number.POSITIVE_INFINITY;

  return groups.flatMap((group) =>
    group.length > maxLength || !fitsDuration(group)
      ? splitByWords(group, maxLength, maxWords, maxChars)
      : [group]
  );
}

const withSpeaker = (speaker: string | undefined) =>
  speaker !== undefined ? { speaker } : {};

const chunkSegmentText = (
  segment: TranscriptSegment,
  options: Required<ChunkOptions>
): Chunk[] => {
  const duration = segment.end - segment.start;
  const text = segment.text.trim();
  if (!text) {
    return [];
  }

  if (duration <= options.maxDuration && text.length <= options.maxLength) {
    return [
      {
        start: segment.start,
        end: segment.end,
        text,
        ...withSpeaker(segment.speaker),
        words: [],
      },
    ];
  }

  const pieces = splitSegmentText(text, duration, options);
  const totalChars = pieces.reduce((sum, piece) => sum + piece.length, 0);
  const chunks: Chunk[] = [];
  let cursor = segment.start;

  for (const [i, piece] of pieces.entries()) {
    const start = cursor;
    // Pieces tile the segment; the last one ends exactly where it does
    const nominalEnd =
      i === pieces.length - 1
        ? segment.end
        : start + (duration * piece.length) / totalChars;
    cursor = nominalEnd;

    chunks.push({
      start,
      end: Math.max(nominalEnd, start + options.minDuration),
      text: piece,
      ...withSpeaker(segment.speaker),
      words: [],
    });
  }

  return chunks;
};

/**
 * Converts a transcript into ordered, format-agnostic subtitle chunks.
 *
 * Word-timed segments are regrouped word by word and a chunk may span
 * several consecutive segments of the same speaker. Segments without word
 * timing are split on punctuation, then on words, with timestamps allocated
 * by character share.
 */
export function chunkTranscript(
  transcript: Transcript,
  options?: ChunkOptions
): Chunk[] {
  const normalized = normalizeChunkOptions(options);
  const { maxDuration, maxLength, maxWords } = normalized;
  const chunks: Chunk[] = [];
  let pending: PendingChunk | null = null;

  const flush = () => {
    if (!pending || !pending.words.length) {
      pending = null;
      return;
    }
    const { words, text, speaker } = pending;
    chunks.push({
      start: words[0].start,
      end: words[words.length - 1].end,
      text,
      ...withSpeaker(speaker),
      words,
    });
    pending = null;
  };

  const shouldBreakBefore = (current: PendingChunk, word: ChunkWord) =>
    current.speaker !== word.speaker ||
    current.words.length >= maxWords ||
    word.end - current.words[0].start > maxDuration ||
    current.text.length + 1 + word.word.length > maxLength;

  for (const segment of transcript.segments) {
    if (segment.end - segment.start < MIN_SEGMENT_DURATION) {
      continue;
    }

    if (!segment.words?.length) {
      flush();
      chunks.push(...chunkSegmentText(segment, normalized));
      continue;
    }

    for (const source of segment.words) {
      const text = source.word.trim();
      if (!text) {
        continue;
      }
      const word: ChunkWord = {
        word: text,
        start: source.start,
        end: source.end,
        ...withSpeaker(source.speaker ?? segment.speaker),
      };

      if (pending && shouldBreakBefore(pending, word)) {
        flush();
      }

      if (pending) {
        pending.words.push(word);
        pending.text = `${pending.text} ${text}`;
      } else {
        pending = { ...withSpeaker(word.speaker), words: [word], text };
      }
    }
  }

  flush();

  // Array.prototype.sort is stable, so equal starts keep transcript order
  return chunks.sort((a, b) => a.start - b.start);
}
