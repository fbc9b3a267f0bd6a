export interface TranscriptWord {
  word: string;
  start: number;
  end: number;
  speaker?: string;
  probability?: number;
}

export interface TranscriptSegment {
  id?: number;
  start: number;
  end: number;
  text: string;
  speaker?: string;
  words?: readonly TranscriptWord[];
}

export interface Transcript {
  language: string;
  segments: readonly TranscriptSegment[];
}

export interface TranscriptStats {
  language: string;
  segmentCount: number;
  totalWords: number;
  speakerCounts: Record<string, number>;
  wordCounts: Record<string, number>;
}
