export type SpeakerLabelMode = "normalized" | "sequential";

const DIARIZED_SPEAKER = /^SPEAKER_(\d+)$/;

/**
 * Turns a diarization id such as `SPEAKER_01` into `Speaker 1`. Other ids are
 * already human names and come back unchanged.
 */
export function normalizeSpeakerLabel(speakerId: string): string {
  const match = DIARIZED_SPEAKER.exec(speakerId);
  if (!match) {
    return speakerId;
  }
  return `Speaker ${Number.parseInt(match[1], 10)}`;
}

/**
 * Creates a labeler for one run. In sequential mode speakers are numbered in
 * the order the labeler first sees them, so the returned function must not be
 * shared between tracks.
 */
export function createSpeakerLabeler(
  mode: SpeakerLabelMode = "normalized"
): (speakerId: string) => string {
  if (mode === "normalized") {
    return normalizeSpeakerLabel;
  }

  const labels = new Map<string, string>();
  return (speakerId) => {
    let label = labels.get(speakerId);
    if (label === undefined) {
      label = `Speaker ${labels.size + 1}`;
      labels.set(speakerId, label);
    }
    return label;
  };
}
