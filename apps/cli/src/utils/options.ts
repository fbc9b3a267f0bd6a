import { InvalidOptionError } from "../errors";

/**
 * Parses repeated `SPEAKER=color` flags into a speaker color map. The last
 * `=` separates the speaker from the color; a later flag for the same speaker
 * wins.
 */
export function parseColorAssignments(values: readonly string[]): Record<string, string> {
  const entries = values.map((value): [string, string] => {
    const separator = value.lastIndexOf("=");
    const speaker = value.slice(0, Math.max(separator, 0)).trim();
    const color = separator >= 0 ? value.slice(separator + 1).trim() : "";
    if (!speaker || !color) {
      throw new InvalidOptionError(`Expected SPEAKER=color, got "${value}"`);
    }
    return [speaker, color];
  });
  return Object.fromEntries(entries);
}
