// Shared helpers for the Call Insight pipeline.
//
// Deterministic formatting and numeric helpers used by the prompt builder,
// the scoring parser and report export.

/**
 * Formats a number of seconds into `[MM:SS]` timestamp format.
 */
export function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return `[${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}]`;
}

/**
 * Rounds half away from zero to `digits` decimal places.
 * Works on the decimal string form so values like 7.85 round to 7.9 rather
 * than falling victim to binary representation.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const magnitude = String(Math.abs(value));
  if (magnitude.includes("e")) {
    return Math.round(value * factor) / factor;
  }
  return (Math.sign(value) * Math.round(Number(`${magnitude}e${digits}`))) / factor;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Human speaker label for a diarization id ("0" → "Speaker 1"); named labels pass through. */
export function speakerLabel(speaker: string): string {
  return /^\d+$/.test(speaker) ? `Speaker ${Number(speaker) + 1}` : speaker;
}
