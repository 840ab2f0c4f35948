// Call Insight - Aligner
// Joins the transcript and emotion timelines into annotated turns.
//
// The two collaborators run on independent time grids, so a transcript
// segment may straddle several emotion segments (or none). Each turn takes
// the label with the largest total overlap over [start, end); ties go to the
// label whose overlapping segment starts first; no overlap means "neutral".

import type { AnnotatedTurn, EmotionLabel, EmotionSegment, TranscriptSegment } from "./types.js";
import { InvalidSegmentError } from "./errors.js";

export const FALLBACK_LABEL: EmotionLabel = "neutral";

interface TimedSegment {
  start: number;
  end: number;
}

/**
 * Rejects segments with non-finite timestamps or `start > end`.
 * Zero-length segments are valid; they simply overlap nothing.
 */
export function validateSegments(segments: readonly TimedSegment[], source: string): void {
  for (let i = 0; i < segments.length; i++) {
    const { start, end } = segments[i];
    if (!Number.isFinite(start) || !Number.isFinite(end)) {
      throw new InvalidSegmentError(
        `${source} segment ${i} has a non-finite timestamp (start=${start}, end=${end})`,
      );
    }
    if (start > end) {
      throw new InvalidSegmentError(
        `${source} segment ${i} starts after it ends (start=${start}, end=${end})`,
      );
    }
  }
}

/** Indices of `segments` ordered by start time; stable for equal starts. */
function orderByStart(segments: readonly TimedSegment[]): number[] {
  const order = segments.map((_, i) => i);
  let sorted = true;
  for (let i = 1; i < segments.length; i++) {
    if (segments[i].start < segments[i - 1].start) {
      sorted = false;
      break;
    }
  }
  if (!sorted) {
    order.sort((a, b) => segments[a].start - segments[b].start || a - b);
  }
  return order;
}

export function overlapDuration(a: TimedSegment, b: TimedSegment): number {
  return Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));
}

/**
 * Align transcript segments with emotion segments.
 *
 * Sweeps both start-ordered sequences once. `low` only advances past emotion
 * segments that end before the current transcript starts; since transcripts
 * are visited in start order, those segments cannot overlap any later turn.
 *
 * @returns One turn per transcript segment, in transcript input order.
 * @throws InvalidSegmentError when either input holds a malformed segment.
 */
export function align(
  transcripts: readonly TranscriptSegment[],
  emotions: readonly EmotionSegment[],
): AnnotatedTurn[] {
  validateSegments(transcripts, "Transcript");
  validateSegments(emotions, "Emotion");

  if (transcripts.length === 0) {
    return [];
  }

  const emotionOrder = orderByStart(emotions);
  const transcriptOrder = orderByStart(transcripts);
  const turns: AnnotatedTurn[] = new Array<AnnotatedTurn>(transcripts.length);

  let low = 0;
  for (const ti of transcriptOrder) {
    const segment = transcripts[ti];

    while (low < emotionOrder.length && emotions[emotionOrder[low]].end <= segment.start) {
      low++;
    }

    // Per-label overlap totals, in order of first overlapping segment.
    const totals = new Map<EmotionLabel, number>();
    for (let k = low; k < emotionOrder.length; k++) {
      const emotion = emotions[emotionOrder[k]];
      if (emotion.start >= segment.end) break;
      const overlap = overlapDuration(segment, emotion);
      if (overlap > 0) {
        totals.set(emotion.label, (totals.get(emotion.label) ?? 0) + overlap);
      }
    }

    let dominantLabel = FALLBACK_LABEL;
    let best = 0;
    for (const [label, total] of totals) {
      if (total > best) {
        best = total;
        dominantLabel = label;
      }
    }

    const turn: AnnotatedTurn = {
      start: segment.start,
      end: segment.end,
      text: segment.text,
      dominantLabel,
    };
    if (segment.speaker !== undefined) {
      turn.speaker = segment.speaker;
    }
    turns[ti] = turn;
  }

  return turns;
}
