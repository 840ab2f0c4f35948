// Call Insight - Emotion Extractor
// Client for a speech-emotion-diarization service.
//
// The service receives the raw recording and answers with time-stamped
// emotion labels, either as a flat array, as `{ segments: [...] }`, or keyed
// by the uploaded file name:
//   { "call.wav": [{ "start": 0.0, "end": 4.2, "emotion": "n" }, ...] }
// Labels may be one-letter codes (n, a, h, s) or words.

import type { EmotionLabel, EmotionSegment } from "./types.js";
import { EmotionExtractionFailedError } from "./errors.js";
import { defaultHttpClient, httpErrorMessage, type HttpClient } from "./utils/http.js";

export interface EmotionExtractor {
  /** @throws EmotionExtractionFailedError */
  extractEmotions(audio: Buffer): Promise<EmotionSegment[]>;
}

const LABEL_ALIASES: Record<string, EmotionLabel> = {
  n: "neutral",
  neu: "neutral",
  neutral: "neutral",
  a: "anger",
  ang: "anger",
  anger: "anger",
  angry: "anger",
  h: "happy",
  hap: "happy",
  happy: "happy",
  happiness: "happy",
  s: "sad",
  sad: "sad",
  sadness: "sad",
};

/**
 * @throws EmotionExtractionFailedError for labels outside the known set.
 */
export function normalizeEmotionLabel(raw: string): EmotionLabel {
  const label = LABEL_ALIASES[raw.trim().toLowerCase()];
  if (!label) {
    throw new EmotionExtractionFailedError(`Unrecognized emotion label: "${raw}"`);
  }
  return label;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function entriesOf(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (isRecord(payload)) {
    if (Array.isArray(payload.segments)) {
      return payload.segments;
    }
    const values = Object.values(payload);
    if (values.length === 1 && Array.isArray(values[0])) {
      return values[0];
    }
  }
  throw new EmotionExtractionFailedError("Emotion service response has no segment list");
}

/**
 * Parses a diarization service payload into EmotionSegment[].
 *
 * Timestamps are only type-checked here; ordering problems such as
 * start > end are left to the aligner, which rejects them as InvalidSegment.
 *
 * @throws EmotionExtractionFailedError for malformed entries.
 */
export function parseEmotionDiary(payload: unknown): EmotionSegment[] {
  return entriesOf(payload).map((entry, i) => {
    if (!isRecord(entry)) {
      throw new EmotionExtractionFailedError(`Emotion segment ${i} is not an object`);
    }
    const { start, end } = entry;
    const rawLabel = entry.emotion ?? entry.label;
    if (typeof start !== "number" || typeof end !== "number") {
      throw new EmotionExtractionFailedError(`Emotion segment ${i} is missing numeric start/end`);
    }
    if (typeof rawLabel !== "string") {
      throw new EmotionExtractionFailedError(`Emotion segment ${i} is missing its label`);
    }
    return { start, end, label: normalizeEmotionLabel(rawLabel) };
  });
}

export interface HttpEmotionExtractorOptions {
  /** Applies to the whole exchange, response body included. */
  timeoutMs?: number;
  contentType?: string;
  httpClient?: HttpClient;
}

export class HttpEmotionExtractor implements EmotionExtractor {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly contentType: string;
  private readonly http: HttpClient;

  constructor(url: string, options: HttpEmotionExtractorOptions = {}) {
    this.url = url;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.contentType = options.contentType ?? "audio/wav";
    this.http = options.httpClient ?? defaultHttpClient;
  }

  async extractEmotions(audio: Buffer): Promise<EmotionSegment[]> {
    if (audio.length === 0) {
      return [];
    }

    let payload: unknown;
    try {
      const response = await this.http.post(this.url, audio, {
        timeout: this.timeoutMs,
        headers: { "Content-Type": this.contentType },
      });
      payload = response.data;
    } catch (err) {
      throw new EmotionExtractionFailedError(`Emotion extraction failed: ${httpErrorMessage(err)}`, { cause: err });
    }

    return parseEmotionDiary(payload);
  }
}
