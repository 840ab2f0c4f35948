// Call Insight - Transcription Engine
// Turns a call recording into ordered, time-stamped transcript segments.
//
// Two providers:
//   1. OpenAI whisper-1 with verbose_json segment timestamps (default)
//   2. Deepgram pre-recorded with utterances + diarization, which also labels
//      each segment with a speaker id
//
// Privacy: audio is sent to the provider in-memory only, never written to disk.

import { toFile } from "openai";
import { TranscriptionFailedError, errorMessage } from "./errors.js";
import type { TranscriptSegment } from "./types.js";
import { withTimeout } from "./utils/timeout.js";

export interface Transcriber {
  /** @throws TranscriptionFailedError */
  transcribe(audio: Buffer): Promise<TranscriptSegment[]>;
}

// ─── OpenAI transcription client interface (for testability / dependency injection) ──

type UploadFile = Awaited<ReturnType<typeof toFile>>;

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: UploadFile;
        model: string;
        response_format?: "json" | "verbose_json";
        timestamp_granularities?: Array<"word" | "segment">;
        language?: string;
      }): Promise<OpenAITranscriptionResponse>;
    };
  };
}

/**
 * `segments` and `duration` are only present with the `verbose_json`
 * response format.
 */
export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number;
  language?: string;
  segments?: Array<{
    id: number;
    start: number;
    end: number;
    text: string;
  }>;
}

export interface TranscriberOptions {
  timeoutMs?: number;
  language?: string;
}

/**
 * Parses an OpenAI transcription response into TranscriptSegment[].
 *
 * Segment timestamps are used when present; a text-only response becomes a
 * single segment spanning the reported duration.
 */
export function parseOpenAITranscription(response: OpenAITranscriptionResponse): TranscriptSegment[] {
  if (response.segments && response.segments.length > 0) {
    return response.segments
      .filter((seg) => seg.text.trim().length > 0)
      .map((seg) => ({
        start: seg.start,
        end: seg.end,
        text: seg.text.trim(),
      }));
  }

  const text = response.text?.trim();
  if (!text) {
    return [];
  }
  return [{ start: 0, end: response.duration ?? 0, text }];
}

export class OpenAITranscriber implements Transcriber {
  private readonly client: OpenAITranscriptionClient;
  private readonly timeoutMs: number;
  private readonly language: string;

  constructor(client: OpenAITranscriptionClient, options: TranscriberOptions = {}) {
    this.client = client;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.language = options.language ?? "en";
  }

  async transcribe(audio: Buffer): Promise<TranscriptSegment[]> {
    if (audio.length === 0) {
      return [];
    }

    try {
      const file = await toFile(audio, "call.wav", { type: "audio/wav" });
      const response = await withTimeout(
        this.client.audio.transcriptions.create({
          file,
          model: "whisper-1",
          language: this.language,
          response_format: "verbose_json",
          timestamp_granularities: ["segment"],
        }),
        this.timeoutMs,
        "OpenAI transcription",
      );
      return parseOpenAITranscription(response);
    } catch (err) {
      throw new TranscriptionFailedError(`OpenAI transcription failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

// ─── Deepgram ───────────────────────────────────────────────────────────────────

/**
 * Shape of the parts of a Deepgram pre-recorded response we read.
 * Defined locally to avoid tight coupling with SDK internals.
 */
export interface DeepgramPrerecordedResult {
  metadata?: { duration?: number };
  results: {
    utterances?: Array<{
      start: number;
      end: number;
      transcript: string;
      speaker?: number;
    }>;
    channels: Array<{
      alternatives: Array<{
        transcript: string;
      }>;
    }>;
  };
}

export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: Record<string, string | number | boolean>,
      ): Promise<{ result: DeepgramPrerecordedResult | null; error: { message: string } | null }>;
    };
  };
}

const DEEPGRAM_OPTIONS = {
  model: "nova-2",
  smart_format: true,
  punctuate: true,
  utterances: true,
  diarize: true,
};

/**
 * Utterances carry diarized speaker ids; without them the whole channel
 * transcript becomes one segment.
 */
export function parseDeepgramResult(result: DeepgramPrerecordedResult): TranscriptSegment[] {
  const utterances = result.results.utterances ?? [];
  if (utterances.length > 0) {
    return utterances
      .filter((u) => u.transcript.trim().length > 0)
      .map((u) => {
        const segment: TranscriptSegment = { start: u.start, end: u.end, text: u.transcript.trim() };
        if (u.speaker !== undefined) {
          segment.speaker = String(u.speaker);
        }
        return segment;
      });
  }

  const text = result.results.channels[0]?.alternatives[0]?.transcript.trim();
  if (!text) {
    return [];
  }
  return [{ start: 0, end: result.metadata?.duration ?? 0, text }];
}

export class DeepgramTranscriber implements Transcriber {
  private readonly client: DeepgramPrerecordedClient;
  private readonly timeoutMs: number;
  private readonly language: string;

  constructor(client: DeepgramPrerecordedClient, options: TranscriberOptions = {}) {
    this.client = client;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.language = options.language ?? "en";
  }

  async transcribe(audio: Buffer): Promise<TranscriptSegment[]> {
    if (audio.length === 0) {
      return [];
    }

    let response: Awaited<ReturnType<DeepgramPrerecordedClient["listen"]["prerecorded"]["transcribeFile"]>>;
    try {
      response = await withTimeout(
        this.client.listen.prerecorded.transcribeFile(audio, { ...DEEPGRAM_OPTIONS, language: this.language }),
        this.timeoutMs,
        "Deepgram transcription",
      );
    } catch (err) {
      throw new TranscriptionFailedError(`Deepgram transcription failed: ${errorMessage(err)}`, { cause: err });
    }

    if (response.error || !response.result) {
      throw new TranscriptionFailedError(
        `Deepgram transcription failed: ${response.error?.message ?? "empty response"}`,
      );
    }
    return parseDeepgramResult(response.result);
  }
}
