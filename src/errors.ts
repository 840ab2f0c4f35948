// Call Insight - Error taxonomy
//
// Every failure the pipeline surfaces carries a `kind` discriminant so the
// server and callers can classify it without string matching.

export type PipelineErrorKind =
  | "InvalidSegment"
  | "TranscriptionFailed"
  | "EmotionExtractionFailed"
  | "MalformedModelOutput"
  | "ModelUnavailable"
  | "NotificationFailed"
  | "CallNotFound"
  | "InvalidState"
  | "Cancelled"
  | "InvalidRequest";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidSegmentError extends PipelineError {
  readonly kind = "InvalidSegment" as const;
}

export class TranscriptionFailedError extends PipelineError {
  readonly kind = "TranscriptionFailed" as const;
}

export class EmotionExtractionFailedError extends PipelineError {
  readonly kind = "EmotionExtractionFailed" as const;
}

export class MalformedModelOutputError extends PipelineError {
  readonly kind = "MalformedModelOutput" as const;

  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ModelUnavailableError extends PipelineError {
  readonly kind = "ModelUnavailable" as const;
}

export class NotificationFailedError extends PipelineError {
  readonly kind = "NotificationFailed" as const;
}

export class CallNotFoundError extends PipelineError {
  readonly kind = "CallNotFound" as const;

  constructor(readonly callId: string) {
    super(`Call not found: ${callId}`);
  }
}

export class InvalidCallStateError extends PipelineError {
  readonly kind = "InvalidState" as const;
}

export class ChatCancelledError extends PipelineError {
  readonly kind = "Cancelled" as const;
}

export class InvalidRequestError extends PipelineError {
  readonly kind = "InvalidRequest" as const;
}

/** Startup configuration problem. Not part of the pipeline taxonomy. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
