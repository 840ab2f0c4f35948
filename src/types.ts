// Call Insight - Shared TypeScript interfaces and types
//
// Time values are seconds from the start of the recording.

// ─── Call State Machine ─────────────────────────────────────────────────────────

export enum CallState {
  PENDING = "pending",
  ANALYZING = "analyzing",
  READY = "ready",
  FAILED = "failed",
}

export type PipelineStage =
  | "transcribing"
  | "aligning"
  | "detecting"
  | "notifying"
  | "scoring"
  | "ready"
  | "failed";

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

// ─── Collaborator Output ────────────────────────────────────────────────────────

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
  /** Diarized speaker label, when the transcription provider supplies one. */
  speaker?: string;
}

export const EMOTION_LABELS = ["neutral", "anger", "happy", "sad"] as const;

export type EmotionLabel = (typeof EMOTION_LABELS)[number];

export interface EmotionSegment {
  start: number;
  end: number;
  label: EmotionLabel;
}

// ─── Derived Analysis Data ──────────────────────────────────────────────────────

export interface AnnotatedTurn {
  start: number;
  end: number;
  text: string;
  dominantLabel: EmotionLabel;
  speaker?: string;
}

export interface EscalationFlag {
  escalate: boolean;
  reason?: string;
  /** Negative share of representative-attributed duration (or turn count when duration is zero). */
  negativeRatio: number;
  longestNegativeRun: number;
  /** Speaker treated as the representative; null when turns carry no speaker labels. */
  representativeSpeaker: string | null;
}

/** Frozen once scored; callers share one instance with the call record. */
export interface Report {
  /** Category name → score in [0, 10]. Always has at least one entry. */
  readonly scores: Readonly<Record<string, number>>;
  /** Mean of `scores`, rounded to one decimal place. */
  readonly csi: number;
  readonly narrative: string;
  /** Configured categories the model response did not score. */
  readonly missingCategories: readonly string[];
}

// ─── Conversation ───────────────────────────────────────────────────────────────

export type ConversationRole = "user" | "system" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

// ─── Supervisor Review ──────────────────────────────────────────────────────────

export type ReviewFindingKind = "official" | "product";

export interface ReviewFinding {
  kind: ReviewFindingKind;
  description: string;
}

// ─── Public Results ─────────────────────────────────────────────────────────────

export interface AnalysisResult {
  callId: string;
  report: Report;
  escalation: EscalationFlag;
  /** Set when an escalation notification could not be delivered. */
  notificationWarning: string | null;
}

export interface CallSummary {
  id: string;
  state: CallState;
  createdAt: string;
  analyzedAt: string | null;
  report: Report | null;
  escalation: EscalationFlag | null;
  notified: boolean;
  notificationWarning: string | null;
  conversation: ConversationTurn[];
  lastError: { kind: string; message: string } | null;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

// Client → Server messages
export type ClientMessage =
  | { type: "subscribe"; callId: string }
  | { type: "unsubscribe"; callId: string }
  | { type: "chat"; callId: string; query: string };

// Server → Client messages
export type ServerMessage =
  | { type: "pipeline_progress"; callId: string; stage: PipelineStage; message?: string }
  | { type: "subscribed"; callId: string; state: CallState }
  | { type: "chat_answer"; callId: string; query: string; answer: string }
  | { type: "error"; kind: string; message: string; callId?: string };
