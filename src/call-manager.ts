// Call Insight - Call Manager
// Central orchestrator owning every call's analysis state and chat buffer.
//
// Pipeline per call:
//   transcription ∥ emotion extraction → align → detect →
//   notify (once, alongside scoring) → score → seed conversation
//
// A READY call can be rescored: the aligned turns are kept and the
// previous report goes into the prompt as prior analysis.
//
// Privacy: audio is held only for the duration of the collaborator calls.
// Captured segments are kept until the call is READY so a failed analysis
// can be retried without resubmitting audio.

import { v4 as uuidv4 } from "uuid";
import { CallState } from "./types.js";
import type {
  AnalysisResult,
  AnnotatedTurn,
  CallSummary,
  EmotionSegment,
  EscalationFlag,
  PipelineStage,
  Report,
  ReviewFinding,
  TranscriptSegment,
} from "./types.js";
import { align } from "./aligner.js";
import { EscalationDetector } from "./escalation-detector.js";
import { ConversationBuffer } from "./conversation-buffer.js";
import {
  DEFAULT_SCORING_EXAMPLE,
  buildScoringPrompt,
  defaultScoringInstructions,
  renderTranscript,
  type ScoringInstructions,
} from "./prompt-builder.js";
import type { ScoringSession } from "./scoring-session.js";
import type { ChatOrchestrator } from "./chat-orchestrator.js";
import type { Transcriber } from "./transcription-engine.js";
import type { EmotionExtractor } from "./emotion-extractor.js";
import type { Notifier } from "./notifier.js";
import type { SupervisorReview } from "./supervisor-review.js";
import type { ReportExporter } from "./report-export.js";
import {
  CallNotFoundError,
  EmotionExtractionFailedError,
  InvalidCallStateError,
  TranscriptionFailedError,
  errorMessage,
  isPipelineError,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export const ESCALATION_SUBJECT = "Issue regarding customer service";

// ─── Call record ────────────────────────────────────────────────────────────────

interface CallRecord {
  id: string;
  state: CallState;
  createdAt: Date;
  analyzedAt: Date | null;
  transcripts: TranscriptSegment[] | null;
  emotions: EmotionSegment[] | null;
  /** Aligned turns the report was scored from; kept for rescoring. */
  turns: AnnotatedTurn[] | null;
  report: Report | null;
  /** True while rescoreCall() runs. */
  revising: boolean;
  escalation: EscalationFlag | null;
  /** Set before the first notification attempt; never cleared. */
  notified: boolean;
  notificationWarning: string | null;
  buffer: ConversationBuffer;
  lastError: { kind: string; message: string } | null;
}

export interface CallEvent {
  callId: string;
  stage: PipelineStage;
  message?: string;
}

export type CallEventListener = (event: CallEvent) => void;

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface CallManagerDeps {
  transcriber: Transcriber;
  emotionExtractor: EmotionExtractor;
  scoringSession: ScoringSession;
  chatOrchestrator: ChatOrchestrator;
  notifier: Notifier;
  recipient: string;
  escalationDetector?: EscalationDetector;
  supervisorReview?: SupervisorReview;
  reportExporter?: ReportExporter;
  instructions?: ScoringInstructions;
  scoringExample?: string;
  logger?: Logger;
}

/**
 * Valid state transitions for the call state machine.
 *
 * PENDING → ANALYZING:   analyzeCall()
 * ANALYZING → READY:     scoring succeeded, conversation seeded
 * ANALYZING → FAILED:    any pipeline error
 * FAILED → ANALYZING:    retryAnalysis() or analyzeCall() with new audio
 */
const VALID_TRANSITIONS: ReadonlyMap<CallState, readonly CallState[]> = new Map([
  [CallState.PENDING, [CallState.ANALYZING]],
  [CallState.ANALYZING, [CallState.READY, CallState.FAILED]],
  [CallState.FAILED, [CallState.ANALYZING]],
  [CallState.READY, []],
]);

export class CallManager {
  private calls: Map<string, CallRecord> = new Map();
  private listeners: Map<string, Set<CallEventListener>> = new Map();
  private readonly deps: CallManagerDeps;
  private readonly detector: EscalationDetector;
  private readonly instructions: ScoringInstructions;
  private readonly scoringExample: string;
  private readonly logger: Logger;

  constructor(deps: CallManagerDeps) {
    this.deps = deps;
    this.detector = deps.escalationDetector ?? new EscalationDetector();
    this.instructions = deps.instructions ?? defaultScoringInstructions(deps.scoringSession.scoredCategories);
    this.scoringExample = deps.scoringExample ?? DEFAULT_SCORING_EXAMPLE;
    this.logger = deps.logger ?? createLogger("CallManager");
  }

  /** Creates a new call in the PENDING state. */
  createCall(): string {
    const buffer = new ConversationBuffer(uuidv4());
    const call: CallRecord = {
      id: buffer.callId,
      state: CallState.PENDING,
      createdAt: new Date(),
      analyzedAt: null,
      transcripts: null,
      emotions: null,
      turns: null,
      report: null,
      revising: false,
      escalation: null,
      notified: false,
      notificationWarning: null,
      buffer,
      lastError: null,
    };
    this.calls.set(call.id, call);
    this.logger.info(`Created call ${call.id}`);
    return call.id;
  }

  /** @throws CallNotFoundError */
  getCall(callId: string): CallSummary {
    return this.toSummary(this.requireCall(callId));
  }

  listCalls(): CallSummary[] {
    return [...this.calls.values()].map((call) => this.toSummary(call));
  }

  /**
   * Ends a call: queued chat turns are cancelled and the call is forgotten.
   * An analysis still running completes into the detached record.
   *
   * @throws CallNotFoundError
   */
  endCall(callId: string): void {
    const call = this.requireCall(callId);
    call.buffer.close();
    this.calls.delete(callId);
    this.listeners.delete(callId);
    this.logger.info(`Ended call ${callId}`);
  }

  /**
   * Subscribes to pipeline stage events of one call.
   * @returns a function that removes the listener.
   * @throws CallNotFoundError
   */
  subscribe(callId: string, listener: CallEventListener): () => void {
    this.requireCall(callId);
    let set = this.listeners.get(callId);
    if (!set) {
      set = new Set();
      this.listeners.set(callId, set);
    }
    set.add(listener);
    return () => {
      this.listeners.get(callId)?.delete(listener);
    };
  }

  /** Creates a call and runs the full pipeline on it. */
  async analyze(audio: Buffer): Promise<AnalysisResult> {
    return this.analyzeCall(this.createCall(), audio);
  }

  /**
   * Runs the full pipeline on a PENDING call, or on a FAILED call with new audio.
   *
   * @throws TranscriptionFailedError / EmotionExtractionFailedError from the collaborators.
   * @throws InvalidSegmentError for malformed timestamps.
   * @throws ModelUnavailableError / MalformedModelOutputError from scoring.
   * @throws InvalidCallStateError if the call is analyzing or ready.
   */
  async analyzeCall(callId: string, audio: Buffer): Promise<AnalysisResult> {
    const call = this.requireCall(callId);
    this.assertTransition(call, CallState.ANALYZING, "analyzeCall");
    this.setState(call, CallState.ANALYZING);
    call.transcripts = null;
    call.emotions = null;
    call.lastError = null;

    let transcripts: TranscriptSegment[];
    let emotions: EmotionSegment[];
    try {
      this.emit(call, "transcribing");
      [transcripts, emotions] = await Promise.all([
        this.deps.transcriber.transcribe(audio).catch((err: unknown) => {
          throw isPipelineError(err)
            ? err
            : new TranscriptionFailedError(`Transcription failed: ${errorMessage(err)}`, { cause: err });
        }),
        this.deps.emotionExtractor.extractEmotions(audio).catch((err: unknown) => {
          throw isPipelineError(err)
            ? err
            : new EmotionExtractionFailedError(`Emotion extraction failed: ${errorMessage(err)}`, { cause: err });
        }),
      ]);
    } catch (err) {
      throw this.fail(call, err);
    }

    call.transcripts = transcripts;
    call.emotions = emotions;
    this.logger.info(
      `Call ${call.id}: ${transcripts.length} transcript segments, ${emotions.length} emotion segments`,
    );
    return this.runAnalysis(call, transcripts, emotions);
  }

  /**
   * Re-runs alignment through scoring on a FAILED call using the segments
   * captured by the previous attempt. A notification already attempted for
   * this call is never sent again.
   *
   * @throws InvalidCallStateError if the call is not FAILED or has no captured segments.
   */
  async retryAnalysis(callId: string): Promise<AnalysisResult> {
    const call = this.requireCall(callId);
    this.assertTransition(call, CallState.ANALYZING, "retryAnalysis");
    if (call.state !== CallState.FAILED || !call.transcripts || !call.emotions) {
      throw new InvalidCallStateError(
        `Call ${callId} has no captured segments to retry; submit the audio again`,
      );
    }
    this.setState(call, CallState.ANALYZING);
    call.lastError = null;
    return this.runAnalysis(call, call.transcripts, call.emotions);
  }

  /**
   * Scores a READY call again from its aligned turns, with the current report
   * as prior analysis. On success the conversation restarts from the new
   * report; on failure the call keeps its previous report.
   *
   * @throws InvalidCallStateError if the call is not READY, is already being
   *   rescored, or has follow-up questions in flight.
   * @throws ModelUnavailableError / MalformedModelOutputError from scoring.
   */
  async rescoreCall(callId: string): Promise<AnalysisResult> {
    const call = this.requireCall(callId);
    if (call.state !== CallState.READY || !call.report || !call.turns || !call.escalation) {
      throw new InvalidCallStateError(
        `Cannot rescore call ${callId} in "${call.state}" state. Expected state: "${CallState.READY}".`,
      );
    }
    if (call.revising) {
      throw new InvalidCallStateError(`Call ${callId} is already being rescored`);
    }
    if (this.deps.chatOrchestrator.pending(call.buffer) > 0) {
      throw new InvalidCallStateError(`Call ${callId} has follow-up questions in flight`);
    }

    const turns = call.turns;
    const escalation = call.escalation;
    call.revising = true;
    let report: Report;
    try {
      this.emit(call, "scoring");
      report = await this.deps.scoringSession.score(
        buildScoringPrompt(turns, this.instructions, this.scoringExample, call.report),
      );
    } catch (err) {
      this.logger.warn(`Rescoring call ${call.id} failed; keeping the previous report: ${errorMessage(err)}`);
      throw err;
    } finally {
      call.revising = false;
    }

    const buffer = new ConversationBuffer(call.id);
    buffer.seed(report, renderTranscript(turns));
    call.buffer.close();
    call.buffer = buffer;
    call.report = report;
    call.analyzedAt = new Date();
    this.emit(call, "ready", `CSI ${report.csi}`);
    this.logger.info(`Call ${call.id} rescored: CSI ${report.csi}`);

    return {
      callId: call.id,
      report,
      escalation: { ...escalation },
      notificationWarning: call.notificationWarning,
    };
  }

  /**
   * Asks a follow-up question about a READY call.
   * @throws InvalidCallStateError if the call has no report yet or is being rescored.
   */
  async chat(callId: string, query: string): Promise<string> {
    const call = this.requireCall(callId);
    if (call.state !== CallState.READY) {
      throw new InvalidCallStateError(
        `Cannot chat about call ${callId} in "${call.state}" state. Expected state: "${CallState.READY}".`,
      );
    }
    if (call.revising) {
      throw new InvalidCallStateError(`Call ${callId} is being rescored; ask again once it is ready`);
    }
    return this.deps.chatOrchestrator.ask(call.buffer, query);
  }

  /**
   * Save a READY call's report and conversation via the ReportExporter.
   * This is the only path to persistence: opt-in only.
   *
   * @returns Array of saved file paths, or empty array if no exporter.
   */
  async exportCall(callId: string): Promise<string[]> {
    const call = this.requireCall(callId);
    if (call.state !== CallState.READY) {
      throw new InvalidCallStateError(`Call ${callId} has no report to export yet`);
    }
    if (this.deps.reportExporter) {
      return this.deps.reportExporter.saveCall(this.toSummary(call));
    }
    return [];
  }

  // ─── Pipeline ───────────────────────────────────────────────────────────────

  private async runAnalysis(
    call: CallRecord,
    transcripts: readonly TranscriptSegment[],
    emotions: readonly EmotionSegment[],
  ): Promise<AnalysisResult> {
    try {
      this.emit(call, "aligning");
      const turns = align(transcripts, emotions);

      this.emit(call, "detecting");
      const escalation = this.detector.detect(turns);
      call.escalation = escalation;

      // notify() never rejects, so scoring runs while it is in flight.
      let notification: Promise<void> = Promise.resolve();
      if (escalation.escalate && !call.notified) {
        this.emit(call, "notifying", escalation.reason);
        notification = this.notify(call, turns, escalation);
      }

      let report: Report;
      try {
        this.emit(call, "scoring");
        report = await this.deps.scoringSession.score(
          buildScoringPrompt(turns, this.instructions, this.scoringExample),
        );
      } finally {
        await notification;
      }

      call.buffer.seed(report, renderTranscript(turns));
      call.report = report;
      call.turns = turns;
      call.analyzedAt = new Date();
      call.transcripts = null;
      call.emotions = null;
      this.setState(call, CallState.READY);
      this.emit(call, "ready", `CSI ${report.csi}`);
      this.logger.info(`Call ${call.id} analyzed: CSI ${report.csi}, escalated: ${escalation.escalate}`);

      return {
        callId: call.id,
        report,
        escalation: { ...escalation },
        notificationWarning: call.notificationWarning,
      };
    } catch (err) {
      throw this.fail(call, err);
    }
  }

  /**
   * Sends the escalation notification. The `notified` marker is set before
   * the attempt, so a call is notified at most once even if sending fails.
   * Failures become `notificationWarning` and never fail the analysis.
   */
  private async notify(call: CallRecord, turns: readonly AnnotatedTurn[], flag: EscalationFlag): Promise<void> {
    call.notified = true;

    let findings: ReviewFinding[] = [];
    if (this.deps.supervisorReview) {
      try {
        findings = await this.deps.supervisorReview.review(turns);
      } catch (err) {
        this.logger.warn(`Supervisor review failed for call ${call.id}: ${errorMessage(err)}`);
      }
    }

    try {
      await this.deps.notifier.send(
        this.deps.recipient,
        ESCALATION_SUBJECT,
        formatEscalationBody(call.id, flag, findings),
      );
      this.logger.info(`Escalation notification sent for call ${call.id}`);
    } catch (err) {
      call.notificationWarning = errorMessage(err);
      this.logger.warn(`Escalation notification failed for call ${call.id}: ${call.notificationWarning}`);
    }
  }

  private fail(call: CallRecord, err: unknown): unknown {
    const kind = isPipelineError(err) ? err.kind : "Internal";
    call.lastError = { kind, message: errorMessage(err) };
    if (call.state === CallState.ANALYZING) {
      this.setState(call, CallState.FAILED);
    }
    this.emit(call, "failed", call.lastError.message);
    this.logger.error(`Analysis failed for call ${call.id} (${kind}): ${call.lastError.message}`);
    return err;
  }

  private emit(call: CallRecord, stage: PipelineStage, message?: string): void {
    const listeners = this.listeners.get(call.id);
    if (!listeners) return;
    const event: CallEvent = message === undefined ? { callId: call.id, stage } : { callId: call.id, stage, message };
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.warn(`Stage listener for call ${call.id} threw: ${errorMessage(err)}`);
      }
    }
  }

  private toSummary(call: CallRecord): CallSummary {
    return {
      id: call.id,
      state: call.state,
      createdAt: call.createdAt.toISOString(),
      analyzedAt: call.analyzedAt ? call.analyzedAt.toISOString() : null,
      report: call.report,
      escalation: call.escalation ? { ...call.escalation } : null,
      notified: call.notified,
      notificationWarning: call.notificationWarning,
      conversation: call.buffer.contents(),
      lastError: call.lastError,
    };
  }

  private requireCall(callId: string): CallRecord {
    const call = this.calls.get(callId);
    if (!call) {
      throw new CallNotFoundError(callId);
    }
    return call;
  }

  // ─── State Transition Helpers ───────────────────────────────────────────────

  private setState(call: CallRecord, next: CallState): void {
    this.logger.info(`Call ${call.id}: ${call.state} → ${next}`);
    call.state = next;
  }

  /**
   * Validates that a state transition is allowed.
   * @throws InvalidCallStateError with a descriptive message if the transition is invalid.
   */
  private assertTransition(call: CallRecord, targetState: CallState, methodName: string): void {
    const allowed = VALID_TRANSITIONS.get(call.state) ?? [];
    if (!allowed.includes(targetState)) {
      throw new InvalidCallStateError(
        `Invalid state transition: cannot call ${methodName}() in "${call.state}" state. ` +
          `Expected state: ${this.getExpectedStatesForTarget(targetState)}.`,
      );
    }
  }

  private getExpectedStatesForTarget(targetState: CallState): string {
    const sources: string[] = [];
    for (const [source, targets] of VALID_TRANSITIONS) {
      if (targets.includes(targetState)) {
        sources.push(`"${source}"`);
      }
    }
    return sources.length > 0 ? sources.join(" or ") : "unknown";
  }
}

/** Plain-text body of the escalation notification. */
export function formatEscalationBody(
  callId: string,
  flag: EscalationFlag,
  findings: readonly ReviewFinding[],
): string {
  const lines = [
    `Call ${callId} was flagged for supervisor attention.`,
    `Reason: ${flag.reason ?? "negative tone threshold reached"}`,
  ];
  if (findings.length > 0) {
    lines.push("", "Supervisor review:");
    for (const finding of findings) {
      lines.push(`- [${finding.kind}] ${finding.description}`);
    }
  }
  return lines.join("\n");
}
