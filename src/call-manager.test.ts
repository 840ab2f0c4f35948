import { describe, it, expect, vi } from "vitest";
import { CallManager, ESCALATION_SUBJECT, formatEscalationBody, type CallManagerDeps } from "./call-manager.js";
import { ScoringSession } from "./scoring-session.js";
import { ChatOrchestrator } from "./chat-orchestrator.js";
import { SupervisorReview } from "./supervisor-review.js";
import {
  CallNotFoundError,
  ChatCancelledError,
  EmotionExtractionFailedError,
  InvalidCallStateError,
  InvalidSegmentError,
  ModelUnavailableError,
  NotificationFailedError,
  TranscriptionFailedError,
} from "./errors.js";
import type { LanguageModel } from "./language-model.js";
import type { Notifier } from "./notifier.js";
import type { Transcriber } from "./transcription-engine.js";
import type { EmotionExtractor } from "./emotion-extractor.js";
import { CallState, type Deferred, type EmotionSegment, type PipelineStage, type TranscriptSegment } from "./types.js";
import { createDeferred } from "./utils/deferred.js";

// ─── Fixtures ───────────────────────────────────────────────────────────────────

const AUDIO = Buffer.from("fake-audio");

const TRANSCRIPT: TranscriptSegment[] = [
  { start: 0, end: 2, text: "Thanks for calling, how can I help?" },
  { start: 2, end: 4, text: "I already told you twice." },
];

const CALM_EMOTIONS: EmotionSegment[] = [{ start: 0, end: 4, label: "neutral" }];

const ANGRY_EMOTIONS: EmotionSegment[] = [
  { start: 0, end: 2, label: "neutral" },
  { start: 2, end: 4, label: "anger" },
];

const ANGRY_REASON = "50% of the representative's speaking time carried a negative tone (threshold 30%)";

const SCORING_REPLY = "Communication: 8/10 Resolution: 6/10 Emotion Handling: 7/10. The call went reasonably well.";

function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function scriptedModel(...replies: Array<string | Error>): LanguageModel {
  let i = 0;
  return {
    name: "fake-model",
    generate: vi.fn(async () => {
      const reply = replies[Math.min(i++, replies.length - 1)];
      if (reply instanceof Error) throw reply;
      return reply;
    }),
  };
}

function recordingNotifier(failWith?: Error) {
  const sent: Array<{ recipient: string; subject: string; body: string }> = [];
  const notifier: Notifier = {
    send: async (recipient, subject, body) => {
      sent.push({ recipient, subject, body });
      if (failWith) throw failWith;
    },
  };
  return { notifier, sent };
}

interface SetupOptions {
  transcript?: TranscriptSegment[];
  emotions?: EmotionSegment[];
  scoringModel?: LanguageModel;
  chatModel?: LanguageModel;
  notifier?: Notifier;
  extra?: Partial<CallManagerDeps>;
}

function setup(options: SetupOptions = {}) {
  const transcribe = vi.fn(async (_audio: Buffer) => options.transcript ?? TRANSCRIPT);
  const extractEmotions = vi.fn(async (_audio: Buffer) => options.emotions ?? CALM_EMOTIONS);
  const transcriber: Transcriber = { transcribe };
  const emotionExtractor: EmotionExtractor = { extractEmotions };
  const recorder = recordingNotifier();

  const manager = new CallManager({
    transcriber,
    emotionExtractor,
    scoringSession: new ScoringSession(options.scoringModel ?? scriptedModel(SCORING_REPLY), {
      logger: silentLogger(),
    }),
    chatOrchestrator: new ChatOrchestrator(options.chatModel ?? scriptedModel("Because the refund was slow."), {
      logger: silentLogger(),
    }),
    notifier: options.notifier ?? recorder.notifier,
    recipient: "supervisor@example.com",
    logger: silentLogger(),
    ...options.extra,
  });

  return { manager, transcribe, extractEmotions, sent: recorder.sent };
}

// ─── Analysis ───────────────────────────────────────────────────────────────────

describe("CallManager analysis", () => {
  it("analyzes a calm call to READY and seeds the conversation with the report", async () => {
    const { manager, sent } = setup();

    const result = await manager.analyze(AUDIO);

    expect(result.report).toEqual({
      scores: { Communication: 8, Resolution: 6, "Emotion Handling": 7 },
      csi: 7,
      narrative: SCORING_REPLY,
      missingCategories: [],
    });
    expect(result.escalation.escalate).toBe(false);
    expect(result.notificationWarning).toBeNull();
    expect(sent).toHaveLength(0);

    const call = manager.getCall(result.callId);
    expect(call.state).toBe(CallState.READY);
    expect(call.notified).toBe(false);
    expect(call.analyzedAt).not.toBeNull();
    expect(call.lastError).toBeNull();
    expect(call.conversation).toEqual([{ role: "assistant", content: SCORING_REPLY }]);
  });

  it("passes the same audio to both collaborators", async () => {
    const { manager, transcribe, extractEmotions } = setup();
    await manager.analyze(AUDIO);
    expect(transcribe).toHaveBeenCalledWith(AUDIO);
    expect(extractEmotions).toHaveBeenCalledWith(AUDIO);
  });

  it("emits stage events in pipeline order", async () => {
    const { manager } = setup({ emotions: ANGRY_EMOTIONS });
    const callId = manager.createCall();
    const events: Array<{ stage: PipelineStage; message?: string }> = [];
    manager.subscribe(callId, (event) => events.push({ stage: event.stage, message: event.message }));

    await manager.analyzeCall(callId, AUDIO);

    expect(events).toEqual([
      { stage: "transcribing", message: undefined },
      { stage: "aligning", message: undefined },
      { stage: "detecting", message: undefined },
      { stage: "notifying", message: ANGRY_REASON },
      { stage: "scoring", message: undefined },
      { stage: "ready", message: "CSI 7" },
    ]);
  });

  it("keeps running when a stage listener throws", async () => {
    const { manager } = setup();
    const callId = manager.createCall();
    manager.subscribe(callId, () => {
      throw new Error("listener bug");
    });

    await manager.analyzeCall(callId, AUDIO);
    expect(manager.getCall(callId).state).toBe(CallState.READY);
  });

  it("stops delivering events after unsubscribe", async () => {
    const { manager } = setup();
    const callId = manager.createCall();
    const listener = vi.fn();
    const unsubscribe = manager.subscribe(callId, listener);
    unsubscribe();

    await manager.analyzeCall(callId, AUDIO);
    expect(listener).not.toHaveBeenCalled();
  });

  it("keeps the stored result when a caller mutates the returned one", async () => {
    const { manager } = setup({ emotions: ANGRY_EMOTIONS });
    const result = await manager.analyze(AUDIO);

    expect(Object.isFrozen(result.report)).toBe(true);
    expect(Reflect.set(result.report.scores, "Communication", 0)).toBe(false);
    expect(Reflect.set(result.report, "csi", 0)).toBe(false);
    result.escalation.escalate = false;
    const summary = manager.getCall(result.callId);
    if (summary.escalation) summary.escalation.reason = "edited";

    const call = manager.getCall(result.callId);
    expect(call.report?.scores.Communication).toBe(8);
    expect(call.report?.csi).toBe(7);
    expect(call.escalation?.escalate).toBe(true);
    expect(call.escalation?.reason).toBe(ANGRY_REASON);
  });

  it("refuses to re-analyze a READY call", async () => {
    const { manager } = setup();
    const { callId } = await manager.analyze(AUDIO);

    await expect(manager.analyzeCall(callId, AUDIO)).rejects.toThrow(
      'Invalid state transition: cannot call analyzeCall() in "ready" state. Expected state: "pending" or "failed".',
    );
  });
});

// ─── Escalation ─────────────────────────────────────────────────────────────────

describe("CallManager escalation", () => {
  it("notifies the supervisor once with the escalation reason", async () => {
    const { manager, sent } = setup({ emotions: ANGRY_EMOTIONS });

    const result = await manager.analyze(AUDIO);

    expect(result.escalation).toEqual({
      escalate: true,
      reason: ANGRY_REASON,
      negativeRatio: 0.5,
      longestNegativeRun: 1,
      representativeSpeaker: null,
    });
    expect(sent).toEqual([
      {
        recipient: "supervisor@example.com",
        subject: ESCALATION_SUBJECT,
        body: `Call ${result.callId} was flagged for supervisor attention.\nReason: ${ANGRY_REASON}`,
      },
    ]);
    expect(manager.getCall(result.callId).notified).toBe(true);
  });

  it("adds supervisor review findings to the notification body", async () => {
    const review = new SupervisorReview(
      scriptedModel('***official("The representative repeated the same script")*** ***none()***'),
    );
    const { manager, sent } = setup({ emotions: ANGRY_EMOTIONS, extra: { supervisorReview: review } });

    const { callId } = await manager.analyze(AUDIO);

    expect(sent[0].body).toBe(
      [
        `Call ${callId} was flagged for supervisor attention.`,
        `Reason: ${ANGRY_REASON}`,
        "",
        "Supervisor review:",
        "- [official] The representative repeated the same script",
      ].join("\n"),
    );
  });

  it("still notifies when the supervisor review fails", async () => {
    const review = new SupervisorReview(scriptedModel(new Error("model offline")));
    const { manager, sent } = setup({ emotions: ANGRY_EMOTIONS, extra: { supervisorReview: review } });

    const { callId } = await manager.analyze(AUDIO);

    expect(sent).toHaveLength(1);
    expect(sent[0].body).toBe(`Call ${callId} was flagged for supervisor attention.\nReason: ${ANGRY_REASON}`);
  });

  it("scores the call while the supervisor review is still running", async () => {
    const reviewReply = createDeferred<string>();
    const review = new SupervisorReview({ name: "review-model", generate: () => reviewReply.promise });
    const scoringModel = scriptedModel(SCORING_REPLY);
    const { manager, sent } = setup({ emotions: ANGRY_EMOTIONS, scoringModel, extra: { supervisorReview: review } });
    const callId = manager.createCall();

    const analysis = manager.analyzeCall(callId, AUDIO);
    await vi.waitFor(() => expect(scoringModel.generate).toHaveBeenCalledTimes(1));

    expect(sent).toHaveLength(0);
    expect(manager.getCall(callId).state).toBe(CallState.ANALYZING);

    reviewReply.resolve('***product("Refund tooling is too slow")***');
    const result = await analysis;

    expect(result.report.csi).toBe(7);
    expect(manager.getCall(callId).state).toBe(CallState.READY);
    expect(sent).toHaveLength(1);
    expect(sent[0].body).toBe(
      [
        `Call ${callId} was flagged for supervisor attention.`,
        `Reason: ${ANGRY_REASON}`,
        "",
        "Supervisor review:",
        "- [product] Refund tooling is too slow",
      ].join("\n"),
    );
  });

  it("turns a failed notification into a warning and still reaches READY", async () => {
    const { notifier } = recordingNotifier(new NotificationFailedError("Webhook returned HTTP 500"));
    const { manager } = setup({ emotions: ANGRY_EMOTIONS, notifier });

    const result = await manager.analyze(AUDIO);

    expect(result.notificationWarning).toBe("Webhook returned HTTP 500");
    const call = manager.getCall(result.callId);
    expect(call.state).toBe(CallState.READY);
    expect(call.notified).toBe(true);
    expect(call.notificationWarning).toBe("Webhook returned HTTP 500");
  });

  it("does not notify again when a failed analysis is retried", async () => {
    const scoringModel = scriptedModel(new Error("rate limited"), SCORING_REPLY);
    const { manager, sent, transcribe } = setup({ emotions: ANGRY_EMOTIONS, scoringModel });
    const callId = manager.createCall();

    await expect(manager.analyzeCall(callId, AUDIO)).rejects.toBeInstanceOf(ModelUnavailableError);
    expect(manager.getCall(callId).state).toBe(CallState.FAILED);
    expect(manager.getCall(callId).lastError).toEqual({
      kind: "ModelUnavailable",
      message: "Scoring call to fake-model failed: rate limited",
    });
    expect(sent).toHaveLength(1);

    const result = await manager.retryAnalysis(callId);

    expect(result.report.csi).toBe(7);
    expect(manager.getCall(callId).state).toBe(CallState.READY);
    expect(manager.getCall(callId).lastError).toBeNull();
    expect(sent).toHaveLength(1);
    expect(transcribe).toHaveBeenCalledTimes(1);
  });
});

// ─── Failures ───────────────────────────────────────────────────────────────────

describe("CallManager failures", () => {
  it("fails the call on malformed transcript timestamps", async () => {
    const { manager } = setup({ transcript: [{ start: 5, end: 2, text: "backwards" }] });
    const callId = manager.createCall();

    await expect(manager.analyzeCall(callId, AUDIO)).rejects.toBeInstanceOf(InvalidSegmentError);

    const call = manager.getCall(callId);
    expect(call.state).toBe(CallState.FAILED);
    expect(call.lastError).toEqual({
      kind: "InvalidSegment",
      message: "Transcript segment 0 starts after it ends (start=5, end=2)",
    });
  });

  it("wraps an unclassified transcription error and requires new audio to retry", async () => {
    const { manager, transcribe } = setup();
    transcribe.mockRejectedValueOnce(new Error("socket hang up"));
    const callId = manager.createCall();
    const events: PipelineStage[] = [];
    manager.subscribe(callId, (event) => events.push(event.stage));

    const failure = manager.analyzeCall(callId, AUDIO);
    await expect(failure).rejects.toBeInstanceOf(TranscriptionFailedError);
    await expect(failure).rejects.toThrow("Transcription failed: socket hang up");
    expect(events).toEqual(["transcribing", "failed"]);

    await expect(manager.retryAnalysis(callId)).rejects.toThrow(
      `Call ${callId} has no captured segments to retry; submit the audio again`,
    );

    const result = await manager.analyzeCall(callId, AUDIO);
    expect(result.callId).toBe(callId);
    expect(manager.getCall(callId).state).toBe(CallState.READY);
  });

  it("passes classified collaborator errors through unchanged", async () => {
    const { manager, extractEmotions } = setup();
    const original = new EmotionExtractionFailedError("Emotion extraction failed: HTTP 503 Service Unavailable");
    extractEmotions.mockRejectedValueOnce(original);

    await expect(manager.analyze(AUDIO)).rejects.toBe(original);
  });

  it("rejects retry of a call that never failed", async () => {
    const { manager } = setup();
    const callId = manager.createCall();

    await expect(manager.retryAnalysis(callId)).rejects.toBeInstanceOf(InvalidCallStateError);
  });

  it("reports unknown calls", () => {
    const { manager } = setup();
    expect(() => manager.getCall("missing")).toThrow(CallNotFoundError);
    expect(() => manager.getCall("missing")).toThrow("Call not found: missing");
    expect(() => manager.endCall("missing")).toThrow(CallNotFoundError);
  });
});

// ─── Chat, lifecycle and export ─────────────────────────────────────────────────

describe("CallManager chat", () => {
  it("rejects chat before the report is ready", async () => {
    const { manager } = setup();
    const callId = manager.createCall();

    await expect(manager.chat(callId, "How did it go?")).rejects.toThrow(
      `Cannot chat about call ${callId} in "pending" state. Expected state: "ready".`,
    );
  });

  it("answers follow-up questions on a READY call", async () => {
    const { manager } = setup();
    const { callId } = await manager.analyze(AUDIO);

    expect(await manager.chat(callId, "Why 6 for resolution?")).toBe("Because the refund was slow.");
    expect(manager.getCall(callId).conversation).toEqual([
      { role: "assistant", content: SCORING_REPLY },
      { role: "user", content: "Why 6 for resolution?" },
      { role: "assistant", content: "Because the refund was slow." },
    ]);
  });

  it("cancels queued chat turns when the call ends", async () => {
    const replies: Array<Deferred<string>> = [];
    const chatModel: LanguageModel = {
      name: "fake-model",
      generate: () => {
        const reply = createDeferred<string>();
        replies.push(reply);
        return reply.promise;
      },
    };
    const { manager } = setup({ chatModel });
    const { callId } = await manager.analyze(AUDIO);

    const first = manager.chat(callId, "first");
    const second = manager.chat(callId, "second");
    const secondOutcome = second.catch((err: unknown) => err);
    await vi.waitFor(() => expect(replies).toHaveLength(1));

    manager.endCall(callId);
    replies[0].resolve("first answer");

    expect(await first).toBe("first answer");
    expect(await secondOutcome).toBeInstanceOf(ChatCancelledError);
    expect(replies).toHaveLength(1);
    expect(() => manager.getCall(callId)).toThrow(CallNotFoundError);
  });

  it("lists every live call", async () => {
    const { manager } = setup();
    const a = manager.createCall();
    const { callId: b } = await manager.analyze(AUDIO);

    expect(manager.listCalls().map((c) => [c.id, c.state])).toEqual([
      [a, CallState.PENDING],
      [b, CallState.READY],
    ]);
  });

  it("exports nothing without an exporter and refuses calls without a report", async () => {
    const { manager } = setup();
    const pending = manager.createCall();
    const { callId } = await manager.analyze(AUDIO);

    expect(await manager.exportCall(callId)).toEqual([]);
    await expect(manager.exportCall(pending)).rejects.toThrow(`Call ${pending} has no report to export yet`);
  });
});

// ─── Rescoring ──────────────────────────────────────────────────────────────────

const REVISED_REPLY = "Communication: 9/10 Resolution: 7/10 Emotion Handling: 8/10. On reflection the call went well.";

describe("CallManager rescoring", () => {
  it("rescores with the previous report as prior analysis and restarts the conversation", async () => {
    const scoringModel = scriptedModel(SCORING_REPLY, REVISED_REPLY);
    const { manager, transcribe } = setup({ scoringModel });
    const { callId } = await manager.analyze(AUDIO);
    await manager.chat(callId, "Why 6 for resolution?");
    const events: Array<{ stage: PipelineStage; message?: string }> = [];
    manager.subscribe(callId, (event) => events.push({ stage: event.stage, message: event.message }));

    const result = await manager.rescoreCall(callId);

    expect(result.report.csi).toBe(8);
    expect(scoringModel.generate).toHaveBeenCalledTimes(2);
    expect(scoringModel.generate).toHaveBeenLastCalledWith(
      expect.stringContaining(`<Previous analysis>\n${SCORING_REPLY}\n</Previous analysis>`),
    );
    expect(transcribe).toHaveBeenCalledTimes(1);
    expect(events).toEqual([
      { stage: "scoring", message: undefined },
      { stage: "ready", message: "CSI 8" },
    ]);

    const call = manager.getCall(callId);
    expect(call.state).toBe(CallState.READY);
    expect(call.report?.narrative).toBe(REVISED_REPLY);
    expect(call.conversation).toEqual([{ role: "assistant", content: REVISED_REPLY }]);
  });

  it("keeps the previous report when rescoring fails", async () => {
    const { manager } = setup({ scoringModel: scriptedModel(SCORING_REPLY, new Error("rate limited")) });
    const { callId } = await manager.analyze(AUDIO);

    await expect(manager.rescoreCall(callId)).rejects.toThrow(
      new ModelUnavailableError("Scoring call to fake-model failed: rate limited"),
    );

    const call = manager.getCall(callId);
    expect(call.state).toBe(CallState.READY);
    expect(call.report?.csi).toBe(7);
    expect(call.lastError).toBeNull();
    expect(await manager.chat(callId, "Still there?")).toBe("Because the refund was slow.");
  });

  it("refuses chat while a rescore runs and a second concurrent rescore", async () => {
    const revision = createDeferred<string>();
    let calls = 0;
    const scoringModel: LanguageModel = {
      name: "fake-model",
      generate: async () => (calls++ === 0 ? SCORING_REPLY : revision.promise),
    };
    const { manager } = setup({ scoringModel });
    const { callId } = await manager.analyze(AUDIO);

    const rescore = manager.rescoreCall(callId);
    await expect(manager.rescoreCall(callId)).rejects.toThrow(`Call ${callId} is already being rescored`);
    await expect(manager.chat(callId, "Any news?")).rejects.toThrow(
      `Call ${callId} is being rescored; ask again once it is ready`,
    );

    revision.resolve(REVISED_REPLY);
    expect((await rescore).report.csi).toBe(8);
  });

  it("refuses to rescore while a follow-up question is in flight", async () => {
    const answer = createDeferred<string>();
    const { manager } = setup({ chatModel: { name: "fake-model", generate: () => answer.promise } });
    const { callId } = await manager.analyze(AUDIO);

    const question = manager.chat(callId, "Why 6?");
    await expect(manager.rescoreCall(callId)).rejects.toThrow(`Call ${callId} has follow-up questions in flight`);

    answer.resolve("Slow refund.");
    expect(await question).toBe("Slow refund.");
  });

  it("refuses calls without a report", async () => {
    const { manager } = setup();
    const callId = manager.createCall();

    await expect(manager.rescoreCall(callId)).rejects.toThrow(
      new InvalidCallStateError(`Cannot rescore call ${callId} in "pending" state. Expected state: "ready".`),
    );
  });
});

describe("formatEscalationBody", () => {
  it("falls back to a generic reason", () => {
    const body = formatEscalationBody(
      "call-1",
      { escalate: true, negativeRatio: 1, longestNegativeRun: 3, representativeSpeaker: "0" },
      [{ kind: "product", description: "Refund form rejects valid order numbers" }],
    );
    expect(body).toBe(
      "Call call-1 was flagged for supervisor attention.\n" +
        "Reason: negative tone threshold reached\n" +
        "\n" +
        "Supervisor review:\n" +
        "- [product] Refund form rejects valid order numbers",
    );
  });
});
