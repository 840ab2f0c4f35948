// Call Insight - Chat Orchestrator
// Follow-up question loop over a call's ConversationBuffer.
//
// Turns on one buffer run strictly one after another: each prompt depends on
// every earlier exchange having been appended. A buffer only ever gains a
// user turn together with the assistant answer to it.

import type { ConversationBuffer } from "./conversation-buffer.js";
import type { LanguageModel } from "./language-model.js";
import {
  ChatCancelledError,
  InvalidCallStateError,
  InvalidRequestError,
  MalformedModelOutputError,
  ModelUnavailableError,
  errorMessage,
} from "./errors.js";
import { buildChatPrompt, extractAssistantReply, type ChatPromptOptions } from "./prompt-builder.js";
import { createLogger, type Logger } from "./logger.js";
import { SerialQueue } from "./utils/serial-queue.js";

/** Longest accepted query, in characters. */
export const MAX_QUERY_CHARS = 4000;

export interface ChatOrchestratorOptions extends ChatPromptOptions {
  logger?: Logger;
}

export class ChatOrchestrator {
  private readonly model: LanguageModel;
  private readonly promptOptions: ChatPromptOptions;
  private readonly logger: Logger;
  private readonly queues = new WeakMap<ConversationBuffer, SerialQueue>();

  constructor(model: LanguageModel, options: ChatOrchestratorOptions = {}) {
    const { logger, ...promptOptions } = options;
    this.model = model;
    this.promptOptions = promptOptions;
    this.logger = logger ?? createLogger("ChatOrchestrator");
  }

  /** Number of asks queued or running against `buffer`. */
  pending(buffer: ConversationBuffer): number {
    return this.queues.get(buffer)?.size ?? 0;
  }

  /**
   * Ask a follow-up question about the call behind `buffer`.
   *
   * Queued behind any in-flight ask for the same buffer. On success the query
   * and the answer are appended, in that order; on any failure the buffer is
   * left unchanged.
   *
   * @throws InvalidRequestError for an empty or oversized query.
   * @throws ChatCancelledError if the buffer was closed before this turn started.
   * @throws ModelUnavailableError if the model call fails.
   * @throws MalformedModelOutputError if the model returns an empty answer.
   */
  ask(buffer: ConversationBuffer, query: string): Promise<string> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      return Promise.reject(new InvalidRequestError("Query must not be empty"));
    }
    if (trimmed.length > MAX_QUERY_CHARS) {
      return Promise.reject(
        new InvalidRequestError(`Query is ${trimmed.length} characters; the limit is ${MAX_QUERY_CHARS}`),
      );
    }

    let queue = this.queues.get(buffer);
    if (!queue) {
      queue = new SerialQueue();
      this.queues.set(buffer, queue);
    }

    return queue.run(() => this.runTurn(buffer, trimmed));
  }

  private async runTurn(buffer: ConversationBuffer, query: string): Promise<string> {
    if (buffer.closed) {
      throw new ChatCancelledError(`Call ${buffer.callId} has ended; chat turn cancelled`);
    }
    if (!buffer.seeded) {
      throw new InvalidCallStateError(`Call ${buffer.callId} has no report to discuss yet`);
    }

    const prompt = buildChatPrompt(buffer, query, this.promptOptions);

    let raw: string;
    try {
      raw = await this.model.generate(prompt);
    } catch (err) {
      this.logger.error(`Chat turn failed for call ${buffer.callId}: ${errorMessage(err)}`);
      if (err instanceof ModelUnavailableError) throw err;
      throw new ModelUnavailableError(`Chat call to ${this.model.name} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const answer = extractAssistantReply(raw);
    if (answer.length === 0) {
      this.logger.warn(`Empty chat answer for call ${buffer.callId}; turn not recorded`);
      throw new MalformedModelOutputError("Language model returned an empty answer");
    }

    buffer.append("user", query);
    buffer.append("assistant", answer);
    this.logger.info(`Chat turn recorded for call ${buffer.callId} (buffer length ${buffer.length})`);
    return answer;
  }
}
