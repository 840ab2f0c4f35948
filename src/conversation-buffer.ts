// Call Insight - Conversation Buffer
// Per-call, append-only dialogue log backing follow-up questions.
//
// The seed turn (the report narrative, as an assistant turn) is written
// exactly once before any chat turn. The rendered call transcript is kept
// alongside as `context`; it is prompt material, not a dialogue turn.

import type { ConversationRole, ConversationTurn, Report } from "./types.js";
import { InvalidCallStateError } from "./errors.js";

export class ConversationBuffer {
  private readonly turns: ConversationTurn[] = [];
  private _context = "";
  private _closed = false;

  constructor(readonly callId: string) {}

  get seeded(): boolean {
    return this.turns.length > 0;
  }

  get closed(): boolean {
    return this._closed;
  }

  get length(): number {
    return this.turns.length;
  }

  /** Rendered call transcript the seed report was produced from. */
  get context(): string {
    return this._context;
  }

  /**
   * Seeds the buffer with the report narrative.
   * @throws InvalidCallStateError if already seeded.
   */
  seed(report: Report, context = ""): void {
    if (this.seeded) {
      throw new InvalidCallStateError(`Conversation for call ${this.callId} is already seeded`);
    }
    this._context = context;
    this.turns.push({ role: "assistant", content: report.narrative });
  }

  /**
   * Appends a turn after the seed.
   * @throws InvalidCallStateError if the buffer has not been seeded.
   */
  append(role: ConversationRole, content: string): void {
    if (!this.seeded) {
      throw new InvalidCallStateError(
        `Conversation for call ${this.callId} must be seeded before chat turns are added`,
      );
    }
    this.turns.push({ role, content });
  }

  /** Ordered copy of the buffer; index 0 is the seed turn. */
  contents(): ConversationTurn[] {
    return this.turns.map((t) => ({ ...t }));
  }

  /** Marks the call's chat lifetime as over. Queued turns will not start. */
  close(): void {
    this._closed = true;
  }
}
