// Call Insight - Prompt Builder
// Deterministic prompt construction for scoring, follow-up chat and
// supervisor review.
//
// All prompts use the same role-block template:
//   ### System:\n...\n### User:\n...\n### Assistant:\n
// and end with an open assistant header for the model to complete.

import type { AnnotatedTurn, ConversationRole, Report } from "./types.js";
import type { ConversationBuffer } from "./conversation-buffer.js";
import { InvalidCallStateError } from "./errors.js";
import { formatTimestamp, speakerLabel } from "./utils.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_CATEGORIES = ["Communication", "Resolution", "Emotion Handling"] as const;

export interface ScoringInstructions {
  system: string;
  task: string;
}

export function defaultScoringInstructions(
  categories: readonly string[] = DEFAULT_CATEGORIES,
): ScoringInstructions {
  return {
    system: "You are a customer service expert.",
    task:
      "I will provide you with the transcript of a customer service call together with the tone of voice " +
      "detected for each line (anger, happy, neutral or sad). Analyse both and rate the call out of 10 on each " +
      `of these categories: ${categories.join(", ")}. Write every rating as "Category: score/10". ` +
      "Then give the overall Customer Satisfaction Index as the average of the ratings, followed by a short " +
      "explanation of what went well and what the representative should improve.",
  };
}

export const DEFAULT_SCORING_EXAMPLE =
  "Communication: 8.5/10 Resolution: 8/10 Emotion Handling: 7/10. So, the overall Customer Satisfaction " +
  "Index can be calculated as the average of these three scores, which is approximately 7.8/10.";

export const DEFAULT_CHAT_SYSTEM_PROMPT =
  "You are a customer service expert who receives the transcript of a customer call and writes a report on it. " +
  "Afterwards you answer questions about the call and how the service could improve. " +
  "The user asking questions is the customer service official from the call.";

export const REVIEW_SYSTEM_PROMPT =
  "You are the customer service supervisor. Read the call transcript and decide whether there is an issue. " +
  'If there is an issue with the product, write ***product("the problem description")***. ' +
  'If there is an issue with the customer service official, write ***official("the problem description")***. ' +
  "Every directive must be enclosed in three asterisks before and after. The problem description inside the " +
  "parentheses must explain in detail what the problem was and why it happened. " +
  "If there is no issue, write ***none()***.";

/** Default upper bound on chat prompt size, in characters. */
export const DEFAULT_MAX_CHAT_PROMPT_CHARS = 24_000;

// ─── Template helpers ───────────────────────────────────────────────────────────

const ROLE_HEADERS: Record<ConversationRole, string> = {
  system: "System",
  user: "User",
  assistant: "Assistant",
};

const ASSISTANT_HEADER = "### Assistant:";
const USER_HEADER = "### User:";

export function renderBlock(role: ConversationRole, content: string): string {
  return `### ${ROLE_HEADERS[role]}:\n${content}\n`;
}

/**
 * Renders turns as alternating transcript/tone lines:
 *   [00:05] Speaker 1: This is ridiculous
 *   Tone: anger
 */
export function renderTranscript(turns: readonly AnnotatedTurn[]): string {
  if (turns.length === 0) {
    return "(no speech detected)";
  }
  const lines: string[] = [];
  for (const turn of turns) {
    const who = turn.speaker !== undefined ? `${speakerLabel(turn.speaker)}: ` : "";
    lines.push(`${formatTimestamp(turn.start)} ${who}${turn.text}`);
    lines.push(`Tone: ${turn.dominantLabel}`);
  }
  return lines.join("\n");
}

// ─── Scoring ────────────────────────────────────────────────────────────────────

export function buildScoringPrompt(
  turns: readonly AnnotatedTurn[],
  instructions: ScoringInstructions,
  example: string,
  priorReport?: Report | null,
): string {
  const user: string[] = [instructions.task];
  user.push(`<Transcript>\n${renderTranscript(turns)}\n</Transcript>`);
  if (priorReport) {
    user.push(
      `<Previous analysis>\n${priorReport.narrative}\n</Previous analysis>\n` +
        "Revise the previous analysis where the transcript supports a different rating.",
    );
  }
  if (example) {
    user.push(`<Example>\n${example}\n</Example>`);
  }

  return renderBlock("system", instructions.system) + renderBlock("user", user.join("\n")) + `${ASSISTANT_HEADER}\n`;
}

// ─── Chat ───────────────────────────────────────────────────────────────────────

export interface ChatPromptOptions {
  systemPrompt?: string;
  maxPromptChars?: number;
}

/** Groups post-seed turns into exchanges, each starting at a user turn. */
function groupExchanges(blocks: Array<{ role: ConversationRole; text: string }>): string[] {
  const exchanges: string[] = [];
  for (const block of blocks) {
    if (block.role === "user" || exchanges.length === 0) {
      exchanges.push(block.text);
    } else {
      exchanges[exchanges.length - 1] += block.text;
    }
  }
  return exchanges;
}

/**
 * Builds the follow-up prompt: system preamble, call transcript, seed report,
 * prior exchanges, then the new query.
 *
 * When the result would exceed `maxPromptChars`, whole exchanges are dropped
 * oldest first. The preamble, transcript context, seed report and query are
 * always kept, even if they alone exceed the limit.
 *
 * @throws InvalidCallStateError if the buffer has not been seeded.
 */
export function buildChatPrompt(
  buffer: ConversationBuffer,
  query: string,
  options: ChatPromptOptions = {},
): string {
  const { systemPrompt = DEFAULT_CHAT_SYSTEM_PROMPT, maxPromptChars = DEFAULT_MAX_CHAT_PROMPT_CHARS } = options;

  const [seed, ...history] = buffer.contents();
  if (!seed) {
    throw new InvalidCallStateError(`Conversation for call ${buffer.callId} has not been seeded`);
  }

  let head = renderBlock("system", systemPrompt);
  if (buffer.context) {
    head += renderBlock("user", buffer.context);
  }
  head += renderBlock(seed.role, seed.content);
  const tail = renderBlock("user", query) + `${ASSISTANT_HEADER}\n`;

  const exchanges = groupExchanges(history.map((t) => ({ role: t.role, text: renderBlock(t.role, t.content) })));

  let remaining = maxPromptChars - head.length - tail.length;
  let keepFrom = exchanges.length;
  while (keepFrom > 0 && exchanges[keepFrom - 1].length <= remaining) {
    remaining -= exchanges[keepFrom - 1].length;
    keepFrom--;
  }

  return head + exchanges.slice(keepFrom).join("") + tail;
}

// ─── Supervisor review ──────────────────────────────────────────────────────────

export function buildReviewPrompt(turns: readonly AnnotatedTurn[]): string {
  return (
    renderBlock("system", REVIEW_SYSTEM_PROMPT) +
    renderBlock("user", `<Transcript>\n${renderTranscript(turns)}\n</Transcript>`) +
    `${ASSISTANT_HEADER}\n`
  );
}

// ─── Response handling ──────────────────────────────────────────────────────────

/**
 * Extracts the assistant's reply from raw model output. Completion-style
 * models may echo the prompt, and some continue the dialogue on their own;
 * keep the text after the last assistant header, up to any user header.
 */
export function extractAssistantReply(raw: string): string {
  const at = raw.lastIndexOf(ASSISTANT_HEADER);
  let reply = at >= 0 ? raw.slice(at + ASSISTANT_HEADER.length) : raw;
  const next = reply.indexOf(USER_HEADER);
  if (next >= 0) {
    reply = reply.slice(0, next);
  }
  return reply.trim();
}
