// Call Insight - Supervisor Review
//
// For escalated calls the model is asked, as a supervisor, to describe what
// went wrong. Its answer uses directives enclosed in triple asterisks:
//   ***official("The representative interrupted the customer ...")***
//   ***product("The refund form rejects valid order numbers ...")***
// Findings only enrich the escalation notification; they never gate it.

import type { AnnotatedTurn, ReviewFinding, ReviewFindingKind } from "./types.js";
import type { LanguageModel } from "./language-model.js";
import { ModelUnavailableError, errorMessage } from "./errors.js";
import { buildReviewPrompt, extractAssistantReply } from "./prompt-builder.js";

const DIRECTIVE_PATTERN = /\*{3}([\s\S]*?)\*{3}/g;
const DIRECTIVE_BODY = /^\s*(\w+)\(\s*"([\s\S]*)"\s*\)\s*$/;

const FINDING_KINDS: ReadonlySet<string> = new Set<ReviewFindingKind>(["official", "product"]);

function isFindingKind(kind: string): kind is ReviewFindingKind {
  return FINDING_KINDS.has(kind);
}

/**
 * Extracts findings from a review response. Directives of unknown kind,
 * `none()` and malformed bodies are skipped.
 */
export function parseReviewDirectives(text: string): ReviewFinding[] {
  const findings: ReviewFinding[] = [];
  for (const match of text.matchAll(DIRECTIVE_PATTERN)) {
    const body = DIRECTIVE_BODY.exec(match[1]);
    if (!body) continue;
    const kind = body[1].toLowerCase();
    const description = body[2].trim();
    if (isFindingKind(kind) && description.length > 0) {
      findings.push({ kind, description });
    }
  }
  return findings;
}

export class SupervisorReview {
  constructor(private readonly model: LanguageModel) {}

  /**
   * @throws ModelUnavailableError if the model call fails.
   */
  async review(turns: readonly AnnotatedTurn[]): Promise<ReviewFinding[]> {
    let raw: string;
    try {
      raw = await this.model.generate(buildReviewPrompt(turns));
    } catch (err) {
      if (err instanceof ModelUnavailableError) throw err;
      throw new ModelUnavailableError(`Supervisor review failed: ${errorMessage(err)}`, { cause: err });
    }
    return parseReviewDirectives(extractAssistantReply(raw));
  }
}
