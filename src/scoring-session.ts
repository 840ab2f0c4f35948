// Call Insight - Scoring Session
// One language-model call per analyzed call, turned into a Report.
//
// Parsing policy: scores are matched per configured category with a fixed
// "Category: score" pattern. A response with no parseable category fails
// closed with MalformedModelOutputError; otherwise the CSI is the mean of
// whichever categories matched.

import type { Report } from "./types.js";
import type { LanguageModel } from "./language-model.js";
import { MalformedModelOutputError, ModelUnavailableError, errorMessage } from "./errors.js";
import { DEFAULT_CATEGORIES, extractAssistantReply } from "./prompt-builder.js";
import { createLogger, type Logger } from "./logger.js";
import { escapeRegExp, mean, roundTo } from "./utils.js";

export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

// ─── Parsing ────────────────────────────────────────────────────────────────────

export type ScoreParseResult =
  | {
      ok: true;
      scores: Record<string, number>;
      missingCategories: string[];
      issues: string[];
    }
  | {
      ok: false;
      issues: string[];
    };

/**
 * "Emotion Handling" → /\bEmotion\s+Handling[*_]*\s*[:\-–]\s*[*_]*\s*(\d+(?:\.\d+)?)(\s*\/\s*(\d+(?:\.\d+)?))?/i
 * Tolerates markdown emphasis around the name and an optional "/10" scale.
 */
function categoryPattern(category: string): RegExp {
  const name = category.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
  return new RegExp(
    `\\b${name}[*_]*\\s*[:\\-–]\\s*[*_]*\\s*(\\d+(?:\\.\\d+)?)(?:\\s*\\/\\s*(\\d+(?:\\.\\d+)?))?`,
    "i",
  );
}

/**
 * Extract category scores from a model response. Never throws.
 *
 * For each category the first match wins. A score on a scale other than 10,
 * or outside [0, 10], is reported as an issue and the category is treated as
 * missing.
 */
export function parseCategoryScores(text: string, categories: readonly string[]): ScoreParseResult {
  const scores: Record<string, number> = {};
  const missingCategories: string[] = [];
  const issues: string[] = [];

  for (const category of categories) {
    const match = categoryPattern(category).exec(text);
    if (!match) {
      missingCategories.push(category);
      issues.push(`No score found for "${category}"`);
      continue;
    }

    const value = parseFloat(match[1]);
    const scale = match[2] !== undefined ? parseFloat(match[2]) : MAX_SCORE;
    if (scale !== MAX_SCORE) {
      missingCategories.push(category);
      issues.push(`Score for "${category}" is on a /${match[2]} scale, expected /${MAX_SCORE}`);
      continue;
    }
    if (!Number.isFinite(value) || value < MIN_SCORE || value > MAX_SCORE) {
      missingCategories.push(category);
      issues.push(`Score for "${category}" is out of range: ${match[1]}`);
      continue;
    }

    scores[category] = value;
  }

  if (Object.keys(scores).length === 0) {
    return { ok: false, issues };
  }
  return { ok: true, scores, missingCategories, issues };
}

/** CSI: arithmetic mean of the category scores, rounded to one decimal place. */
export function computeCsi(scores: Readonly<Record<string, number>>): number {
  return roundTo(mean(Object.values(scores)), 1);
}

// ─── ScoringSession ─────────────────────────────────────────────────────────────

export interface ScoringSessionOptions {
  categories?: readonly string[];
  logger?: Logger;
}

export class ScoringSession {
  private readonly model: LanguageModel;
  private readonly categories: readonly string[];
  private readonly logger: Logger;

  constructor(model: LanguageModel, options: ScoringSessionOptions = {}) {
    this.model = model;
    this.categories = options.categories ?? DEFAULT_CATEGORIES;
    this.logger = options.logger ?? createLogger("ScoringSession");
    if (this.categories.length === 0) {
      throw new RangeError("ScoringSession needs at least one category");
    }
  }

  get scoredCategories(): readonly string[] {
    return this.categories;
  }

  /**
   * Invoke the model once and parse its response into a Report.
   *
   * @throws ModelUnavailableError if the model call fails.
   * @throws MalformedModelOutputError if no category score can be parsed.
   */
  async score(prompt: string): Promise<Report> {
    let raw: string;
    try {
      raw = await this.model.generate(prompt);
    } catch (err) {
      if (err instanceof ModelUnavailableError) throw err;
      throw new ModelUnavailableError(`Scoring call to ${this.model.name} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const narrative = extractAssistantReply(raw);
    const parsed = parseCategoryScores(narrative, this.categories);

    if (!parsed.ok) {
      this.logger.warn(`Unparseable scoring response from ${this.model.name}: ${parsed.issues.join("; ")}`);
      throw new MalformedModelOutputError(
        `Scoring response contained no parseable category scores (expected one of: ${this.categories.join(", ")})`,
        parsed.issues,
      );
    }

    if (parsed.missingCategories.length > 0) {
      this.logger.warn(`Partial scoring response; averaging without: ${parsed.missingCategories.join(", ")}`);
    }

    const csi = computeCsi(parsed.scores);
    this.logger.info(
      `Scored call: ${Object.entries(parsed.scores)
        .map(([k, v]) => `${k}=${v}`)
        .join(", ")} → CSI ${csi}`,
    );

    return Object.freeze({
      scores: Object.freeze({ ...parsed.scores }),
      csi,
      narrative,
      missingCategories: Object.freeze([...parsed.missingCategories]),
    });
  }
}
