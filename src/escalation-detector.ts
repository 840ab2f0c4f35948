// Call Insight - Escalation Detector
//
// Pure predicate over annotated turns: decides whether the representative's
// side of the call warrants a supervisor notification. Dispatch is not done
// here; CallManager sends at most one notification per call.

import type { AnnotatedTurn, EmotionLabel, EscalationFlag } from "./types.js";
import { roundTo } from "./utils.js";

export interface EscalationConfig {
  /** Labels counted as negative. Default: ["anger"]. */
  negativeLabels: readonly EmotionLabel[];
  /** Escalate when the negative share of representative time reaches this. Default: 0.3. */
  negativeDurationRatio: number;
  /** Escalate on this many consecutive negative representative turns. Default: 3. */
  consecutiveNegativeTurns: number;
  /**
   * Speaker label of the representative. When unset, the speaker of the first
   * labelled turn is used, since the representative answers the call.
   */
  representativeSpeaker?: string;
}

export const DEFAULT_ESCALATION_CONFIG: EscalationConfig = {
  negativeLabels: ["anger"],
  negativeDurationRatio: 0.3,
  consecutiveNegativeTurns: 3,
};

export class EscalationDetector {
  private readonly config: EscalationConfig;
  private readonly negative: ReadonlySet<EmotionLabel>;

  constructor(config: Partial<EscalationConfig> = {}) {
    this.config = { ...DEFAULT_ESCALATION_CONFIG, ...config };
    if (!(this.config.negativeDurationRatio > 0 && this.config.negativeDurationRatio <= 1)) {
      throw new RangeError(
        `negativeDurationRatio must be in (0, 1], got ${this.config.negativeDurationRatio}`,
      );
    }
    if (!Number.isInteger(this.config.consecutiveNegativeTurns) || this.config.consecutiveNegativeTurns < 1) {
      throw new RangeError(
        `consecutiveNegativeTurns must be a positive integer, got ${this.config.consecutiveNegativeTurns}`,
      );
    }
    this.negative = new Set(this.config.negativeLabels);
  }

  /**
   * Resolve which speaker is the representative. Returns null when no turn
   * carries a speaker label, in which case every turn is attributed to the
   * representative.
   */
  resolveRepresentative(turns: readonly AnnotatedTurn[]): string | null {
    if (this.config.representativeSpeaker !== undefined) {
      return this.config.representativeSpeaker;
    }
    const first = turns.find((t) => t.speaker !== undefined);
    return first?.speaker ?? null;
  }

  detect(turns: readonly AnnotatedTurn[]): EscalationFlag {
    const representative = this.resolveRepresentative(turns);
    const attributed =
      representative === null ? turns : turns.filter((t) => t.speaker === representative);

    if (attributed.length === 0) {
      return {
        escalate: false,
        negativeRatio: 0,
        longestNegativeRun: 0,
        representativeSpeaker: representative,
      };
    }

    let totalDuration = 0;
    let negativeDuration = 0;
    let negativeCount = 0;
    let run = 0;
    let longestRun = 0;

    for (const turn of attributed) {
      const duration = turn.end - turn.start;
      totalDuration += duration;
      if (this.negative.has(turn.dominantLabel)) {
        negativeDuration += duration;
        negativeCount++;
        run++;
        longestRun = Math.max(longestRun, run);
      } else {
        run = 0;
      }
    }

    const ratio =
      totalDuration > 0 ? negativeDuration / totalDuration : negativeCount / attributed.length;
    const negativeRatio = roundTo(ratio, 4);

    const reasons: string[] = [];
    if (negativeCount > 0 && ratio >= this.config.negativeDurationRatio) {
      reasons.push(
        `${Math.round(ratio * 100)}% of the representative's speaking time carried a negative tone ` +
          `(threshold ${Math.round(this.config.negativeDurationRatio * 100)}%)`,
      );
    }
    if (longestRun >= this.config.consecutiveNegativeTurns) {
      reasons.push(
        `${longestRun} consecutive representative turns carried a negative tone ` +
          `(threshold ${this.config.consecutiveNegativeTurns})`,
      );
    }

    const flag: EscalationFlag = {
      escalate: reasons.length > 0,
      negativeRatio,
      longestNegativeRun: longestRun,
      representativeSpeaker: representative,
    };
    if (reasons.length > 0) {
      flag.reason = reasons.join("; ");
    }
    return flag;
  }
}
