// Call Insight - Configuration
// Typed settings read from the environment. `.env` is loaded by the entry
// point through dotenv before this runs.

import { ConfigError } from "./errors.js";
import { EMOTION_LABELS, type EmotionLabel } from "./types.js";
import { DEFAULT_CATEGORIES, DEFAULT_MAX_CHAT_PROMPT_CHARS } from "./prompt-builder.js";
import { DEFAULT_ESCALATION_CONFIG, type EscalationConfig } from "./escalation-detector.js";

export type TranscriptionProvider = "openai" | "deepgram";

export interface AppConfig {
  port: number;

  openaiApiKey: string;
  chatModel: string;
  temperature: number;
  modelTimeoutMs: number;

  transcriptionProvider: TranscriptionProvider;
  deepgramApiKey: string | null;
  transcriptionLanguage: string;
  transcriptionTimeoutMs: number;

  emotionServiceUrl: string;
  emotionTimeoutMs: number;

  notification: {
    webhookUrl: string | null;
    recipient: string;
    timeoutMs: number;
  };
  /** Ask the model for a supervisor review of escalated calls. */
  supervisorReview: boolean;

  escalation: EscalationConfig;
  categories: string[];
  maxChatPromptChars: number;
  outputDir: string;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key]?.trim() || defaultValue;
  if (!value) {
    throw new ConfigError(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getOptionalEnvVar(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function getEnvVarNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key]?.trim();
  if (!value) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a number, got "${value}"`);
  }
  return parsed;
}

function getEnvVarBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key]?.trim();
  if (!value) {
    return defaultValue;
  }
  return value.toLowerCase() === "true";
}

function getEnvVarList(env: Env, key: string): string[] | null {
  const value = env[key]?.trim();
  if (!value) {
    return null;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function isEmotionLabel(value: string): value is EmotionLabel {
  return EMOTION_LABELS.some((label) => label === value);
}

function parseNegativeLabels(env: Env): EmotionLabel[] {
  const raw = getEnvVarList(env, "ESCALATION_NEGATIVE_LABELS");
  if (!raw) {
    return [...DEFAULT_ESCALATION_CONFIG.negativeLabels];
  }
  return raw.map((label) => {
    const normalized = label.toLowerCase();
    if (!isEmotionLabel(normalized)) {
      throw new ConfigError(
        `ESCALATION_NEGATIVE_LABELS contains unknown label "${label}" (expected: ${EMOTION_LABELS.join(", ")})`,
      );
    }
    return normalized;
  });
}

function parseProvider(env: Env): TranscriptionProvider {
  const provider = getEnvVar(env, "TRANSCRIPTION_PROVIDER", "openai").toLowerCase();
  if (provider !== "openai" && provider !== "deepgram") {
    throw new ConfigError(`TRANSCRIPTION_PROVIDER must be "openai" or "deepgram", got "${provider}"`);
  }
  return provider;
}

function requireRange(key: string, value: number, min: number, max: number): number {
  if (value < min || value > max) {
    throw new ConfigError(`${key} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function requirePositiveInteger(key: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${key} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Reads and validates configuration.
 * @throws ConfigError on a missing required value or a malformed one.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const transcriptionProvider = parseProvider(env);
  const deepgramApiKey =
    transcriptionProvider === "deepgram"
      ? getEnvVar(env, "DEEPGRAM_API_KEY")
      : getOptionalEnvVar(env, "DEEPGRAM_API_KEY");

  const negativeDurationRatio = getEnvVarNumber(
    env,
    "ESCALATION_NEGATIVE_RATIO",
    DEFAULT_ESCALATION_CONFIG.negativeDurationRatio,
  );
  if (!(negativeDurationRatio > 0 && negativeDurationRatio <= 1)) {
    throw new ConfigError(`ESCALATION_NEGATIVE_RATIO must be in (0, 1], got ${negativeDurationRatio}`);
  }

  const escalation: EscalationConfig = {
    negativeLabels: parseNegativeLabels(env),
    negativeDurationRatio,
    consecutiveNegativeTurns: requirePositiveInteger(
      "ESCALATION_CONSECUTIVE_TURNS",
      getEnvVarNumber(env, "ESCALATION_CONSECUTIVE_TURNS", DEFAULT_ESCALATION_CONFIG.consecutiveNegativeTurns),
    ),
  };
  const representativeSpeaker = getOptionalEnvVar(env, "REPRESENTATIVE_SPEAKER");
  if (representativeSpeaker !== null) {
    escalation.representativeSpeaker = representativeSpeaker;
  }

  return {
    port: requireRange("PORT", getEnvVarNumber(env, "PORT", 3000), 0, 65535),

    openaiApiKey: getEnvVar(env, "OPENAI_API_KEY"),
    chatModel: getEnvVar(env, "CHAT_MODEL", "gpt-4o"),
    temperature: requireRange("CHAT_TEMPERATURE", getEnvVarNumber(env, "CHAT_TEMPERATURE", 0.7), 0, 2),
    modelTimeoutMs: getEnvVarNumber(env, "MODEL_TIMEOUT_MS", 60_000),

    transcriptionProvider,
    deepgramApiKey,
    transcriptionLanguage: getEnvVar(env, "TRANSCRIPTION_LANGUAGE", "en"),
    transcriptionTimeoutMs: getEnvVarNumber(env, "TRANSCRIPTION_TIMEOUT_MS", 120_000),

    emotionServiceUrl: getEnvVar(env, "EMOTION_SERVICE_URL"),
    emotionTimeoutMs: getEnvVarNumber(env, "EMOTION_TIMEOUT_MS", 120_000),

    notification: {
      webhookUrl: getOptionalEnvVar(env, "NOTIFY_WEBHOOK_URL"),
      recipient: getEnvVar(env, "ESCALATION_RECIPIENT", "supervisor@example.com"),
      timeoutMs: getEnvVarNumber(env, "NOTIFY_TIMEOUT_MS", 10_000),
    },
    supervisorReview: getEnvVarBoolean(env, "SUPERVISOR_REVIEW", true),

    escalation,
    categories: getEnvVarList(env, "SCORING_CATEGORIES") ?? [...DEFAULT_CATEGORIES],
    maxChatPromptChars: requirePositiveInteger(
      "MAX_CHAT_PROMPT_CHARS",
      getEnvVarNumber(env, "MAX_CHAT_PROMPT_CHARS", DEFAULT_MAX_CHAT_PROMPT_CHARS),
    ),
    outputDir: getEnvVar(env, "OUTPUT_DIR", "output"),
  };
}
