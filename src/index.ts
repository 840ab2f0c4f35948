// Call Insight - Entry point
// Wires up all pipeline dependencies and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { loadConfig, type AppConfig } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { createAppServer } from "./server.js";
import { CallManager } from "./call-manager.js";
import { DeepgramTranscriber, OpenAITranscriber, type Transcriber } from "./transcription-engine.js";
import type { DeepgramPrerecordedClient, OpenAITranscriptionClient } from "./transcription-engine.js";
import { HttpEmotionExtractor } from "./emotion-extractor.js";
import { OpenAIChatModel } from "./language-model.js";
import type { OpenAIClient } from "./language-model.js";
import { ScoringSession } from "./scoring-session.js";
import { ChatOrchestrator } from "./chat-orchestrator.js";
import { EscalationDetector } from "./escalation-detector.js";
import { SupervisorReview } from "./supervisor-review.js";
import { LogNotifier, WebhookNotifier, type Notifier } from "./notifier.js";
import { ReportExporter } from "./report-export.js";

export const APP_NAME = "Call Insight";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    logFatal(`${err.message}. Add it to your .env file.`);
  } else {
    logFatal(`Failed to load configuration: ${errorMessage(err)}`);
  }
  process.exit(1);
}

logInit("Configuration loaded");

// ─── Initialize API clients ─────────────────────────────────────────────────────

logInit("Creating OpenAI client...");
const openaiClient = new OpenAI({ apiKey: config.openaiApiKey });

let transcriber: Transcriber;
if (config.transcriptionProvider === "deepgram" && config.deepgramApiKey) {
  logInit("Initializing Deepgram transcriber (pre-recorded, diarized)...");
  const deepgramClient = createDeepgramClient(config.deepgramApiKey);
  transcriber = new DeepgramTranscriber(deepgramClient as unknown as DeepgramPrerecordedClient, {
    timeoutMs: config.transcriptionTimeoutMs,
    language: config.transcriptionLanguage,
  });
} else {
  logInit("Initializing OpenAI transcriber (whisper-1)...");
  transcriber = new OpenAITranscriber(openaiClient as unknown as OpenAITranscriptionClient, {
    timeoutMs: config.transcriptionTimeoutMs,
    language: config.transcriptionLanguage,
  });
}

// ─── Initialize pipeline components ─────────────────────────────────────────────

logInit(`Initializing emotion extractor (${config.emotionServiceUrl})...`);
const emotionExtractor = new HttpEmotionExtractor(config.emotionServiceUrl, {
  timeoutMs: config.emotionTimeoutMs,
});

logInit(`Initializing language model (${config.chatModel})...`);
const model = new OpenAIChatModel(openaiClient as unknown as OpenAIClient, {
  model: config.chatModel,
  temperature: config.temperature,
  timeoutMs: config.modelTimeoutMs,
});

const notifier: Notifier = config.notification.webhookUrl
  ? new WebhookNotifier(config.notification.webhookUrl, { timeoutMs: config.notification.timeoutMs })
  : new LogNotifier();
logInit(
  config.notification.webhookUrl
    ? `Escalations notify ${config.notification.recipient} via webhook`
    : "No NOTIFY_WEBHOOK_URL set; escalations are logged only",
);

// ─── Create CallManager with all dependencies ───────────────────────────────────

logInit("Wiring CallManager pipeline...");
const callManager = new CallManager({
  transcriber,
  emotionExtractor,
  scoringSession: new ScoringSession(model, { categories: config.categories }),
  chatOrchestrator: new ChatOrchestrator(model, { maxPromptChars: config.maxChatPromptChars }),
  notifier,
  recipient: config.notification.recipient,
  escalationDetector: new EscalationDetector(config.escalation),
  supervisorReview: config.supervisorReview ? new SupervisorReview(model) : undefined,
  reportExporter: new ReportExporter(config.outputDir),
});

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ callManager });

server
  .listen(config.port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit(`Pipeline: ${config.transcriptionProvider} transcription + emotion service → align → escalate → ${config.chatModel}`);
    logInit("Ready for connections");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${errorMessage(err)}`);
    process.exit(1);
  });
