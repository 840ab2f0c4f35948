// Call Insight - Language model collaborator
//
// The pipeline only needs `generate(prompt) → text`. The OpenAI adapter sends
// the whole role-block prompt as one user message and maps every transport
// failure or timeout to ModelUnavailableError.

import { ModelUnavailableError, errorMessage } from "./errors.js";

export interface LanguageModel {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Array<{ role: "system" | "user" | "assistant"; content: string }>;
          temperature?: number;
          max_tokens?: number;
        },
        options?: { timeout?: number; maxRetries?: number },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface OpenAIChatModelOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Request timeout handed to the SDK; 0 disables it. */
  timeoutMs?: number;
}

export class OpenAIChatModel implements LanguageModel {
  private readonly client: OpenAIClient;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;

  constructor(client: OpenAIClient, options: OpenAIChatModelOptions = {}) {
    this.client = client;
    this.model = options.model ?? "gpt-4o";
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 1500;
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  get name(): string {
    return this.model;
  }

  async generate(prompt: string): Promise<string> {
    let response: Awaited<ReturnType<OpenAIClient["chat"]["completions"]["create"]>>;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        },
        // The SDK aborts the request at the timeout. Retries belong to the caller.
        { timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined, maxRetries: 0 },
      );
    } catch (err) {
      throw new ModelUnavailableError(`Language model ${this.model} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    return response.choices[0]?.message.content ?? "";
  }
}
