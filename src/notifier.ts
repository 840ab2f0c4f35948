// Call Insight - Notification collaborator
//
// Delivery only. Deciding whether to notify, and making sure a call is
// notified at most once, is CallManager's job.

import { NotificationFailedError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { defaultHttpClient, httpErrorMessage, type HttpClient } from "./utils/http.js";

export interface Notifier {
  /** @throws NotificationFailedError when the message could not be delivered. */
  send(recipient: string, subject: string, body: string): Promise<void>;
}

export interface WebhookNotifierOptions {
  timeoutMs?: number;
  /** Extra request headers, e.g. an authorization token for the relay. */
  headers?: Record<string, string>;
  httpClient?: HttpClient;
}

/**
 * Posts `{ to, subject, text }` as JSON to a mail or chat relay webhook.
 * A non-2xx answer, a network error or the axios timeout fails the send.
 */
export class WebhookNotifier implements Notifier {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly http: HttpClient;

  constructor(url: string, options: WebhookNotifierOptions = {}) {
    this.url = url;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.headers = options.headers ?? {};
    this.http = options.httpClient ?? defaultHttpClient;
  }

  async send(recipient: string, subject: string, body: string): Promise<void> {
    try {
      await this.http.post(
        this.url,
        { to: recipient, subject, text: body },
        { timeout: this.timeoutMs, headers: { "Content-Type": "application/json", ...this.headers } },
      );
    } catch (err) {
      throw new NotificationFailedError(`Notification to ${recipient} failed: ${httpErrorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

/**
 * Writes notifications to the log. Used when no webhook is configured so
 * escalations remain visible in the service output.
 */
export class LogNotifier implements Notifier {
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger("Notifier")) {
    this.logger = logger;
  }

  async send(recipient: string, subject: string, body: string): Promise<void> {
    this.logger.warn(`Escalation for ${recipient}: ${subject}\n${body}`);
  }
}
