// Call Insight - HTTP API and WebSocket Handler
//
// REST routes submit calls, read results and ask follow-up questions; the
// WebSocket channel streams pipeline stage events and answers chat messages.
//
// Privacy: audio is held in memory for the duration of one request and never
//          written to disk. Call data lives in server memory only.

import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { CallManager } from "./call-manager.js";
import type { ClientMessage, ServerMessage } from "./types.js";
import { InvalidRequestError, errorMessage, isPipelineError, type PipelineErrorKind } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Largest accepted audio upload. */
const DEFAULT_MAX_AUDIO_BYTES = "50mb";

const STATUS_BY_KIND: Record<PipelineErrorKind, number> = {
  InvalidRequest: 400,
  InvalidSegment: 422,
  TranscriptionFailed: 502,
  EmotionExtractionFailed: 502,
  MalformedModelOutput: 502,
  NotificationFailed: 502,
  ModelUnavailable: 503,
  CallNotFound: 404,
  InvalidState: 409,
  Cancelled: 409,
};

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  callManager: CallManager;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Upload size limit in a form body-parser accepts, e.g. "50mb". */
  maxAudioBytes?: string | number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  callManager: CallManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { callManager, logger = createLogger("Server"), maxAudioBytes = DEFAULT_MAX_AUDIO_BYTES } = options;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/calls", (_req, res) => {
    res.json(callManager.listCalls());
  });

  app.post(
    "/calls",
    express.raw({ type: () => true, limit: maxAudioBytes }),
    route(logger, async (req, res) => {
      const audio: unknown = req.body;
      if (!Buffer.isBuffer(audio) || audio.length === 0) {
        throw new InvalidRequestError("Request body must contain the call recording");
      }

      const callId = callManager.createCall();

      // wait=false returns at once; progress is then followed over WebSocket.
      if (req.query.wait === "false") {
        res.status(202).json({ callId, state: callManager.getCall(callId).state });
        callManager.analyzeCall(callId, audio).catch((err: unknown) => {
          logger.error(`Background analysis failed for call ${callId}: ${errorMessage(err)}`);
        });
        return;
      }

      try {
        const result = await callManager.analyzeCall(callId, audio);
        res.status(201).json(result);
      } catch (err) {
        sendError(res, err, callId);
      }
    }),
  );

  app.get(
    "/calls/:id",
    route(logger, async (req, res) => {
      res.json(callManager.getCall(req.params.id));
    }),
  );

  app.delete(
    "/calls/:id",
    route(logger, async (req, res) => {
      callManager.endCall(req.params.id);
      res.status(204).end();
    }),
  );

  app.post(
    "/calls/:id/retry",
    route(logger, async (req, res) => {
      res.json(await callManager.retryAnalysis(req.params.id));
    }),
  );

  app.post(
    "/calls/:id/rescore",
    route(logger, async (req, res) => {
      res.json(await callManager.rescoreCall(req.params.id));
    }),
  );

  app.post(
    "/calls/:id/chat",
    express.json(),
    route(logger, async (req, res) => {
      const body: unknown = req.body;
      const query = typeof body === "object" && body !== null && "query" in body ? body.query : undefined;
      if (typeof query !== "string") {
        throw new InvalidRequestError('Request body must be JSON of the form { "query": "..." }');
      }
      const answer = await callManager.chat(req.params.id, query);
      res.json({ callId: req.params.id, query, answer });
    }),
  );

  app.post(
    "/calls/:id/export",
    route(logger, async (req, res) => {
      const paths = await callManager.exportCall(req.params.id);
      res.json({ callId: req.params.id, paths });
    }),
  );

  // Body-parser failures (malformed JSON, oversized upload) land here.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof Error && "status" in err && typeof err.status === "number" ? err.status : 500;
    if (status >= 400 && status < 500) {
      res.status(status).json({ kind: "InvalidRequest", message: errorMessage(err) });
      return;
    }
    logger.error(`Unhandled request error: ${errorMessage(err)}`);
    res.status(500).json({ kind: "Internal", message: "Internal server error" });
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, callManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    callManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── HTTP helpers ───────────────────────────────────────────────────────────────

function route(logger: Logger, handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res) => {
    handler(req, res).catch((err: unknown) => {
      if (!isPipelineError(err)) {
        logger.error(`${req.method} ${req.path} failed: ${errorMessage(err)}`);
      }
      sendError(res, err, req.params.id);
    });
  };
}

/** HTTP status for an error. Errors outside the pipeline taxonomy are 500. */
export function statusForError(err: unknown): number {
  return isPipelineError(err) ? STATUS_BY_KIND[err.kind] : 500;
}

function sendError(res: Response, err: unknown, callId?: string): void {
  const body = isPipelineError(err)
    ? { kind: err.kind, message: err.message, ...(callId ? { callId } : {}) }
    : { kind: "Internal", message: "Internal server error", ...(callId ? { callId } : {}) };
  res.status(statusForError(err)).json(body);
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

/**
 * Validates an incoming text frame.
 * @throws InvalidRequestError for anything other than a known client message.
 */
export function parseClientMessage(text: string): ClientMessage {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new InvalidRequestError("Message is not valid JSON");
  }
  if (typeof data !== "object" || data === null || !("type" in data)) {
    throw new InvalidRequestError("Message must be an object with a type");
  }
  const callId = "callId" in data ? data.callId : undefined;
  if (typeof callId !== "string" || callId.length === 0) {
    throw new InvalidRequestError("Message must name a callId");
  }

  switch (data.type) {
    case "subscribe":
      return { type: "subscribe", callId };
    case "unsubscribe":
      return { type: "unsubscribe", callId };
    case "chat": {
      const query = "query" in data ? data.query : undefined;
      if (typeof query !== "string") {
        throw new InvalidRequestError("Chat message must carry a query string");
      }
      return { type: "chat", callId, query };
    }
    default:
      throw new InvalidRequestError(`Unknown message type: ${String(data.type)}`);
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf-8");
  }
  return data.toString("utf-8");
}

function handleConnection(ws: WebSocket, callManager: CallManager, logger: Logger): void {
  const subscriptions = new Map<string, () => void>();

  logger.info("New WebSocket connection");

  const sendWsError = (err: unknown, callId?: string) => {
    const kind = isPipelineError(err) ? err.kind : "Internal";
    sendMessage(ws, { type: "error", kind, message: errorMessage(err), ...(callId ? { callId } : {}) });
  };

  ws.on("message", (data: RawData, isBinary: boolean) => {
    if (isBinary) {
      sendWsError(new InvalidRequestError("Binary messages are not supported"));
      return;
    }

    let message: ClientMessage;
    try {
      message = parseClientMessage(rawDataToString(data));
    } catch (err) {
      sendWsError(err);
      return;
    }

    try {
      handleClientMessage(ws, message, subscriptions, callManager, logger, sendWsError);
    } catch (err) {
      logger.warn(`Error handling ${message.type} for call ${message.callId}: ${errorMessage(err)}`);
      sendWsError(err, message.callId);
    }
  });

  ws.on("close", () => {
    logger.info("WebSocket closed");
    for (const unsubscribe of subscriptions.values()) {
      unsubscribe();
    }
    subscriptions.clear();
  });
}

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  subscriptions: Map<string, () => void>,
  callManager: CallManager,
  logger: Logger,
  sendWsError: (err: unknown, callId?: string) => void,
): void {
  switch (message.type) {
    case "subscribe": {
      const { state } = callManager.getCall(message.callId);
      if (!subscriptions.has(message.callId)) {
        const unsubscribe = callManager.subscribe(message.callId, (event) => {
          sendMessage(ws, { type: "pipeline_progress", ...event });
        });
        subscriptions.set(message.callId, unsubscribe);
      }
      sendMessage(ws, { type: "subscribed", callId: message.callId, state });
      break;
    }

    case "unsubscribe":
      subscriptions.get(message.callId)?.();
      subscriptions.delete(message.callId);
      break;

    case "chat":
      callManager
        .chat(message.callId, message.query)
        .then((answer) => {
          sendMessage(ws, { type: "chat_answer", callId: message.callId, query: message.query, answer });
        })
        .catch((err: unknown) => {
          logger.warn(`Chat failed for call ${message.callId}: ${errorMessage(err)}`);
          sendWsError(err, message.callId);
        });
      break;
  }
}

/**
 * Sends a typed ServerMessage as JSON. No-op if the socket is not open.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
