// Sales Call Scorecard - HTTP API and WebSocket status feed
//
// REST routes drive the pipeline; a WebSocket connection subscribes to
// session ids and receives status_change and score_updated pushes.

import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import type { TaxonomyProvider } from "./checklist-taxonomy.js";
import {
  ConcurrencyConflict,
  PermanentExternalError,
  PreconditionError,
  SessionNotFoundError,
  TransientExternalError,
  ValidationError,
  errorCode,
  errorMessage,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { PipelineCoordinator } from "./pipeline-coordinator.js";
import { RetryFailure } from "./retry-policy.js";
import type { SessionStateMachine } from "./session-state-machine.js";
import type { StageTaskQueue } from "./stage-task-queue.js";
import { SessionStatus } from "./types.js";
import type { ClientMessage, DealMetadata, ServerMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Largest accepted audio upload. */
export const MAX_UPLOAD_BYTES = 200 * 1024 * 1024;

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  stateMachine: SessionStateMachine;
  coordinator: PipelineCoordinator;
  taxonomy: TaxonomyProvider;
  /** When set, uploads hand the rest of the pipeline to the queue and answer 202. */
  queue?: StageTaskQueue;
  logger?: Logger;
  maxUploadBytes?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Forward rejections to the error middleware. */
function route(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { stateMachine, coordinator, taxonomy, queue } = options;
  const logger = options.logger ?? createLogger("Server");

  const app = express();
  const httpServer = createServer(app);
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/checklist", (_req, res) => {
    const current = taxonomy.current();
    res.json({
      version: current.version,
      totalMaxScore: current.totalMaxScore(),
      categories: current.activeCategories().map((c) => ({
        ...c,
        items: current.itemsInCategory(c.id),
      })),
    });
  });

  // ── Sessions ──

  app.post(
    "/sessions",
    route(async (req, res) => {
      const body = requireBody(req);
      const session = await stateMachine.createSession(requireString(body, "ownerId"), parseDeal(body.deal));
      res.status(201).json(session);
    }),
  );

  app.get(
    "/sessions",
    route(async (req, res) => {
      const ownerId = typeof req.query.ownerId === "string" ? req.query.ownerId : undefined;
      res.json(await stateMachine.listSessions(ownerId));
    }),
  );

  app.get(
    "/sessions/:id",
    route(async (req, res) => {
      res.json(await coordinator.getSnapshot(req.params.id));
    }),
  );

  app.delete(
    "/sessions/:id",
    route(async (req, res) => {
      await stateMachine.deleteSession(req.params.id);
      res.status(204).end();
    }),
  );

  // ── Pipeline ──

  app.post(
    "/sessions/:id/audio",
    express.raw({ type: "audio/*", limit: options.maxUploadBytes ?? MAX_UPLOAD_BYTES }),
    route(async (req, res) => {
      const sessionId = req.params.id;
      await stateMachine.getSession(sessionId);
      const mimeType = (req.headers["content-type"] ?? "").split(";")[0].trim().toLowerCase();
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body)) {
        throw new ValidationError("Expected an audio/* request body");
      }

      const session = await coordinator.uploadAudio(sessionId, body, mimeType);
      if (queue && session.status !== SessionStatus.FAILED) {
        queue.enqueue({ sessionId, targetStage: SessionStatus.COMPLETED });
        res.status(202).json(session);
        return;
      }
      res.json(session);
    }),
  );

  app.post(
    "/sessions/:id/advance",
    route(async (req, res) => {
      res.json(await coordinator.advance(req.params.id));
    }),
  );

  app.post(
    "/sessions/:id/retry",
    route(async (req, res) => {
      res.json(await coordinator.retry(req.params.id));
    }),
  );

  app.patch(
    "/sessions/:id/responses/:itemId",
    route(async (req, res) => {
      const itemId = Number(req.params.itemId);
      if (!Number.isInteger(itemId)) {
        throw new ValidationError(`Invalid item id "${req.params.itemId}"`);
      }
      const body = requireBody(req);
      const actorId = requireString(body, "actorId");
      const response =
        body.verdict === null
          ? await coordinator.clearOverride(req.params.id, itemId, actorId)
          : await coordinator.applyOverride(req.params.id, itemId, {
              verdict: requireString(body, "verdict"),
              actorId,
              reason: typeof body.reason === "string" ? body.reason : undefined,
            });
      res.json(response);
    }),
  );

  app.post(
    "/sessions/:id/score",
    route(async (req, res) => {
      const body = optionalBody(req);
      const actorId = typeof body.actorId === "string" ? body.actorId : null;
      res.status(201).json(await coordinator.recomputeScore(req.params.id, actorId));
    }),
  );

  app.get(
    "/sessions/:id/scores",
    route(async (req, res) => {
      res.json(await coordinator.getScoreHistory(req.params.id));
    }),
  );

  app.post(
    "/sessions/:id/coaching",
    route(async (req, res) => {
      const regenerate = optionalBody(req).regenerate === true;
      res.json(await coordinator.generateCoaching(req.params.id, { regenerate }));
    }),
  );

  app.post(
    "/sessions/:id/report",
    route(async (req, res) => {
      const regenerate = optionalBody(req).regenerate === true;
      res.json(await coordinator.generateReport(req.params.id, { regenerate }));
    }),
  );

  app.post(
    "/sessions/:id/export",
    route(async (req, res) => {
      res.json({ paths: await coordinator.exportSession(req.params.id) });
    }),
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusFor(err);
    if (status >= 500) {
      logger.error(`Request failed: ${errorMessage(err)}`);
    }
    const cause = err instanceof RetryFailure ? err.error : err;
    res.status(status).json({ error: errorCode(cause), message: errorMessage(err) });
  });

  // ── WebSocket status feed ──

  const wss = new WebSocketServer({ server: httpServer });
  const subscriptions = new Map<WebSocket, Set<string>>();

  const publish = (sessionId: string, message: ServerMessage) => {
    for (const [ws, sessionIds] of subscriptions) {
      if (sessionIds.has(sessionId)) sendMessage(ws, message);
    }
  };

  const stopStatus = stateMachine.onStatusChange((session) => {
    publish(session.id, {
      type: "status_change",
      sessionId: session.id,
      status: session.status,
      failure: session.failure,
    });
  });
  const stopScores = coordinator.onScoreUpdated((result) => {
    publish(result.sessionId, {
      type: "score_updated",
      sessionId: result.sessionId,
      version: result.version,
      total: result.total,
      riskBand: result.riskBand,
      delta: result.delta,
    });
  });

  wss.on("connection", (ws: WebSocket) => {
    subscriptions.set(ws, new Set());

    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      const message = isBinary ? null : parseClientMessage(data.toString());
      if (!message) {
        sendMessage(ws, { type: "error", message: "Expected a JSON subscribe or unsubscribe message" });
        return;
      }
      const sessionIds = subscriptions.get(ws);
      if (!sessionIds) return;
      if (message.type === "subscribe") {
        sessionIds.add(message.sessionId);
        sendMessage(ws, { type: "subscribed", sessionId: message.sessionId });
      } else {
        sessionIds.delete(message.sessionId);
      }
    });

    ws.on("close", () => {
      subscriptions.delete(ws);
    });

    ws.on("error", (err) => {
      logger.error(`WebSocket error: ${err.message}`);
      subscriptions.delete(ws);
    });
  });

  return {
    app,
    httpServer,
    wss,
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
      stopStatus();
      stopScores();
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

// ─── Error mapping ──────────────────────────────────────────────────────────────

export function httpStatusFor(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof SessionNotFoundError) return 404;
  if (err instanceof PreconditionError || err instanceof ConcurrencyConflict) return 409;
  if (err instanceof RetryFailure || err instanceof TransientExternalError || err instanceof PermanentExternalError) {
    return 502;
  }
  // body-parser errors carry their own 4xx status (malformed JSON, payload too large)
  if (err instanceof Error && "status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

// ─── Request parsing ────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (!isRecord(body)) {
    throw new ValidationError("Expected a JSON object body");
  }
  return body;
}

function optionalBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

function requireString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new ValidationError(`"${key}" must be a non-empty string`);
  }
  return value;
}

function parseDeal(raw: unknown): DealMetadata {
  if (!isRecord(raw)) {
    throw new ValidationError(`"deal" must be an object`);
  }
  const deal: DealMetadata = { customerName: requireString(raw, "customerName") };
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") deal[key] = value;
  }
  return deal;
}

export function parseClientMessage(text: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || typeof parsed.sessionId !== "string") return null;
  if (parsed.type === "subscribe") return { type: "subscribe", sessionId: parsed.sessionId };
  if (parsed.type === "unsubscribe") return { type: "unsubscribe", sessionId: parsed.sessionId };
  return null;
}

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
