// Server tests: REST routes, error mapping and the WebSocket status feed.
// Runs the real app on an ephemeral port with fake provider clients.

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import WebSocket from "ws";
import { LocalAudioStorage } from "./audio-storage.js";
import type { ChecklistAnalyzer } from "./checklist-analyzer.js";
import { ChecklistTaxonomy, TaxonomyProvider } from "./checklist-taxonomy.js";
import type { CoachingGenerator } from "./coaching-generator.js";
import {
  ConcurrencyConflict,
  PermanentExternalError,
  PreconditionError,
  SessionNotFoundError,
  StageTimeoutError,
  ValidationError,
} from "./errors.js";
import { FilePersistence } from "./file-persistence.js";
import { silentLogger } from "./logger.js";
import { PipelineCoordinator } from "./pipeline-coordinator.js";
import { MarkdownReportGenerator } from "./report-generator.js";
import { RetryFailure, createRetryPolicy } from "./retry-policy.js";
import { createAppServer, httpStatusFor, parseClientMessage } from "./server.js";
import type { AppServer } from "./server.js";
import { SessionStateMachine } from "./session-state-machine.js";
import { InMemorySessionStore } from "./session-store.js";
import { StageTaskQueue } from "./stage-task-queue.js";
import type { Transcriber } from "./transcription-engine.js";

// ─── Fixtures ───────────────────────────────────────────────────────────────────

const taxonomy = new TaxonomyProvider(
  ChecklistTaxonomy.fromDefinition({
    version: "test-1",
    categories: [
      { id: 1, name: "Discovery", description: "", order: 1, weight: 2, maxScore: 10 },
      { id: 2, name: "Economics", description: "", order: 2, weight: 1, maxScore: 20 },
    ],
    items: [
      { id: 1, categoryId: 1, ordinal: 1, title: "Trigger", definition: "Why now", weight: 0.5 },
      { id: 2, categoryId: 1, ordinal: 2, title: "Impact", definition: "What changes", weight: 0.5 },
      { id: 3, categoryId: 2, ordinal: 1, title: "Budget", definition: "How much", weight: 0.25 },
      { id: 4, categoryId: 2, ordinal: 2, title: "Signer", definition: "Who signs", weight: 0.75 },
    ],
  }),
);

/** Items 1 and 4 validated: 20 of 30 points. */
const ANALYSIS_PAYLOAD = {
  items: [
    { item_id: 1, verdict: "validated", confidence: 0.9, evidence: "", rationale: "" },
    { item_id: 2, verdict: "not_validated", confidence: 0.7, evidence: "", rationale: "" },
    { item_id: 4, verdict: "validated", confidence: 0.8, evidence: "", rationale: "" },
  ],
};

const WAV_BYTES = new Uint8Array([82, 73, 70, 70, 1, 2, 3, 4]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function idOf(body: unknown): string {
  if (isRecord(body) && typeof body.id === "string") return body.id;
  throw new Error(`Response has no id: ${JSON.stringify(body)}`);
}

/** WebSocket client that buffers every JSON message it receives. */
class TestClient {
  ws: WebSocket;
  private messages: unknown[] = [];
  private waiters: Array<() => void> = [];

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on("message", (data: WebSocket.RawData) => {
      this.messages.push(JSON.parse(data.toString()));
      for (const wake of this.waiters.splice(0)) wake();
    });
  }

  waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.ws.once("open", () => resolve());
      this.ws.once("error", reject);
    });
  }

  /** Next message whose `type` matches, skipping others. */
  async nextOfType(type: string, timeoutMs = 3000): Promise<unknown> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const index = this.messages.findIndex((m) => isRecord(m) && m.type === type);
      if (index >= 0) return this.messages.splice(index, 1)[0];
      const remaining = deadline - Date.now();
      if (remaining <= 0) throw new Error(`No "${type}" message within ${timeoutMs}ms`);
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, remaining);
        this.waiters.push(() => {
          clearTimeout(timer);
          resolve();
        });
      });
    }
  }

  sendJson(message: unknown): void {
    this.ws.send(JSON.stringify(message));
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

// ─── Harness ────────────────────────────────────────────────────────────────────

describe("Server", () => {
  let server: AppServer;
  let queue: StageTaskQueue | undefined;
  let transcribe: Mock<Transcriber["transcribe"]>;
  let generateCoaching: Mock<CoachingGenerator["generate"]>;
  let workDir: string;
  let baseUrl: string;
  let clients: TestClient[];

  async function start(options: { withQueue?: boolean } = {}): Promise<void> {
    const store = new InMemorySessionStore();
    const stateMachine = new SessionStateMachine({ store, taxonomy, logger: silentLogger });
    const audioStorage = new LocalAudioStorage(join(workDir, "uploads"));
    const analyze = vi.fn<ChecklistAnalyzer["analyze"]>().mockResolvedValue({ payload: ANALYSIS_PAYLOAD, requestId: null });
    const coordinator = new PipelineCoordinator({
      stateMachine,
      store,
      taxonomy,
      audioStorage,
      transcriber: { service: "fake-transcriber", transcribe },
      analyzer: { service: "fake-analysis", analyze },
      coachingGenerator: { service: "fake-coaching", generate: generateCoaching },
      reportGenerator: new MarkdownReportGenerator(),
      filePersistence: new FilePersistence(join(workDir, "output")),
      retryPolicy: createRetryPolicy(
        { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1, multiplier: 1 },
        { sleep: () => Promise.resolve() },
      ),
      lease: { wait: true, pollIntervalMs: 1 },
      logger: silentLogger,
    });
    queue = options.withQueue ? new StageTaskQueue(coordinator, { logger: silentLogger }) : undefined;
    server = createAppServer({ stateMachine, coordinator, taxonomy, queue, logger: silentLogger });
    await server.listen(0);

    const address = server.httpServer.address();
    if (address === null || typeof address === "string") {
      throw new Error("Unexpected server address format");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "scorecard-server-"));
    transcribe = vi.fn<Transcriber["transcribe"]>().mockResolvedValue({
      text: "We must replace billing before the June audit.",
      language: "en",
      durationSeconds: 60,
      wordCount: 8,
      requestId: null,
    });
    generateCoaching = vi.fn<CoachingGenerator["generate"]>().mockResolvedValue({
      feedbackText: "Good call.",
      strengths: [],
      improvementAreas: [],
      actionItems: ["Confirm the signer."],
      fallback: false,
      requestId: null,
    });
    clients = [];
  });

  afterEach(async () => {
    for (const c of clients) c.close();
    await queue?.drain();
    await server.close();
    await rm(workDir, { recursive: true, force: true });
  });

  async function request(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await res.text();
    return { status: res.status, body: text ? JSON.parse(text) : null };
  }

  async function upload(sessionId: string, contentType = "audio/wav"): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}/sessions/${sessionId}/audio`, {
      method: "POST",
      headers: { "content-type": contentType },
      body: WAV_BYTES,
    });
    return { status: res.status, body: await res.json() };
  }

  async function createSession(): Promise<string> {
    const res = await request("POST", "/sessions", { ownerId: "rep-1", deal: { customerName: "Acme" } });
    return idOf(res.body);
  }

  /** Upload and advance through every stage without a queue. */
  async function completedSession(): Promise<string> {
    const id = await createSession();
    await upload(id);
    for (let i = 0; i < 4; i++) {
      await request("POST", `/sessions/${id}/advance`);
    }
    return id;
  }

  async function connect(): Promise<TestClient> {
    const client = new TestClient(baseUrl.replace("http://", "ws://"));
    clients.push(client);
    await client.waitForOpen();
    return client;
  }

  // ─── Basics ─────────────────────────────────────────────────────────────────────

  describe("basics", () => {
    beforeEach(() => start());

    it("answers the health check", async () => {
      expect(await request("GET", "/health")).toEqual({ status: 200, body: { status: "ok" } });
    });

    it("serves the active checklist grouped by category", async () => {
      const { status, body } = await request("GET", "/checklist");
      expect(status).toBe(200);
      expect(body).toMatchObject({
        version: "test-1",
        totalMaxScore: 30,
        categories: [
          { id: 1, name: "Discovery", items: [{ id: 1, points: 5 }, { id: 2, points: 5 }] },
          { id: 2, name: "Economics", items: [{ id: 3, points: 5 }, { id: 4, points: 15 }] },
        ],
      });
    });
  });

  // ─── Sessions ───────────────────────────────────────────────────────────────────

  describe("sessions", () => {
    beforeEach(() => start());

    it("creates a draft session", async () => {
      const { status, body } = await request("POST", "/sessions", {
        ownerId: "rep-1",
        deal: { customerName: "Acme", opportunityName: "Billing", seats: 40 },
      });
      expect(status).toBe(201);
      expect(body).toMatchObject({
        ownerId: "rep-1",
        deal: { customerName: "Acme", opportunityName: "Billing" },
        status: "draft",
        version: 0,
        failure: null,
      });
      expect(isRecord(body) && isRecord(body.deal) && "seats" in body.deal).toBe(false);
    });

    it("rejects a session without an owner", async () => {
      expect(await request("POST", "/sessions", { deal: { customerName: "Acme" } })).toEqual({
        status: 400,
        body: { error: "validation_error", message: '"ownerId" must be a non-empty string' },
      });
    });

    it("rejects a deal without a customer", async () => {
      const { status, body } = await request("POST", "/sessions", { ownerId: "rep-1", deal: {} });
      expect(status).toBe(400);
      expect(body).toEqual({ error: "validation_error", message: '"customerName" must be a non-empty string' });
    });

    it("lists sessions filtered by owner", async () => {
      const id = await createSession();
      await request("POST", "/sessions", { ownerId: "rep-2", deal: { customerName: "Globex" } });

      const { body } = await request("GET", "/sessions?ownerId=rep-1");
      expect(Array.isArray(body) && body.map(idOf)).toEqual([id]);
      expect((await request("GET", "/sessions")).body).toHaveLength(2);
    });

    it("returns 404 for an unknown session", async () => {
      expect(await request("GET", "/sessions/missing")).toEqual({
        status: 404,
        body: { error: "session_not_found", message: "Session not found: missing" },
      });
    });

    it("deletes a session", async () => {
      const id = await createSession();
      expect((await request("DELETE", `/sessions/${id}`)).status).toBe(204);
      expect((await request("GET", `/sessions/${id}`)).status).toBe(404);
      expect((await request("DELETE", `/sessions/${id}`)).status).toBe(404);
    });
  });

  // ─── Pipeline ───────────────────────────────────────────────────────────────────

  describe("pipeline without a queue", () => {
    beforeEach(() => start());

    it("moves an uploaded session to uploading", async () => {
      const id = await createSession();
      const { status, body } = await upload(id);
      expect(status).toBe(200);
      expect(body).toMatchObject({ id, status: "uploading" });
    });

    it("rejects an unsupported audio type", async () => {
      const id = await createSession();
      expect(await upload(id, "audio/aiff")).toEqual({
        status: 400,
        body: { error: "validation_error", message: 'Unsupported audio type "audio/aiff"' },
      });
    });

    it("rejects a body that is not audio", async () => {
      const id = await createSession();
      const res = await upload(id, "text/plain");
      expect(res.status).toBe(400);
    });

    it("refuses a new recording once the session has moved past draft", async () => {
      const id = await completedSession();
      expect(await upload(id, "audio/mpeg")).toEqual({
        status: 409,
        body: {
          error: "precondition_failed",
          message: `Session ${id} is in "completed" state; audio can only be uploaded to a draft session`,
        },
      });
      const { body } = await request("GET", `/sessions/${id}`);
      expect(body).toMatchObject({ session: { status: "completed" }, scoring: { version: 1 } });
    });

    it("advances stage by stage to a scored session", async () => {
      const id = await completedSession();
      const { body } = await request("GET", `/sessions/${id}`);
      expect(body).toMatchObject({
        session: { id, status: "completed" },
        transcript: { text: "We must replace billing before the June audit." },
        scoring: { version: 1, total: 20, maxScore: 30, normalizedTotal: 66.6667, riskBand: "caution", delta: null },
      });
    });

    it("reports a failed stage and retries it", async () => {
      transcribe.mockRejectedValueOnce(new PermanentExternalError("Corrupt audio"));
      const id = await createSession();
      await upload(id);
      await request("POST", `/sessions/${id}/advance`);

      const failed = await request("POST", `/sessions/${id}/advance`);
      expect(failed.status).toBe(200);
      expect(failed.body).toMatchObject({
        status: "failed",
        failure: { stage: "processing", classification: "permanent", code: "permanent_external_error", message: "Corrupt audio" },
      });

      expect(await request("POST", `/sessions/${id}/advance`)).toEqual({
        status: 409,
        body: { error: "precondition_failed", message: `Session ${id} has failed; retry it before advancing` },
      });

      const retried = await request("POST", `/sessions/${id}/retry`);
      expect(retried.body).toMatchObject({ status: "completed", failure: null });
    });

    it("applies an override and rescores", async () => {
      const id = await completedSession();
      const patched = await request("PATCH", `/sessions/${id}/responses/3`, {
        actorId: "manager-1",
        verdict: "validated",
        reason: "Budget came up after the call",
      });
      expect(patched.body).toMatchObject({
        itemId: 3,
        override: { verdict: "validated", actorId: "manager-1", reason: "Budget came up after the call" },
      });

      const history = await request("GET", `/sessions/${id}/scores`);
      expect(history.body).toMatchObject([
        { version: 1, total: 20, trigger: "pipeline" },
        { version: 2, total: 25, trigger: "override", actorId: "manager-1", delta: 5, riskBand: "healthy" },
      ]);
    });

    it("clears an override when the verdict is null", async () => {
      const id = await completedSession();
      await request("PATCH", `/sessions/${id}/responses/4`, { actorId: "manager-1", verdict: "not_validated" });
      const cleared = await request("PATCH", `/sessions/${id}/responses/4`, { actorId: "manager-1", verdict: null });

      expect(cleared.body).toMatchObject({ itemId: 4, verdict: "validated", override: null });
      const history = await request("GET", `/sessions/${id}/scores`);
      expect(Array.isArray(history.body) && history.body.map((r) => isRecord(r) && r.total)).toEqual([20, 5, 20]);
    });

    it("validates override input", async () => {
      const id = await completedSession();
      expect((await request("PATCH", `/sessions/${id}/responses/abc`, { actorId: "m", verdict: "validated" })).body).toEqual({
        error: "validation_error",
        message: 'Invalid item id "abc"',
      });
      expect((await request("PATCH", `/sessions/${id}/responses/3`, { actorId: "m", verdict: "maybe" })).status).toBe(400);
      expect((await request("PATCH", `/sessions/${id}/responses/3`, { verdict: "validated" })).status).toBe(400);
    });

    it("refuses an override before analysis", async () => {
      const id = await createSession();
      const res = await request("PATCH", `/sessions/${id}/responses/1`, { actorId: "m", verdict: "validated" });
      expect(res.status).toBe(409);
    });

    it("recomputes the score on request", async () => {
      const id = await completedSession();
      const { status, body } = await request("POST", `/sessions/${id}/score`, { actorId: "manager-1" });
      expect(status).toBe(201);
      expect(body).toMatchObject({ version: 2, total: 20, delta: 0, trigger: "manual_recompute", actorId: "manager-1" });
    });

    it("generates coaching and a report", async () => {
      const id = await completedSession();

      const coaching = await request("POST", `/sessions/${id}/coaching`);
      expect(coaching.body).toMatchObject({ feedbackText: "Good call.", audio: null, scoringVersion: 1 });

      const report = await request("POST", `/sessions/${id}/report`);
      expect(report.body).toMatchObject({ format: "text/markdown", scoringVersion: 1 });
      expect(isRecord(report.body) && typeof report.body.content === "string" && report.body.content.split("\n")[0]).toBe(
        "# Call Scorecard: Acme",
      );
    });

    it("maps a failed coaching call to 502", async () => {
      generateCoaching.mockRejectedValue(new PermanentExternalError("Model refused"));
      const id = await completedSession();
      expect(await request("POST", `/sessions/${id}/coaching`)).toEqual({
        status: 502,
        body: { error: "permanent_external_error", message: "Model refused" },
      });
    });

    it("refuses coaching before scoring", async () => {
      const id = await createSession();
      expect((await request("POST", `/sessions/${id}/coaching`)).status).toBe(409);
    });

    it("exports the session and marks it synced", async () => {
      const id = await completedSession();
      const { body } = await request("POST", `/sessions/${id}/export`);
      expect(isRecord(body) && Array.isArray(body.paths) && body.paths.length).toBe(4);
      expect((await request("GET", `/sessions/${id}`)).body).toMatchObject({ session: { isSynced: true } });
    });
  });

  describe("pipeline with a queue", () => {
    beforeEach(() => start({ withQueue: true }));

    it("accepts the upload and completes the session in the background", async () => {
      const id = await createSession();
      const { status } = await upload(id);
      expect(status).toBe(202);

      await queue?.drain();
      expect((await request("GET", `/sessions/${id}`)).body).toMatchObject({
        session: { status: "completed" },
        scoring: { total: 20 },
      });
    });
  });

  // ─── WebSocket feed ─────────────────────────────────────────────────────────────

  describe("status feed", () => {
    beforeEach(() => start());

    it("confirms a subscription and pushes status changes", async () => {
      const id = await createSession();
      const client = await connect();
      client.sendJson({ type: "subscribe", sessionId: id });
      expect(await client.nextOfType("subscribed")).toEqual({ type: "subscribed", sessionId: id });

      await upload(id);
      expect(await client.nextOfType("status_change")).toEqual({
        type: "status_change",
        sessionId: id,
        status: "uploading",
        failure: null,
      });
    });

    it("pushes score updates", async () => {
      const id = await completedSession();
      const client = await connect();
      client.sendJson({ type: "subscribe", sessionId: id });
      await client.nextOfType("subscribed");

      await request("PATCH", `/sessions/${id}/responses/3`, { actorId: "manager-1", verdict: "validated" });
      expect(await client.nextOfType("score_updated")).toEqual({
        type: "score_updated",
        sessionId: id,
        version: 2,
        total: 25,
        riskBand: "healthy",
        delta: 5,
      });
    });

    it("does not push events for other sessions", async () => {
      const watched = await createSession();
      const other = await createSession();
      const client = await connect();
      client.sendJson({ type: "subscribe", sessionId: watched });
      await client.nextOfType("subscribed");

      await upload(other);
      await upload(watched);
      expect(await client.nextOfType("status_change")).toMatchObject({ sessionId: watched });
    });

    it("answers a malformed message with an error", async () => {
      const client = await connect();
      client.ws.send("subscribe please");
      expect(await client.nextOfType("error")).toEqual({
        type: "error",
        message: "Expected a JSON subscribe or unsubscribe message",
      });
    });
  });
});

// ─── Pure helpers ─────────────────────────────────────────────────────────────────

describe("httpStatusFor", () => {
  it("maps the error taxonomy to status codes", () => {
    expect(httpStatusFor(new ValidationError("x"))).toBe(400);
    expect(httpStatusFor(new SessionNotFoundError("s1"))).toBe(404);
    expect(httpStatusFor(new PreconditionError("x"))).toBe(409);
    expect(httpStatusFor(new ConcurrencyConflict("x"))).toBe(409);
    expect(httpStatusFor(new StageTimeoutError("openai-analysis", 10))).toBe(502);
    expect(httpStatusFor(new RetryFailure(new Error("x"), "transient", 3))).toBe(502);
    expect(httpStatusFor(new Error("boom"))).toBe(500);
  });

  it("passes through client error statuses from body parsing", () => {
    expect(httpStatusFor(Object.assign(new Error("too large"), { status: 413 }))).toBe(413);
    expect(httpStatusFor(Object.assign(new Error("upstream"), { status: 503 }))).toBe(500);
  });
});

describe("parseClientMessage", () => {
  it("parses subscribe and unsubscribe", () => {
    expect(parseClientMessage('{"type":"subscribe","sessionId":"s1"}')).toEqual({ type: "subscribe", sessionId: "s1" });
    expect(parseClientMessage('{"type":"unsubscribe","sessionId":"s1","extra":1}')).toEqual({
      type: "unsubscribe",
      sessionId: "s1",
    });
  });

  it("rejects anything else", () => {
    expect(parseClientMessage("not json")).toBeNull();
    expect(parseClientMessage('{"type":"subscribe"}')).toBeNull();
    expect(parseClientMessage('{"type":"ping","sessionId":"s1"}')).toBeNull();
    expect(parseClientMessage("[]")).toBeNull();
  });
});
