// Sales Call Scorecard - Session State Machine
// Single source of truth for session status. Every stage completion is an
// explicit transition request, checked against the state graph and the
// prerequisite artifact, then committed with a compare-and-set on the
// session version.
//
// At most one transition is in flight per session: callers that do pipeline
// work hold the session lease (withLease) for the whole stage.

import { v4 as uuidv4 } from "uuid";
import type { TaxonomyProvider } from "./checklist-taxonomy.js";
import { ConcurrencyConflict, PreconditionError, SessionNotFoundError, ValidationError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import { realSleep } from "./retry-policy.js";
import type { Lease, SessionPatch, SessionStore } from "./session-store.js";
import { SessionStatus } from "./types.js";
import type { ActiveStatus, DealMetadata, FailureInfo, ManualOverride, Session, SessionResponse } from "./types.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionStateMachineDeps {
  store: SessionStore;
  taxonomy: TaxonomyProvider;
  logger?: Logger;
  /** Lease lifetime; a crashed worker's lease lapses after this. */
  leaseTtlMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export type StatusListener = (session: Session) => void;

/**
 * Valid forward transitions.
 *
 * DRAFT → UPLOADING:        audio attached
 * UPLOADING → PROCESSING:   upload confirmed
 * PROCESSING → ANALYZING:   transcript produced
 * ANALYZING → SCORING:      reconciled responses produced
 * SCORING → COMPLETED:      scoring result produced
 *
 * fail() moves any non-terminal state to FAILED; retry() moves FAILED back
 * to the stage that failed.
 */
const VALID_TRANSITIONS: ReadonlyMap<SessionStatus, SessionStatus> = new Map([
  [SessionStatus.DRAFT, SessionStatus.UPLOADING],
  [SessionStatus.UPLOADING, SessionStatus.PROCESSING],
  [SessionStatus.PROCESSING, SessionStatus.ANALYZING],
  [SessionStatus.ANALYZING, SessionStatus.SCORING],
  [SessionStatus.SCORING, SessionStatus.COMPLETED],
]);

/** Pipeline order, used to tell whether a status is at or past another. */
const STAGE_ORDER: readonly SessionStatus[] = [
  SessionStatus.DRAFT,
  SessionStatus.UPLOADING,
  SessionStatus.PROCESSING,
  SessionStatus.ANALYZING,
  SessionStatus.SCORING,
  SessionStatus.COMPLETED,
];

export function isActiveStatus(status: SessionStatus): status is ActiveStatus {
  return status !== SessionStatus.COMPLETED && status !== SessionStatus.FAILED;
}

/** True when `status` is `target` or later along the pipeline. FAILED is never at-or-past anything. */
export function isAtOrPast(status: SessionStatus, target: SessionStatus): boolean {
  const a = STAGE_ORDER.indexOf(status);
  const b = STAGE_ORDER.indexOf(target);
  return a >= 0 && b >= 0 && a >= b;
}

export interface FailureInput {
  classification: FailureInfo["classification"];
  code: string;
  message: string;
  attempts: number;
  retries: number;
}

export interface LeaseOptions {
  /** Wait for a held lease instead of rejecting. */
  wait?: boolean;
  pollIntervalMs?: number;
  maxWaitMs?: number;
}

export interface OverrideInput {
  verdict: string;
  actorId: string;
  reason?: string;
}

const MAX_PATCH_ATTEMPTS = 5;

export class SessionStateMachine {
  private readonly store: SessionStore;
  private readonly taxonomy: TaxonomyProvider;
  private readonly logger: Logger;
  private readonly leaseTtlMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private listeners: Set<StatusListener> = new Set();

  constructor(deps: SessionStateMachineDeps) {
    this.store = deps.store;
    this.taxonomy = deps.taxonomy;
    this.logger = deps.logger ?? createLogger("SessionStateMachine");
    this.leaseTtlMs = deps.leaseTtlMs ?? 10 * 60 * 1000;
    this.sleep = deps.sleep ?? realSleep;
  }

  /** Subscribe to status changes. Returns an unsubscribe function. */
  onStatusChange(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(session: Session): void {
    for (const listener of this.listeners) {
      try {
        listener(session);
      } catch (err) {
        const errMsg = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Status listener threw for session ${session.id}: ${errMsg}`);
      }
    }
  }

  // ─── Lifecycle ────────────────────────────────────────────────────────────────

  /**
   * Creates a new session in DRAFT. No child artifacts exist yet; each is
   * created by the stage responsible for it.
   */
  async createSession(ownerId: string, deal: DealMetadata): Promise<Session> {
    if (!ownerId.trim()) {
      throw new ValidationError("ownerId is required");
    }
    if (!deal.customerName?.trim()) {
      throw new ValidationError("deal.customerName is required");
    }

    const session: Session = {
      id: uuidv4(),
      ownerId,
      deal: { ...deal },
      status: SessionStatus.DRAFT,
      version: 0,
      createdAt: new Date(),
      submittedAt: null,
      completedAt: null,
      isSynced: false,
      failure: null,
    };
    await this.store.insertSession(session);
    this.logger.info(`Session ${session.id} created for owner ${ownerId}`);
    return session;
  }

  /** @throws SessionNotFoundError */
  async getSession(sessionId: string): Promise<Session> {
    const session = await this.store.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  listSessions(ownerId?: string): Promise<Session[]> {
    return this.store.listSessions(ownerId);
  }

  /** Deletes the session and everything it owns. */
  async deleteSession(sessionId: string): Promise<void> {
    const deleted = await this.store.deleteSession(sessionId);
    if (!deleted) {
      throw new SessionNotFoundError(sessionId);
    }
    this.logger.info(`Session ${sessionId} deleted`);
  }

  // ─── Transitions ──────────────────────────────────────────────────────────────

  /**
   * Move the session one step forward to `target`.
   *
   * @throws PreconditionError if `target` is not the next status or its
   *   prerequisite artifact is missing; the session is left unchanged
   * @throws ConcurrencyConflict if the session changed since it was read
   */
  async transition(sessionId: string, target: SessionStatus): Promise<Session> {
    const session = await this.getSession(sessionId);
    this.assertTransition(session, target);
    await this.checkPrecondition(sessionId, target);

    const patch: SessionPatch = { status: target, isSynced: false };
    if (target === SessionStatus.UPLOADING) patch.submittedAt = new Date();
    if (target === SessionStatus.COMPLETED) patch.completedAt = new Date();

    const updated = await this.commitStatus(session, patch);
    this.logger.info(`Session ${sessionId}: ${session.status} → ${target}`);
    this.emit(updated);
    return updated;
  }

  /**
   * Record a failure. Any non-terminal status may fail; the failed status is
   * kept on the session so retry() can return to it. Failing an already
   * failed session is a no-op.
   */
  async fail(sessionId: string, input: FailureInput): Promise<Session> {
    const session = await this.getSession(sessionId);
    if (session.status === SessionStatus.FAILED) {
      return session;
    }
    if (!isActiveStatus(session.status)) {
      throw new PreconditionError(`Session ${sessionId} is completed and cannot fail`);
    }

    const failure: FailureInfo = { stage: session.status, ...input, failedAt: new Date() };
    const updated = await this.commitStatus(session, {
      status: SessionStatus.FAILED,
      failure,
      isSynced: false,
    });
    this.logger.error(
      `Session ${sessionId} failed in "${failure.stage}" (${failure.classification}, ${failure.code}, ` +
        `${failure.retries} retries): ${failure.message}`,
    );
    this.emit(updated);
    return updated;
  }

  /**
   * FAILED → the stage that failed. The failure record is cleared; the
   * caller re-runs the stage afterwards.
   */
  async retry(sessionId: string): Promise<Session> {
    const session = await this.getSession(sessionId);
    if (session.status !== SessionStatus.FAILED || !session.failure) {
      throw new PreconditionError(
        `Cannot retry: session ${sessionId} is in "${session.status}" state. Only failed sessions can be retried.`,
      );
    }
    const stage = session.failure.stage;
    const updated = await this.commitStatus(session, {
      status: stage,
      failure: null,
    });
    this.logger.info(`Session ${sessionId}: failed → ${stage} (retry)`);
    this.emit(updated);
    return updated;
  }

  /**
   * Compare-and-set a status change read from `session`. Writes that leave the
   * status alone (the sync flag) also bump the version, so a conflict is
   * retried against the fresh version as long as the status is still the one
   * the change was checked against.
   */
  private async commitStatus(session: Session, patch: SessionPatch): Promise<Session> {
    let version = session.version;
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.store.updateSession(session.id, version, patch);
      } catch (err) {
        if (!(err instanceof ConcurrencyConflict) || attempt >= MAX_PATCH_ATTEMPTS) {
          throw err;
        }
        const latest = await this.getSession(session.id);
        if (latest.status !== session.status) {
          throw err;
        }
        version = latest.version;
      }
    }
  }

  private assertTransition(session: Session, target: SessionStatus): void {
    const expected = VALID_TRANSITIONS.get(session.status);
    if (expected !== target) {
      throw new PreconditionError(
        `Invalid transition: session ${session.id} is in "${session.status}" state, cannot move to "${target}".` +
          (expected ? ` Expected next state is "${expected}".` : ""),
      );
    }
  }

  /** Throws PreconditionError when the artifact that `target` requires is missing or empty. */
  private async checkPrecondition(sessionId: string, target: SessionStatus): Promise<void> {
    switch (target) {
      case SessionStatus.UPLOADING:
      case SessionStatus.PROCESSING: {
        const audio = await this.store.getAudio(sessionId);
        if (!audio || !audio.locator) {
          throw new PreconditionError(`Session ${sessionId} has no audio artifact`);
        }
        return;
      }
      case SessionStatus.ANALYZING: {
        const transcript = await this.store.getTranscript(sessionId);
        if (!transcript || transcript.text.trim().length === 0) {
          throw new PreconditionError(`Session ${sessionId} has no transcript`);
        }
        return;
      }
      case SessionStatus.SCORING: {
        const { responses, reconciledAt } = await this.store.getResponses(sessionId);
        if (!reconciledAt) {
          throw new PreconditionError(`Session ${sessionId} has not been reconciled`);
        }
        const present = new Set(responses.map((r) => r.itemId));
        const missing = this.taxonomy.current().activeItems().filter((i) => !present.has(i.id));
        if (missing.length > 0) {
          throw new PreconditionError(`Session ${sessionId} is missing responses for ${missing.length} active items`);
        }
        return;
      }
      case SessionStatus.COMPLETED: {
        const scoring = await this.store.getCurrentScoring(sessionId);
        if (!scoring) {
          throw new PreconditionError(`Session ${sessionId} has no scoring result`);
        }
        return;
      }
      default:
        throw new PreconditionError(`No forward transition leads to "${target}"`);
    }
  }

  // ─── Exclusion ────────────────────────────────────────────────────────────────

  /**
   * Run `fn` while holding the session lease. A held lease either rejects
   * immediately with ConcurrencyConflict or, with `wait`, is polled until it
   * is released or expires. The lease is renewed every third of its TTL
   * until `fn` settles.
   */
  async withLease<T>(
    sessionId: string,
    fn: (lease: Lease) => Promise<T>,
    options: LeaseOptions = {},
  ): Promise<T> {
    const holder = uuidv4();
    const pollIntervalMs = options.pollIntervalMs ?? 50;
    const deadline = Date.now() + (options.maxWaitMs ?? this.leaseTtlMs);

    let lease = await this.store.acquireLease(sessionId, holder, this.leaseTtlMs);
    while (!lease) {
      if (!options.wait || Date.now() >= deadline) {
        throw new ConcurrencyConflict(`A transition is already in progress for session ${sessionId}`);
      }
      await this.sleep(pollIntervalMs);
      lease = await this.store.acquireLease(sessionId, holder, this.leaseTtlMs);
    }

    let renewal: Promise<void> = Promise.resolve();
    const heartbeat = setInterval(() => {
      renewal = this.renewLease(sessionId, holder);
    }, Math.max(1, Math.floor(this.leaseTtlMs / 3)));

    try {
      return await fn(lease);
    } finally {
      clearInterval(heartbeat);
      await renewal;
      await this.store.releaseLease(sessionId, holder);
    }
  }

  private async renewLease(sessionId: string, holder: string): Promise<void> {
    try {
      const renewed = await this.store.acquireLease(sessionId, holder, this.leaseTtlMs);
      if (!renewed) {
        this.logger.warn(`Lease on session ${sessionId} was taken by another holder before the stage finished`);
      }
    } catch (err) {
      this.logger.warn(`Lease renewal failed for session ${sessionId}: ${errorMessage(err)}`);
    }
  }

  // ─── Manual overrides ─────────────────────────────────────────────────────────

  /**
   * Record a manual verdict for one item. Allowed once the response set
   * exists; does not change status. The AI judgment stays on the response.
   */
  async applyOverride(sessionId: string, itemId: number, input: OverrideInput): Promise<SessionResponse> {
    if (input.verdict !== "validated" && input.verdict !== "not_validated") {
      throw new ValidationError(`Override verdict must be "validated" or "not_validated", got "${input.verdict}"`);
    }
    if (!input.actorId.trim()) {
      throw new ValidationError("Override requires an actorId");
    }
    const override: ManualOverride = {
      verdict: input.verdict,
      actorId: input.actorId,
      reason: input.reason?.trim() ?? "",
      overriddenAt: new Date(),
    };

    await this.requireReconciled(sessionId);
    const updated = await this.store.updateResponse(sessionId, itemId, (current) => ({
      ...current,
      override,
      updatedAt: override.overriddenAt,
    }));
    await this.markUnsynced(sessionId);
    this.logger.info(`Session ${sessionId}: item ${itemId} overridden to "${override.verdict}" by ${override.actorId}`);
    return updated;
  }

  /** Drop an override so the AI judgment counts again. */
  async clearOverride(sessionId: string, itemId: number, actorId: string): Promise<SessionResponse> {
    await this.requireReconciled(sessionId);
    const updated = await this.store.updateResponse(sessionId, itemId, (current) => ({
      ...current,
      override: null,
      updatedAt: new Date(),
    }));
    await this.markUnsynced(sessionId);
    this.logger.info(`Session ${sessionId}: override on item ${itemId} cleared by ${actorId}`);
    return updated;
  }

  private async requireReconciled(sessionId: string): Promise<void> {
    await this.getSession(sessionId);
    const { reconciledAt } = await this.store.getResponses(sessionId);
    if (!reconciledAt) {
      throw new PreconditionError(`Session ${sessionId} has no responses yet; overrides apply after analysis`);
    }
  }

  // ─── Sync flag ────────────────────────────────────────────────────────────────

  markSynced(sessionId: string): Promise<Session> {
    return this.patch(sessionId, { isSynced: true });
  }

  markUnsynced(sessionId: string): Promise<Session> {
    return this.patch(sessionId, { isSynced: false });
  }

  /** Non-status patch; re-reads and retries on a version race with a transition. */
  private async patch(sessionId: string, patch: SessionPatch): Promise<Session> {
    for (let attempt = 1; ; attempt++) {
      const session = await this.getSession(sessionId);
      try {
        return await this.store.updateSession(sessionId, session.version, patch);
      } catch (err) {
        if (!(err instanceof ConcurrencyConflict) || attempt >= MAX_PATCH_ATTEMPTS) {
          throw err;
        }
      }
    }
  }
}
