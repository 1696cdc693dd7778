// Sales Call Scorecard - Session persistence
//
// SessionStore is the durable-store contract the pipeline relies on:
// read-your-writes per session, compare-and-set on the session version,
// per-session leases with expiry, and an atomic response batch write that
// carries the reconciliation-complete marker. InMemorySessionStore is the
// implementation used by the server process and the tests; reads return
// copies so callers never alias stored state.

import { ConcurrencyConflict, PreconditionError, SessionNotFoundError } from "./errors.js";
import type {
  AudioArtifact,
  CoachingFeedback,
  ProvenanceRecord,
  Report,
  ScoringResult,
  Session,
  SessionResponse,
  SessionSnapshot,
  Transcript,
} from "./types.js";

export interface Lease {
  sessionId: string;
  holder: string;
  expiresAt: number;
}

export type SessionPatch = Partial<Omit<Session, "id" | "version" | "createdAt" | "ownerId">>;

export interface StoredResponses {
  responses: SessionResponse[];
  /** Set by the reconciliation batch write; null until then. */
  reconciledAt: Date | null;
}

export interface SessionStore {
  insertSession(session: Session): Promise<void>;
  getSession(sessionId: string): Promise<Session | null>;
  listSessions(ownerId?: string): Promise<Session[]>;
  /**
   * Apply `patch` if the stored version equals `expectedVersion`; bumps the version.
   * @throws ConcurrencyConflict on a version mismatch
   * @throws SessionNotFoundError
   */
  updateSession(sessionId: string, expectedVersion: number, patch: SessionPatch): Promise<Session>;
  /** Removes the session and every child artifact. */
  deleteSession(sessionId: string): Promise<boolean>;

  /** Returns the lease, or null when another holder has an unexpired one. Re-acquiring extends it. */
  acquireLease(sessionId: string, holder: string, ttlMs: number): Promise<Lease | null>;
  releaseLease(sessionId: string, holder: string): Promise<void>;
  getLease(sessionId: string): Promise<Lease | null>;

  putAudio(sessionId: string, audio: AudioArtifact): Promise<void>;
  getAudio(sessionId: string): Promise<AudioArtifact | null>;
  putTranscript(sessionId: string, transcript: Transcript): Promise<void>;
  getTranscript(sessionId: string): Promise<Transcript | null>;

  /**
   * Write a full reconciled response set and set the reconciliation-complete
   * marker in one step. Stored responses that carry an override win over the
   * incoming ones.
   */
  writeResponses(sessionId: string, responses: SessionResponse[]): Promise<SessionResponse[]>;
  getResponses(sessionId: string): Promise<StoredResponses>;
  /** @throws PreconditionError when the session has no response for the item */
  updateResponse(
    sessionId: string,
    itemId: number,
    update: (current: SessionResponse) => SessionResponse,
  ): Promise<SessionResponse>;

  /**
   * Append a scoring snapshot. `result.version` must be exactly one more than
   * the current version (1 for the first).
   * @throws ConcurrencyConflict otherwise
   */
  appendScoringResult(result: ScoringResult): Promise<void>;
  getCurrentScoring(sessionId: string): Promise<ScoringResult | null>;
  listScoringResults(sessionId: string): Promise<ScoringResult[]>;

  putCoaching(sessionId: string, coaching: CoachingFeedback): Promise<void>;
  getCoaching(sessionId: string): Promise<CoachingFeedback | null>;
  putReport(sessionId: string, report: Report): Promise<void>;
  getReport(sessionId: string): Promise<Report | null>;

  appendProvenance(record: ProvenanceRecord): Promise<void>;
  listProvenance(sessionId: string): Promise<ProvenanceRecord[]>;

  /** Session plus all children, read without interleaving writes. */
  snapshot(sessionId: string): Promise<SessionSnapshot>;
}

// ─── In-memory implementation ───────────────────────────────────────────────────

interface SessionRecord {
  session: Session;
  audio: AudioArtifact | null;
  transcript: Transcript | null;
  responses: Map<number, SessionResponse>;
  reconciledAt: Date | null;
  scoring: ScoringResult[];
  coaching: CoachingFeedback | null;
  report: Report | null;
  provenance: ProvenanceRecord[];
}

const copy = <T>(value: T): T => structuredClone(value);

export class InMemorySessionStore implements SessionStore {
  private records: Map<string, SessionRecord> = new Map();
  private leases: Map<string, Lease> = new Map();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  private record(sessionId: string): SessionRecord {
    const record = this.records.get(sessionId);
    if (!record) {
      throw new SessionNotFoundError(sessionId);
    }
    return record;
  }

  async insertSession(session: Session): Promise<void> {
    if (this.records.has(session.id)) {
      throw new ConcurrencyConflict(`Session ${session.id} already exists`);
    }
    this.records.set(session.id, {
      session: copy(session),
      audio: null,
      transcript: null,
      responses: new Map(),
      reconciledAt: null,
      scoring: [],
      coaching: null,
      report: null,
      provenance: [],
    });
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const record = this.records.get(sessionId);
    return record ? copy(record.session) : null;
  }

  async listSessions(ownerId?: string): Promise<Session[]> {
    return [...this.records.values()]
      .map((r) => r.session)
      .filter((s) => ownerId === undefined || s.ownerId === ownerId)
      .map(copy);
  }

  async updateSession(sessionId: string, expectedVersion: number, patch: SessionPatch): Promise<Session> {
    const record = this.record(sessionId);
    if (record.session.version !== expectedVersion) {
      throw new ConcurrencyConflict(
        `Session ${sessionId} is at version ${record.session.version}, expected ${expectedVersion}`,
      );
    }
    record.session = { ...record.session, ...copy(patch), version: expectedVersion + 1 };
    return copy(record.session);
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    this.leases.delete(sessionId);
    return this.records.delete(sessionId);
  }

  // ── Leases ─────────────────────────────────────────────────────────────────

  async acquireLease(sessionId: string, holder: string, ttlMs: number): Promise<Lease | null> {
    this.record(sessionId);
    const now = this.now();
    const current = this.leases.get(sessionId);
    if (current && current.holder !== holder && current.expiresAt > now) {
      return null;
    }
    const lease: Lease = { sessionId, holder, expiresAt: now + ttlMs };
    this.leases.set(sessionId, lease);
    return { ...lease };
  }

  async releaseLease(sessionId: string, holder: string): Promise<void> {
    const current = this.leases.get(sessionId);
    if (current?.holder === holder) {
      this.leases.delete(sessionId);
    }
  }

  async getLease(sessionId: string): Promise<Lease | null> {
    const current = this.leases.get(sessionId);
    if (!current || current.expiresAt <= this.now()) return null;
    return { ...current };
  }

  // ── Artifacts ──────────────────────────────────────────────────────────────

  async putAudio(sessionId: string, audio: AudioArtifact): Promise<void> {
    this.record(sessionId).audio = copy(audio);
  }

  async getAudio(sessionId: string): Promise<AudioArtifact | null> {
    return copy(this.record(sessionId).audio);
  }

  async putTranscript(sessionId: string, transcript: Transcript): Promise<void> {
    this.record(sessionId).transcript = copy(transcript);
  }

  async getTranscript(sessionId: string): Promise<Transcript | null> {
    return copy(this.record(sessionId).transcript);
  }

  async writeResponses(sessionId: string, responses: SessionResponse[]): Promise<SessionResponse[]> {
    const record = this.record(sessionId);
    const next = new Map<number, SessionResponse>();
    for (const incoming of responses) {
      const stored = record.responses.get(incoming.itemId);
      next.set(incoming.itemId, stored?.override ? stored : copy(incoming));
    }
    record.responses = next;
    record.reconciledAt = new Date(this.now());
    return copy([...next.values()]);
  }

  async getResponses(sessionId: string): Promise<StoredResponses> {
    const record = this.record(sessionId);
    return {
      responses: copy([...record.responses.values()]),
      reconciledAt: copy(record.reconciledAt),
    };
  }

  async updateResponse(
    sessionId: string,
    itemId: number,
    update: (current: SessionResponse) => SessionResponse,
  ): Promise<SessionResponse> {
    const record = this.record(sessionId);
    const current = record.responses.get(itemId);
    if (!current) {
      throw new PreconditionError(`Session ${sessionId} has no response for item ${itemId}`);
    }
    const next = update(copy(current));
    record.responses.set(itemId, copy(next));
    return next;
  }

  async appendScoringResult(result: ScoringResult): Promise<void> {
    const record = this.record(result.sessionId);
    const currentVersion = record.scoring.at(-1)?.version ?? 0;
    if (result.version !== currentVersion + 1) {
      throw new ConcurrencyConflict(
        `Scoring for session ${result.sessionId} is at version ${currentVersion}, cannot write version ${result.version}`,
      );
    }
    record.scoring.push(copy(result));
  }

  async getCurrentScoring(sessionId: string): Promise<ScoringResult | null> {
    return copy(this.record(sessionId).scoring.at(-1) ?? null);
  }

  async listScoringResults(sessionId: string): Promise<ScoringResult[]> {
    return copy(this.record(sessionId).scoring);
  }

  async putCoaching(sessionId: string, coaching: CoachingFeedback): Promise<void> {
    this.record(sessionId).coaching = copy(coaching);
  }

  async getCoaching(sessionId: string): Promise<CoachingFeedback | null> {
    return copy(this.record(sessionId).coaching);
  }

  async putReport(sessionId: string, report: Report): Promise<void> {
    this.record(sessionId).report = copy(report);
  }

  async getReport(sessionId: string): Promise<Report | null> {
    return copy(this.record(sessionId).report);
  }

  async appendProvenance(record: ProvenanceRecord): Promise<void> {
    this.record(record.sessionId).provenance.push(copy(record));
  }

  async listProvenance(sessionId: string): Promise<ProvenanceRecord[]> {
    return copy(this.record(sessionId).provenance);
  }

  async snapshot(sessionId: string): Promise<SessionSnapshot> {
    const record = this.record(sessionId);
    return copy({
      session: record.session,
      audio: record.audio,
      transcript: record.transcript,
      responses: [...record.responses.values()],
      scoring: record.scoring.at(-1) ?? null,
      coaching: record.coaching,
      report: record.report,
    });
  }
}
