// Sales Call Scorecard - Pipeline Coordinator
// Drives a session through upload → transcription → analysis → scoring and
// produces coaching and reports on demand.
//
// Every external call is time-boxed and retried by the injected RetryPolicy,
// and leaves a provenance record. Stage work for one session is serialized:
// same-process callers share the in-flight run, other workers wait on the
// session lease and then find the stage already done.
//
// Stages are idempotent. A stage whose artifact already exists commits the
// transition without calling the external service again.

import type { TaxonomyProvider } from "./checklist-taxonomy.js";
import type { ChecklistAnalyzer } from "./checklist-analyzer.js";
import type { CoachingGenerator } from "./coaching-generator.js";
import type { StageTimeouts } from "./config.js";
import { DEFAULT_TIMEOUTS } from "./config.js";
import {
  ConcurrencyConflict,
  PermanentExternalError,
  PreconditionError,
  SessionNotFoundError,
  classifyError,
  errorCode,
  errorMessage,
} from "./errors.js";
import type { FilePersistence } from "./file-persistence.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { ReportGenerator } from "./report-generator.js";
import type { RetryPolicy } from "./retry-policy.js";
import { RetryFailure, createRetryPolicy, runWithRetry, withTimeout } from "./retry-policy.js";
import type { ScoreOptions } from "./scoring-engine.js";
import { score } from "./scoring-engine.js";
import type { FailureInput, LeaseOptions, OverrideInput, SessionStateMachine } from "./session-state-machine.js";
import { isAtOrPast } from "./session-state-machine.js";
import type { SessionStore } from "./session-store.js";
import type { AudioStorage } from "./audio-storage.js";
import type { Transcriber } from "./transcription-engine.js";
import type { TTSConfig, TTSEngine } from "./tts-engine.js";
import { SessionStatus } from "./types.js";
import type {
  ActiveStatus,
  CoachingFeedback,
  ProvenanceStage,
  Report,
  ScoreTrigger,
  ScoringResult,
  Session,
  SessionResponse,
  SessionSnapshot,
  StageTrigger,
} from "./types.js";
import { InFlight } from "./utils/in-flight.js";
import type { DuplicatePolicy } from "./validation-reconciler.js";
import { parseJudgments, reconcile } from "./validation-reconciler.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface PipelineCoordinatorDeps {
  stateMachine: SessionStateMachine;
  store: SessionStore;
  taxonomy: TaxonomyProvider;
  audioStorage: AudioStorage;
  transcriber: Transcriber;
  analyzer: ChecklistAnalyzer;
  coachingGenerator?: CoachingGenerator;
  /** Narrates coaching when set together with filePersistence. */
  ttsEngine?: TTSEngine;
  ttsConfig?: Partial<TTSConfig>;
  reportGenerator?: ReportGenerator;
  filePersistence?: FilePersistence;
  retryPolicy?: RetryPolicy;
  timeouts?: Partial<StageTimeouts>;
  duplicatePolicy?: DuplicatePolicy;
  scoreOptions?: Pick<ScoreOptions, "ranking" | "riskThresholds">;
  /** How stage runs wait on a lease held by another worker. */
  lease?: LeaseOptions;
  logger?: Logger;
  now?: () => Date;
}

export type ScoreListener = (result: ScoringResult) => void;

export interface GenerateOptions {
  /** Produce a new artifact even when one exists for the current scoring version. */
  regenerate?: boolean;
}

/** Upper bound on advance() calls in runToCompletion; one per forward transition. */
const MAX_STAGES = 5;

export class PipelineCoordinator {
  private readonly stateMachine: SessionStateMachine;
  private readonly store: SessionStore;
  private readonly taxonomy: TaxonomyProvider;
  private readonly deps: PipelineCoordinatorDeps;
  private readonly retryPolicy: RetryPolicy;
  private readonly timeouts: StageTimeouts;
  private readonly leaseOptions: LeaseOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly stageRuns = new InFlight<Session>();
  private readonly coachingRuns = new InFlight<CoachingFeedback>();
  private readonly reportRuns = new InFlight<Report>();
  private scoreListeners: Set<ScoreListener> = new Set();

  private readonly stageRunners: Record<ActiveStatus, (sessionId: string) => Promise<Session>> = {
    [SessionStatus.DRAFT]: (id) => this.runUpload(id),
    [SessionStatus.UPLOADING]: (id) => this.runUploadConfirmation(id),
    [SessionStatus.PROCESSING]: (id) => this.runTranscription(id),
    [SessionStatus.ANALYZING]: (id) => this.runAnalysis(id),
    [SessionStatus.SCORING]: (id) => this.runScoring(id),
  };

  constructor(deps: PipelineCoordinatorDeps) {
    this.deps = deps;
    this.stateMachine = deps.stateMachine;
    this.store = deps.store;
    this.taxonomy = deps.taxonomy;
    this.retryPolicy = deps.retryPolicy ?? createRetryPolicy();
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...deps.timeouts };
    this.leaseOptions = { wait: true, pollIntervalMs: 25, ...deps.lease };
    this.logger = deps.logger ?? createLogger("PipelineCoordinator");
    this.now = deps.now ?? (() => new Date());
  }

  onScoreUpdated(listener: ScoreListener): () => void {
    this.scoreListeners.add(listener);
    return () => {
      this.scoreListeners.delete(listener);
    };
  }

  // ─── Stage entry points ───────────────────────────────────────────────────────

  /** draft → uploading once storage reports the recording. */
  attachAudio(sessionId: string): Promise<Session> {
    return this.advanceFrom(sessionId, SessionStatus.DRAFT);
  }

  /**
   * Store a recording and attach it. Only a draft session, or one that
   * failed before any audio was attached, takes a recording; later stages
   * already depend on the one they have.
   *
   * @throws PreconditionError for any other status
   */
  async uploadAudio(sessionId: string, data: Buffer, mimeType: string): Promise<Session> {
    await this.stateMachine.withLease(
      sessionId,
      async () => {
        const session = await this.stateMachine.getSession(sessionId);
        const failedBeforeAttach =
          session.status === SessionStatus.FAILED && session.failure?.stage === SessionStatus.DRAFT;
        if (session.status !== SessionStatus.DRAFT && !failedBeforeAttach) {
          throw new PreconditionError(
            `Session ${sessionId} is in "${session.status}" state; audio can only be uploaded to a draft session`,
          );
        }
        await this.deps.audioStorage.save(sessionId, data, mimeType);
        if (failedBeforeAttach) {
          await this.stateMachine.retry(sessionId);
        }
      },
      this.leaseOptions,
    );
    return this.attachAudio(sessionId);
  }

  /** uploading → processing once storage confirms the recording is readable. */
  confirmUpload(sessionId: string): Promise<Session> {
    return this.advanceFrom(sessionId, SessionStatus.UPLOADING);
  }

  /**
   * Run the stage implied by the current status and commit its transition.
   * Returns the session afterwards; a stage that failed leaves it in FAILED
   * with the failure recorded. COMPLETED is returned unchanged.
   *
   * @throws PreconditionError when the session is FAILED (retry it) or a
   *   prerequisite is missing
   */
  async advance(sessionId: string): Promise<Session> {
    const session = await this.stateMachine.getSession(sessionId);
    if (session.status === SessionStatus.COMPLETED) {
      return session;
    }
    if (session.status === SessionStatus.FAILED) {
      throw new PreconditionError(`Session ${sessionId} has failed; retry it before advancing`);
    }
    const stage = session.status;
    return this.stageRuns.run(`${sessionId}:${stage}`, () =>
      this.stateMachine.withLease(sessionId, () => this.runStage(sessionId, stage), this.leaseOptions),
    );
  }

  /** Advance until the session is completed or failed. */
  async runToCompletion(sessionId: string): Promise<Session> {
    let session = await this.stateMachine.getSession(sessionId);
    for (let step = 0; step < MAX_STAGES && session.status !== SessionStatus.COMPLETED; step++) {
      if (session.status === SessionStatus.FAILED) break;
      session = await this.advance(sessionId);
    }
    return session;
  }

  /** FAILED → the failed stage, then continue the pipeline from there. */
  async retry(sessionId: string): Promise<Session> {
    await this.stateMachine.retry(sessionId);
    return this.runToCompletion(sessionId);
  }

  /**
   * At-least-once ingress. A trigger whose target is already reached or
   * passed, or that arrives for a failed session, changes nothing.
   */
  async handleTrigger(trigger: StageTrigger): Promise<Session> {
    let session = await this.stateMachine.getSession(trigger.sessionId);
    while (!isAtOrPast(session.status, trigger.targetStage)) {
      if (session.status === SessionStatus.FAILED) {
        this.logger.warn(`Trigger for session ${session.id} → ${trigger.targetStage} ignored: session has failed`);
        return session;
      }
      session = await this.advance(trigger.sessionId);
    }
    return session;
  }

  private async advanceFrom(sessionId: string, stage: ActiveStatus): Promise<Session> {
    const session = await this.stateMachine.getSession(sessionId);
    if (session.status === stage) {
      return this.advance(sessionId);
    }
    if (session.status === SessionStatus.FAILED) {
      throw new PreconditionError(`Session ${sessionId} has failed; retry it first`);
    }
    if (!isAtOrPast(session.status, stage)) {
      throw new PreconditionError(`Session ${sessionId} is in "${session.status}", not "${stage}"`);
    }
    return session;
  }

  // ─── Stage bodies (run under the session lease) ───────────────────────────────

  private async runStage(sessionId: string, expected: ActiveStatus): Promise<Session> {
    const session = await this.stateMachine.getSession(sessionId);
    if (session.status !== expected) {
      this.logger.debug(`Session ${sessionId} already moved from "${expected}" to "${session.status}"`);
      return session;
    }

    try {
      return await this.stageRunners[expected](sessionId);
    } catch (err) {
      if (
        err instanceof PreconditionError ||
        err instanceof ConcurrencyConflict ||
        err instanceof SessionNotFoundError
      ) {
        throw err;
      }
      return this.stateMachine.fail(sessionId, toFailureInput(err));
    }
  }

  private async runUpload(sessionId: string): Promise<Session> {
    if (!(await this.store.getAudio(sessionId))) {
      const artifact = await this.external(sessionId, "upload", "audio-storage", this.timeouts.storageMs, () =>
        this.deps.audioStorage.describe(sessionId),
      );
      if (!artifact) {
        throw new PreconditionError(`No audio has been uploaded for session ${sessionId}`);
      }
      await this.store.putAudio(sessionId, artifact);
    }
    return this.stateMachine.transition(sessionId, SessionStatus.UPLOADING);
  }

  private async runUploadConfirmation(sessionId: string): Promise<Session> {
    const audio = await this.requireAudio(sessionId);
    await this.external(sessionId, "upload", "audio-storage", this.timeouts.storageMs, async () => {
      const stored = await this.deps.audioStorage.describe(sessionId);
      if (!stored || stored.locator !== audio.locator) {
        throw new PermanentExternalError(`Audio for session ${sessionId} is no longer in storage`);
      }
      return stored;
    });
    return this.stateMachine.transition(sessionId, SessionStatus.PROCESSING);
  }

  private async runTranscription(sessionId: string): Promise<Session> {
    const existing = await this.store.getTranscript(sessionId);
    if (!existing || !existing.text.trim()) {
      const audio = await this.requireAudio(sessionId);
      const bytes = await this.external(sessionId, "transcription", "audio-storage", this.timeouts.storageMs, () =>
        this.deps.audioStorage.read(audio.locator),
      );

      const { transcriber } = this.deps;
      const startedAt = Date.now();
      const result = await this.external(
        sessionId,
        "transcription",
        transcriber.service,
        this.timeouts.transcriptionMs,
        async () => {
          const transcribed = await transcriber.transcribe(audio, bytes);
          if (!transcribed.text.trim()) {
            throw new PermanentExternalError("Transcription returned no speech");
          }
          return transcribed;
        },
        (r) => r.requestId,
      );

      await this.store.putTranscript(sessionId, {
        ...result,
        transcribedAt: this.now(),
        processingMs: Date.now() - startedAt,
      });
      this.logger.info(`Session ${sessionId}: transcribed ${result.wordCount} words`);
    }
    return this.stateMachine.transition(sessionId, SessionStatus.ANALYZING);
  }

  private async runAnalysis(sessionId: string): Promise<Session> {
    const taxonomy = this.taxonomy.current();
    const stored = await this.store.getResponses(sessionId);
    const covered = new Set(stored.responses.map((r) => r.itemId));
    const complete = stored.reconciledAt !== null && taxonomy.activeItems().every((i) => covered.has(i.id));

    if (!complete) {
      const transcript = await this.store.getTranscript(sessionId);
      if (!transcript) {
        throw new PreconditionError(`Session ${sessionId} has no transcript`);
      }

      const { analyzer } = this.deps;
      const completion = await this.external(
        sessionId,
        "analysis",
        analyzer.service,
        this.timeouts.analysisMs,
        () => analyzer.analyze(transcript.text, taxonomy.itemDefinitions()),
        (c) => c.requestId,
      );

      const parsed = parseJudgments(completion.payload);
      const result = reconcile(sessionId, taxonomy, parsed.judgments, stored.responses, {
        duplicatePolicy: this.deps.duplicatePolicy,
        now: this.now(),
      });
      await this.store.writeResponses(sessionId, result.responses);

      const warnings = [...parsed.warnings, ...result.warnings];
      if (warnings.length > 0) {
        this.logger.warn(`Session ${sessionId}: ${warnings.length} data quality warnings in analysis output`);
        for (const w of warnings) {
          this.logger.debug(`  ${w.kind}: ${w.message}`);
        }
      }
      this.logger.info(
        `Session ${sessionId}: reconciled ${result.matchedCount}/${result.responses.length} items from analysis`,
      );
    }
    return this.stateMachine.transition(sessionId, SessionStatus.SCORING);
  }

  private async runScoring(sessionId: string): Promise<Session> {
    if (!(await this.store.getCurrentScoring(sessionId))) {
      await this.computeScore(sessionId, "pipeline", null);
    }
    return this.stateMachine.transition(sessionId, SessionStatus.COMPLETED);
  }

  // ─── Scoring ──────────────────────────────────────────────────────────────────

  /**
   * Score the current responses as a new version. Does not change status.
   * Every call writes its own version; the lease orders concurrent calls.
   * @throws PreconditionError before reconciliation
   */
  recomputeScore(sessionId: string, actorId: string | null): Promise<ScoringResult> {
    return this.stateMachine.withLease(
      sessionId,
      () => this.rescore(sessionId, "manual_recompute", actorId),
      this.leaseOptions,
    );
  }

  /**
   * Record an override and rescore when the session already has a score.
   * Runs under the session lease, so an override that arrives while the
   * pipeline is scoring lands after that score and rescores on top of it.
   */
  applyOverride(sessionId: string, itemId: number, input: OverrideInput): Promise<SessionResponse> {
    return this.stateMachine.withLease(
      sessionId,
      async () => {
        const response = await this.stateMachine.applyOverride(sessionId, itemId, input);
        await this.rescoreAfterOverride(sessionId, input.actorId);
        return response;
      },
      this.leaseOptions,
    );
  }

  clearOverride(sessionId: string, itemId: number, actorId: string): Promise<SessionResponse> {
    return this.stateMachine.withLease(
      sessionId,
      async () => {
        const response = await this.stateMachine.clearOverride(sessionId, itemId, actorId);
        await this.rescoreAfterOverride(sessionId, actorId);
        return response;
      },
      this.leaseOptions,
    );
  }

  /** Caller holds the lease. */
  private async rescoreAfterOverride(sessionId: string, actorId: string): Promise<void> {
    if (await this.store.getCurrentScoring(sessionId)) {
      await this.rescore(sessionId, "override", actorId);
    }
  }

  /** Caller holds the lease. */
  private async rescore(sessionId: string, trigger: ScoreTrigger, actorId: string | null): Promise<ScoringResult> {
    const result = await this.computeScore(sessionId, trigger, actorId);
    await this.stateMachine.markUnsynced(sessionId);
    return result;
  }

  private async computeScore(sessionId: string, trigger: ScoreTrigger, actorId: string | null): Promise<ScoringResult> {
    const taxonomy = this.taxonomy.current();
    const { responses, reconciledAt } = await this.store.getResponses(sessionId);
    if (!reconciledAt) {
      throw new PreconditionError(`Session ${sessionId} has not been reconciled; nothing to score`);
    }

    const previous = await this.store.getCurrentScoring(sessionId);
    const startedAt = this.now();
    const snapshot = score(responses, taxonomy, new Map(), {
      ...this.deps.scoreOptions,
      previousTotal: previous?.total ?? null,
    });
    const result: ScoringResult = {
      ...snapshot,
      sessionId,
      version: (previous?.version ?? 0) + 1,
      taxonomyVersion: taxonomy.version,
      trigger,
      actorId,
      computedAt: this.now(),
    };
    await this.store.appendScoringResult(result);
    await this.store.appendProvenance({
      sessionId,
      stage: "scoring",
      service: "scoring-engine",
      attempts: 1,
      startedAt,
      finishedAt: result.computedAt,
      outcome: "success",
      requestId: null,
      error: null,
    });

    this.logger.info(
      `Session ${sessionId}: scored v${result.version} (${trigger}) ${result.total}/${result.maxScore}, ${result.riskBand}`,
    );
    for (const listener of this.scoreListeners) {
      try {
        listener(result);
      } catch (err) {
        this.logger.warn(`Score listener threw for session ${sessionId}: ${errorMessage(err)}`);
      }
    }
    return result;
  }

  // ─── Coaching and reports ─────────────────────────────────────────────────────

  /**
   * Coaching for the current scoring version. Returns the stored coaching
   * when it already matches that version, unless `regenerate` is set.
   */
  generateCoaching(sessionId: string, options: GenerateOptions = {}): Promise<CoachingFeedback> {
    return this.coachingRuns.run(sessionId, () => this.produceCoaching(sessionId, options.regenerate ?? false));
  }

  regenerateCoaching(sessionId: string): Promise<CoachingFeedback> {
    return this.generateCoaching(sessionId, { regenerate: true });
  }

  generateReport(sessionId: string, options: GenerateOptions = {}): Promise<Report> {
    return this.reportRuns.run(sessionId, () => this.produceReport(sessionId, options.regenerate ?? false));
  }

  regenerateReport(sessionId: string): Promise<Report> {
    return this.generateReport(sessionId, { regenerate: true });
  }

  private async produceCoaching(sessionId: string, regenerate: boolean): Promise<CoachingFeedback> {
    const generator = this.deps.coachingGenerator;
    if (!generator) {
      throw new PreconditionError("Coaching is not configured");
    }
    const snapshot = await this.requireScored(sessionId);
    const scoring = snapshot.scoring;
    if (snapshot.coaching && snapshot.coaching.scoringVersion === scoring.version && !regenerate) {
      return snapshot.coaching;
    }

    const draft = await this.external(
      sessionId,
      "coaching",
      generator.service,
      this.timeouts.coachingMs,
      () =>
        generator.generate({
          transcriptText: snapshot.transcript?.text ?? "",
          scoring,
          taxonomy: this.taxonomy.current(),
          deal: snapshot.session.deal,
        }),
      (d) => d.requestId,
    );

    const coaching: CoachingFeedback = {
      feedbackText: draft.feedbackText,
      strengths: draft.strengths,
      improvementAreas: draft.improvementAreas,
      actionItems: draft.actionItems,
      fallback: draft.fallback,
      audio: await this.narrate(sessionId, draft.feedbackText),
      scoringVersion: scoring.version,
      generatedAt: this.now(),
    };
    await this.store.putCoaching(sessionId, coaching);
    await this.stateMachine.markUnsynced(sessionId);
    this.logger.info(`Session ${sessionId}: coaching generated for scoring v${scoring.version}`);
    return coaching;
  }

  /** Narrated coaching is optional; a TTS failure leaves the text coaching in place. */
  private async narrate(sessionId: string, text: string): Promise<CoachingFeedback["audio"]> {
    const { ttsEngine, filePersistence } = this.deps;
    if (!ttsEngine || !filePersistence) return null;
    try {
      const speech = await this.external(sessionId, "coaching", ttsEngine.service, this.timeouts.coachingMs, () =>
        ttsEngine.synthesize(text, this.deps.ttsConfig),
      );
      const locator = await filePersistence.saveCoachingAudio(sessionId, speech.audio);
      return { locator, estimatedSeconds: speech.estimatedSeconds };
    } catch (err) {
      this.logger.warn(`Session ${sessionId}: coaching narration skipped: ${errorMessage(err)}`);
      return null;
    }
  }

  private async produceReport(sessionId: string, regenerate: boolean): Promise<Report> {
    const generator = this.deps.reportGenerator;
    if (!generator) {
      throw new PreconditionError("Report generation is not configured");
    }
    const snapshot = await this.requireScored(sessionId);
    const scoring = snapshot.scoring;
    if (snapshot.report && snapshot.report.scoringVersion === scoring.version && !regenerate) {
      return snapshot.report;
    }

    const content = await this.external(sessionId, "report", generator.service, this.timeouts.reportMs, () =>
      generator.generate({
        session: snapshot.session,
        scoring,
        responses: snapshot.responses,
        taxonomy: this.taxonomy.current(),
        coaching: snapshot.coaching,
      }),
    );
    const report: Report = {
      format: "text/markdown",
      content,
      scoringVersion: scoring.version,
      generatedAt: this.now(),
    };
    await this.store.putReport(sessionId, report);
    await this.stateMachine.markUnsynced(sessionId);
    this.logger.info(`Session ${sessionId}: report generated for scoring v${scoring.version}`);
    return report;
  }

  // ─── Read side and export ─────────────────────────────────────────────────────

  async getSnapshot(sessionId: string): Promise<SessionSnapshot> {
    await this.stateMachine.getSession(sessionId);
    return this.store.snapshot(sessionId);
  }

  async getScoreHistory(sessionId: string): Promise<ScoringResult[]> {
    await this.stateMachine.getSession(sessionId);
    return this.store.listScoringResults(sessionId);
  }

  /**
   * Write the session's outputs to disk and mark it synced. Runs under the
   * lease so no override lands between the snapshot and the sync flag.
   * Returns the paths written.
   */
  async exportSession(sessionId: string): Promise<string[]> {
    const persistence = this.deps.filePersistence;
    if (!persistence) {
      throw new PreconditionError("File export is not configured");
    }
    const paths = await this.stateMachine.withLease(
      sessionId,
      async () => {
        const written = await persistence.saveSession(await this.getSnapshot(sessionId));
        await this.stateMachine.markSynced(sessionId);
        return written;
      },
      this.leaseOptions,
    );
    this.logger.info(`Session ${sessionId}: exported ${paths.length} files`);
    return paths;
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────────

  private async requireAudio(sessionId: string) {
    const audio = await this.store.getAudio(sessionId);
    if (!audio) {
      throw new PreconditionError(`Session ${sessionId} has no audio artifact`);
    }
    return audio;
  }

  private async requireScored(sessionId: string): Promise<SessionSnapshot & { scoring: ScoringResult }> {
    const snapshot = await this.getSnapshot(sessionId);
    const { scoring } = snapshot;
    if (!scoring) {
      throw new PreconditionError(`Session ${sessionId} has no scoring result yet`);
    }
    return { ...snapshot, scoring };
  }

  /**
   * One external call under the retry policy, each attempt time-boxed.
   * Records provenance for the call either way.
   *
   * @throws RetryFailure when the error is permanent or the budget is spent
   */
  private async external<T>(
    sessionId: string,
    stage: ProvenanceStage,
    service: string,
    timeoutMs: number,
    operation: () => Promise<T>,
    requestIdOf?: (value: T) => string | null,
  ): Promise<T> {
    const startedAt = this.now();
    try {
      const { value, attempts } = await runWithRetry(
        () => withTimeout(operation, timeoutMs, service),
        this.retryPolicy,
        {
          onRetry: (attempt, err, delayMs) =>
            this.logger.warn(
              `Session ${sessionId}: ${service} attempt ${attempt} failed (${errorMessage(err)}); retrying in ${delayMs}ms`,
            ),
        },
      );
      await this.store.appendProvenance({
        sessionId,
        stage,
        service,
        attempts,
        startedAt,
        finishedAt: this.now(),
        outcome: "success",
        requestId: requestIdOf?.(value) ?? null,
        error: null,
      });
      return value;
    } catch (err) {
      if (err instanceof RetryFailure) {
        await this.store.appendProvenance({
          sessionId,
          stage,
          service,
          attempts: err.attempts,
          startedAt,
          finishedAt: this.now(),
          outcome: "failure",
          requestId: null,
          error: err.message,
        });
      }
      throw err;
    }
  }
}

function toFailureInput(err: unknown): FailureInput {
  if (err instanceof RetryFailure) {
    return {
      classification: err.classification,
      code: errorCode(err.error),
      message: err.message,
      attempts: err.attempts,
      retries: err.retries,
    };
  }
  return {
    classification: classifyError(err),
    code: errorCode(err),
    message: errorMessage(err),
    attempts: 1,
    retries: 0,
  };
}
