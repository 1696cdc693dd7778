// Sales Call Scorecard - Shared TypeScript interfaces and types
//
// Runtime code lives in the component modules; this barrel holds only types
// and the SessionStatus enum.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionStatus {
  DRAFT = "draft",
  UPLOADING = "uploading",
  PROCESSING = "processing",
  ANALYZING = "analyzing",
  SCORING = "scoring",
  COMPLETED = "completed",
  FAILED = "failed",
}

/** Statuses in which pipeline work can still happen (everything but the two end states). */
export type ActiveStatus = Exclude<SessionStatus, SessionStatus.COMPLETED | SessionStatus.FAILED>;

export type ErrorClassification = "transient" | "permanent";

export interface FailureInfo {
  /** The status the session was in when the failure happened; retry returns here. */
  stage: ActiveStatus;
  classification: ErrorClassification;
  code: string;
  message: string;
  /** Calls made to the failing service, first attempt included. */
  attempts: number;
  /** attempts - 1 for a retried call; 0 when the error was permanent or the stage was local */
  retries: number;
  failedAt: Date;
}

// ─── Checklist Taxonomy ─────────────────────────────────────────────────────────

export interface ChecklistCategory {
  id: number;
  name: string;
  description: string;
  order: number;
  /** Ranking weight used to order gaps. Default 1. */
  weight: number;
  /** Configured max; the effective max is the sum of active item points. */
  maxScore: number;
  active: boolean;
}

export interface ChecklistItem {
  id: number;
  categoryId: number;
  ordinal: number;
  title: string;
  definition: string;
  /** Fraction of the category's max score carried by this item. */
  weight: number;
  /** weight × category maxScore */
  points: number;
  active: boolean;
}

export interface TaxonomyDefinition {
  version: string;
  categories: Array<Omit<ChecklistCategory, "active"> & { active?: boolean }>;
  items: Array<Omit<ChecklistItem, "points" | "active"> & { active?: boolean }>;
}

/** Subset of an item handed to the analysis service. */
export interface ItemDefinition {
  id: number;
  category: string;
  title: string;
  definition: string;
}

// ─── Responses ──────────────────────────────────────────────────────────────────

export type Verdict = "validated" | "not_validated" | "undetermined";

export interface AIJudgment {
  itemId: number;
  verdict: Verdict;
  confidence: number;
  evidence: string;
  rationale: string;
}

export interface ManualOverride {
  verdict: Exclude<Verdict, "undetermined">;
  actorId: string;
  reason: string;
  overriddenAt: Date;
}

export interface SessionResponse {
  sessionId: string;
  itemId: number;
  /** AI judgment, kept even when shadowed by an override. */
  verdict: Verdict;
  confidence: number;
  evidence: string;
  rationale: string;
  override: ManualOverride | null;
  updatedAt: Date;
}

export type DataQualityWarningKind =
  | "unknown_item"
  | "inactive_item"
  | "missing_item_id"
  | "confidence_clamped"
  | "malformed_judgment"
  | "duplicate_judgment";

export interface DataQualityWarning {
  kind: DataQualityWarningKind;
  itemId: number | null;
  message: string;
}

// ─── Scoring ────────────────────────────────────────────────────────────────────

export type RiskBand = "healthy" | "caution" | "at_risk";

export interface CategoryScore {
  categoryId: number;
  name: string;
  score: number;
  maxScore: number;
  validatedCount: number;
  itemCount: number;
}

export interface RankedItem {
  itemId: number;
  categoryId: number;
  title: string;
  points: number;
}

/** Output of the pure scoring function. Contains no timestamps so it is reproducible. */
export interface ScoreSnapshot {
  total: number;
  maxScore: number;
  /** total on a 0–100 scale */
  normalizedTotal: number;
  riskBand: RiskBand;
  categoryScores: CategoryScore[];
  topStrengths: RankedItem[];
  topGaps: RankedItem[];
  validatedCount: number;
  totalCount: number;
  previousTotal: number | null;
  delta: number | null;
}

export type ScoreTrigger = "pipeline" | "manual_recompute" | "override";

export interface ScoringResult extends ScoreSnapshot {
  sessionId: string;
  version: number;
  taxonomyVersion: string;
  trigger: ScoreTrigger;
  actorId: string | null;
  computedAt: Date;
}

// ─── Pipeline Artifacts ─────────────────────────────────────────────────────────

export interface AudioArtifact {
  locator: string;
  mimeType: string;
  durationSeconds: number | null;
  sizeBytes: number | null;
  attachedAt: Date;
}

export interface TranscriptionResult {
  text: string;
  language: string | null;
  durationSeconds: number | null;
  wordCount: number;
  requestId: string | null;
}

export interface Transcript extends TranscriptionResult {
  transcribedAt: Date;
  processingMs: number;
}

export interface CoachingPoint {
  point: string;
  explanation: string;
}

export interface CoachingFeedback {
  feedbackText: string;
  strengths: CoachingPoint[];
  improvementAreas: CoachingPoint[];
  actionItems: string[];
  audio: { locator: string; estimatedSeconds: number } | null;
  /** true when the model output could not be parsed and a rule-based summary was used */
  fallback: boolean;
  scoringVersion: number;
  generatedAt: Date;
}

export interface Report {
  format: "text/markdown";
  content: string;
  scoringVersion: number;
  generatedAt: Date;
}

export type ProvenanceStage = "upload" | "transcription" | "analysis" | "scoring" | "coaching" | "report";

export interface ProvenanceRecord {
  sessionId: string;
  stage: ProvenanceStage;
  service: string;
  attempts: number;
  startedAt: Date;
  finishedAt: Date;
  outcome: "success" | "failure";
  requestId: string | null;
  error: string | null;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface DealMetadata {
  customerName: string;
  opportunityName?: string;
  decisionInfluencer?: string;
  dealStage?: string;
  [key: string]: string | undefined;
}

export interface Session {
  id: string;
  ownerId: string;
  deal: DealMetadata;
  status: SessionStatus;
  /** Incremented on every write; transitions compare-and-set against it. */
  version: number;
  createdAt: Date;
  submittedAt: Date | null;
  completedAt: Date | null;
  /** false once anything changes after the last export */
  isSynced: boolean;
  failure: FailureInfo | null;
}

/** Everything downstream generators need, read in one consistent pass. */
export interface SessionSnapshot {
  session: Session;
  audio: AudioArtifact | null;
  transcript: Transcript | null;
  responses: SessionResponse[];
  scoring: ScoringResult | null;
  coaching: CoachingFeedback | null;
  report: Report | null;
}

// ─── Trigger Ingress ────────────────────────────────────────────────────────────

export interface StageTrigger {
  sessionId: string;
  targetStage: SessionStatus;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

export type ClientMessage =
  | { type: "subscribe"; sessionId: string }
  | { type: "unsubscribe"; sessionId: string };

export type ServerMessage =
  | { type: "status_change"; sessionId: string; status: SessionStatus; failure: FailureInfo | null }
  | { type: "score_updated"; sessionId: string; version: number; total: number; riskBand: RiskBand; delta: number | null }
  | { type: "subscribed"; sessionId: string }
  | { type: "error"; message: string };
