// Sales Call Scorecard - Scoring Engine
//
// Pure function from a response set (+ manual overrides) to a ScoreSnapshot.
// No I/O, no clock: calling score() twice with the same inputs yields
// deep-equal output. Persisting the snapshot and supplying the previous total
// are the caller's job.

import type { ChecklistTaxonomy } from "./checklist-taxonomy.js";
import type {
  CategoryScore,
  ChecklistCategory,
  ChecklistItem,
  ManualOverride,
  RankedItem,
  RiskBand,
  ScoreSnapshot,
  SessionResponse,
  Verdict,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Decimal places kept on every reported score. */
export const SCORE_PRECISION = 4;

export interface RiskThresholds {
  /** normalized total at or above this is healthy */
  healthy: number;
  /** normalized total at or above this (and below healthy) is caution */
  caution: number;
}

export const DEFAULT_RISK_THRESHOLDS: RiskThresholds = { healthy: 80, caution: 60 };

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function roundScore(value: number): number {
  const factor = 10 ** SCORE_PRECISION;
  return Math.round(value * factor) / factor;
}

/** Scale a raw total onto 0–100. A taxonomy with no points normalizes to 0. */
export function normalizeTotal(total: number, maxScore: number): number {
  if (maxScore <= 0) return 0;
  return (total / maxScore) * 100;
}

export function classifyRisk(normalized: number, thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS): RiskBand {
  if (normalized >= thresholds.healthy) return "healthy";
  if (normalized >= thresholds.caution) return "caution";
  return "at_risk";
}

/** Collect the overrides already recorded on a response set. */
export function overridesFrom(responses: readonly SessionResponse[]): Map<number, ManualOverride> {
  const overrides = new Map<number, ManualOverride>();
  for (const r of responses) {
    if (r.override) overrides.set(r.itemId, r.override);
  }
  return overrides;
}

/** The verdict that counts: the override's when there is one, else the AI's. */
export function effectiveVerdict(response: SessionResponse | undefined, override: ManualOverride | undefined): Verdict {
  if (override) return override.verdict;
  return response?.verdict ?? "undetermined";
}

// ─── Ranking ────────────────────────────────────────────────────────────────────

export interface RankCandidate {
  item: ChecklistItem;
  category: ChecklistCategory;
}

export interface RankingPolicy {
  limit: number;
  compareStrengths(a: RankCandidate, b: RankCandidate): number;
  compareGaps(a: RankCandidate, b: RankCandidate): number;
}

export const DEFAULT_RANKING_POLICY: RankingPolicy = {
  limit: 3,
  compareStrengths: (a, b) =>
    b.item.points - a.item.points ||
    a.category.order - b.category.order ||
    a.item.ordinal - b.item.ordinal,
  compareGaps: (a, b) =>
    b.category.weight - a.category.weight ||
    a.item.ordinal - b.item.ordinal ||
    a.category.order - b.category.order,
};

function toRanked(c: RankCandidate): RankedItem {
  return {
    itemId: c.item.id,
    categoryId: c.category.id,
    title: c.item.title,
    points: roundScore(c.item.points),
  };
}

// ─── score() ────────────────────────────────────────────────────────────────────

export interface ScoreOptions {
  /** Total of the session's previous snapshot; null/undefined when none exists. */
  previousTotal?: number | null;
  ranking?: Partial<RankingPolicy>;
  riskThresholds?: RiskThresholds;
}

/**
 * Score a response set against the taxonomy's active items.
 *
 * An item earns its full points when its effective verdict is "validated"
 * and nothing otherwise; confidence is informational only. Overrides passed
 * in `overrides` take precedence over those recorded on the responses.
 * Responses for inactive or unknown items are ignored; active items with no
 * response score zero.
 */
export function score(
  responses: readonly SessionResponse[],
  taxonomy: ChecklistTaxonomy,
  overrides: ReadonlyMap<number, ManualOverride> = new Map(),
  options: ScoreOptions = {},
): ScoreSnapshot {
  const ranking: RankingPolicy = { ...DEFAULT_RANKING_POLICY, ...options.ranking };
  const responseByItem = new Map(responses.map((r) => [r.itemId, r]));

  const strengths: RankCandidate[] = [];
  const gaps: RankCandidate[] = [];
  const categoryScores: CategoryScore[] = [];
  let validatedCount = 0;

  for (const category of taxonomy.activeCategories()) {
    const items = taxonomy.itemsInCategory(category.id);
    let raw = 0;
    let validatedInCategory = 0;

    for (const item of items) {
      const response = responseByItem.get(item.id);
      const verdict = effectiveVerdict(response, overrides.get(item.id) ?? response?.override ?? undefined);
      if (verdict === "validated") {
        raw += item.points;
        validatedInCategory++;
        strengths.push({ item, category });
      } else {
        gaps.push({ item, category });
      }
    }

    const max = roundScore(taxonomy.categoryMaxScore(category.id));
    categoryScores.push({
      categoryId: category.id,
      name: category.name,
      score: Math.min(roundScore(raw), max),
      maxScore: max,
      validatedCount: validatedInCategory,
      itemCount: items.length,
    });
    validatedCount += validatedInCategory;
  }

  const total = roundScore(categoryScores.reduce((sum, c) => sum + c.score, 0));
  const maxScore = roundScore(taxonomy.totalMaxScore());
  const normalized = normalizeTotal(total, maxScore);
  const previousTotal = options.previousTotal ?? null;

  return {
    total,
    maxScore,
    normalizedTotal: roundScore(normalized),
    riskBand: classifyRisk(normalized, options.riskThresholds),
    categoryScores,
    topStrengths: strengths.sort(ranking.compareStrengths).slice(0, ranking.limit).map(toRanked),
    topGaps: gaps.sort(ranking.compareGaps).slice(0, ranking.limit).map(toRanked),
    validatedCount,
    totalCount: taxonomy.activeItems().length,
    previousTotal,
    delta: previousTotal === null ? null : roundScore(total - previousTotal),
  };
}
