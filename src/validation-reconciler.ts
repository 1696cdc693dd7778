// Sales Call Scorecard - Validation Reconciler
//
// Turns the analysis service's raw output into exactly one response per
// active checklist item. Two steps:
//   1. parseJudgments(): untrusted payload → tagged AIJudgment records.
//      Unknown fields are ignored, missing fields defaulted.
//   2. reconcile(): judgments → complete response set. Duplicates resolved,
//      gaps filled with "undetermined", unknown/inactive ids discarded with a
//      data-quality warning, overridden responses left untouched.
//
// Both steps are synchronous and never fail the pipeline on bad AI output.

import type { ChecklistTaxonomy } from "./checklist-taxonomy.js";
import type { AIJudgment, DataQualityWarning, SessionResponse, Verdict } from "./types.js";

// ─── Parsing ────────────────────────────────────────────────────────────────────

const VALIDATED_WORDS = new Set(["validated", "yes", "true", "pass", "passed", "demonstrated"]);
const NOT_VALIDATED_WORDS = new Set(["not_validated", "not validated", "no", "false", "fail", "failed", "invalidated"]);
const UNDETERMINED_WORDS = new Set(["undetermined", "unknown", "not_found", "n/a", "unclear", ""]);

export interface ParsedJudgments {
  judgments: AIJudgment[];
  warnings: DataQualityWarning[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstDefined(obj: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (obj[key] !== undefined) return obj[key];
  }
  return undefined;
}

function parseItemId(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) return Number(value);
  return null;
}

function parseVerdict(value: unknown): Verdict | null {
  if (value === undefined || value === null) return "undetermined";
  if (typeof value === "boolean") return value ? "validated" : "not_validated";
  if (typeof value === "string") {
    const word = value.trim().toLowerCase();
    if (VALIDATED_WORDS.has(word)) return "validated";
    if (NOT_VALIDATED_WORDS.has(word)) return "not_validated";
    if (UNDETERMINED_WORDS.has(word)) return "undetermined";
  }
  return null;
}

function parseConfidence(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isNaN(n) ? 0 : n;
  }
  return 0;
}

function parseText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Parse an analysis payload. Accepts a bare array or an object carrying an
 * `items` / `judgments` / `results` array. Entries may name the item as
 * `item_id`, `itemId` or `id` and the verdict as `verdict`, `answer` or
 * `validated`.
 */
export function parseJudgments(raw: unknown): ParsedJudgments {
  const warnings: DataQualityWarning[] = [];
  let entries: unknown[] = [];

  if (Array.isArray(raw)) {
    entries = raw;
  } else if (isRecord(raw)) {
    const list = firstDefined(raw, ["items", "judgments", "results"]);
    if (Array.isArray(list)) {
      entries = list;
    } else if (list !== undefined) {
      warnings.push({ kind: "malformed_judgment", itemId: null, message: "Judgment list is not an array" });
    }
  } else if (raw !== undefined && raw !== null) {
    warnings.push({ kind: "malformed_judgment", itemId: null, message: `Unexpected payload of type ${typeof raw}` });
  }

  const judgments: AIJudgment[] = [];
  entries.forEach((entry, index) => {
    if (!isRecord(entry)) {
      warnings.push({ kind: "malformed_judgment", itemId: null, message: `Entry ${index} is not an object` });
      return;
    }

    const itemId = parseItemId(firstDefined(entry, ["item_id", "itemId", "id"]));
    if (itemId === null) {
      warnings.push({ kind: "missing_item_id", itemId: null, message: `Entry ${index} has no usable item id` });
      return;
    }

    const rawVerdict = firstDefined(entry, ["verdict", "answer", "validated"]);
    let verdict = parseVerdict(rawVerdict);
    if (verdict === null) {
      warnings.push({
        kind: "malformed_judgment",
        itemId,
        message: `Unrecognized verdict ${JSON.stringify(rawVerdict)}; treated as undetermined`,
      });
      verdict = "undetermined";
    }

    judgments.push({
      itemId,
      verdict,
      confidence: parseConfidence(entry.confidence),
      evidence: parseText(firstDefined(entry, ["evidence", "evidence_text", "quote"])),
      rationale: parseText(firstDefined(entry, ["rationale", "reasoning", "ai_reasoning"])),
    });
  });

  return { judgments, warnings };
}

// ─── Reconciliation ─────────────────────────────────────────────────────────────

/**
 * How to pick between several judgments for the same item.
 * - "last": the later judgment supersedes earlier ones.
 * - "highest_confidence": the most confident one wins; equal confidence goes to the later one.
 */
export type DuplicatePolicy = "last" | "highest_confidence";

export interface ReconcileOptions {
  duplicatePolicy?: DuplicatePolicy;
  now?: Date;
}

export interface ReconcileResult {
  /** One response per active item, in taxonomy order. */
  responses: SessionResponse[];
  warnings: DataQualityWarning[];
  /** Active items that received a judgment. */
  matchedCount: number;
}

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function reconcile(
  sessionId: string,
  taxonomy: ChecklistTaxonomy,
  judgments: readonly AIJudgment[],
  existing: readonly SessionResponse[] = [],
  options: ReconcileOptions = {},
): ReconcileResult {
  const policy = options.duplicatePolicy ?? "last";
  const now = options.now ?? new Date();
  const warnings: DataQualityWarning[] = [];

  const chosen = new Map<number, AIJudgment>();
  for (const judgment of judgments) {
    const item = taxonomy.getItem(judgment.itemId);
    if (!item) {
      warnings.push({
        kind: "unknown_item",
        itemId: judgment.itemId,
        message: `Judgment for unknown item ${judgment.itemId} discarded`,
      });
      continue;
    }
    if (!taxonomy.isActive(judgment.itemId)) {
      warnings.push({
        kind: "inactive_item",
        itemId: judgment.itemId,
        message: `Judgment for inactive item ${judgment.itemId} discarded`,
      });
      continue;
    }

    const confidence = clampConfidence(judgment.confidence);
    if (confidence !== judgment.confidence) {
      warnings.push({
        kind: "confidence_clamped",
        itemId: judgment.itemId,
        message: `Confidence ${judgment.confidence} for item ${judgment.itemId} clamped to ${confidence}`,
      });
    }
    const normalized: AIJudgment = {
      ...judgment,
      confidence: judgment.verdict === "undetermined" ? 0 : confidence,
    };

    const previous = chosen.get(judgment.itemId);
    if (previous) {
      warnings.push({
        kind: "duplicate_judgment",
        itemId: judgment.itemId,
        message: `Multiple judgments for item ${judgment.itemId}; resolved by "${policy}"`,
      });
      if (policy === "highest_confidence" && previous.confidence > normalized.confidence) {
        continue;
      }
    }
    chosen.set(judgment.itemId, normalized);
  }

  const existingByItem = new Map(existing.map((r) => [r.itemId, r]));
  let matchedCount = 0;

  const responses = taxonomy.activeItems().map((item): SessionResponse => {
    const judgment = chosen.get(item.id);
    if (judgment) matchedCount++;

    const prior = existingByItem.get(item.id);
    if (prior?.override) {
      return prior;
    }

    return {
      sessionId,
      itemId: item.id,
      verdict: judgment?.verdict ?? "undetermined",
      confidence: judgment?.confidence ?? 0,
      evidence: judgment?.evidence ?? "",
      rationale: judgment?.rationale ?? "",
      override: null,
      updatedAt: now,
    };
  });

  return { responses, warnings, matchedCount };
}
