// Sales Call Scorecard - Coaching Generator
// Produces rep-facing coaching from a scored session using OpenAI JSON mode.
//
// Two stages:
//   1. Structured JSON: the model returns summary, strengths, improvement
//      areas and action items grounded in the scorecard and transcript.
//   2. Shape check: a payload that does not match is replaced by a
//      rule-based summary built from the scorecard alone (fallback = true).
// Call failures are not caught here; they surface to the coordinator's retry loop.

import type { ChecklistTaxonomy } from "./checklist-taxonomy.js";
import type { OpenAIClient } from "./openai-client.js";
import { completeJson } from "./openai-client.js";
import type { CoachingFeedback, CoachingPoint, DealMetadata, ScoringResult } from "./types.js";

export interface CoachingInput {
  transcriptText: string;
  scoring: ScoringResult;
  taxonomy: ChecklistTaxonomy;
  deal: DealMetadata;
}

export type CoachingDraft = Pick<
  CoachingFeedback,
  "feedbackText" | "strengths" | "improvementAreas" | "actionItems" | "fallback"
> & { requestId: string | null };

export interface CoachingGenerator {
  readonly service: string;
  generate(input: CoachingInput): Promise<CoachingDraft>;
}

/** Transcript characters sent with the prompt; long calls are cut at this length. */
const MAX_TRANSCRIPT_CHARS = 40_000;

export class OpenAICoachingGenerator implements CoachingGenerator {
  readonly service = "openai-coaching";
  private readonly openai: OpenAIClient;
  private readonly model: string;

  constructor(openaiClient: OpenAIClient, model: string = "gpt-4o") {
    this.openai = openaiClient;
    this.model = model;
  }

  async generate(input: CoachingInput): Promise<CoachingDraft> {
    const { payload, requestId } = await completeJson(this.openai, this.model, buildPrompt(input), 0.7);
    const parsed = parseCoaching(payload);
    if (!parsed) {
      return { ...buildFallbackCoaching(input.scoring, input.taxonomy), requestId };
    }
    return { ...parsed, fallback: false, requestId };
  }
}

// ── Prompt ───────────────────────────────────────────────────────────────────

function buildPrompt(input: CoachingInput): { system: string; user: string } {
  const { scoring, taxonomy, deal } = input;

  const system = `You are a sales coach reviewing one call with the account executive who ran it.
Be specific and encouraging. Ground every point in the scorecard or a quote from the transcript.

Respond with a JSON object of this exact shape:
{
  "summary": "<2-4 sentences>",
  "strengths": [{ "point": "<short title>", "explanation": "<why it mattered>" }],
  "improvement_areas": [{ "point": "<short title>", "explanation": "<what to do differently>" }],
  "action_items": ["<concrete next step>"]
}

Give 1-3 strengths, 1-3 improvement areas and 2-5 action items.`;

  const categories = scoring.categoryScores
    .map((c) => `- ${c.name}: ${c.score}/${c.maxScore} (${c.validatedCount}/${c.itemCount} items)`)
    .join("\n");
  const gaps = scoring.topGaps
    .map((g) => `- ${g.title}: ${taxonomy.getItem(g.itemId)?.definition ?? ""}`)
    .join("\n");
  const strengths = scoring.topStrengths.map((s) => `- ${s.title}`).join("\n");
  const transcript =
    input.transcriptText.length > MAX_TRANSCRIPT_CHARS
      ? `${input.transcriptText.slice(0, MAX_TRANSCRIPT_CHARS)} [...]`
      : input.transcriptText;

  const user = `## Deal
Customer: ${deal.customerName}${deal.opportunityName ? `\nOpportunity: ${deal.opportunityName}` : ""}

## Scorecard
Total: ${scoring.total}/${scoring.maxScore} (${scoring.normalizedTotal}%), risk band: ${scoring.riskBand}
${categories}

## Strongest items
${strengths || "- none"}

## Biggest gaps
${gaps || "- none"}

## Transcript
${transcript}`;

  return { system, user };
}

// ── Parsing ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parsePoints(raw: unknown): CoachingPoint[] | null {
  if (!Array.isArray(raw)) return null;
  const points: CoachingPoint[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) return null;
    const { point, explanation } = entry;
    if (typeof point !== "string" || typeof explanation !== "string" || !point.trim()) return null;
    points.push({ point: point.trim(), explanation: explanation.trim() });
  }
  return points;
}

/** Returns null when the payload does not have the requested shape. */
export function parseCoaching(
  payload: unknown,
): Pick<CoachingFeedback, "feedbackText" | "strengths" | "improvementAreas" | "actionItems"> | null {
  if (!isRecord(payload)) return null;

  const { summary, action_items: actionItems } = payload;
  if (typeof summary !== "string" || !summary.trim()) return null;

  const strengths = parsePoints(payload.strengths);
  const improvementAreas = parsePoints(payload.improvement_areas);
  if (!strengths || !improvementAreas) return null;

  if (!Array.isArray(actionItems)) return null;
  const actions: string[] = [];
  for (const a of actionItems) {
    if (typeof a !== "string") return null;
    if (a.trim()) actions.push(a.trim());
  }

  return { feedbackText: summary.trim(), strengths, improvementAreas, actionItems: actions };
}

// ── Fallback ─────────────────────────────────────────────────────────────────

/** Rule-based coaching from the scorecard alone. Deterministic. */
export function buildFallbackCoaching(
  scoring: ScoringResult,
  taxonomy: ChecklistTaxonomy,
): Omit<CoachingDraft, "requestId"> {
  const categoryName = (categoryId: number) => taxonomy.getCategory(categoryId)?.name ?? "the checklist";

  return {
    feedbackText:
      `This call scored ${scoring.total} of ${scoring.maxScore} (${scoring.normalizedTotal}%) ` +
      `and is rated ${scoring.riskBand.replace("_", " ")}. ` +
      `${scoring.validatedCount} of ${scoring.totalCount} checklist items were validated.`,
    strengths: scoring.topStrengths.map((s) => ({
      point: s.title,
      explanation: `Validated under ${categoryName(s.categoryId)}.`,
    })),
    improvementAreas: scoring.topGaps.map((g) => ({
      point: g.title,
      explanation: taxonomy.getItem(g.itemId)?.definition || `Not validated under ${categoryName(g.categoryId)}.`,
    })),
    actionItems: scoring.topGaps.map((g) => `Cover "${g.title}" on the next call.`),
    fallback: true,
  };
}
