// Sales Call Scorecard - Report Generator
// Renders the scored session as a markdown scorecard. PDF rendering and
// delivery happen elsewhere; they take this markdown as input.

import type { ChecklistTaxonomy } from "./checklist-taxonomy.js";
import { effectiveVerdict } from "./scoring-engine.js";
import type { CoachingFeedback, RiskBand, ScoringResult, Session, SessionResponse } from "./types.js";

export interface ReportInput {
  session: Session;
  scoring: ScoringResult;
  responses: readonly SessionResponse[];
  taxonomy: ChecklistTaxonomy;
  coaching: CoachingFeedback | null;
}

export interface ReportGenerator {
  readonly service: string;
  generate(input: ReportInput): Promise<string>;
}

const RISK_LABELS: Record<RiskBand, string> = {
  healthy: "Healthy",
  caution: "Caution",
  at_risk: "At risk",
};

export function formatDelta(delta: number | null): string {
  if (delta === null) return "first scored version";
  return `${delta >= 0 ? "+" : ""}${delta} since previous version`;
}

export function renderMarkdownReport(input: ReportInput): string {
  const { session, scoring, taxonomy, coaching } = input;
  const responses = new Map(input.responses.map((r) => [r.itemId, r]));
  const lines: string[] = [];

  lines.push(`# Call Scorecard: ${session.deal.customerName}`, "");
  if (session.deal.opportunityName) lines.push(`**Opportunity:** ${session.deal.opportunityName}  `);
  lines.push(`**Session:** ${session.id}  `);
  lines.push(`**Score:** ${scoring.total} / ${scoring.maxScore} (${scoring.normalizedTotal}%)  `);
  lines.push(`**Risk:** ${RISK_LABELS[scoring.riskBand]}  `);
  lines.push(`**Version:** ${scoring.version} (${formatDelta(scoring.delta)})`, "");

  lines.push("## Category Scores", "", "| Category | Score | Validated |", "| --- | --- | --- |");
  for (const c of scoring.categoryScores) {
    lines.push(`| ${c.name} | ${c.score} / ${c.maxScore} | ${c.validatedCount} / ${c.itemCount} |`);
  }
  lines.push("");

  lines.push("## Top Strengths", "");
  lines.push(...numbered(scoring.topStrengths.map((s) => s.title)), "");
  lines.push("## Top Gaps", "");
  lines.push(...numbered(scoring.topGaps.map((g) => g.title)), "");

  lines.push("## Checklist", "");
  for (const category of taxonomy.activeCategories()) {
    lines.push(`### ${category.name}`, "");
    for (const item of taxonomy.itemsInCategory(category.id)) {
      const response = responses.get(item.id);
      const verdict = effectiveVerdict(response, response?.override ?? undefined);
      const mark = verdict === "validated" ? "x" : " ";
      const note = response?.override ? ` _(override by ${response.override.actorId})_` : "";
      lines.push(`- [${mark}] ${item.title}${note}`);
    }
    lines.push("");
  }

  if (coaching) {
    lines.push("## Coaching", "", coaching.feedbackText, "");
    if (coaching.actionItems.length > 0) {
      lines.push("### Action Items", "");
      lines.push(...coaching.actionItems.map((a) => `- ${a}`), "");
    }
  }

  return lines.join("\n").trimEnd() + "\n";
}

function numbered(entries: string[]): string[] {
  if (entries.length === 0) return ["_None_"];
  return entries.map((e, i) => `${i + 1}. ${e}`);
}

export class MarkdownReportGenerator implements ReportGenerator {
  readonly service = "markdown-report";

  async generate(input: ReportInput): Promise<string> {
    return renderMarkdownReport(input);
  }
}
