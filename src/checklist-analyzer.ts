// Sales Call Scorecard - Checklist Analyzer
// Asks the language model, in JSON mode, which checklist items the
// transcript validates. The payload is returned untouched; parsing and
// normalization belong to the validation reconciler.

import type { JsonCompletion, OpenAIClient } from "./openai-client.js";
import { completeJson } from "./openai-client.js";
import type { ItemDefinition } from "./types.js";

export interface ChecklistAnalyzer {
  readonly service: string;
  analyze(transcriptText: string, items: readonly ItemDefinition[]): Promise<JsonCompletion>;
}

const SYSTEM_PROMPT = `You review transcripts of sales calls against a qualification checklist.

For every checklist item you are given, decide whether the conversation validates it:
- "validated": the transcript contains clear evidence that the item was covered
- "not_validated": the topic was not covered, or was covered without the required detail
- "undetermined": the transcript is too unclear to decide

Respond with a JSON object of this exact shape:
{
  "items": [
    {
      "item_id": <number>,
      "verdict": "validated" | "not_validated" | "undetermined",
      "confidence": <number between 0 and 1>,
      "evidence": "<short verbatim quote from the transcript, or empty>",
      "rationale": "<one sentence>"
    }
  ]
}

Return one entry per checklist item. Quote evidence verbatim. Do not invent content.`;

export class OpenAIChecklistAnalyzer implements ChecklistAnalyzer {
  readonly service = "openai-analysis";
  private readonly openai: OpenAIClient;
  private readonly model: string;

  constructor(openaiClient: OpenAIClient, model: string = "gpt-4o") {
    this.openai = openaiClient;
    this.model = model;
  }

  analyze(transcriptText: string, items: readonly ItemDefinition[]): Promise<JsonCompletion> {
    return completeJson(this.openai, this.model, this.buildPrompt(transcriptText, items), 0);
  }

  private buildPrompt(transcriptText: string, items: readonly ItemDefinition[]): { system: string; user: string } {
    const checklist = items
      .map((item) => `${item.id}. [${item.category}] ${item.title}: ${item.definition}`)
      .join("\n");

    return {
      system: SYSTEM_PROMPT,
      user: `## Checklist (${items.length} items)\n${checklist}\n\n## Transcript\n${transcriptText}`,
    };
  }
}
