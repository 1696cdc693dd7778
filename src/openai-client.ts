// Sales Call Scorecard - OpenAI chat client seam
// Shared by the checklist analyzer and the coaching generator.

import { TransientExternalError } from "./errors.js";

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user"; content: string }>;
        response_format?: { type: "json_object" | "text" };
        temperature?: number;
      }): Promise<{
        id?: string;
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface JsonCompletion {
  /** Parsed JSON body, untrusted. */
  payload: unknown;
  requestId: string | null;
}

/**
 * One JSON-mode chat completion. An empty body or one that is not JSON is a
 * transient failure: the same prompt usually succeeds on the next attempt.
 */
export async function completeJson(
  client: OpenAIClient,
  model: string,
  prompt: { system: string; user: string },
  temperature: number,
): Promise<JsonCompletion> {
  const response = await client.chat.completions.create({
    model,
    messages: [
      { role: "system", content: prompt.system },
      { role: "user", content: prompt.user },
    ],
    response_format: { type: "json_object" },
    temperature,
  });

  const content = response.choices[0]?.message?.content;
  if (!content) {
    throw new TransientExternalError("LLM returned empty response");
  }

  let payload: unknown;
  try {
    payload = JSON.parse(content);
  } catch (err) {
    throw new TransientExternalError(`Failed to parse LLM response as JSON: ${content.slice(0, 200)}`, {
      cause: err,
    });
  }
  return { payload, requestId: response.id ?? null };
}
