// Sales Call Scorecard - Error taxonomy
//
// Pure computations normalize bad input away where they can (clamping,
// gap-filling) and raise ValidationError otherwise. External failures are
// split into transient (retried) and permanent (fail the stage at once).

import type { ErrorClassification } from "./types.js";

export abstract class PipelineError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed input to a pure function or an operation argument. */
export class ValidationError extends PipelineError {
  readonly code = "validation_error";
}

/** The prerequisite artifact for a transition is missing. Session state is unchanged. */
export class PreconditionError extends PipelineError {
  readonly code = "precondition_failed";
}

/** Another transition for the session is in flight, or the session changed underneath us. */
export class ConcurrencyConflict extends PipelineError {
  readonly code = "concurrency_conflict";
}

export class SessionNotFoundError extends PipelineError {
  readonly code = "session_not_found";

  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
  }
}

export class TransientExternalError extends PipelineError {
  readonly code: string = "transient_external_error";
}

export class StageTimeoutError extends TransientExternalError {
  readonly code = "stage_timeout";

  constructor(readonly service: string, readonly timeoutMs: number) {
    super(`${service} did not respond within ${timeoutMs}ms`);
  }
}

export class PermanentExternalError extends PipelineError {
  readonly code = "permanent_external_error";
}

// ─── Classification ─────────────────────────────────────────────────────────────

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

function readProperty(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  const value: unknown = Reflect.get(err, key);
  return value;
}

/**
 * Default transient/permanent classifier.
 *
 * SDK errors (openai, @deepgram/sdk) carry an HTTP `status`; 408, 409, 429 and
 * 5xx are retryable, any other status is not. Socket-level failures carry a
 * Node error `code`. Anything unrecognized is permanent.
 */
export function classifyError(err: unknown): ErrorClassification {
  if (err instanceof TransientExternalError) return "transient";
  if (err instanceof PipelineError) return "permanent";

  const status = readProperty(err, "status");
  if (typeof status === "number") {
    if (status === 408 || status === 409 || status === 429 || status >= 500) {
      return "transient";
    }
    return "permanent";
  }

  const code = readProperty(err, "code");
  if (typeof code === "string" && TRANSIENT_NETWORK_CODES.has(code)) {
    return "transient";
  }

  const name = readProperty(err, "name");
  if (name === "APIConnectionError" || name === "APIConnectionTimeoutError") {
    return "transient";
  }

  return "permanent";
}

export function errorCode(err: unknown): string {
  if (err instanceof PipelineError) return err.code;
  const code = readProperty(err, "code");
  if (typeof code === "string") return code;
  const status = readProperty(err, "status");
  if (typeof status === "number") return `http_${status}`;
  return "unknown_error";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
