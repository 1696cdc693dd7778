// Unit tests for error classification
// Tests: classifyError, errorCode, errorMessage

import { describe, it, expect } from "vitest";
import {
  ConcurrencyConflict,
  PermanentExternalError,
  SessionNotFoundError,
  StageTimeoutError,
  TransientExternalError,
  ValidationError,
  classifyError,
  errorCode,
  errorMessage,
} from "./errors.js";

/** Shape of the SDKs' API errors: an Error with an HTTP status. */
function apiError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe("classifyError", () => {
  it("treats rate limits, timeouts and server errors as transient", () => {
    expect(classifyError(apiError(429))).toBe("transient");
    expect(classifyError(apiError(408))).toBe("transient");
    expect(classifyError(apiError(503))).toBe("transient");
  });

  it("treats other client errors as permanent", () => {
    expect(classifyError(apiError(400))).toBe("permanent");
    expect(classifyError(apiError(401))).toBe("permanent");
  });

  it("treats socket failures as transient", () => {
    expect(classifyError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe("transient");
    expect(classifyError(Object.assign(new Error("gone"), { name: "APIConnectionError" }))).toBe("transient");
  });

  it("uses the pipeline error class when there is one", () => {
    expect(classifyError(new StageTimeoutError("svc", 10))).toBe("transient");
    expect(classifyError(new TransientExternalError("busy"))).toBe("transient");
    expect(classifyError(new PermanentExternalError("bad"))).toBe("permanent");
    expect(classifyError(new ValidationError("bad"))).toBe("permanent");
  });

  it("treats anything unrecognized as permanent", () => {
    expect(classifyError(new Error("?"))).toBe("permanent");
    expect(classifyError("string failure")).toBe("permanent");
    expect(classifyError(null)).toBe("permanent");
  });
});

describe("errorCode", () => {
  it("reads the pipeline code, a node code or an HTTP status", () => {
    expect(errorCode(new ConcurrencyConflict("x"))).toBe("concurrency_conflict");
    expect(errorCode(new SessionNotFoundError("s1"))).toBe("session_not_found");
    expect(errorCode(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe("ECONNRESET");
    expect(errorCode(apiError(404))).toBe("http_404");
    expect(errorCode(42)).toBe("unknown_error");
  });
});

describe("errorMessage", () => {
  it("uses the message of an Error and stringifies anything else", () => {
    expect(errorMessage(new SessionNotFoundError("s1"))).toBe("Session not found: s1");
    expect(errorMessage("plain")).toBe("plain");
  });
});

describe("PipelineError", () => {
  it("names instances after their class", () => {
    expect(new ValidationError("x").name).toBe("ValidationError");
    expect(new StageTimeoutError("svc", 5).name).toBe("StageTimeoutError");
  });
});
