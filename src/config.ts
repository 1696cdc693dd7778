// Sales Call Scorecard - Configuration
//
// Reads process.env (populated from .env by dotenv in index.ts) into a typed
// AppConfig. Every retry/timeout knob lives here so it can be tuned per
// deployment and replaced wholesale in tests.

import { ValidationError } from "./errors.js";

export type TranscriptionProvider = "openai" | "deepgram";

export interface RetryConfig {
  /** Retries after the first attempt. 0 disables retrying. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export interface StageTimeouts {
  transcriptionMs: number;
  analysisMs: number;
  coachingMs: number;
  reportMs: number;
  storageMs: number;
}

export interface AppConfig {
  port: number;
  openaiApiKey: string | null;
  deepgramApiKey: string | null;
  transcriptionProvider: TranscriptionProvider;
  transcriptionModel: string;
  analysisModel: string;
  coachingModel: string;
  ttsModel: string;
  ttsVoice: string;
  coachingAudioEnabled: boolean;
  retry: RetryConfig;
  timeouts: StageTimeouts;
  leaseTtlMs: number;
  rankingLimit: number;
  workerConcurrency: number;
  taxonomyPath: string;
  audioDir: string;
  outputDir: string;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  multiplier: 2,
};

export const DEFAULT_TIMEOUTS: StageTimeouts = {
  transcriptionMs: 300_000,
  analysisMs: 120_000,
  coachingMs: 60_000,
  reportMs: 30_000,
  storageMs: 15_000,
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readFloat(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ValidationError(`${key} must be a number >= ${min}, got "${raw}"`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new ValidationError(`${key} must be a boolean, got "${env[key]}"`);
}

function readProvider(env: Env): TranscriptionProvider {
  const raw = env.TRANSCRIPTION_PROVIDER?.trim().toLowerCase() || "openai";
  if (raw !== "openai" && raw !== "deepgram") {
    throw new ValidationError(`TRANSCRIPTION_PROVIDER must be "openai" or "deepgram", got "${raw}"`);
  }
  return raw;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readInt(env, "PORT", 3000, 0),
    openaiApiKey: env.OPENAI_API_KEY || null,
    deepgramApiKey: env.DEEPGRAM_API_KEY || null,
    transcriptionProvider: readProvider(env),
    transcriptionModel: env.TRANSCRIPTION_MODEL || "whisper-1",
    analysisModel: env.ANALYSIS_MODEL || "gpt-4o",
    coachingModel: env.COACHING_MODEL || "gpt-4o",
    ttsModel: env.TTS_MODEL || "tts-1",
    ttsVoice: env.TTS_VOICE || "nova",
    coachingAudioEnabled: readBool(env, "COACHING_AUDIO_ENABLED", false),
    retry: {
      maxRetries: readInt(env, "RETRY_MAX", DEFAULT_RETRY_CONFIG.maxRetries),
      baseDelayMs: readInt(env, "RETRY_BASE_DELAY_MS", DEFAULT_RETRY_CONFIG.baseDelayMs),
      maxDelayMs: readInt(env, "RETRY_MAX_DELAY_MS", DEFAULT_RETRY_CONFIG.maxDelayMs),
      multiplier: readFloat(env, "RETRY_MULTIPLIER", DEFAULT_RETRY_CONFIG.multiplier, 1),
    },
    timeouts: {
      transcriptionMs: readInt(env, "TRANSCRIPTION_TIMEOUT_MS", DEFAULT_TIMEOUTS.transcriptionMs, 1),
      analysisMs: readInt(env, "ANALYSIS_TIMEOUT_MS", DEFAULT_TIMEOUTS.analysisMs, 1),
      coachingMs: readInt(env, "COACHING_TIMEOUT_MS", DEFAULT_TIMEOUTS.coachingMs, 1),
      reportMs: readInt(env, "REPORT_TIMEOUT_MS", DEFAULT_TIMEOUTS.reportMs, 1),
      storageMs: readInt(env, "STORAGE_TIMEOUT_MS", DEFAULT_TIMEOUTS.storageMs, 1),
    },
    leaseTtlMs: readInt(env, "LEASE_TTL_MS", 10 * 60 * 1000, 1),
    rankingLimit: readInt(env, "RANKING_LIMIT", 3, 1),
    workerConcurrency: readInt(env, "WORKER_CONCURRENCY", 4, 1),
    taxonomyPath: env.TAXONOMY_PATH || "data/checklist.json",
    audioDir: env.AUDIO_DIR || "uploads",
    outputDir: env.OUTPUT_DIR || "output",
  };
}
