// Sales Call Scorecard - Transcription Engine
// Turns a stored call recording into transcript text. Two providers:
//   1. OpenAI audio transcriptions (default)
//   2. Deepgram prerecorded transcription
//
// Both SDK clients are injected through minimal structural interfaces so
// tests can pass plain mocks. The engines make exactly one provider call per
// transcribe(); retrying and timeouts are the coordinator's job.

import type { PrerecordedSchema } from "@deepgram/sdk";
import { AUDIO_EXTENSIONS, isSupportedAudioType } from "./audio-storage.js";
import { PermanentExternalError } from "./errors.js";
import type { AudioArtifact, TranscriptionResult } from "./types.js";

// ─── Provider-neutral interface ─────────────────────────────────────────────────

export interface Transcriber {
  /** Provider name recorded on provenance entries. */
  readonly service: string;
  transcribe(artifact: AudioArtifact, audio: Buffer): Promise<TranscriptionResult>;
}

function assertSupported(artifact: AudioArtifact): void {
  if (!isSupportedAudioType(artifact.mimeType)) {
    throw new PermanentExternalError(`Unsupported audio type "${artifact.mimeType}"`);
  }
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

// ─── OpenAI ─────────────────────────────────────────────────────────────────────

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * Mirrors the SDK's `audio.transcriptions.create()`.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        response_format?: "json" | "verbose_json";
        language?: string;
        prompt?: string;
      }): Promise<OpenAITranscriptionResponse>;
    };
  };
}

/**
 * `duration` and `language` only come back with `verbose_json` (whisper-1);
 * gpt-4o-transcribe returns text only.
 */
export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number;
  language?: string;
}

export class OpenAITranscriber implements Transcriber {
  readonly service = "openai-transcription";
  private client: OpenAITranscriptionClient;
  private model: string;

  constructor(client: OpenAITranscriptionClient, model = "whisper-1") {
    this.client = client;
    this.model = model;
  }

  async transcribe(artifact: AudioArtifact, audio: Buffer): Promise<TranscriptionResult> {
    assertSupported(artifact);

    const file = new File([new Uint8Array(audio)], `call${AUDIO_EXTENSIONS[artifact.mimeType] ?? ".wav"}`, {
      type: artifact.mimeType,
    });

    // Only whisper-1 supports verbose_json, which carries duration and language.
    const response = await this.client.audio.transcriptions.create({
      file,
      model: this.model,
      response_format: this.model === "whisper-1" ? "verbose_json" : "json",
    });

    const text = response.text?.trim() ?? "";
    return {
      text,
      language: response.language ?? null,
      durationSeconds: response.duration ?? artifact.durationSeconds,
      wordCount: countWords(text),
      requestId: null,
    };
  }
}

// ─── Deepgram ───────────────────────────────────────────────────────────────────

/**
 * The parts of Deepgram's prerecorded response we read. A subset of the
 * SDK's SyncPrerecordedResponse.
 */
export interface DeepgramPrerecordedResult {
  metadata?: { request_id?: string; duration?: number };
  results?: {
    channels: Array<{
      detected_language?: string;
      alternatives: Array<{ transcript: string }>;
    }>;
  };
}

/**
 * Wraps `deepgram.listen.prerecorded.transcribeFile()`. The adapter built in
 * index.ts throws the SDK's error object and returns its result otherwise.
 */
export interface DeepgramPrerecordedClient {
  transcribeFile(source: Buffer, options: PrerecordedSchema): Promise<DeepgramPrerecordedResult | null>;
}

const DEFAULT_PRERECORDED_OPTIONS: PrerecordedSchema = {
  model: "nova-2",
  smart_format: true,
  punctuate: true,
  detect_language: true,
};

export class DeepgramTranscriber implements Transcriber {
  readonly service = "deepgram-prerecorded";
  private client: DeepgramPrerecordedClient;
  private options: PrerecordedSchema;

  constructor(client: DeepgramPrerecordedClient, options?: Partial<PrerecordedSchema>) {
    this.client = client;
    this.options = { ...DEFAULT_PRERECORDED_OPTIONS, ...options };
  }

  async transcribe(artifact: AudioArtifact, audio: Buffer): Promise<TranscriptionResult> {
    assertSupported(artifact);

    const result = await this.client.transcribeFile(audio, this.options);
    const channel = result?.results?.channels[0];
    if (!result || !channel) {
      throw new PermanentExternalError("Deepgram returned no transcription channels");
    }

    const text = channel.alternatives[0]?.transcript.trim() ?? "";
    return {
      text,
      language: channel.detected_language ?? null,
      durationSeconds: result.metadata?.duration ?? artifact.durationSeconds,
      wordCount: countWords(text),
      requestId: result.metadata?.request_id ?? null,
    };
  }
}
