// Sales Call Scorecard - TTS Engine
// Narrates coaching feedback via the OpenAI TTS API.
//
// Pre-TTS time enforcement: before calling the API the engine estimates the
// spoken duration from word count / calibratedWPM plus a safety margin. A
// script over maxDurationSeconds is cut back to whole sentences from the
// end, then by words if a single sentence is still too long.

import { countWords } from "./transcription-engine.js";

export interface TTSConfig {
  voice: string;
  maxDurationSeconds: number;
  calibratedWPM: number;
  safetyMarginPercent: number;
}

export const DEFAULT_TTS_CONFIG: TTSConfig = {
  voice: "nova",
  maxDurationSeconds: 90,
  calibratedWPM: 150,
  safetyMarginPercent: 8,
};

/**
 * Minimal interface for the OpenAI audio speech API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAITTSClient {
  audio: {
    speech: {
      create(params: { model: string; voice: string; input: string }): Promise<{ arrayBuffer(): Promise<ArrayBuffer> }>;
    };
  };
}

export interface SynthesisResult {
  audio: Buffer;
  script: string;
  estimatedSeconds: number;
}

/** Split on `.`, `!` or `?` followed by whitespace; punctuation stays with its sentence. */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export class TTSEngine {
  readonly service = "openai-tts";
  private readonly openai: OpenAITTSClient;
  private readonly model: string;

  constructor(openaiClient: OpenAITTSClient, model: string = "tts-1") {
    this.openai = openaiClient;
    this.model = model;
  }

  /** (words / wpm) × 60 × (1 + margin / 100), in seconds. */
  estimateDuration(text: string, wpm: number = DEFAULT_TTS_CONFIG.calibratedWPM, safetyMarginPercent = 0): number {
    const words = countWords(text);
    if (words === 0 || wpm <= 0) return 0;
    return (words / wpm) * 60 * (1 + safetyMarginPercent / 100);
  }

  /**
   * Drop trailing sentences until the estimate fits. Purely subtractive.
   * The first sentence is always kept; if it alone is too long, it is cut
   * at the last word that fits.
   */
  trimToFit(
    text: string,
    maxSeconds: number,
    wpm: number = DEFAULT_TTS_CONFIG.calibratedWPM,
    safetyMarginPercent = 0,
  ): string {
    const fits = (candidate: string) => this.estimateDuration(candidate, wpm, safetyMarginPercent) <= maxSeconds;
    const trimmed = text.trim();
    if (fits(trimmed)) return trimmed;

    const sentences = splitSentences(trimmed);
    while (sentences.length > 1) {
      sentences.pop();
      const candidate = sentences.join(" ");
      if (fits(candidate)) return candidate;
    }

    const words = (sentences[0] ?? "").split(/\s+/);
    const maxWords = Math.floor((maxSeconds * wpm) / (60 * (1 + safetyMarginPercent / 100)));
    return words.slice(0, Math.max(0, maxWords)).join(" ");
  }

  async synthesize(text: string, config?: Partial<TTSConfig>): Promise<SynthesisResult> {
    const merged: TTSConfig = { ...DEFAULT_TTS_CONFIG, ...config };
    const script = this.trimToFit(text, merged.maxDurationSeconds, merged.calibratedWPM, merged.safetyMarginPercent);

    const response = await this.openai.audio.speech.create({
      model: this.model,
      voice: merged.voice,
      input: script,
    });

    const arrayBuffer = await response.arrayBuffer();
    return {
      audio: Buffer.from(arrayBuffer),
      script,
      estimatedSeconds: this.estimateDuration(script, merged.calibratedWPM),
    };
  }
}
