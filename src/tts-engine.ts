// Swing Coach - TTS Engine
// Converts one coaching phrase to spoken audio via the OpenAI TTS API.
// The audio cache gate calls synthesize() once per unique phrase.

import { classifyRemoteError } from "./errors.js";

// ─── Config ─────────────────────────────────────────────────────────────────────

export interface TTSConfig {
  model: string;
  voice: string;
}

export const DEFAULT_TTS_CONFIG: TTSConfig = {
  model: "tts-1",
  voice: "nova",
};

// ─── OpenAI TTS client interface (for testability / dependency injection) ────────

/**
 * Minimal interface for the OpenAI audio speech API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAITTSClient {
  audio: {
    speech: {
      create(params: {
        model: string;
        voice: string;
        input: string;
      }): Promise<{ arrayBuffer(): Promise<ArrayBuffer> }>;
    };
  };
}

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<Buffer>;
}

export class TTSEngine implements SpeechSynthesizer {
  private readonly config: TTSConfig;

  constructor(
    private readonly client: OpenAITTSClient,
    config: Partial<TTSConfig> = {},
  ) {
    this.config = { ...DEFAULT_TTS_CONFIG, ...config };
  }

  /**
   * Synthesize `text` as MP3, the API's default format. Failures come back as
   * TransientError (retry later) or ContentRejectedError (input refused).
   */
  async synthesize(text: string): Promise<Buffer> {
    const input = text.trim();
    if (input.length === 0) {
      throw new Error("Cannot synthesize an empty phrase");
    }
    try {
      const response = await this.client.audio.speech.create({
        model: this.config.model,
        voice: this.config.voice,
        input,
      });
      return Buffer.from(await response.arrayBuffer());
    } catch (err) {
      throw classifyRemoteError(err, "synthesize speech");
    }
  }
}
