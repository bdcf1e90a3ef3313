// Swing Coach - Inference Engine client
// Sends a swing video plus an instruction prompt to Gemini and returns the raw
// text response. The video goes through the Files API: upload, wait while the
// file is PROCESSING (bounded polling), then generate against its URI.
//
// Errors are mapped onto the pipeline taxonomy: rate limits, 5xx and socket
// failures become TransientError; 4xx and a FAILED file become
// ContentRejectedError. Retrying is the caller's job.

import { ContentRejectedError, TransientError, classifyRemoteError, errorMessage, isAbortError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { VideoMetadata } from "./types.js";
import { sleep } from "./utils.js";

// ─── Gemini client interface (for testability / dependency injection) ────────────

export interface GeminiFile {
  name?: string;
  uri?: string;
  mimeType?: string;
  state?: string;
  error?: { message?: string };
}

/**
 * Minimal surface of the @google/genai client used here. A `GoogleGenAI`
 * instance satisfies it; tests inject vi.fn fakes.
 */
export interface GeminiClient {
  files: {
    upload(params: { file: string; config?: { mimeType?: string; displayName?: string } }): Promise<GeminiFile>;
    get(params: { name: string }): Promise<GeminiFile>;
    delete(params: { name: string }): Promise<unknown>;
  };
  models: {
    generateContent(params: {
      model: string;
      contents: Array<{
        role: string;
        parts: Array<{ text?: string; fileData?: { fileUri: string; mimeType: string } }>;
      }>;
      config?: { responseMimeType?: string; temperature?: number; abortSignal?: AbortSignal };
    }): Promise<{ text?: string }>;
  };
}

// ─── Engine interface ───────────────────────────────────────────────────────────

export interface InferenceRequest {
  sessionId: string;
  videoPath: string;
  mimeType: string;
  video: VideoMetadata;
  signal?: AbortSignal;
}

export interface InferenceEngine {
  /** Returns the engine's raw response text; it is not trusted. */
  analyze(request: InferenceRequest): Promise<string>;
}

export interface GeminiEngineConfig {
  model: string;
  promptTemplate: string;
  pollIntervalMs: number;
  timeoutMs: number;
  temperature?: number;
}

export interface GeminiEngineDeps {
  logger?: Logger;
  now?: () => number;
}

/** Fill `{duration}`, `{frame_rate}` and `{frame_count}` placeholders. */
export function renderPrompt(template: string, video: VideoMetadata): string {
  const values: Record<string, string> = {
    duration: video.durationSeconds.toFixed(1),
    frame_rate: Number(video.frameRate.toFixed(3)).toString(),
    frame_count: String(video.frameCount),
  };
  return template.replace(/\{(duration|frame_rate|frame_count)\}/g, (_match, key: string) => values[key] ?? "");
}

export class GeminiInferenceEngine implements InferenceEngine {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly client: GeminiClient,
    private readonly config: GeminiEngineConfig,
    deps: GeminiEngineDeps = {},
  ) {
    this.logger = deps.logger ?? createConsoleLogger("InferenceEngine");
    this.now = deps.now ?? Date.now;
  }

  async analyze(request: InferenceRequest): Promise<string> {
    const uploaded = await this.call("upload video", () =>
      this.client.files.upload({
        file: request.videoPath,
        config: { mimeType: request.mimeType, displayName: `swing-${request.sessionId}` },
      }),
    );
    const name = uploaded.name;
    if (!name) throw new TransientError("upload video: engine returned no file handle");

    try {
      const file = await this.waitUntilActive(uploaded, name, request.signal);
      const fileUri = file.uri;
      if (!fileUri) throw new TransientError("engine file has no URI");

      const response = await this.call("generate analysis", () =>
        this.client.models.generateContent({
          model: this.config.model,
          contents: [
            {
              role: "user",
              parts: [
                { fileData: { fileUri, mimeType: file.mimeType ?? request.mimeType } },
                { text: renderPrompt(this.config.promptTemplate, request.video) },
              ],
            },
          ],
          config: {
            responseMimeType: "application/json",
            temperature: this.config.temperature ?? 0.2,
            abortSignal: request.signal,
          },
        }),
      );
      return response.text ?? "";
    } finally {
      await this.client.files.delete({ name }).catch((err: unknown) => {
        this.logger.warn(`Failed to delete engine file ${name}: ${errorMessage(err)}`);
      });
    }
  }

  private async waitUntilActive(initial: GeminiFile, name: string, signal?: AbortSignal): Promise<GeminiFile> {
    const deadline = this.now() + this.config.timeoutMs;
    let file = initial;
    while (file.state === "PROCESSING" || file.state === "STATE_UNSPECIFIED") {
      if (this.now() >= deadline) {
        throw new TransientError(`engine file ${name} still processing after ${this.config.timeoutMs}ms`);
      }
      await sleep(this.config.pollIntervalMs, signal);
      file = await this.call("poll file state", () => this.client.files.get({ name }));
    }
    if (file.state === "FAILED") {
      throw new ContentRejectedError(`engine could not process the video: ${file.error?.message ?? "unknown reason"}`);
    }
    return file;
  }

  private async call<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isAbortError(err)) throw err;
      throw classifyRemoteError(err, context);
    }
  }
}
