// Swing Coach - Configuration
// Maps environment variables (loaded by dotenv at the entry point) onto a typed
// AppConfig. Numeric settings fall back to their defaults when unset and throw
// when set to something out of range.

import path from "node:path";

export interface AppConfig {
  port: number;
  dataDir: string;
  promptPath: string;
  gemini: {
    apiKey: string | undefined;
    model: string;
    pollIntervalMs: number;
    timeoutMs: number;
    maxAttempts: number;
    /** Inference calls allowed in flight at once; later jobs wait as submitted. */
    maxConcurrent: number;
  };
  tts: {
    apiKey: string | undefined;
    model: string;
    voice: string;
  };
  storage: {
    /** Google Cloud Storage bucket; uploads stay on local disk when unset. */
    bucket: string | undefined;
    objectPrefix: string;
    maxAttempts: number;
  };
  retry: {
    baseDelayMs: number;
    maxDelayMs: number;
  };
  validation: {
    shortClipThresholdSeconds: number;
  };
  connectivity: {
    probeUrl: string;
    probeIntervalMs: number;
  };
  media: {
    ffmpegPath: string;
    ffprobePath: string;
  };
}

export type Env = Record<string, string | undefined>;

// ─── Readers ────────────────────────────────────────────────────────────────────

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

function readOptional(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

function readPositiveNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive number, got "${raw}"`);
  }
  return parsed;
}

// ─── Loader ─────────────────────────────────────────────────────────────────────

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const retry = {
    baseDelayMs: readPositiveInt(env, "RETRY_BASE_DELAY_MS", 1000),
    maxDelayMs: readPositiveInt(env, "RETRY_MAX_DELAY_MS", 30_000),
  };
  if (retry.maxDelayMs < retry.baseDelayMs) {
    throw new Error("RETRY_MAX_DELAY_MS must not be smaller than RETRY_BASE_DELAY_MS");
  }

  return {
    port: readPositiveInt(env, "PORT", 3000),
    dataDir: path.resolve(cwd, readString(env, "DATA_DIR", "data")),
    promptPath: path.resolve(cwd, readString(env, "PROMPT_PATH", "prompts/swing-analysis.txt")),
    gemini: {
      apiKey: readOptional(env, "GEMINI_API_KEY"),
      model: readString(env, "GEMINI_MODEL", "gemini-2.5-flash"),
      pollIntervalMs: readPositiveInt(env, "INFERENCE_POLL_INTERVAL_MS", 2000),
      timeoutMs: readPositiveInt(env, "INFERENCE_TIMEOUT_MS", 300_000),
      maxAttempts: readPositiveInt(env, "INFERENCE_MAX_ATTEMPTS", 3),
      maxConcurrent: readPositiveInt(env, "INFERENCE_CONCURRENCY", 2),
    },
    tts: {
      apiKey: readOptional(env, "OPENAI_API_KEY"),
      model: readString(env, "TTS_MODEL", "tts-1"),
      voice: readString(env, "TTS_VOICE", "nova"),
    },
    storage: {
      bucket: readOptional(env, "STORAGE_BUCKET"),
      objectPrefix: readString(env, "UPLOAD_OBJECT_PREFIX", "swing-videos"),
      maxAttempts: readPositiveInt(env, "UPLOAD_MAX_ATTEMPTS", 5),
    },
    retry,
    validation: {
      shortClipThresholdSeconds: readPositiveNumber(env, "SHORT_CLIP_THRESHOLD_SECONDS", 10),
    },
    connectivity: {
      probeUrl: readString(env, "CONNECTIVITY_PROBE_URL", "https://www.googleapis.com/generate_204"),
      probeIntervalMs: readPositiveInt(env, "CONNECTIVITY_PROBE_INTERVAL_MS", 10_000),
    },
    media: {
      ffmpegPath: readString(env, "FFMPEG_PATH", "ffmpeg"),
      ffprobePath: readString(env, "FFPROBE_PATH", "ffprobe"),
    },
  };
}
