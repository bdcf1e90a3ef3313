// Swing Coach - Entry point
// Wires up all pipeline dependencies, resumes unfinished sessions and starts
// the server.

import "dotenv/config";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { Storage } from "@google-cloud/storage";
import { GoogleGenAI } from "@google/genai";
import OpenAI from "openai";
import { AnalysisOrchestrator } from "./analysis-orchestrator.js";
import { AudioCacheGate } from "./audio-cache-gate.js";
import { loadConfig, type AppConfig } from "./config.js";
import { HostProbeConnectivity } from "./connectivity-monitor.js";
import { errorMessage } from "./errors.js";
import { GeminiInferenceEngine } from "./inference-engine.js";
import { createConsoleLogger } from "./logger.js";
import { FfmpegMediaTools } from "./media-tools.js";
import { GcsObjectStore, LocalObjectStore, type ObjectStore } from "./object-store.js";
import { RemoteAnalysisService } from "./remote-analysis-service.js";
import { ReportAssembler } from "./report-assembler.js";
import { createAppServer } from "./server.js";
import { SessionStore } from "./session-store.js";
import { TTSEngine } from "./tts-engine.js";

export const APP_NAME = "Swing Coach";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

function createObjectStore(config: AppConfig): ObjectStore {
  if (config.storage.bucket) {
    logInit(`Uploading videos to gs://${config.storage.bucket}/${config.storage.objectPrefix}`);
    return new GcsObjectStore(new Storage(), config.storage.bucket, config.storage.objectPrefix);
  }
  const uploadsDir = path.join(config.dataDir, "uploads");
  logInit(`STORAGE_BUCKET not set; uploading videos to ${uploadsDir}`);
  return new LocalObjectStore(uploadsDir, config.storage.objectPrefix);
}

async function main(): Promise<void> {
  const config = loadConfig();

  // ─── Validate API keys ───────────────────────────────────────────────────────

  const geminiKey = config.gemini.apiKey;
  const openaiKey = config.tts.apiKey;
  if (!geminiKey) throw new Error("GEMINI_API_KEY is not set. Add it to your .env file.");
  if (!openaiKey) throw new Error("OPENAI_API_KEY is not set. Add it to your .env file.");
  logInit("API keys loaded");

  const promptTemplate = await readFile(config.promptPath, "utf-8");
  logInit(`Loaded analysis prompt from ${config.promptPath}`);

  // ─── Initialize pipeline components ──────────────────────────────────────────

  const backoff = config.retry;
  const store = new SessionStore(config.dataDir);
  const media = new FfmpegMediaTools(config.media);

  logInit(`Initializing GeminiInferenceEngine (${config.gemini.model})...`);
  const engine = new GeminiInferenceEngine(new GoogleGenAI({ apiKey: geminiKey }), {
    model: config.gemini.model,
    promptTemplate,
    pollIntervalMs: config.gemini.pollIntervalMs,
    timeoutMs: config.gemini.timeoutMs,
  });

  const remote = new RemoteAnalysisService(
    { objectStore: createObjectStore(config), engine, prober: media },
    {
      resultsDir: path.join(config.dataDir, "results"),
      uploadMaxAttempts: config.storage.maxAttempts,
      inferenceMaxAttempts: config.gemini.maxAttempts,
      maxConcurrentInferences: config.gemini.maxConcurrent,
      backoff,
      validator: { shortClipThresholdSeconds: config.validation.shortClipThresholdSeconds },
    },
  );

  logInit(`Initializing TTSEngine (OpenAI ${config.tts.model}, voice ${config.tts.voice})...`);
  const tts = new TTSEngine(new OpenAI({ apiKey: openaiKey }), config.tts);
  const audioGate = new AudioCacheGate({ synthesizer: tts, store });
  const assembler = new ReportAssembler({ store, frames: media });

  const connectivity = new HostProbeConnectivity({
    url: config.connectivity.probeUrl,
    intervalMs: config.connectivity.probeIntervalMs,
  });

  // ─── Orchestrator and server ─────────────────────────────────────────────────

  logInit("Wiring AnalysisOrchestrator pipeline...");
  const orchestrator = new AnalysisOrchestrator({
    store,
    remote,
    connectivity,
    audioGate,
    assembler,
    backoff,
    logger: createConsoleLogger("Orchestrator"),
  });

  const server = createAppServer({ orchestrator, store, connectivity });

  await connectivity.start();
  logInit(`Connectivity probe: ${connectivity.isReachable() ? "reachable" : "unreachable"}`);

  const resumed = await orchestrator.resumeAll();
  logInit(`Resumed ${resumed.length} unfinished session(s)`);

  const port = await server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
  logInit("Pipeline: upload → Gemini → validate → OpenAI TTS → report");

  const shutdown = (signal: string) => {
    logInit(`${signal} received, shutting down...`);
    connectivity.stop();
    Promise.all([server.close(), orchestrator.close()])
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logFatal(errorMessage(err));
  process.exit(1);
});
