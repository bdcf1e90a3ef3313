// Swing Coach - Remote Analysis Service
//
// submit(sessionId, video) probes the clip, uploads it to object storage,
// waits for an inference slot, invokes the engine, validates the raw response
// and persists the outcome under `{resultsDir}/{sessionId}.json`.
//
// Idempotency: while a job for a session is in flight, submit() returns the
// same handle. Once an outcome is persisted, submit() returns a settled handle
// without invoking the engine again.
//
// Retry policy: uploads retry transient failures with exponential backoff;
// inference retries transient and connectivity failures only. Content rejection is never
// retried. A job outcome promise never rejects; transient exhaustion and
// cancellation are outcomes of their own. A failed outcome write is reported
// as an interruption carrying a LocalStorageError.

import { mkdir, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import {
  ContentRejectedError,
  LocalStorageError,
  PipelineError,
  TransientError,
  ValidationFailureError,
  classifyRemoteError,
  errorMessage,
  isAbortError,
  isRetryable,
} from "./errors.js";
import type { InferenceEngine } from "./inference-engine.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { isToolLaunchError, type VideoProber } from "./media-tools.js";
import type { ObjectStore } from "./object-store.js";
import {
  DEFAULT_VALIDATOR_OPTIONS,
  validateAnalysis,
  type Correction,
  type ValidatorOptions,
} from "./result-validator.js";
import type { AnalysisResult, VideoMetadata } from "./types.js";
import { createDeferred } from "./utils/deferred.js";
import { computeBackoffDelay, sleep, writeJsonAtomic, type BackoffPolicy } from "./utils.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

export type JobStage = "queued" | "uploading" | "submitted" | "analyzing" | "settled";

/** Outcomes that are persisted and never recomputed. */
export type DefinitiveOutcome =
  | { kind: "completed"; result: AnalysisResult; corrections: Correction[] }
  | { kind: "content_rejected"; reason: string }
  | { kind: "validation_failure"; reason: string; rawPayload: string };

export type JobOutcome =
  | DefinitiveOutcome
  /** Retries exhausted on a transient error; submit again later. */
  | { kind: "interrupted"; error: PipelineError }
  | { kind: "cancelled" };

export interface JobObserver {
  onStage?(stage: JobStage): void;
  onUploadProgress?(fraction: number): void;
}

export interface AnalysisJob {
  readonly sessionId: string;
  /** Resolves once; never rejects. */
  readonly outcome: Promise<JobOutcome>;
  readonly stage: JobStage;
  readonly uploadProgress: number;
  /** Current stage and progress are replayed to the new observer. */
  observe(observer: JobObserver): () => void;
  /** Abort best-effort; the outcome is guaranteed not to be persisted. */
  cancel(): void;
}

export interface SubmitRequest {
  videoPath: string;
  mimeType: string;
}

export interface RemoteAnalysisConfig {
  resultsDir: string;
  uploadMaxAttempts: number;
  inferenceMaxAttempts: number;
  backoff: BackoffPolicy;
  maxConcurrentInferences: number;
  validator: ValidatorOptions;
}

export interface RemoteAnalysisDeps {
  objectStore: ObjectStore;
  engine: InferenceEngine;
  prober: VideoProber;
  logger?: Logger;
}

export const DEFAULT_REMOTE_ANALYSIS_CONFIG: Omit<RemoteAnalysisConfig, "resultsDir"> = {
  uploadMaxAttempts: 5,
  inferenceMaxAttempts: 3,
  backoff: { baseDelayMs: 1000, maxDelayMs: 30_000 },
  maxConcurrentInferences: 4,
  validator: DEFAULT_VALIDATOR_OPTIONS,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDefinitiveOutcome(value: unknown): value is DefinitiveOutcome {
  if (!isRecord(value)) return false;
  switch (value.kind) {
    case "completed":
      return isRecord(value.result) && Array.isArray(value.corrections);
    case "content_rejected":
      return typeof value.reason === "string";
    case "validation_failure":
      return typeof value.reason === "string" && typeof value.rawPayload === "string";
    default:
      return false;
  }
}

// ─── Job handle ─────────────────────────────────────────────────────────────────

class RemoteJob implements AnalysisJob {
  stage: JobStage = "queued";
  uploadProgress = 0;
  readonly controller = new AbortController();
  private readonly deferred = createDeferred<JobOutcome>();
  private readonly observers = new Set<JobObserver>();
  private settled = false;

  constructor(readonly sessionId: string) {}

  get outcome(): Promise<JobOutcome> {
    return this.deferred.promise;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  observe(observer: JobObserver): () => void {
    this.observers.add(observer);
    observer.onStage?.(this.stage);
    if (this.uploadProgress > 0) observer.onUploadProgress?.(this.uploadProgress);
    return () => {
      this.observers.delete(observer);
    };
  }

  cancel(): void {
    this.controller.abort();
    this.settle({ kind: "cancelled" });
  }

  setStage(stage: JobStage): void {
    if (this.settled || stage === this.stage) return;
    this.stage = stage;
    for (const observer of [...this.observers]) observer.onStage?.(stage);
  }

  setUploadProgress(fraction: number): void {
    if (this.settled || fraction <= this.uploadProgress) return;
    this.uploadProgress = Math.min(1, fraction);
    for (const observer of [...this.observers]) observer.onUploadProgress?.(this.uploadProgress);
  }

  settle(outcome: JobOutcome): void {
    if (this.settled) return;
    this.settled = true;
    this.stage = "settled";
    this.deferred.resolve(outcome);
    this.observers.clear();
  }
}

// ─── Inference slots ────────────────────────────────────────────────────────────

class InferenceSlots {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly limit: number) {}

  async acquire(signal: AbortSignal): Promise<() => void> {
    if (this.active >= this.limit) {
      await new Promise<void>((resolve, reject) => {
        const onAbort = () => {
          const index = this.waiters.indexOf(grant);
          if (index >= 0) this.waiters.splice(index, 1);
          reject(signal.reason);
        };
        const grant = () => {
          signal.removeEventListener("abort", onAbort);
          resolve();
        };
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }
        this.waiters.push(grant);
        signal.addEventListener("abort", onAbort, { once: true });
      });
    } else {
      this.active++;
    }
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      // Hand the slot straight to the next waiter; the active count is unchanged.
      if (next) next();
      else this.active--;
    };
  }
}

// ─── Service ────────────────────────────────────────────────────────────────────

export class RemoteAnalysisService {
  private readonly config: RemoteAnalysisConfig;
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, RemoteJob>();
  private readonly slots: InferenceSlots;

  constructor(
    private readonly deps: RemoteAnalysisDeps,
    config: Partial<RemoteAnalysisConfig> & { resultsDir: string },
  ) {
    this.config = { ...DEFAULT_REMOTE_ANALYSIS_CONFIG, ...config };
    this.logger = deps.logger ?? createConsoleLogger("RemoteAnalysis");
    this.slots = new InferenceSlots(Math.max(1, this.config.maxConcurrentInferences));
  }

  /** Number of jobs currently running (not settled). */
  get activeJobCount(): number {
    return this.inFlight.size;
  }

  submit(sessionId: string, request: SubmitRequest): AnalysisJob {
    const existing = this.inFlight.get(sessionId);
    if (existing && !existing.signal.aborted) {
      this.logger.info(`[${sessionId}] submit joined the job already in flight`);
      return existing;
    }

    const job = new RemoteJob(sessionId);
    // Registered before any await, so a concurrent submit() sees it.
    this.inFlight.set(sessionId, job);
    this.run(job, request)
      .then((outcome) => job.settle(outcome))
      .catch((err: unknown) => {
        this.logger.error(`[${sessionId}] job crashed: ${errorMessage(err)}`);
        job.settle({ kind: "interrupted", error: classifyRemoteError(err, "analysis job") });
      })
      .finally(() => {
        if (this.inFlight.get(sessionId) === job) this.inFlight.delete(sessionId);
      });
    return job;
  }

  /** Previously persisted outcome for a session, if any. */
  async readOutcome(sessionId: string): Promise<DefinitiveOutcome | null> {
    let text: string;
    try {
      text = await readFile(this.outcomePath(sessionId), "utf-8");
    } catch (err) {
      if (isRecord(err) && err.code === "ENOENT") return null;
      throw new LocalStorageError(`Failed to read outcome for ${sessionId}: ${errorMessage(err)}`, { cause: err });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      this.logger.warn(`[${sessionId}] ignoring unreadable outcome file: ${errorMessage(err)}`);
      return null;
    }
    return isDefinitiveOutcome(parsed) ? parsed : null;
  }

  /** Cancel any job and delete the persisted outcome (used on discard). */
  async forget(sessionId: string): Promise<void> {
    this.inFlight.get(sessionId)?.cancel();
    this.inFlight.delete(sessionId);
    await rm(this.outcomePath(sessionId), { force: true });
  }

  // ── pipeline ──

  private async run(job: RemoteJob, request: SubmitRequest): Promise<JobOutcome> {
    const { sessionId, signal } = job;

    const persisted = await this.readOutcome(sessionId);
    if (persisted) {
      this.logger.info(`[${sessionId}] returning persisted ${persisted.kind} outcome`);
      return persisted;
    }

    try {
      const video = await this.probe(request.videoPath);

      job.setStage("uploading");
      const stored = await this.withRetry(sessionId, "upload", this.config.uploadMaxAttempts, signal, () =>
        this.deps.objectStore.upload({
          sessionId,
          filePath: request.videoPath,
          contentType: request.mimeType,
          onProgress: (fraction) => job.setUploadProgress(fraction),
          signal,
        }),
      );
      job.setUploadProgress(1);
      this.logger.info(`[${sessionId}] uploaded ${stored.sizeBytes} bytes to ${stored.uri}`);

      job.setStage("submitted");
      signal.throwIfAborted();
      const release = await this.slots.acquire(signal);
      let raw: string;
      try {
        job.setStage("analyzing");
        raw = await this.withRetry(sessionId, "inference", this.config.inferenceMaxAttempts, signal, () =>
          this.deps.engine.analyze({ sessionId, videoPath: request.videoPath, mimeType: request.mimeType, video, signal }),
        );
      } finally {
        release();
      }

      const validation = validateAnalysis(raw, video, this.config.validator);
      for (const correction of validation.corrections) {
        this.logger.warn(`[${sessionId}] correction ${correction.kind}: ${correction.detail}`);
      }
      const outcome: DefinitiveOutcome = validation.ok
        ? { kind: "completed", result: validation.result, corrections: validation.corrections }
        : { kind: "validation_failure", reason: validation.reason, rawPayload: validation.rawPayload };
      if (!validation.ok) this.logger.warn(`[${sessionId}] validation failed: ${validation.reason}`);
      return await this.persist(job, outcome);
    } catch (err) {
      if (signal.aborted || isAbortError(err)) return { kind: "cancelled" };
      const error = classifyRemoteError(err, "analysis");
      if (error instanceof ContentRejectedError) {
        this.logger.warn(`[${sessionId}] content rejected: ${error.message}`);
        return await this.persist(job, { kind: "content_rejected", reason: error.message });
      }
      if (error instanceof ValidationFailureError) {
        return await this.persist(job, { kind: "validation_failure", reason: error.message, rawPayload: error.rawPayload });
      }
      this.logger.warn(`[${sessionId}] interrupted: ${error.message}`);
      return { kind: "interrupted", error };
    }
  }

  private async probe(videoPath: string): Promise<VideoMetadata> {
    try {
      return await this.deps.prober.probe(videoPath);
    } catch (err) {
      // A prober that cannot be started says nothing about the clip.
      if (isToolLaunchError(err)) {
        throw new TransientError(`Video probe failed: ${errorMessage(err)}`, { cause: err });
      }
      throw new ContentRejectedError(`Unreadable video: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async withRetry<T>(
    sessionId: string,
    label: string,
    maxAttempts: number,
    signal: AbortSignal,
    fn: () => Promise<T>,
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (signal.aborted || isAbortError(err)) throw err;
        const error = classifyRemoteError(err, label);
        if (!isRetryable(error)) throw error;
        if (attempt + 1 >= maxAttempts) {
          throw new TransientError(`${label} failed after ${maxAttempts} attempts: ${error.message}`, { cause: err });
        }
        const delay = computeBackoffDelay(attempt, this.config.backoff);
        this.logger.warn(`[${sessionId}] ${label} attempt ${attempt + 1} failed (${error.message}); retrying in ${delay}ms`);
        await sleep(delay, signal);
      }
    }
  }

  private async persist(job: RemoteJob, outcome: DefinitiveOutcome): Promise<JobOutcome> {
    if (job.signal.aborted) return { kind: "cancelled" };
    const filePath = this.outcomePath(job.sessionId);
    try {
      await mkdir(this.config.resultsDir, { recursive: true });
      await writeJsonAtomic(filePath, outcome);
    } catch (err) {
      throw new LocalStorageError(
        `Failed to persist ${outcome.kind} outcome for ${job.sessionId}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    if (job.signal.aborted) {
      // Cancelled while the write was in progress.
      await rm(filePath, { force: true });
      return { kind: "cancelled" };
    }
    this.logger.info(`[${job.sessionId}] persisted ${outcome.kind} outcome`);
    return outcome;
  }

  private outcomePath(sessionId: string): string {
    if (!/^[\w-]+$/.test(sessionId)) throw new LocalStorageError(`Invalid session id "${sessionId}"`);
    return join(this.config.resultsDir, `${sessionId}.json`);
  }
}
