// Swing Coach - Analysis Orchestrator
// Owns the session lifecycle: created → uploading → submitted → analyzing →
// completed | failed, plus the delivery stage after completion (audio caching
// and report assembly).
//
// Each session is driven by at most one task at a time. resume() is the only
// re-entry point (after a restart, a reconnect or a retry) and joins a drive
// already running. A runId epoch captured at the start of a drive is checked
// before every commit; discard() bumps it, so nothing from an abandoned drive
// is persisted or published.
//
// Connectivity loss never fails a session. Uploads in progress are aborted,
// inference already accepted keeps running, and the session waits with
// waitingForConnectivity set until the network comes back.

import { v7 as uuidv7 } from "uuid";
import { collectSpokenPhrases, type AudioCacheGate } from "./audio-cache-gate.js";
import type { ConnectivitySource } from "./connectivity-monitor.js";
import {
  InvalidSessionStateError,
  LocalStorageError,
  SessionNotFoundError,
  errorMessage,
  isAbortError,
} from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { AnalysisJob, JobOutcome, JobStage, SubmitRequest } from "./remote-analysis-service.js";
import type { ReportAssembler, StagedReport } from "./report-assembler.js";
import type { SessionStore } from "./session-store.js";
import {
  SessionStatus,
  isTerminal,
  type AnalysisSession,
  type FailureKind,
  type SessionEvent,
  type SessionStatusSnapshot,
} from "./types.js";
import { clamp, computeBackoffDelay, sleep, type BackoffPolicy } from "./utils.js";

// ─── State machine ──────────────────────────────────────────────────────────────

const VALID_TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  [SessionStatus.CREATED]: [SessionStatus.UPLOADING, SessionStatus.FAILED],
  [SessionStatus.UPLOADING]: [SessionStatus.SUBMITTED, SessionStatus.FAILED],
  [SessionStatus.SUBMITTED]: [SessionStatus.ANALYZING, SessionStatus.FAILED],
  [SessionStatus.ANALYZING]: [SessionStatus.COMPLETED, SessionStatus.FAILED],
  [SessionStatus.COMPLETED]: [],
  [SessionStatus.FAILED]: [],
};

const PIPELINE_ORDER: readonly SessionStatus[] = [
  SessionStatus.CREATED,
  SessionStatus.UPLOADING,
  SessionStatus.SUBMITTED,
  SessionStatus.ANALYZING,
  SessionStatus.COMPLETED,
];

const STAGE_STATUS: Partial<Record<JobStage, SessionStatus>> = {
  uploading: SessionStatus.UPLOADING,
  submitted: SessionStatus.SUBMITTED,
  analyzing: SessionStatus.ANALYZING,
};

export function assertTransition(from: SessionStatus, to: SessionStatus): void {
  if (!VALID_TRANSITIONS[from].includes(to)) {
    throw new Error(`Invalid session transition: ${from} → ${to}`);
  }
}

/** Terminal sessions carry exactly one of result / lastError; others carry neither. */
export function assertSessionInvariant(session: AnalysisSession): void {
  const hasResult = session.result !== undefined;
  const hasError = session.lastError !== undefined;
  const ok =
    session.status === SessionStatus.COMPLETED
      ? hasResult && !hasError
      : session.status === SessionStatus.FAILED
        ? hasError && !hasResult
        : !hasResult && !hasError;
  if (!ok) {
    throw new Error(`Session ${session.id} violates the result/error invariant in status ${session.status}`);
  }
}

// ─── Progress ───────────────────────────────────────────────────────────────────

export const PROGRESS_WEIGHTS = { upload: 0.4, analysis: 0.4, audio: 0.2 } as const;

export interface ProgressInput {
  status: SessionStatus;
  uploadProgress: number;
  audioProgress: number;
  ready: boolean;
}

export function computeProgress(input: ProgressInput): number {
  const w = PROGRESS_WEIGHTS;
  switch (input.status) {
    case SessionStatus.CREATED:
      return 0;
    case SessionStatus.UPLOADING:
      return w.upload * clamp(input.uploadProgress, 0, 1);
    case SessionStatus.SUBMITTED:
      return w.upload + w.analysis * 0.25;
    case SessionStatus.ANALYZING:
      return w.upload + w.analysis * 0.5;
    case SessionStatus.COMPLETED:
      return input.ready ? 1 : w.upload + w.analysis + w.audio * clamp(input.audioProgress, 0, 1);
    case SessionStatus.FAILED:
      return 0;
  }
}

export function describeStatus(
  status: SessionStatus,
  flags: { waitingForConnectivity: boolean; ready: boolean; lastError?: string },
): string {
  if (flags.waitingForConnectivity && !isTerminal(status)) return "Waiting for connectivity";
  switch (status) {
    case SessionStatus.CREATED:
      return "Waiting to upload";
    case SessionStatus.UPLOADING:
      return "Uploading video";
    case SessionStatus.SUBMITTED:
      return "Queued for analysis";
    case SessionStatus.ANALYZING:
      return "Analyzing swing";
    case SessionStatus.COMPLETED:
      if (flags.ready) return "Ready";
      return flags.waitingForConnectivity ? "Waiting for connectivity" : "Preparing coaching audio";
    case SessionStatus.FAILED:
      return flags.lastError ? `Failed: ${flags.lastError}` : "Failed";
  }
}

// ─── Dependencies ───────────────────────────────────────────────────────────────

/** The part of RemoteAnalysisService the orchestrator drives. */
export interface RemoteAnalysis {
  submit(sessionId: string, request: SubmitRequest): AnalysisJob;
  forget(sessionId: string): Promise<void>;
}

export interface OrchestratorDeps {
  store: SessionStore;
  remote: RemoteAnalysis;
  connectivity: ConnectivitySource;
  audioGate: AudioCacheGate;
  assembler: ReportAssembler;
  logger?: Logger;
  backoff?: BackoffPolicy;
  now?: () => Date;
  generateId?: () => string;
}

export interface NewSessionInput {
  video: Buffer;
  mimeType: string;
}

export type SessionEventListener = (event: SessionEvent) => void;

type StepResult = "done" | "again" | "retry";

interface SessionRuntime {
  runId: number;
  drive: Promise<void> | null;
  rerun: boolean;
  job: AnalysisJob | null;
  waitingForConnectivity: boolean;
  reportReady: boolean;
  hydrated: boolean;
  discarded: boolean;
  /** Aborted to cut a backoff wait short. */
  wake: AbortController;
  /** Serializes stage transitions and progress updates coming from a job. */
  stageChain: Promise<void>;
  lastEmittedUpload: number;
}

const VIDEO_EXTENSIONS: Record<string, string> = {
  "video/mp4": ".mp4",
  "video/quicktime": ".mov",
  "video/webm": ".webm",
  "video/x-m4v": ".m4v",
};

export function videoFileName(mimeType: string): string {
  return `video${VIDEO_EXTENSIONS[mimeType.toLowerCase()] ?? ".mp4"}`;
}

// ─── Orchestrator ───────────────────────────────────────────────────────────────

export class AnalysisOrchestrator {
  private readonly sessions = new Map<string, AnalysisSession>();
  private readonly runtimes = new Map<string, SessionRuntime>();
  private readonly listeners = new Set<SessionEventListener>();
  private readonly unsubscribers: Array<() => void> = [];
  private readonly logger: Logger;
  private readonly backoff: BackoffPolicy;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private closed = false;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = deps.logger ?? createConsoleLogger("AnalysisOrchestrator");
    this.backoff = deps.backoff ?? { baseDelayMs: 1000, maxDelayMs: 30_000 };
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? uuidv7;

    this.unsubscribers.push(
      deps.connectivity.subscribe((reachable) => this.handleConnectivity(reachable)),
      deps.audioGate.onProgress((sessionId) => this.emitUpdate(sessionId)),
      deps.audioGate.onReady((sessionId) => this.emitUpdate(sessionId)),
    );
  }

  // ── events ──

  onEvent(listener: SessionEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: SessionEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error(`Event listener threw: ${errorMessage(err)}`);
      }
    }
  }

  private emitUpdate(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session || this.runtimes.get(sessionId)?.discarded) return;
    this.emit({ type: "session_update", session: this.snapshot(session) });
  }

  private reportStorageError(sessionId: string, err: LocalStorageError): void {
    this.logger.error(`[${sessionId}] storage error: ${err.message}`);
    this.emit({ type: "storage_error", sessionId, message: err.message });
  }

  private handleBackgroundError(sessionId: string, err: unknown): void {
    if (err instanceof LocalStorageError) {
      this.reportStorageError(sessionId, err);
    } else {
      this.logger.error(`[${sessionId}] ${errorMessage(err)}`);
    }
  }

  // ── public API ──

  /**
   * Persist the video and a CREATED record, then start the pipeline in the
   * background. Waits for the local write only, never for the network.
   */
  async createSession(input: NewSessionInput): Promise<string> {
    if (input.video.length === 0) {
      throw new InvalidSessionStateError("Video is empty");
    }
    return this.create(input.video, input.mimeType, input.video.length);
  }

  /** Start a fresh session from a failed session's video; the failed one is untouched. */
  async retryAsNewSession(sessionId: string): Promise<string> {
    const session = await this.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    if (session.status !== SessionStatus.FAILED) {
      throw new InvalidSessionStateError(
        `Session ${sessionId} is ${session.status}; only failed sessions can be retried`,
      );
    }
    return this.create(
      { copyFrom: this.deps.store.videoPath(session) },
      session.videoRef.mimeType,
      session.videoRef.sizeBytes,
      sessionId,
    );
  }

  /**
   * Re-drive a session from its persisted state. Concurrent calls share one
   * drive; a call made while a drive is running schedules one more pass.
   * Never rejects.
   */
  resume(sessionId: string): Promise<void> {
    const rt = this.runtimeFor(sessionId);
    if (rt.discarded || this.closed) return Promise.resolve();
    if (rt.drive) {
      rt.rerun = true;
      return rt.drive;
    }
    const drive = this.runDrives(sessionId, rt);
    rt.drive = drive;
    return drive;
  }

  /** Resume every session that is not finished; returns the ids resumed. */
  async resumeAll(): Promise<string[]> {
    const resumed: string[] = [];
    for (const stored of await this.deps.store.listSessions()) {
      const session = await this.hydrate(stored);
      const rt = this.runtimeFor(session.id);
      if (rt.discarded || session.status === SessionStatus.FAILED) continue;
      if (session.status === SessionStatus.COMPLETED && rt.reportReady) continue;
      // resume() never rejects.
      void this.resume(session.id);
      resumed.push(session.id);
    }
    return resumed;
  }

  /**
   * Stop all work on a session and delete it. A result that arrives later is
   * neither persisted nor published.
   */
  async discard(sessionId: string): Promise<void> {
    const session = await this.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    const rt = this.runtimeFor(sessionId);
    rt.discarded = true;
    rt.runId++;
    rt.job?.cancel();
    this.wakeUp(rt);
    this.deps.audioGate.release(sessionId);
    await this.deps.remote.forget(sessionId);
    await this.deps.store.deleteSession(sessionId);
    this.sessions.delete(sessionId);
    this.logger.info(`[${sessionId}] discarded`);
    this.emit({ type: "session_discarded", sessionId });
  }

  async getStatus(sessionId: string): Promise<SessionStatusSnapshot | null> {
    const session = await this.getSession(sessionId);
    return session ? this.snapshot(session) : null;
  }

  async listStatuses(): Promise<SessionStatusSnapshot[]> {
    const snapshots: SessionStatusSnapshot[] = [];
    for (const stored of await this.deps.store.listSessions()) {
      snapshots.push(this.snapshot(await this.hydrate(stored)));
    }
    return snapshots;
  }

  /**
   * Stop listening, cancel running jobs and wait for drives to wind down.
   * Sessions pick up from their persisted status on the next resumeAll().
   */
  async close(): Promise<void> {
    this.closed = true;
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    const drives: Promise<void>[] = [];
    for (const rt of this.runtimes.values()) {
      rt.runId++;
      rt.job?.cancel();
      this.wakeUp(rt);
      if (rt.drive) drives.push(rt.drive);
    }
    await Promise.all(drives);
  }

  // ── session records ──

  private async create(
    video: Buffer | { copyFrom: string },
    mimeType: string,
    sizeBytes: number,
    retryOf?: string,
  ): Promise<string> {
    const id = this.generateId();
    const timestamp = this.now().toISOString();
    const session: AnalysisSession = {
      id,
      status: SessionStatus.CREATED,
      videoRef: { fileName: videoFileName(mimeType), mimeType, sizeBytes },
      uploadProgress: 0,
      createdAt: timestamp,
      lastTransitionAt: timestamp,
      ...(retryOf ? { retryOf } : {}),
    };
    await this.deps.store.createSession(session, video);
    this.sessions.set(id, session);
    this.runtimeFor(id).hydrated = true;
    this.logger.info(`[${id}] created${retryOf ? ` (retry of ${retryOf})` : ""}`);
    this.emitUpdate(id);
    // resume() never rejects.
    void this.resume(id);
    return id;
  }

  private async getSession(sessionId: string): Promise<AnalysisSession | null> {
    const cached = this.sessions.get(sessionId);
    if (cached) return cached;
    if (this.runtimes.get(sessionId)?.discarded) return null;
    const stored = await this.deps.store.loadSession(sessionId);
    return stored ? this.hydrate(stored) : null;
  }

  /** Adopt a record read from disk; the in-memory copy wins once there is one. */
  private async hydrate(stored: AnalysisSession): Promise<AnalysisSession> {
    if (!this.sessions.has(stored.id)) this.sessions.set(stored.id, stored);
    const rt = this.runtimeFor(stored.id);
    const session = this.sessions.get(stored.id) ?? stored;
    if (!rt.hydrated) {
      rt.hydrated = true;
      if (session.status === SessionStatus.COMPLETED) {
        rt.reportReady = (await this.deps.store.readManifest(session.id)) !== null;
      }
    }
    return session;
  }

  private runtimeFor(sessionId: string): SessionRuntime {
    let rt = this.runtimes.get(sessionId);
    if (!rt) {
      rt = {
        runId: 0,
        drive: null,
        rerun: false,
        job: null,
        waitingForConnectivity: false,
        reportReady: false,
        hydrated: false,
        discarded: false,
        wake: new AbortController(),
        stageChain: Promise.resolve(),
        lastEmittedUpload: 0,
      };
      this.runtimes.set(sessionId, rt);
    }
    return rt;
  }

  private snapshot(session: AnalysisSession): SessionStatusSnapshot {
    const rt = this.runtimes.get(session.id);
    const completed = session.status === SessionStatus.COMPLETED;
    const ready = completed && (rt?.reportReady ?? false);
    const gate = this.deps.audioGate;
    const audioReady = completed && (ready || gate.isReady(session.id));
    const audioProgress = gate.isRegistered(session.id) ? gate.progress(session.id) : ready ? 1 : 0;
    const waitingForConnectivity = rt?.waitingForConnectivity ?? false;
    return {
      sessionId: session.id,
      status: session.status,
      progress: computeProgress({
        status: session.status,
        uploadProgress: session.uploadProgress,
        audioProgress,
        ready,
      }),
      label: describeStatus(session.status, { waitingForConnectivity, ready, lastError: session.lastError }),
      waitingForConnectivity,
      audioReady,
      ready,
      ...(ready ? { manifestPath: this.deps.store.manifestPath(session.id) } : {}),
      ...(session.lastError !== undefined ? { lastError: session.lastError } : {}),
      ...(session.failureKind ? { failureKind: session.failureKind } : {}),
      createdAt: session.createdAt,
      lastTransitionAt: session.lastTransitionAt,
    };
  }

  // ── transitions ──

  private isStale(rt: SessionRuntime, runId: number): boolean {
    return this.closed || rt.discarded || rt.runId !== runId;
  }

  /** Persist then publish one transition. Returns false if the drive went stale. */
  private async commitTransition(
    sessionId: string,
    rt: SessionRuntime,
    runId: number,
    next: SessionStatus,
    patch: Pick<AnalysisSession, "result" | "lastError" | "failureKind"> = {},
  ): Promise<boolean> {
    if (this.isStale(rt, runId)) return false;
    const current = await this.getSession(sessionId);
    if (!current || this.isStale(rt, runId)) return false;
    assertTransition(current.status, next);

    const updated: AnalysisSession = {
      ...current,
      ...patch,
      status: next,
      uploadProgress: next === SessionStatus.SUBMITTED ? 1 : current.uploadProgress,
      lastTransitionAt: this.now().toISOString(),
    };
    assertSessionInvariant(updated);
    await this.deps.store.saveSession(updated);
    if (this.isStale(rt, runId)) return false;
    this.sessions.set(sessionId, updated);
    this.logger.info(`[${sessionId}] ${current.status} → ${next}`);
    this.emitUpdate(sessionId);
    return true;
  }

  /** Walk forward one legal step at a time until `target` is reached. */
  private async advanceTo(sessionId: string, rt: SessionRuntime, runId: number, target: SessionStatus): Promise<void> {
    const to = PIPELINE_ORDER.indexOf(target);
    for (;;) {
      const session = await this.getSession(sessionId);
      if (!session) return;
      const from = PIPELINE_ORDER.indexOf(session.status);
      if (from < 0 || from >= to) return;
      if (!(await this.commitTransition(sessionId, rt, runId, PIPELINE_ORDER[from + 1]))) return;
    }
  }

  private async fail(
    sessionId: string,
    rt: SessionRuntime,
    runId: number,
    kind: FailureKind,
    reason: string,
  ): Promise<void> {
    this.logger.warn(`[${sessionId}] failing session (${kind}): ${reason}`);
    await this.commitTransition(sessionId, rt, runId, SessionStatus.FAILED, {
      lastError: reason,
      failureKind: kind,
    });
  }

  // ── connectivity ──

  private handleConnectivity(reachable: boolean): void {
    this.logger.info(`Connectivity ${reachable ? "restored" : "lost"}`);
    if (reachable) {
      // A drive still inside step() (inference kept running) is only joined
      // by resumeAll(), so it would not clear the flag until its next step.
      for (const [sessionId, rt] of this.runtimes) {
        if (rt.drive) this.setWaiting(sessionId, rt, false);
      }
      this.resumeAll().catch((err: unknown) => {
        this.logger.error(`Failed to resume sessions after reconnect: ${errorMessage(err)}`);
      });
      return;
    }
    for (const [sessionId, rt] of this.runtimes) {
      if (!rt.drive) continue;
      const job = rt.job;
      if (job && (job.stage === "queued" || job.stage === "uploading")) {
        this.logger.info(`[${sessionId}] aborting upload until connectivity returns`);
        job.cancel();
      }
      this.wakeUp(rt);
      this.setWaiting(sessionId, rt, true);
    }
  }

  private setWaiting(sessionId: string, rt: SessionRuntime, waiting: boolean): void {
    if (rt.waitingForConnectivity === waiting) return;
    rt.waitingForConnectivity = waiting;
    if (waiting) this.logger.info(`[${sessionId}] waiting for connectivity`);
    this.emitUpdate(sessionId);
  }

  private wakeUp(rt: SessionRuntime): void {
    rt.wake.abort();
    rt.wake = new AbortController();
  }

  /** Backoff wait that a connectivity change or discard cuts short. */
  private async pause(rt: SessionRuntime, ms: number): Promise<void> {
    try {
      await sleep(ms, rt.wake.signal);
    } catch (err) {
      if (!isAbortError(err)) throw err;
    }
  }

  // ── drive loop ──

  private async runDrives(sessionId: string, rt: SessionRuntime): Promise<void> {
    try {
      do {
        rt.rerun = false;
        await this.drive(sessionId, rt);
      } while (rt.rerun && !rt.discarded && !this.closed);
    } finally {
      rt.drive = null;
    }
  }

  /** Never rejects. */
  private async drive(sessionId: string, rt: SessionRuntime): Promise<void> {
    const runId = rt.runId;
    let attempt = 0;
    for (;;) {
      if (this.isStale(rt, runId)) return;
      let step: StepResult;
      try {
        step = await this.step(sessionId, rt, runId);
      } catch (err) {
        if (err instanceof LocalStorageError) {
          this.reportStorageError(sessionId, err);
          return;
        }
        this.logger.error(`[${sessionId}] unexpected pipeline error: ${errorMessage(err)}`);
        step = "retry";
      }
      if (step === "done") return;
      if (step === "again") {
        attempt = 0;
        continue;
      }
      if (this.isStale(rt, runId)) return;
      if (!this.deps.connectivity.isReachable()) {
        this.setWaiting(sessionId, rt, true);
        return;
      }
      const delay = computeBackoffDelay(attempt++, this.backoff);
      this.logger.info(`[${sessionId}] retrying in ${delay}ms`);
      await this.pause(rt, delay);
    }
  }

  private async step(sessionId: string, rt: SessionRuntime, runId: number): Promise<StepResult> {
    const session = await this.getSession(sessionId);
    if (!session || session.status === SessionStatus.FAILED) return "done";
    if (session.status === SessionStatus.COMPLETED) return this.deliver(sessionId, rt, runId, session);

    if (!this.deps.connectivity.isReachable()) {
      this.setWaiting(sessionId, rt, true);
      return "done";
    }
    this.setWaiting(sessionId, rt, false);

    const job = this.deps.remote.submit(sessionId, {
      videoPath: this.deps.store.videoPath(session),
      mimeType: session.videoRef.mimeType,
    });
    rt.job = job;
    const stopObserving = job.observe({
      onStage: (stage) => this.enqueueStage(sessionId, rt, runId, stage),
      onUploadProgress: (fraction) => this.enqueueUploadProgress(sessionId, rt, runId, fraction),
    });
    let outcome: JobOutcome;
    try {
      outcome = await job.outcome;
    } finally {
      stopObserving();
      if (rt.job === job) rt.job = null;
    }
    await rt.stageChain;
    if (this.isStale(rt, runId)) return "done";

    switch (outcome.kind) {
      case "completed":
        await this.advanceTo(sessionId, rt, runId, SessionStatus.ANALYZING);
        await this.commitTransition(sessionId, rt, runId, SessionStatus.COMPLETED, { result: outcome.result });
        return "again";
      case "content_rejected":
        await this.fail(sessionId, rt, runId, "content_rejected", outcome.reason);
        return "done";
      case "validation_failure":
        await this.deps.store.writeDiagnostics(sessionId, {
          reason: outcome.reason,
          rawPayload: outcome.rawPayload,
        });
        await this.fail(sessionId, rt, runId, "validation_failure", outcome.reason);
        return "done";
      case "cancelled":
        return "retry";
      case "interrupted":
        if (outcome.error instanceof LocalStorageError) throw outcome.error;
        this.logger.warn(`[${sessionId}] analysis interrupted: ${outcome.error.message}`);
        return "retry";
    }
  }

  private enqueueStage(sessionId: string, rt: SessionRuntime, runId: number, stage: JobStage): void {
    const target = STAGE_STATUS[stage];
    if (!target) return;
    rt.stageChain = rt.stageChain
      .then(() => this.advanceTo(sessionId, rt, runId, target))
      .catch((err: unknown) => this.handleBackgroundError(sessionId, err));
  }

  private enqueueUploadProgress(sessionId: string, rt: SessionRuntime, runId: number, fraction: number): void {
    rt.stageChain = rt.stageChain.then(() => {
      const session = this.sessions.get(sessionId);
      if (!session || this.isStale(rt, runId)) return;
      if (session.status !== SessionStatus.UPLOADING || fraction <= session.uploadProgress) return;
      this.sessions.set(sessionId, { ...session, uploadProgress: fraction });
      // Progress is persisted with the next transition; publish in 1% steps.
      if (fraction >= 1 || fraction - rt.lastEmittedUpload >= 0.01) {
        rt.lastEmittedUpload = fraction;
        this.emitUpdate(sessionId);
      }
    });
  }

  // ── delivery ──

  /** Cache audio and extract frames in parallel, then commit the report. */
  private async deliver(
    sessionId: string,
    rt: SessionRuntime,
    runId: number,
    session: AnalysisSession,
  ): Promise<StepResult> {
    if (!rt.reportReady && (await this.deps.store.readManifest(sessionId))) {
      rt.reportReady = true;
      this.emitUpdate(sessionId);
    }
    if (rt.reportReady) return "done";

    const result = session.result;
    if (!result) throw new Error(`Completed session ${sessionId} has no result`);
    const gate = this.deps.audioGate;
    if (!gate.isRegistered(sessionId)) {
      await gate.register(sessionId, collectSpokenPhrases(result));
      this.emitUpdate(sessionId);
    }

    let staged: StagedReport | null = null;
    try {
      const [stagedReport, audioReady] = await Promise.all([
        this.deps.assembler.stageKeyFrames(session),
        this.cacheAudio(sessionId, rt, runId),
      ]);
      staged = stagedReport;
      if (!audioReady || this.isStale(rt, runId)) return "done";

      await this.deps.assembler.commit(session, stagedReport, gate);
      staged = null;
      rt.reportReady = true;
      this.logger.info(`[${sessionId}] ready for playback`);
      this.emitUpdate(sessionId);
      return "done";
    } finally {
      if (staged) await this.deps.assembler.discardStaged(staged);
    }
  }

  /** True once every phrase is cached; false if parked or stale. Never rejects. */
  private async cacheAudio(sessionId: string, rt: SessionRuntime, runId: number): Promise<boolean> {
    const gate = this.deps.audioGate;
    try {
      for (let attempt = 0; ; attempt++) {
        if (this.isStale(rt, runId)) return false;
        if (gate.isReady(sessionId)) return true;
        if (!this.deps.connectivity.isReachable()) {
          this.setWaiting(sessionId, rt, true);
          return false;
        }
        this.setWaiting(sessionId, rt, false);
        await gate.startCaching(sessionId);
        if (gate.isReady(sessionId)) return true;
        const failed = gate.entries(sessionId).filter((entry) => entry.fetchState === "failed").length;
        const delay = computeBackoffDelay(attempt, this.backoff);
        this.logger.warn(`[${sessionId}] ${failed} phrase(s) failed to synthesize; retrying in ${delay}ms`);
        await this.pause(rt, delay);
      }
    } catch (err) {
      if (!this.isStale(rt, runId)) this.handleBackgroundError(sessionId, err);
      return false;
    }
  }
}
