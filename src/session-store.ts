// Swing Coach - Local Persistence Store
// One directory per session under `{dataDir}/sessions/{id}`:
//
//   session.json        current AnalysisSession record
//   video.<ext>         source video, written once at creation
//   diagnostics.json    raw payload of a validation failure
//   audio/<key>.mp3     cached speech fragments, keyed by phrase hash
//   report/             committed report (manifest.json, thumbnail, keyframes, audio)
//
// Every file is written to a temporary name and renamed into place, and writes
// for one session go through a per-session queue, so readers never observe a
// partially written record. All filesystem failures surface as LocalStorageError.

import { mkdir, readdir, readFile, rename, rm, stat, copyFile } from "node:fs/promises";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { LocalStorageError, errorMessage } from "./errors.js";
import { SessionStatus, type AnalysisSession, type SessionReport } from "./types.js";
import { writeFileAtomic, writeJsonAtomic } from "./utils.js";

const SESSION_FILE = "session.json";
const DIAGNOSTICS_FILE = "diagnostics.json";
const AUDIO_DIR = "audio";
const REPORT_DIR = "report";
const MANIFEST_FILE = "manifest.json";
const STAGING_PREFIX = "report.staging-";

const SESSION_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

const STATUS_VALUES = new Set<string>(Object.values(SessionStatus));

export function isValidSessionId(id: string): boolean {
  return SESSION_ID_PATTERN.test(id);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Shape check for records read back from disk. */
export function isAnalysisSession(value: unknown): value is AnalysisSession {
  if (!isRecord(value)) return false;
  const { id, status, videoRef, uploadProgress, createdAt, lastTransitionAt } = value;
  return (
    typeof id === "string" &&
    typeof status === "string" &&
    STATUS_VALUES.has(status) &&
    isRecord(videoRef) &&
    typeof videoRef.fileName === "string" &&
    typeof uploadProgress === "number" &&
    typeof createdAt === "string" &&
    typeof lastTransitionAt === "string"
  );
}

function isSessionReport(value: unknown): value is SessionReport {
  return (
    isRecord(value) &&
    typeof value.sessionId === "string" &&
    Array.isArray(value.keyMoments) &&
    Array.isArray(value.coachingScript)
  );
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}

export class SessionStore {
  readonly sessionsDir: string;
  private readonly writeQueues = new Map<string, Promise<void>>();

  constructor(dataDir: string) {
    this.sessionsDir = join(dataDir, "sessions");
  }

  // ── paths ──

  sessionDir(id: string): string {
    if (!isValidSessionId(id)) {
      throw new LocalStorageError(`Invalid session id "${id}"`);
    }
    return join(this.sessionsDir, id);
  }

  videoPath(session: AnalysisSession): string {
    return join(this.sessionDir(session.id), session.videoRef.fileName);
  }

  audioPath(sessionId: string, key: string): string {
    return join(this.sessionDir(sessionId), AUDIO_DIR, `${key}.mp3`);
  }

  reportDir(sessionId: string): string {
    return join(this.sessionDir(sessionId), REPORT_DIR);
  }

  manifestPath(sessionId: string): string {
    return join(this.reportDir(sessionId), MANIFEST_FILE);
  }

  // ── session records ──

  /**
   * Create the session directory with its video and initial record. The
   * record is written last, so a directory without session.json is an
   * abandoned creation and is skipped by listSessions().
   */
  async createSession(session: AnalysisSession, video: Buffer | { copyFrom: string }): Promise<void> {
    const dir = this.sessionDir(session.id);
    await this.enqueue(session.id, "create session", async () => {
      await mkdir(dir, { recursive: true });
      const videoPath = join(dir, session.videoRef.fileName);
      if (Buffer.isBuffer(video)) {
        await writeFileAtomic(videoPath, video);
      } else {
        await copyFile(video.copyFrom, videoPath);
      }
      await writeJsonAtomic(join(dir, SESSION_FILE), session);
    });
  }

  async saveSession(session: AnalysisSession): Promise<void> {
    const dir = this.sessionDir(session.id);
    await this.enqueue(session.id, "save session", () =>
      writeJsonAtomic(join(dir, SESSION_FILE), session),
    );
  }

  async loadSession(id: string): Promise<AnalysisSession | null> {
    if (!isValidSessionId(id)) return null;
    const filePath = join(this.sessionDir(id), SESSION_FILE);
    let text: string;
    try {
      text = await readFile(filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new LocalStorageError(`Failed to read session ${id}: ${errorMessage(err)}`, { cause: err });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new LocalStorageError(`Corrupt session record ${id}: ${errorMessage(err)}`, { cause: err });
    }
    if (!isAnalysisSession(parsed)) {
      throw new LocalStorageError(`Corrupt session record ${id}: unexpected shape`);
    }
    return parsed;
  }

  /** All readable sessions, newest first (ids are time-ordered). */
  async listSessions(): Promise<AnalysisSession[]> {
    let entries: string[];
    try {
      entries = await readdir(this.sessionsDir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new LocalStorageError(`Failed to list sessions: ${errorMessage(err)}`, { cause: err });
    }
    const sessions: AnalysisSession[] = [];
    for (const entry of entries.filter(isValidSessionId).sort().reverse()) {
      const session = await this.loadSession(entry);
      if (session) sessions.push(session);
    }
    return sessions;
  }

  async deleteSession(id: string): Promise<void> {
    const dir = this.sessionDir(id);
    await this.enqueue(id, "delete session", () => rm(dir, { recursive: true, force: true }));
  }

  async writeDiagnostics(id: string, diagnostics: { reason: string; rawPayload: string }): Promise<void> {
    const dir = this.sessionDir(id);
    await this.enqueue(id, "write diagnostics", () =>
      writeJsonAtomic(join(dir, DIAGNOSTICS_FILE), { ...diagnostics, recordedAt: new Date().toISOString() }),
    );
  }

  // ── audio fragments ──

  async hasAudio(sessionId: string, key: string): Promise<boolean> {
    try {
      const info = await stat(this.audioPath(sessionId, key));
      return info.isFile() && info.size > 0;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw new LocalStorageError(`Failed to inspect audio ${key}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async writeAudio(sessionId: string, key: string, audio: Buffer): Promise<string> {
    const filePath = this.audioPath(sessionId, key);
    await this.enqueue(sessionId, "write audio", async () => {
      await mkdir(join(this.sessionDir(sessionId), AUDIO_DIR), { recursive: true });
      await writeFileAtomic(filePath, audio);
    });
    return filePath;
  }

  // ── report ──

  async createStagingDir(sessionId: string): Promise<string> {
    const dir = join(this.sessionDir(sessionId), `${STAGING_PREFIX}${randomUUID()}`);
    await this.enqueue(sessionId, "create staging directory", () => mkdir(dir, { recursive: true }));
    return dir;
  }

  async removeStagingDir(stagingDir: string): Promise<void> {
    await rm(stagingDir, { recursive: true, force: true });
  }

  /** Rename a fully written staging directory to `report/`. */
  async commitReport(sessionId: string, stagingDir: string): Promise<void> {
    const target = this.reportDir(sessionId);
    await this.enqueue(sessionId, "commit report", () => rename(stagingDir, target));
  }

  async readManifest(sessionId: string): Promise<SessionReport | null> {
    let text: string;
    try {
      text = await readFile(this.manifestPath(sessionId), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new LocalStorageError(`Failed to read manifest ${sessionId}: ${errorMessage(err)}`, { cause: err });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new LocalStorageError(`Corrupt manifest for session ${sessionId}: ${errorMessage(err)}`, { cause: err });
    }
    if (!isSessionReport(parsed)) {
      throw new LocalStorageError(`Corrupt manifest for session ${sessionId}`);
    }
    return parsed;
  }

  // ── write queue ──

  /** True while a write for the session is queued or running. */
  hasPendingWrites(id: string): boolean {
    return this.writeQueues.has(id);
  }

  private enqueue(id: string, action: string, task: () => Promise<unknown>): Promise<void> {
    const previous = this.writeQueues.get(id) ?? Promise.resolve();
    const next = previous.then(async () => {
      try {
        await task();
      } catch (err) {
        throw new LocalStorageError(`Failed to ${action} ${id}: ${errorMessage(err)}`, { cause: err });
      }
    });
    // The queue keeps flowing after a failed write, and its entry goes away
    // once nothing else was queued behind this task.
    const settle = (): void => {
      if (this.writeQueues.get(id) === tail) this.writeQueues.delete(id);
    };
    const tail: Promise<void> = next.then(settle, settle);
    this.writeQueues.set(id, tail);
    return next;
  }
}
