// Swing Coach - Shared TypeScript interfaces and types
// Session lifecycle, validated analysis results, audio cache entries,
// report manifest and the push-message protocol.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionStatus {
  CREATED = "created",
  UPLOADING = "uploading",
  SUBMITTED = "submitted",
  ANALYZING = "analyzing",
  COMPLETED = "completed",
  FAILED = "failed",
}

export const TERMINAL_STATUSES: ReadonlySet<SessionStatus> = new Set([
  SessionStatus.COMPLETED,
  SessionStatus.FAILED,
]);

export function isTerminal(status: SessionStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/** Why a session ended in FAILED. Connectivity is never one of these. */
export type FailureKind = "content_rejected" | "validation_failure";

// ─── Deferred ───────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

// ─── Video ──────────────────────────────────────────────────────────────────────

export interface VideoRef {
  /** File name inside the session directory. */
  fileName: string;
  mimeType: string;
  sizeBytes: number;
}

export interface VideoMetadata {
  durationSeconds: number;
  frameRate: number;
  frameCount: number;
}

// ─── Analysis Result ────────────────────────────────────────────────────────────

export const SWING_PHASES = [
  "setup",
  "backswing",
  "downswing",
  "impact",
  "follow_through",
] as const;

export type SwingPhaseName = (typeof SWING_PHASES)[number];

export interface SwingPhase {
  name: SwingPhaseName;
  startTime: number;
  endTime: number;
  /** Timestamp handed to frame extraction for this phase's still. */
  keyFrameTime: number;
  feedbackText: string;
}

export interface NarrationLine {
  text: string;
  cueTime: number;
}

export interface AnalysisResult {
  swingPhases: SwingPhase[];
  overallScore: number | null;
  summaryText: string;
  highlights: string[];
  improvements: string[];
  metrics: Record<string, number>;
  narrationScript: NarrationLine[];
  video: VideoMetadata;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface AnalysisSession {
  id: string;
  status: SessionStatus;
  videoRef: VideoRef;
  uploadProgress: number;
  result?: AnalysisResult;
  lastError?: string;
  failureKind?: FailureKind;
  /** Id of the failed session this one re-submits. */
  retryOf?: string;
  createdAt: string;
  lastTransitionAt: string;
}

// ─── Audio Cache ────────────────────────────────────────────────────────────────

export type FetchState = "not_started" | "in_flight" | "cached" | "failed";

export interface CachedAudioEntry {
  key: string;
  text: string;
  fetchState: FetchState;
  /** Absolute path of the cached fragment once fetchState is "cached". */
  audioFile?: string;
  lastError?: string;
}

// ─── Report Manifest ────────────────────────────────────────────────────────────

export const MANIFEST_VERSION = 1;

export interface KeyMoment {
  phase: SwingPhaseName;
  timestamp: number;
  framePath: string;
  feedback: string;
  feedbackAudioPath: string | null;
}

export interface CoachingLine {
  text: string;
  startTime: number;
  audioPath: string;
}

/** Paths are relative to the session directory. */
export interface SessionReport {
  manifestVersion: number;
  sessionId: string;
  createdAt: string;
  videoPath: string;
  thumbnailPath: string;
  overallScore: number | null;
  headSpeed: string | null;
  metrics: Record<string, number>;
  topCompliment: string;
  topCritique: string;
  summary: string;
  keyMoments: KeyMoment[];
  coachingScript: CoachingLine[];
}

// ─── Status Query ───────────────────────────────────────────────────────────────

export interface SessionStatusSnapshot {
  sessionId: string;
  status: SessionStatus;
  /** Weighted blend of upload, analysis and audio preparation, in [0, 1]. */
  progress: number;
  label: string;
  waitingForConnectivity: boolean;
  audioReady: boolean;
  /** True once the report manifest is committed. */
  ready: boolean;
  manifestPath?: string;
  lastError?: string;
  failureKind?: FailureKind;
  createdAt: string;
  lastTransitionAt: string;
}

// ─── Push Messages (Server → Client) ────────────────────────────────────────────

export type SessionEvent =
  | { type: "session_update"; session: SessionStatusSnapshot }
  | { type: "session_discarded"; sessionId: string }
  | { type: "storage_error"; sessionId: string; message: string };

export type ServerMessage = SessionEvent | { type: "connectivity"; reachable: boolean };
