// Swing Coach - Report Assembler
// Builds the persisted report for a completed session once its audio is cached.
//
// Layout (relative to the session directory):
//   report/manifest.json
//   report/thumbnail.jpg
//   report/keyframes/{phase}_{frame:03d}.jpg
//   report/audio/line_{index:02d}.mp3
//   report/audio/phase_{phase}.mp3
//
// Everything is written into a staging directory first and renamed to
// `report/` in one step, so a reader sees either no report or a complete one.

import { copyFile, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { FrameExtractor } from "./media-tools.js";
import type { SessionStore } from "./session-store.js";
import {
  MANIFEST_VERSION,
  type AnalysisResult,
  type AnalysisSession,
  type CoachingLine,
  type KeyMoment,
  type SessionReport,
  type SwingPhaseName,
} from "./types.js";

const REPORT_PREFIX = "report";
const FALLBACK_COMPLIMENT = "Great swing!";
const FALLBACK_CRITIQUE = "Keep practicing";

export interface StagedReport {
  sessionId: string;
  dir: string;
  thumbnailPath: string;
  keyFrames: Array<{ phase: SwingPhaseName; timestamp: number; framePath: string }>;
}

/** Looks up the cached audio fragment for a phrase. */
export interface AudioLookup {
  audioFileFor(sessionId: string, text: string): string | null;
}

export interface ReportAssemblerDeps {
  store: SessionStore;
  frames: FrameExtractor;
  logger?: Logger;
}

export function keyFrameFileName(phase: SwingPhaseName, keyFrameTime: number, frameRate: number): string {
  const frame = Math.round(keyFrameTime * frameRate);
  return `${phase}_${String(frame).padStart(3, "0")}.jpg`;
}

/** Club head speed as "95 mph", from whichever metric key the engine used. */
export function formatHeadSpeed(metrics: Record<string, number>): string | null {
  const speed = metrics.clubheadSpeed ?? metrics.club_head_speed ?? metrics.headSpeed;
  return speed === undefined ? null : `${Math.round(speed)} mph`;
}

function requireResult(session: AnalysisSession): AnalysisResult {
  if (!session.result) {
    throw new Error(`Session ${session.id} has no analysis result to report`);
  }
  return session.result;
}

export class ReportAssembler {
  private readonly logger: Logger;

  constructor(private readonly deps: ReportAssemblerDeps) {
    this.logger = deps.logger ?? createConsoleLogger("ReportAssembler");
  }

  readManifest(sessionId: string): Promise<SessionReport | null> {
    return this.deps.store.readManifest(sessionId);
  }

  /**
   * Extract the thumbnail (t = 0) and one still per swing phase at its
   * keyFrameTime into a fresh staging directory.
   */
  async stageKeyFrames(session: AnalysisSession): Promise<StagedReport> {
    const result = requireResult(session);
    const videoPath = this.deps.store.videoPath(session);
    const dir = await this.deps.store.createStagingDir(session.id);
    try {
      await mkdir(join(dir, "keyframes"), { recursive: true });
      await this.deps.frames.extractFrame(videoPath, 0, join(dir, "thumbnail.jpg"));

      const keyFrames: StagedReport["keyFrames"] = [];
      for (const phase of result.swingPhases) {
        const fileName = keyFrameFileName(phase.name, phase.keyFrameTime, result.video.frameRate);
        await this.deps.frames.extractFrame(videoPath, phase.keyFrameTime, join(dir, "keyframes", fileName));
        keyFrames.push({
          phase: phase.name,
          timestamp: phase.keyFrameTime,
          framePath: `${REPORT_PREFIX}/keyframes/${fileName}`,
        });
      }
      return { sessionId: session.id, dir, thumbnailPath: `${REPORT_PREFIX}/thumbnail.jpg`, keyFrames };
    } catch (err) {
      await this.deps.store.removeStagingDir(dir);
      throw err;
    }
  }

  async discardStaged(staged: StagedReport): Promise<void> {
    await this.deps.store.removeStagingDir(staged.dir);
  }

  /**
   * Copy cached audio into the staged report, write the manifest and commit.
   * A session that already has a committed report keeps it; the staged copy
   * is discarded and the existing manifest returned.
   */
  async commit(session: AnalysisSession, staged: StagedReport, audio: AudioLookup): Promise<SessionReport> {
    const existing = await this.readManifest(session.id);
    if (existing) {
      await this.discardStaged(staged);
      return existing;
    }

    const result = requireResult(session);
    try {
      await mkdir(join(staged.dir, "audio"), { recursive: true });
      const stageAudio = async (text: string, fileName: string): Promise<string> => {
        const source = audio.audioFileFor(session.id, text);
        if (!source) throw new Error(`No cached audio for phrase "${text}"`);
        await copyFile(source, join(staged.dir, "audio", fileName));
        return `${REPORT_PREFIX}/audio/${fileName}`;
      };

      const coachingScript: CoachingLine[] = [];
      for (const [index, line] of result.narrationScript.entries()) {
        coachingScript.push({
          text: line.text,
          startTime: line.cueTime,
          audioPath: await stageAudio(line.text, `line_${String(index).padStart(2, "0")}.mp3`),
        });
      }

      const keyMoments: KeyMoment[] = [];
      for (const phase of result.swingPhases) {
        const frame = staged.keyFrames.find((k) => k.phase === phase.name);
        if (!frame) throw new Error(`Missing key frame for phase ${phase.name}`);
        keyMoments.push({
          phase: phase.name,
          timestamp: frame.timestamp,
          framePath: frame.framePath,
          feedback: phase.feedbackText,
          feedbackAudioPath: phase.feedbackText
            ? await stageAudio(phase.feedbackText, `phase_${phase.name}.mp3`)
            : null,
        });
      }

      const report: SessionReport = {
        manifestVersion: MANIFEST_VERSION,
        sessionId: session.id,
        createdAt: session.createdAt,
        videoPath: session.videoRef.fileName,
        thumbnailPath: staged.thumbnailPath,
        overallScore: result.overallScore,
        headSpeed: formatHeadSpeed(result.metrics),
        metrics: result.metrics,
        topCompliment: result.highlights[0] ?? FALLBACK_COMPLIMENT,
        topCritique: result.improvements[0] ?? FALLBACK_CRITIQUE,
        summary: result.summaryText,
        keyMoments,
        coachingScript,
      };
      await writeFile(join(staged.dir, "manifest.json"), JSON.stringify(report, null, 2) + "\n", "utf-8");
      await this.deps.store.commitReport(session.id, staged.dir);
      this.logger.info(`[${session.id}] report committed (${keyMoments.length} key moments)`);
      return report;
    } catch (err) {
      await this.discardStaged(staged);
      // Lost a race with another commit: the committed report stands.
      const committed = await this.readManifest(session.id);
      if (committed) return committed;
      throw err;
    }
  }

  /** Stage and commit in one go; a no-op for a session already reported. */
  async assemble(session: AnalysisSession, audio: AudioLookup): Promise<SessionReport> {
    const existing = await this.readManifest(session.id);
    if (existing) return existing;
    const staged = await this.stageKeyFrames(session);
    return this.commit(session, staged, audio);
  }
}
