// Swing Coach - Media Extraction
// Video probing and still-frame extraction through the ffprobe / ffmpeg
// binaries (paths configurable via FFPROBE_PATH / FFMPEG_PATH).

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { VideoMetadata } from "./types.js";

const execFileAsync = promisify(execFile);

export interface VideoProber {
  probe(videoPath: string): Promise<VideoMetadata>;
}

export interface FrameExtractor {
  /** Write the frame shown at `timeSeconds` to `outputPath` as a JPEG. */
  extractFrame(videoPath: string, timeSeconds: number, outputPath: string): Promise<void>;
}

export interface MediaToolsConfig {
  ffmpegPath: string;
  ffprobePath: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * True when the binary itself could not be started (missing, not executable),
 * as opposed to the tool running and rejecting the file. execFile reports a
 * launch failure with a string errno code and a non-zero exit with a number.
 */
export function isToolLaunchError(err: unknown): boolean {
  return isRecord(err) && typeof err.code === "string";
}

function positiveNumber(value: unknown): number | null {
  const n = typeof value === "string" ? Number(value) : value;
  return typeof n === "number" && Number.isFinite(n) && n > 0 ? n : null;
}

/** "30000/1001" → 29.97…, "30" → 30. */
export function parseFrameRate(value: unknown): number | null {
  if (typeof value !== "string") return positiveNumber(value);
  const [num, den] = value.split("/");
  if (den === undefined) return positiveNumber(num);
  const numerator = Number(num);
  const denominator = Number(den);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) return null;
  return positiveNumber(numerator / denominator);
}

/**
 * Read duration, frame rate and frame count out of
 * `ffprobe -show_entries format=duration:stream=... -of json` output.
 * The frame count falls back to duration × frame rate when the container
 * does not record it.
 */
export function parseProbeOutput(jsonText: string): VideoMetadata {
  const parsed: unknown = JSON.parse(jsonText);
  if (!isRecord(parsed)) throw new Error("ffprobe returned no JSON object");

  const streams = Array.isArray(parsed.streams) ? parsed.streams.filter(isRecord) : [];
  const stream: Record<string, unknown> = streams.find((s) => s.codec_type === undefined || s.codec_type === "video") ?? {};
  const format: Record<string, unknown> = isRecord(parsed.format) ? parsed.format : {};

  const frameRate = parseFrameRate(stream.avg_frame_rate) ?? parseFrameRate(stream.r_frame_rate);
  const durationSeconds = positiveNumber(format.duration) ?? positiveNumber(stream.duration);
  if (frameRate === null || durationSeconds === null) {
    throw new Error("ffprobe output lacks a frame rate or duration");
  }
  const counted = positiveNumber(stream.nb_frames) ?? positiveNumber(stream.nb_read_frames);
  const frameCount = counted !== null ? Math.round(counted) : Math.max(1, Math.round(durationSeconds * frameRate));
  return { durationSeconds, frameRate, frameCount };
}

export class FfmpegMediaTools implements VideoProber, FrameExtractor {
  constructor(private readonly config: MediaToolsConfig) {}

  async probe(videoPath: string): Promise<VideoMetadata> {
    const { stdout } = await execFileAsync(this.config.ffprobePath, [
      "-v",
      "error",
      "-select_streams",
      "v:0",
      "-show_entries",
      "format=duration:stream=codec_type,avg_frame_rate,r_frame_rate,nb_frames,duration",
      "-of",
      "json",
      videoPath,
    ]);
    return parseProbeOutput(stdout);
  }

  async extractFrame(videoPath: string, timeSeconds: number, outputPath: string): Promise<void> {
    await execFileAsync(this.config.ffmpegPath, [
      "-y",
      "-ss",
      Math.max(0, timeSeconds).toString(),
      "-i",
      videoPath,
      "-frames:v",
      "1",
      "-q:v",
      "2",
      "-an",
      outputPath,
    ]);
  }
}
