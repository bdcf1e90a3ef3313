import { describe, it, expect } from "vitest";
import { isToolLaunchError, parseFrameRate, parseProbeOutput } from "./media-tools.js";

describe("parseFrameRate", () => {
  it("parses rational and plain rates", () => {
    expect(parseFrameRate("30/1")).toBe(30);
    expect(parseFrameRate("30000/1001")).toBeCloseTo(29.97, 2);
    expect(parseFrameRate("60")).toBe(60);
    expect(parseFrameRate(25)).toBe(25);
  });

  it("returns null for unknown rates", () => {
    expect(parseFrameRate("0/0")).toBeNull();
    expect(parseFrameRate("abc")).toBeNull();
    expect(parseFrameRate(undefined)).toBeNull();
  });
});

describe("parseProbeOutput", () => {
  it("reads duration, frame rate and frame count", () => {
    const output = JSON.stringify({
      streams: [{ codec_type: "video", avg_frame_rate: "30/1", r_frame_rate: "30/1", nb_frames: "150" }],
      format: { duration: "5.000000" },
    });
    expect(parseProbeOutput(output)).toEqual({ durationSeconds: 5, frameRate: 30, frameCount: 150 });
  });

  it("falls back to r_frame_rate and the stream duration", () => {
    const output = JSON.stringify({
      streams: [{ codec_type: "video", avg_frame_rate: "0/0", r_frame_rate: "60/1", duration: "2.5", nb_frames: "150" }],
      format: {},
    });
    expect(parseProbeOutput(output)).toEqual({ durationSeconds: 2.5, frameRate: 60, frameCount: 150 });
  });

  it("derives the frame count when the container lacks it", () => {
    const output = JSON.stringify({
      streams: [{ codec_type: "video", avg_frame_rate: "24/1" }],
      format: { duration: "4.2" },
    });
    expect(parseProbeOutput(output)).toEqual({ durationSeconds: 4.2, frameRate: 24, frameCount: 101 });
  });

  it("throws when no usable stream is present", () => {
    expect(() => parseProbeOutput(JSON.stringify({ streams: [], format: { duration: "3" } }))).toThrow(
      "ffprobe output lacks a frame rate or duration",
    );
    expect(() => parseProbeOutput("[]")).toThrow("ffprobe returned no JSON object");
  });
});

describe("isToolLaunchError", () => {
  it("separates a binary that cannot start from one that exits with an error", () => {
    expect(isToolLaunchError(Object.assign(new Error("spawn ffprobe ENOENT"), { code: "ENOENT" }))).toBe(true);
    expect(isToolLaunchError(Object.assign(new Error("spawn ffprobe EACCES"), { code: "EACCES" }))).toBe(true);
    expect(isToolLaunchError(Object.assign(new Error("Command failed: ffprobe"), { code: 1 }))).toBe(false);
    expect(isToolLaunchError(new Error("moov atom not found"))).toBe(false);
  });
});
