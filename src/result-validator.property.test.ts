// Property-Based Tests for the Result Validator
// Whatever the engine returns, a successful outcome satisfies the result
// invariants and the validator never throws.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { validateAnalysis } from "./result-validator.js";
import { SWING_PHASES, type VideoMetadata } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

function arbitraryVideo(): fc.Arbitrary<VideoMetadata> {
  return fc
    .record({
      frameRate: fc.constantFrom(24, 25, 30, 60, 120),
      frameCount: fc.integer({ min: 1, max: 2000 }),
    })
    .map(({ frameRate, frameCount }) => ({ frameRate, frameCount, durationSeconds: frameCount / frameRate }));
}

const arbitraryFrame = fc.oneof(
  fc.integer({ min: -500, max: 5000 }),
  fc.double({ min: -100, max: 3000, noNaN: true }),
  fc.constant("12"),
  fc.constant(null),
);

function arbitraryPhaseMap() {
  return fc.dictionary(
    fc.oneof(fc.constantFrom(...SWING_PHASES), fc.constantFrom("Follow Through", "waggle", "Top")),
    fc.record({
      start_frame: arbitraryFrame,
      end_frame: arbitraryFrame,
      feedback: fc.oneof(fc.string(), fc.constant(undefined)),
    }),
  );
}

function arbitraryPayload() {
  return fc.record({
    swings: fc.array(
      fc.record({
        score: fc.oneof(fc.double({ min: -50, max: 200, noNaN: true }), fc.constant(undefined)),
        phases: arbitraryPhaseMap(),
      }),
      { minLength: 0, maxLength: 3 },
    ),
    coaching_script: fc.record({
      lines: fc.array(fc.record({ text: fc.string(), start_frame_number: arbitraryFrame }), { maxLength: 4 }),
    }),
  });
}

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("validateAnalysis properties", () => {
  it("successful results stay inside the clip and are ordered", () => {
    fc.assert(
      fc.property(arbitraryPayload(), arbitraryVideo(), (payload, video) => {
        const outcome = validateAnalysis(JSON.stringify(payload), video);
        if (!outcome.ok) return;
        const { result } = outcome;
        const duration = video.frameCount / video.frameRate;

        expect(result.swingPhases.length).toBeGreaterThan(0);
        const names = result.swingPhases.map((p) => p.name);
        expect(new Set(names).size).toBe(names.length);

        let previousStart = -1;
        for (const phase of result.swingPhases) {
          expect(SWING_PHASES).toContain(phase.name);
          expect(phase.startTime).toBeGreaterThanOrEqual(0);
          expect(phase.endTime).toBeLessThanOrEqual(duration + 1e-9);
          expect(phase.endTime).toBeGreaterThan(phase.startTime);
          expect(phase.keyFrameTime).toBe(phase.startTime);
          expect(phase.startTime).toBeGreaterThanOrEqual(previousStart);
          previousStart = phase.startTime;
        }

        if (result.overallScore !== null) {
          expect(result.overallScore).toBeGreaterThanOrEqual(0);
          expect(result.overallScore).toBeLessThanOrEqual(100);
        }
        for (let i = 1; i < result.narrationScript.length; i++) {
          expect(result.narrationScript[i].cueTime).toBeGreaterThanOrEqual(result.narrationScript[i - 1].cueTime);
        }
        for (const line of result.narrationScript) {
          expect(line.text.trim().length).toBeGreaterThan(0);
          expect(line.cueTime).toBeLessThanOrEqual(duration + 1e-9);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("is deterministic", () => {
    fc.assert(
      fc.property(arbitraryPayload(), arbitraryVideo(), (payload, video) => {
        const raw = JSON.stringify(payload);
        expect(validateAnalysis(raw, video)).toEqual(validateAnalysis(raw, video));
      }),
      { numRuns: 100 },
    );
  });

  it("never throws on arbitrary text", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 300 }), arbitraryVideo(), (raw, video) => {
        const outcome = validateAnalysis(raw, video);
        if (!outcome.ok) expect(outcome.rawPayload).toBe(raw);
      }),
      { numRuns: 300 },
    );
  });

  it("never throws on truncated valid payloads", () => {
    fc.assert(
      fc.property(arbitraryPayload(), arbitraryVideo(), fc.double({ min: 0, max: 1, noNaN: true }), (payload, video, cut) => {
        const raw = JSON.stringify(payload);
        const truncated = raw.slice(0, Math.floor(raw.length * cut));
        expect(() => validateAnalysis(truncated, video)).not.toThrow();
      }),
      { numRuns: 200 },
    );
  });
});
