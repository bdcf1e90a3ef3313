// Property-Based Tests for the Audio Cache Gate
// Whatever order synthesis requests complete in, each phrase is requested once
// and the ready signal fires exactly once, after the last phrase is cached.

import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";
import { AudioCacheGate, type AudioFragmentStore } from "./audio-cache-gate.js";
import { silentLogger } from "./logger.js";
import type { Deferred } from "./types.js";
import { createDeferred } from "./utils/deferred.js";

function createMemoryStore(): AudioFragmentStore {
  const files = new Set<string>();
  const audioPath = (sessionId: string, key: string) => `/audio/${sessionId}/${key}.mp3`;
  return {
    audioPath,
    hasAudio: async (sessionId, key) => files.has(audioPath(sessionId, key)),
    writeAudio: async (sessionId, key) => {
      files.add(audioPath(sessionId, key));
      return audioPath(sessionId, key);
    },
  };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("AudioCacheGate properties", () => {
  it("fires ready once, after the last of any completion order", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc
          .uniqueArray(fc.string({ minLength: 1, maxLength: 12 }).filter((s) => s.trim() === s && s.length > 0), {
            minLength: 1,
            maxLength: 8,
          })
          .chain((phrases) =>
            fc.tuple(
              fc.constant(phrases),
              fc.shuffledSubarray(phrases, { minLength: phrases.length, maxLength: phrases.length }),
            ),
          ),
        fc.integer({ min: 1, max: 3 }),
        async ([phrases, order], callers) => {
          const pending = new Map<string, Deferred<Buffer>>();
          const synthesize = vi.fn((text: string) => {
            const deferred = createDeferred<Buffer>();
            pending.set(text, deferred);
            return deferred.promise;
          });
          const gate = new AudioCacheGate({ synthesizer: { synthesize }, store: createMemoryStore(), logger: silentLogger });
          const onReady = vi.fn();
          gate.onReady(onReady);
          await gate.register("s1", phrases);

          const calls = Array.from({ length: callers }, () => gate.startCaching("s1"));
          expect(synthesize).toHaveBeenCalledTimes(phrases.length);

          for (const text of order) {
            expect(onReady).not.toHaveBeenCalled();
            pending.get(text)?.resolve(Buffer.from(text));
            await flush();
          }
          await Promise.all(calls);

          expect(onReady).toHaveBeenCalledTimes(1);
          expect(gate.isReady("s1")).toBe(true);
          expect(gate.progress("s1")).toBe(1);
        },
      ),
      { numRuns: 60 },
    );
  });
});
