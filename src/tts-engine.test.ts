// Unit tests for TTSEngine
// Tests: synthesize, error classification

import { describe, it, expect, vi } from "vitest";
import { ContentRejectedError, TransientError } from "./errors.js";
import { TTSEngine, type OpenAITTSClient } from "./tts-engine.js";

// ─── Mock OpenAI TTS client ────────────────────────────────────────────────────

function createMockClient(audioData: Buffer = Buffer.from("fake-audio")) {
  const create = vi.fn().mockResolvedValue({
    arrayBuffer: () =>
      Promise.resolve(audioData.buffer.slice(audioData.byteOffset, audioData.byteOffset + audioData.byteLength)),
  });
  const client: OpenAITTSClient = { audio: { speech: { create } } };
  return { client, create };
}

describe("TTSEngine.synthesize", () => {
  it("sends the trimmed phrase with the configured voice", async () => {
    const { client, create } = createMockClient();
    const engine = new TTSEngine(client, { voice: "alloy" });

    const audio = await engine.synthesize("  Keep your head still.  ");

    expect(audio.toString()).toBe("fake-audio");
    expect(create).toHaveBeenCalledWith({ model: "tts-1", voice: "alloy", input: "Keep your head still." });
  });

  it("uses the default model and voice", async () => {
    const { client, create } = createMockClient();
    await new TTSEngine(client).synthesize("Nice tempo");
    expect(create).toHaveBeenCalledWith({ model: "tts-1", voice: "nova", input: "Nice tempo" });
  });

  it("refuses empty phrases without calling the API", async () => {
    const { client, create } = createMockClient();
    await expect(new TTSEngine(client).synthesize("   ")).rejects.toThrow("Cannot synthesize an empty phrase");
    expect(create).not.toHaveBeenCalled();
  });

  it("classifies API failures", async () => {
    const { client, create } = createMockClient();
    const engine = new TTSEngine(client);

    create.mockRejectedValueOnce(Object.assign(new Error("server error"), { status: 500 }));
    await expect(engine.synthesize("Hold the finish")).rejects.toBeInstanceOf(TransientError);

    create.mockRejectedValueOnce(Object.assign(new Error("input too long"), { status: 400 }));
    await expect(engine.synthesize("Hold the finish")).rejects.toBeInstanceOf(ContentRejectedError);
  });
});
