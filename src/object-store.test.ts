import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Writable } from "node:stream";
import { GcsObjectStore, LocalObjectStore, objectKeyFor, type GcsClient } from "./object-store.js";

describe("objectKeyFor", () => {
  it("derives the key from the session id and file extension", () => {
    expect(objectKeyFor("swing-videos", "abc", "/data/abc/video.mov")).toBe("swing-videos/abc/video.mov");
    expect(objectKeyFor("swing-videos/", "abc", "/data/abc/video")).toBe("swing-videos/abc/video.mp4");
  });
});

describe("LocalObjectStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "swing-objects-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("copies the file and reports monotonic progress ending at 1", async () => {
    const source = join(dir, "clip.mp4");
    await writeFile(source, Buffer.alloc(200_000, 7));
    const store = new LocalObjectStore(join(dir, "bucket"), "swing-videos");
    const progress: number[] = [];

    const stored = await store.upload({
      sessionId: "session-1",
      filePath: source,
      contentType: "video/mp4",
      onProgress: (fraction) => progress.push(fraction),
    });

    const target = join(dir, "bucket", "swing-videos", "session-1", "video.mp4");
    expect(stored).toEqual({ uri: `file://${target}`, sizeBytes: 200_000 });
    expect((await readFile(target)).length).toBe(200_000);
    expect(progress[progress.length - 1]).toBe(1);
    for (let i = 1; i < progress.length; i++) {
      expect(progress[i]).toBeGreaterThan(progress[i - 1]);
    }
  });

  it("rejects when aborted", async () => {
    const source = join(dir, "clip.mp4");
    await writeFile(source, Buffer.alloc(1000, 1));
    const store = new LocalObjectStore(join(dir, "bucket"), "swing-videos");

    await expect(
      store.upload({ sessionId: "s", filePath: source, contentType: "video/mp4", signal: AbortSignal.abort() }),
    ).rejects.toMatchObject({ name: "AbortError" });
  });
});

describe("GcsObjectStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "swing-gcs-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("streams the clip through a resumable upload under the session key", async () => {
    const source = join(dir, "clip.mov");
    await writeFile(source, Buffer.alloc(5000, 3));
    const received: Buffer[] = [];
    const createWriteStream = vi.fn(
      (_options: { resumable: boolean; contentType: string }) =>
        new Writable({
          write(chunk: Buffer, _encoding, callback) {
            received.push(chunk);
            callback();
          },
        }),
    );
    const file = vi.fn((_name: string) => ({ createWriteStream }));
    const bucket = vi.fn((_name: string) => ({ file }));
    const client: GcsClient = { bucket };
    const store = new GcsObjectStore(client, "swing-bucket", "swing-videos");

    const stored = await store.upload({ sessionId: "session-1", filePath: source, contentType: "video/quicktime" });

    expect(stored).toEqual({ uri: "gs://swing-bucket/swing-videos/session-1/video.mov", sizeBytes: 5000 });
    expect(bucket).toHaveBeenCalledWith("swing-bucket");
    expect(file).toHaveBeenCalledWith("swing-videos/session-1/video.mov");
    expect(createWriteStream).toHaveBeenCalledWith({ resumable: true, contentType: "video/quicktime" });
    expect(Buffer.concat(received).length).toBe(5000);
  });
});
