import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { LocalStorageError } from "./errors.js";
import { SessionStore, isAnalysisSession, isValidSessionId } from "./session-store.js";
import { SessionStatus, type AnalysisSession } from "./types.js";

const ID_A = "0190a1b2-c3d4-7e5f-8a9b-0c1d2e3f4a5b";
const ID_B = "0190a1b2-c3d4-7e5f-8a9b-0c1d2e3f4a5c";

function makeSession(id: string, overrides: Partial<AnalysisSession> = {}): AnalysisSession {
  return {
    id,
    status: SessionStatus.CREATED,
    videoRef: { fileName: "video.mp4", mimeType: "video/mp4", sizeBytes: 4 },
    uploadProgress: 0,
    createdAt: "2026-01-01T00:00:00.000Z",
    lastTransitionAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

describe("SessionStore", () => {
  let dataDir: string;
  let store: SessionStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "swing-store-"));
    store = new SessionStore(dataDir);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("creates a session directory with the video and record", async () => {
    const session = makeSession(ID_A);
    await store.createSession(session, Buffer.from("clip"));

    expect(await readFile(store.videoPath(session), "utf-8")).toBe("clip");
    expect(await store.loadSession(ID_A)).toEqual(session);
    expect((await readdir(store.sessionDir(ID_A))).sort()).toEqual(["session.json", "video.mp4"]);
  });

  it("copies the video of another session", async () => {
    const original = makeSession(ID_A);
    await store.createSession(original, Buffer.from("clip"));
    const copy = makeSession(ID_B, { retryOf: ID_A });
    await store.createSession(copy, { copyFrom: store.videoPath(original) });

    expect(await readFile(store.videoPath(copy), "utf-8")).toBe("clip");
  });

  it("returns null for unknown or malformed ids", async () => {
    expect(await store.loadSession(ID_A)).toBeNull();
    expect(await store.loadSession("../etc")).toBeNull();
  });

  it("rejects malformed ids when building paths", () => {
    expect(() => store.sessionDir("../etc")).toThrow(LocalStorageError);
  });

  it("raises LocalStorageError for a corrupt record", async () => {
    await mkdir(store.sessionDir(ID_A), { recursive: true });
    await writeFile(join(store.sessionDir(ID_A), "session.json"), "{not json");
    await expect(store.loadSession(ID_A)).rejects.toBeInstanceOf(LocalStorageError);
  });

  it("lists sessions newest first and skips directories without a record", async () => {
    await store.createSession(makeSession(ID_A), Buffer.from("a"));
    await store.createSession(makeSession(ID_B), Buffer.from("b"));
    await mkdir(store.sessionDir("0190a1b2-c3d4-7e5f-8a9b-0c1d2e3f4a5d"), { recursive: true });

    expect((await store.listSessions()).map((s) => s.id)).toEqual([ID_B, ID_A]);
  });

  it("lists nothing before any session exists", async () => {
    expect(await store.listSessions()).toEqual([]);
  });

  it("serializes saves so the last write wins", async () => {
    const session = makeSession(ID_A);
    await store.createSession(session, Buffer.from("a"));
    await Promise.all([
      store.saveSession({ ...session, status: SessionStatus.UPLOADING }),
      store.saveSession({ ...session, status: SessionStatus.SUBMITTED, uploadProgress: 1 }),
    ]);
    expect((await store.loadSession(ID_A))?.status).toBe(SessionStatus.SUBMITTED);
  });

  it("drops a session's write queue once it drains, even after a failed write", async () => {
    const session = makeSession(ID_A);
    await store.createSession(session, Buffer.from("a"));
    expect(store.hasPendingWrites(ID_A)).toBe(false);

    const saved = store.saveSession({ ...session, status: SessionStatus.UPLOADING });
    expect(store.hasPendingWrites(ID_A)).toBe(true);
    await saved;
    expect(store.hasPendingWrites(ID_A)).toBe(false);

    await rm(store.sessionDir(ID_A), { recursive: true });
    await expect(store.saveSession(session)).rejects.toBeInstanceOf(LocalStorageError);
    expect(store.hasPendingWrites(ID_A)).toBe(false);
  });

  it("writes and detects audio fragments", async () => {
    await store.createSession(makeSession(ID_A), Buffer.from("a"));
    expect(await store.hasAudio(ID_A, "abc")).toBe(false);
    const path = await store.writeAudio(ID_A, "abc", Buffer.from("mp3"));
    expect(path).toBe(join(store.sessionDir(ID_A), "audio", "abc.mp3"));
    expect(await store.hasAudio(ID_A, "abc")).toBe(true);
  });

  it("commits a staged report by renaming it", async () => {
    await store.createSession(makeSession(ID_A), Buffer.from("a"));
    const staging = await store.createStagingDir(ID_A);
    await writeFile(
      join(staging, "manifest.json"),
      JSON.stringify({ sessionId: ID_A, keyMoments: [], coachingScript: [] }),
    );
    expect(await store.readManifest(ID_A)).toBeNull();

    await store.commitReport(ID_A, staging);
    expect(await store.readManifest(ID_A)).toEqual({ sessionId: ID_A, keyMoments: [], coachingScript: [] });
    expect((await readdir(store.sessionDir(ID_A))).sort()).toEqual(["report", "session.json", "video.mp4"]);
  });

  it("writes diagnostics for validation failures", async () => {
    await store.createSession(makeSession(ID_A), Buffer.from("a"));
    await store.writeDiagnostics(ID_A, { reason: "No usable swing phases", rawPayload: "{}" });
    const diagnostics: unknown = JSON.parse(await readFile(join(store.sessionDir(ID_A), "diagnostics.json"), "utf-8"));
    expect(diagnostics).toMatchObject({ reason: "No usable swing phases", rawPayload: "{}" });
  });

  it("deletes a session directory", async () => {
    await store.createSession(makeSession(ID_A), Buffer.from("a"));
    await store.deleteSession(ID_A);
    expect(await store.loadSession(ID_A)).toBeNull();
    expect(await store.listSessions()).toEqual([]);
  });
});

describe("session id and record guards", () => {
  it("accepts UUIDs only", () => {
    expect(isValidSessionId(ID_A)).toBe(true);
    expect(isValidSessionId("session-1")).toBe(false);
  });

  it("checks the record shape", () => {
    expect(isAnalysisSession(makeSession(ID_A))).toBe(true);
    expect(isAnalysisSession({ ...makeSession(ID_A), status: "paused" })).toBe(false);
    expect(isAnalysisSession(null)).toBe(false);
  });
});
