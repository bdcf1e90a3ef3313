// Swing Coach - Object storage for uploaded videos
// Durable upload target for the remote analysis service. A Google Cloud Storage
// bucket in production, a plain directory when no bucket is configured. Both
// report byte-level progress and honor an abort signal. Object keys are derived
// from the session id, so a retried upload overwrites the same object.

import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, stat } from "node:fs/promises";
import { dirname, extname, join } from "node:path";
import { Transform, type Writable } from "node:stream";
import { pipeline } from "node:stream/promises";

export interface UploadRequest {
  sessionId: string;
  filePath: string;
  contentType: string;
  /** Called with the uploaded fraction in [0, 1]; never decreases within one call. */
  onProgress?: (fraction: number) => void;
  signal?: AbortSignal;
}

export interface StoredObject {
  uri: string;
  sizeBytes: number;
}

export interface ObjectStore {
  upload(request: UploadRequest): Promise<StoredObject>;
}

export function objectKeyFor(prefix: string, sessionId: string, filePath: string): string {
  const ext = extname(filePath) || ".mp4";
  return `${prefix.replace(/\/+$/, "")}/${sessionId}/video${ext}`;
}

/** Pipe a file into `destination`, reporting progress as bytes flow. */
async function streamWithProgress(
  request: UploadRequest,
  destination: Writable,
): Promise<number> {
  const { size } = await stat(request.filePath);
  let sent = 0;
  let lastReported = -1;
  const counter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      sent += chunk.length;
      const fraction = size > 0 ? Math.min(1, sent / size) : 1;
      if (fraction > lastReported) {
        lastReported = fraction;
        request.onProgress?.(fraction);
      }
      callback(null, chunk);
    },
  });
  await pipeline(createReadStream(request.filePath), counter, destination, { signal: request.signal });
  if (lastReported < 1) request.onProgress?.(1);
  return size;
}

// ─── Google Cloud Storage ───────────────────────────────────────────────────────

/** The slice of the `@google-cloud/storage` client used here; `Storage` satisfies it. */
export interface GcsClient {
  bucket(name: string): {
    file(name: string): {
      createWriteStream(options: { resumable: boolean; contentType: string }): Writable;
    };
  };
}

/** Writes each clip through a GCS resumable upload session. */
export class GcsObjectStore implements ObjectStore {
  constructor(
    private readonly storage: GcsClient,
    private readonly bucketName: string,
    private readonly prefix: string,
  ) {}

  async upload(request: UploadRequest): Promise<StoredObject> {
    const key = objectKeyFor(this.prefix, request.sessionId, request.filePath);
    const file = this.storage.bucket(this.bucketName).file(key);
    const sizeBytes = await streamWithProgress(
      request,
      file.createWriteStream({ resumable: true, contentType: request.contentType }),
    );
    return { uri: `gs://${this.bucketName}/${key}`, sizeBytes };
  }
}

// ─── Local directory ────────────────────────────────────────────────────────────

export class LocalObjectStore implements ObjectStore {
  constructor(
    private readonly rootDir: string,
    private readonly prefix: string,
  ) {}

  async upload(request: UploadRequest): Promise<StoredObject> {
    const key = objectKeyFor(this.prefix, request.sessionId, request.filePath);
    const target = join(this.rootDir, key);
    await mkdir(dirname(target), { recursive: true });
    const sizeBytes = await streamWithProgress(request, createWriteStream(target));
    return { uri: `file://${target}`, sizeBytes };
  }
}
