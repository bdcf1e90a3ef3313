// Shared utilities for Swing Coach.
//
// Deterministic helpers used by the remote service, the orchestrator and the
// audio cache gate: backoff timing, abortable sleep, phrase hashing and
// atomic JSON writes.

import { createHash, randomUUID } from "node:crypto";
import { rename, rm, writeFile } from "node:fs/promises";

// ─── Retry timing ───────────────────────────────────────────────────────────────

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Exponential backoff: base * 2^attempt, capped at maxDelayMs.
 * `attempt` is zero-based (the first retry waits baseDelayMs).
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, Math.floor(attempt));
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
}

/**
 * Resolves after `ms`, or rejects with an AbortError as soon as `signal`
 * aborts. A zero delay still yields to the event loop.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function abortError(): Error {
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

// ─── Numbers ────────────────────────────────────────────────────────────────────

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ─── Phrase keys ────────────────────────────────────────────────────────────────

/**
 * Stable key for a phrase's cached audio. The exact text is hashed, so two
 * phrases differing only in whitespace get different fragments.
 */
export function phraseKey(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex").slice(0, 24);
}

// ─── Atomic writes ──────────────────────────────────────────────────────────────

/**
 * Write `data` next to `filePath` under a temporary name, then rename it into
 * place. Readers see either the previous file or the complete new one.
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await writeFile(tmpPath, data);
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(value, null, 2) + "\n");
}
