// Swing Coach - Audio Cache Gate
//
// Guarantees every spoken phrase of a session has synthesized audio on disk
// before playback is offered. Phrases are keyed by a hash of their exact text;
// each key has at most one synthesis request in flight, and concurrent
// startCaching() calls join the requests already running. The ready signal
// fires exactly once per session, on the completion that caches the last
// outstanding phrase, whatever order requests finish in.

import { errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { SpeechSynthesizer } from "./tts-engine.js";
import type { AnalysisResult, CachedAudioEntry, Deferred } from "./types.js";
import { createDeferred } from "./utils/deferred.js";
import { phraseKey } from "./utils.js";

/** Where fragments live; SessionStore implements this. */
export interface AudioFragmentStore {
  hasAudio(sessionId: string, key: string): Promise<boolean>;
  writeAudio(sessionId: string, key: string, audio: Buffer): Promise<string>;
  audioPath(sessionId: string, key: string): string;
}

export interface AudioCacheGateDeps {
  synthesizer: SpeechSynthesizer;
  store: AudioFragmentStore;
  logger?: Logger;
}

export type ReadyListener = (sessionId: string) => void;
export type ProgressListener = (sessionId: string, progress: number) => void;

interface SessionCache {
  entries: Map<string, CachedAudioEntry>;
  inFlight: Map<string, Promise<void>>;
  ready: Deferred<void>;
  readyFired: boolean;
  released: boolean;
}

/**
 * Every phrase the coached playback speaks: narration lines plus per-phase
 * feedback, trimmed, without duplicates, in first-seen order.
 */
export function collectSpokenPhrases(result: AnalysisResult): string[] {
  const phrases = [
    ...result.narrationScript.map((line) => line.text),
    ...result.swingPhases.map((phase) => phase.feedbackText),
  ]
    .map((text) => text.trim())
    .filter((text) => text.length > 0);
  return [...new Set(phrases)];
}

export class AudioCacheGate {
  private readonly sessions = new Map<string, SessionCache>();
  private readonly readyListeners = new Set<ReadyListener>();
  private readonly progressListeners = new Set<ProgressListener>();
  private readonly logger: Logger;

  constructor(private readonly deps: AudioCacheGateDeps) {
    this.logger = deps.logger ?? createConsoleLogger("AudioCacheGate");
  }

  // ── registration ──

  /**
   * Add phrases to a session's cache. Phrases whose audio is already on disk
   * start out cached, so the cache survives restarts.
   */
  async register(sessionId: string, phrases: string[]): Promise<void> {
    const cache = this.cacheFor(sessionId);
    for (const raw of phrases) {
      const text = raw.trim();
      if (text.length === 0) continue;
      const key = phraseKey(text);
      if (cache.entries.has(key)) continue;
      const entry: CachedAudioEntry = { key, text, fetchState: "not_started" };
      cache.entries.set(key, entry);
      if (await this.deps.store.hasAudio(sessionId, key)) {
        entry.fetchState = "cached";
        entry.audioFile = this.deps.store.audioPath(sessionId, key);
      }
    }
    this.checkReady(sessionId, cache);
  }

  isRegistered(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Drop a session; completions still in flight are ignored. */
  release(sessionId: string): void {
    const cache = this.sessions.get(sessionId);
    if (!cache) return;
    cache.released = true;
    this.sessions.delete(sessionId);
  }

  // ── caching ──

  /**
   * Issue one synthesis request for every phrase that is not cached and not
   * already in flight. Resolves when every request issued or joined by this
   * call has settled. Never rejects: failures are recorded on the entry and
   * retried by the next call.
   */
  async startCaching(sessionId: string): Promise<void> {
    const cache = this.sessions.get(sessionId);
    if (!cache) throw new Error(`No phrases registered for session ${sessionId}`);

    const pending: Promise<void>[] = [];
    for (const entry of cache.entries.values()) {
      if (entry.fetchState === "cached") continue;
      let request = cache.inFlight.get(entry.key);
      if (!request) {
        request = this.fetch(sessionId, cache, entry).finally(() => {
          cache.inFlight.delete(entry.key);
        });
        cache.inFlight.set(entry.key, request);
      }
      pending.push(request);
    }
    await Promise.all(pending);
  }

  private async fetch(sessionId: string, cache: SessionCache, entry: CachedAudioEntry): Promise<void> {
    entry.fetchState = "in_flight";
    entry.lastError = undefined;
    try {
      const audio = await this.deps.synthesizer.synthesize(entry.text);
      if (cache.released) return;
      const file = await this.deps.store.writeAudio(sessionId, entry.key, audio);
      if (cache.released) return;
      entry.fetchState = "cached";
      entry.audioFile = file;
    } catch (err) {
      entry.fetchState = "failed";
      entry.lastError = errorMessage(err);
      if (!cache.released) {
        this.logger.warn(`[${sessionId}] synthesis failed for phrase ${entry.key}: ${entry.lastError}`);
      }
    } finally {
      if (!cache.released) {
        this.emitProgress(sessionId);
        this.checkReady(sessionId, cache);
      }
    }
  }

  // ── queries ──

  isReady(sessionId: string): boolean {
    const cache = this.sessions.get(sessionId);
    return cache !== undefined && this.allCached(cache);
  }

  /** cached / total; 1 for a session with nothing to say, 0 when unknown. */
  progress(sessionId: string): number {
    const cache = this.sessions.get(sessionId);
    if (!cache) return 0;
    if (cache.entries.size === 0) return 1;
    let cached = 0;
    for (const entry of cache.entries.values()) {
      if (entry.fetchState === "cached") cached++;
    }
    return cached / cache.entries.size;
  }

  /** Resolves when the session becomes ready. */
  whenReady(sessionId: string): Promise<void> {
    return this.cacheFor(sessionId).ready.promise;
  }

  entries(sessionId: string): CachedAudioEntry[] {
    const cache = this.sessions.get(sessionId);
    return cache ? [...cache.entries.values()].map((entry) => ({ ...entry })) : [];
  }

  /** Cached fragment for a phrase, or null if it is not cached yet. */
  audioFileFor(sessionId: string, text: string): string | null {
    const entry = this.sessions.get(sessionId)?.entries.get(phraseKey(text.trim()));
    return entry?.fetchState === "cached" && entry.audioFile ? entry.audioFile : null;
  }

  // ── listeners ──

  onReady(listener: ReadyListener): () => void {
    this.readyListeners.add(listener);
    return () => {
      this.readyListeners.delete(listener);
    };
  }

  onProgress(listener: ProgressListener): () => void {
    this.progressListeners.add(listener);
    return () => {
      this.progressListeners.delete(listener);
    };
  }

  // ── internals ──

  private cacheFor(sessionId: string): SessionCache {
    let cache = this.sessions.get(sessionId);
    if (!cache) {
      cache = {
        entries: new Map(),
        inFlight: new Map(),
        ready: createDeferred<void>(),
        readyFired: false,
        released: false,
      };
      this.sessions.set(sessionId, cache);
    }
    return cache;
  }

  private allCached(cache: SessionCache): boolean {
    for (const entry of cache.entries.values()) {
      if (entry.fetchState !== "cached") return false;
    }
    return true;
  }

  private checkReady(sessionId: string, cache: SessionCache): void {
    if (cache.readyFired || !this.allCached(cache)) return;
    cache.readyFired = true;
    this.logger.info(`[${sessionId}] audio ready (${cache.entries.size} phrases)`);
    cache.ready.resolve();
    for (const listener of [...this.readyListeners]) listener(sessionId);
  }

  private emitProgress(sessionId: string): void {
    if (this.progressListeners.size === 0) return;
    const progress = this.progress(sessionId);
    for (const listener of [...this.progressListeners]) listener(sessionId, progress);
  }
}
