// Swing Coach - Connectivity Monitor
// Push signal for network reachability. The orchestrator subscribes and pauses
// or resumes sessions on transitions; listeners fire only when the state flips.

export type ConnectivityListener = (reachable: boolean) => void;

export interface ConnectivitySource {
  isReachable(): boolean;
  /** Returns an unsubscribe function. */
  subscribe(listener: ConnectivityListener): () => void;
}

/** Connectivity state set from outside (tests, or a platform callback). */
export class ConnectivitySignal implements ConnectivitySource {
  private reachable: boolean;
  private readonly listeners = new Set<ConnectivityListener>();

  constructor(initiallyReachable = true) {
    this.reachable = initiallyReachable;
  }

  isReachable(): boolean {
    return this.reachable;
  }

  subscribe(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setReachable(reachable: boolean): void {
    if (reachable === this.reachable) return;
    this.reachable = reachable;
    for (const listener of [...this.listeners]) {
      listener(reachable);
    }
  }
}

// ─── Host probe ─────────────────────────────────────────────────────────────────

export type ProbeFn = (url: string, timeoutMs: number) => Promise<boolean>;

/** Any HTTP response counts as reachable; only a failed request does not. */
export const httpProbe: ProbeFn = async (url, timeoutMs) => {
  try {
    await fetch(url, { method: "HEAD", signal: AbortSignal.timeout(timeoutMs) });
    return true;
  } catch {
    return false;
  }
};

export interface HostProbeOptions {
  url: string;
  intervalMs: number;
  timeoutMs?: number;
  probe?: ProbeFn;
}

/**
 * Periodically probes a well-known URL and flips the signal on change.
 * start() runs one probe immediately.
 */
export class HostProbeConnectivity extends ConnectivitySignal {
  private timer: ReturnType<typeof setInterval> | null = null;
  private probing = false;
  private readonly probe: ProbeFn;

  constructor(private readonly options: HostProbeOptions) {
    super(true);
    this.probe = options.probe ?? httpProbe;
  }

  start(): Promise<void> {
    if (!this.timer) {
      this.timer = setInterval(() => {
        void this.check();
      }, this.options.intervalMs);
    }
    return this.check();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One probe; overlapping calls are skipped. Never rejects. */
  async check(): Promise<void> {
    if (this.probing) return;
    this.probing = true;
    try {
      const timeoutMs = this.options.timeoutMs ?? Math.min(5000, this.options.intervalMs);
      // A probe that throws is an unreachable host.
      const ok = await this.probe(this.options.url, timeoutMs).catch(() => false);
      this.setReachable(ok);
    } finally {
      this.probing = false;
    }
  }
}
