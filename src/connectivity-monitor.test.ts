import { describe, it, expect, vi, afterEach } from "vitest";
import { ConnectivitySignal, HostProbeConnectivity } from "./connectivity-monitor.js";

describe("ConnectivitySignal", () => {
  it("notifies listeners only when the state flips", () => {
    const signal = new ConnectivitySignal();
    const listener = vi.fn();
    signal.subscribe(listener);

    signal.setReachable(true);
    signal.setReachable(false);
    signal.setReachable(false);
    signal.setReachable(true);

    expect(listener.mock.calls).toEqual([[false], [true]]);
    expect(signal.isReachable()).toBe(true);
  });

  it("stops notifying after unsubscribe", () => {
    const signal = new ConnectivitySignal(false);
    const listener = vi.fn();
    const unsubscribe = signal.subscribe(listener);
    unsubscribe();
    signal.setReachable(true);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe("HostProbeConnectivity", () => {
  let monitor: HostProbeConnectivity | null = null;

  afterEach(() => {
    monitor?.stop();
    monitor = null;
  });

  it("runs one probe on start and reports the result", async () => {
    const probe = vi.fn().mockResolvedValue(false);
    monitor = new HostProbeConnectivity({ url: "http://probe.test", intervalMs: 60_000, probe });
    const listener = vi.fn();
    monitor.subscribe(listener);

    await monitor.start();

    expect(probe).toHaveBeenCalledWith("http://probe.test", 5000);
    expect(monitor.isReachable()).toBe(false);
    expect(listener).toHaveBeenCalledWith(false);
  });

  it("treats a throwing probe as unreachable", async () => {
    const probe = vi.fn().mockRejectedValue(new Error("dns"));
    monitor = new HostProbeConnectivity({ url: "http://probe.test", intervalMs: 60_000, probe });
    await monitor.check();
    expect(monitor.isReachable()).toBe(false);
  });

  it("skips overlapping checks", async () => {
    let release: (ok: boolean) => void = () => {};
    const probe = vi.fn(
      () =>
        new Promise<boolean>((resolve) => {
          release = resolve;
        }),
    );
    monitor = new HostProbeConnectivity({ url: "http://probe.test", intervalMs: 60_000, timeoutMs: 100, probe });

    const first = monitor.check();
    await monitor.check();
    release(true);
    await first;

    expect(probe).toHaveBeenCalledTimes(1);
  });

  it("probes again on every interval", async () => {
    vi.useFakeTimers();
    try {
      const probe = vi.fn().mockResolvedValue(true);
      monitor = new HostProbeConnectivity({ url: "http://probe.test", intervalMs: 1000, probe });
      await monitor.start();
      await vi.advanceTimersByTimeAsync(3000);
      expect(probe).toHaveBeenCalledTimes(4);
    } finally {
      vi.useRealTimers();
    }
  });
});
