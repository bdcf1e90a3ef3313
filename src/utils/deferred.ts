// Typed deferred utility, kept in its own module so the type barrel (src/types.ts)
// stays free of runtime code. Remote jobs publish their outcome through one, and
// the audio cache gate uses one per session for whenReady().

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
