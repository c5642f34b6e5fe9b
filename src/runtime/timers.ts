import { clearTimeout as nodeClearTimeout, setTimeout as nodeSetTimeout } from "node:timers";

export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

const fallbackTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
} as const;

/**
 * Resolves the timer function currently installed on {@link globalThis}. Fake
 * timers (Sinon) replace the globals, so looking them up at call time keeps the
 * engine's sleeps and timeouts under the test clock.
 */
function resolveTimer<K extends keyof typeof fallbackTimers>(key: K): (typeof fallbackTimers)[K] {
  const candidate = (globalThis as Record<string, unknown>)[key];
  if (typeof candidate === "function") {
    return candidate as (typeof fallbackTimers)[K];
  }
  return fallbackTimers[key];
}

export function runtimeSetTimeout(callback: () => void, ms: number): TimeoutHandle {
  return resolveTimer("setTimeout")(callback, ms);
}

export function runtimeClearTimeout(handle: TimeoutHandle): void {
  resolveTimer("clearTimeout")(handle);
}

/**
 * Resolves after {@link ms} milliseconds, or rejects with the signal's reason
 * as soon as {@link signal} aborts. The pending timer is cleared on abort.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }
  if (ms <= 0 && !signal) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      runtimeClearTimeout(handle);
      reject(signal?.reason);
    };
    const handle = runtimeSetTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export const runtimeTimers = {
  setTimeout: runtimeSetTimeout,
  clearTimeout: runtimeClearTimeout,
  sleep,
} as const;
