/** Controller whose signal also aborts when its parent signal aborts. */
export interface LinkedAbortController {
  readonly controller: AbortController;
  readonly signal: AbortSignal;
  /** Detaches the listener installed on the parent signal. Idempotent. */
  dispose(): void;
}

/**
 * Creates a controller linked to {@link parent}: aborting the parent aborts the
 * child with the same reason, while aborting the child leaves the parent
 * untouched. Callers must dispose the link once the child scope settles so
 * long-lived parent signals do not accumulate listeners.
 */
export function createLinkedAbortController(parent: AbortSignal): LinkedAbortController {
  const controller = new AbortController();
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, signal: controller.signal, dispose: () => undefined };
  }

  const onAbort = (): void => {
    controller.abort(parent.reason);
  };
  parent.addEventListener("abort", onAbort, { once: true });

  let disposed = false;
  return {
    controller,
    signal: controller.signal,
    dispose: () => {
      if (disposed) {
        return;
      }
      disposed = true;
      parent.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Races {@link work} against {@link signal}. The returned promise rejects with
 * the value produced by {@link toError} as soon as the signal aborts. Once the
 * race is lost the outcome of the abandoned work settles an already settled
 * promise and is dropped.
 */
export function raceAbort<T>(work: PromiseLike<T>, signal: AbortSignal, toError: (reason: unknown) => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(toError(signal.reason));
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    Promise.resolve(work).then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
