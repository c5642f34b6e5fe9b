/**
 * Raised for structural misuse of the engine: invalid builder calls, bad
 * arity, non-positive limits, mismatched Gather factory output. These errors
 * always propagate to the caller and are never converted into a FAIL result.
 */
export class TreeProgrammingError extends Error {
  public readonly code = "E-TREE-PROGRAMMING";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TreeProgrammingError";
  }
}

/**
 * Signal used to unwind a cancelled branch. Timeout and Terminable abort their
 * child's signal with this error so they can tell their own cancellation
 * apart from a child failing on its own.
 */
export class TreeCancellationError extends Error {
  public readonly code = "E-TREE-CANCELLED";

  constructor(message = "tree execution cancelled", options?: ErrorOptions) {
    super(message, options);
    this.name = "TreeCancellationError";
  }
}

/** Raised by trace storages when an identifier does not resolve to a saved trace. */
export class TraceNotFoundError extends Error {
  public readonly code = "E-TRACE-NOT-FOUND";

  constructor(public readonly traceId: string) {
    super(`trace ${traceId} not found`);
    this.name = "TraceNotFoundError";
  }
}

export function isCancellationError(error: unknown): error is TreeCancellationError {
  return error instanceof TreeCancellationError;
}

/**
 * Normalises an abort reason into a {@link TreeCancellationError} while
 * preserving the original reason as the cause.
 */
export function toCancellationError(reason: unknown): TreeCancellationError {
  if (reason instanceof TreeCancellationError) {
    return reason;
  }
  if (reason instanceof Error) {
    return new TreeCancellationError(reason.message || undefined, { cause: reason });
  }
  if (typeof reason === "string" && reason.trim().length > 0) {
    return new TreeCancellationError(reason);
  }
  return new TreeCancellationError(undefined, reason === undefined ? undefined : { cause: reason });
}
