import type { StructuredLogger } from "../logger.js";
import { raceAbort } from "../runtime/abort.js";
import { sleep } from "../runtime/timers.js";
import type { RandomSource } from "../utils/random.js";

import { getDefaults } from "./defaults.js";
import { toCancellationError } from "./errors.js";
import type { Result } from "./result.js";
import { Tracer } from "./tracer.js";

export interface ContextOptions {
  /** Blackboard bound for the whole run. Can also be bound later with {@link Context.usingBlackboard}. */
  blackboard?: unknown;
  /** Defaults to the process-wide logger from {@link getDefaults}. */
  logger?: StructuredLogger;
  /** Source consumed by randomised composites. Defaults to {@link Math.random}. */
  random?: RandomSource;
  /** Aborting this signal cancels the run. */
  signal?: AbortSignal;
  /** Root span of the trace tree. A fresh `ROOT` span is created when omitted. */
  traceRoot?: Tracer;
  /** Span new node spans are attached under. Defaults to the trace root. */
  tracer?: Tracer;
}

export interface ForkOptions {
  blackboard?: unknown;
  signal?: AbortSignal;
}

const NEVER_ABORTED = new AbortController().signal;

/**
 * Per-run carrier threaded through every node invocation. Concurrent branches
 * never share a context: Parallel, Gather, Timeout and Terminable fork one per
 * spawned task so the blackboard and tracer pointers stay task-local while the
 * trace tree, logger and random source are shared.
 */
export class Context {
  readonly logger: StructuredLogger;
  readonly random: RandomSource;
  readonly signal: AbortSignal;
  /** Span of the node currently executing on this context. */
  tracer: Tracer;
  /** Result of the most recently completed node on this context. */
  lastResult: Result | undefined;
  /** Span of the most recently completed node on this context. */
  lastTracer: Tracer | undefined;
  private currentBlackboard: unknown;
  private readonly root: Tracer;

  constructor(options: ContextOptions = {}) {
    this.logger = options.logger ?? getDefaults().logger;
    this.random = options.random ?? Math.random;
    this.signal = options.signal ?? NEVER_ABORTED;
    this.root = options.traceRoot ?? new Tracer("ROOT", "ROOT");
    this.tracer = options.tracer ?? this.root;
    this.currentBlackboard = options.blackboard;
  }

  /** Currently bound blackboard, untyped. */
  get blackboard(): unknown {
    return this.currentBlackboard;
  }

  /**
   * Currently bound blackboard viewed as {@link B}. The type is fixed by the
   * tree that built the calling node; the context itself does not check it.
   */
  board<B>(): B {
    return this.currentBlackboard as B;
  }

  /**
   * Binds {@link blackboard} while {@link fn} runs and restores the previous
   * binding afterwards, whatever the outcome.
   */
  async usingBlackboard<T>(blackboard: unknown, fn: () => Promise<T>): Promise<T> {
    const previous = this.currentBlackboard;
    this.currentBlackboard = blackboard;
    try {
      return await fn();
    } finally {
      this.currentBlackboard = previous;
    }
  }

  /** Makes {@link span} the current span while {@link fn} runs. */
  async usingTracer<T>(span: Tracer, fn: () => Promise<T>): Promise<T> {
    const previous = this.tracer;
    this.tracer = span;
    try {
      return await fn();
    } finally {
      this.tracer = previous;
    }
  }

  /**
   * Derives a context for a spawned task. The fork records under the current
   * span and shares the trace tree, logger and random source; it owns its
   * blackboard pointer, tracer pointer and last result. The last result starts
   * as the parent's so a tap placed first in the task sees the preceding
   * sibling's outcome.
   */
  fork(options: ForkOptions = {}): Context {
    const forked = new Context({
      blackboard: "blackboard" in options ? options.blackboard : this.currentBlackboard,
      logger: this.logger,
      random: this.random,
      signal: options.signal ?? this.signal,
      traceRoot: this.root,
      tracer: this.tracer,
    });
    forked.lastResult = this.lastResult;
    return forked;
  }

  /** Root span of the run, named and kinded `ROOT`. */
  traceRoot(): Tracer {
    return this.root;
  }

  get cancelled(): boolean {
    return this.signal.aborted;
  }

  throwIfCancelled(): void {
    if (this.signal.aborted) {
      throw toCancellationError(this.signal.reason);
    }
  }

  /**
   * Awaits {@link work} unless the run is cancelled first, in which case the
   * returned promise rejects with a cancellation error straight away.
   */
  async guard<T>(work: T | PromiseLike<T>): Promise<T> {
    this.throwIfCancelled();
    if (!isPromiseLike(work)) {
      return work;
    }
    return raceAbort(work, this.signal, toCancellationError);
  }

  /** Cancellable sleep on the runtime timers. */
  async sleep(ms: number): Promise<void> {
    this.throwIfCancelled();
    try {
      await sleep(ms, this.signal);
    } catch (error) {
      if (this.signal.aborted) {
        throw toCancellationError(this.signal.reason);
      }
      throw error;
    }
  }
}

function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}
