import pLimit from "p-limit";
import { z } from "zod";

import { createLinkedAbortController } from "../../runtime/abort.js";
import { runtimeClearTimeout, runtimeSetTimeout, sleep } from "../../runtime/timers.js";
import type { KeyValueStore } from "../../store/keyValueStore.js";
import { RedisKeyValueStore, type RedisCommandClient } from "../../store/redisStore.js";
import { describeError } from "../../utils/serialize.js";
import { type BoundCallable, bindCallable } from "../callable.js";
import type { Context } from "../context.js";
import { getDefaults } from "../defaults.js";
import { TreeCancellationError, TreeProgrammingError, isCancellationError } from "../errors.js";
import { CompositeNode, DecoratorNode, Node } from "../node.js";
import { durationMsSchema, parseNodeOptions, positiveIntSchema } from "../options.js";
import { Result } from "../result.js";
import { spawnTask } from "../spawn.js";

/**
 * Settles every task before reporting. Rejections are rethrown once all
 * siblings are done so no task is left running behind the caller; the first
 * rejection in input order wins.
 */
async function settleAll(tasks: Array<Promise<Result>>): Promise<Result[]> {
  const outcomes = await Promise.allSettled(tasks);
  const results: Result[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
    results.push(outcome.value);
  }
  return results;
}

/** OK only when every result is OK; failed positions hold `undefined`. */
function aggregate(results: readonly Result[]): Result {
  const data = results.map((result) => (result.isOk() ? result.data : undefined));
  return results.every((result) => result.isOk()) ? Result.OK(data) : Result.FAIL(data);
}

const ConcurrencyOptionsSchema = z
  .object({
    name: z.string().optional(),
    concurrencyLimit: positiveIntSchema.optional(),
  })
  .strict();

export interface ParallelOptions {
  name?: string;
  /** Maximum number of children running at once. Unbounded by default. */
  concurrencyLimit?: number;
}

/**
 * Runs every child as a spawned task, at most `concurrencyLimit` at a time,
 * and waits for all of them. Data is positioned by child order.
 */
export class ParallelNode extends CompositeNode {
  readonly kind: string = "Parallel";
  private readonly concurrencyLimit: number | undefined;

  constructor(options: ParallelOptions = {}) {
    const parsed = parseNodeOptions("Parallel", ConcurrencyOptionsSchema, options);
    super(parsed.name);
    this.concurrencyLimit = parsed.concurrencyLimit;
  }

  protected async evaluate(context: Context): Promise<Result> {
    const limit = pLimit(Math.max(1, this.concurrencyLimit ?? this.children.length));
    const results = await settleAll(this.children.map((child) => limit(() => spawnTask(context, child))));
    return aggregate(results);
  }
}

/** Output of a Gather factory: subtrees and the blackboards they run against, pairwise. */
export type GatherPlan<C> = readonly [trees: readonly Node[], blackboards: readonly C[]];

export type GatherFactory<B, C> = (blackboard: B) => GatherPlan<C>;

export interface GatherOptions {
  name?: string;
  concurrencyLimit?: number;
}

/**
 * Parallel over a plan computed at run time: each subtree runs as a spawned
 * task bound to its own blackboard. Mismatched list lengths are a programming
 * error.
 */
export class GatherNode<B, C> extends Node {
  readonly kind: string = "Gather";
  private readonly concurrencyLimit: number | undefined;

  constructor(
    private readonly factory: GatherFactory<B, C>,
    options: GatherOptions = {},
  ) {
    const parsed = parseNodeOptions("Gather", ConcurrencyOptionsSchema, options);
    super(parsed.name);
    if (typeof factory !== "function") {
      throw new TreeProgrammingError("Gather factory must be a function");
    }
    this.concurrencyLimit = parsed.concurrencyLimit;
  }

  protected async evaluate(context: Context): Promise<Result> {
    const [trees, blackboards] = this.factory(context.board<B>());
    if (trees.length !== blackboards.length) {
      throw new TreeProgrammingError(
        `Gather node ${this.fullname} received ${trees.length} trees but ${blackboards.length} blackboards`,
      );
    }
    context.tracer.setAttribute("tasks", trees.length);
    const limit = pLimit(Math.max(1, this.concurrencyLimit ?? trees.length));
    const results = await settleAll(
      trees.map((tree, index) => limit(() => spawnTask(context, tree, { blackboard: blackboards[index] }))),
    );
    return aggregate(results);
  }
}

export interface TimeoutOptions {
  name?: string;
}

/**
 * Runs the primary child under a time budget. On expiry the child is
 * cancelled and awaited, then the optional second child runs as fallback;
 * without one the node fails.
 */
export class TimeoutNode extends Node {
  readonly kind: string = "Timeout";
  protected override readonly minChildren: number = 1;
  protected override readonly maxChildren: number = 2;

  constructor(
    private readonly timeoutMs: number,
    options: TimeoutOptions = {},
  ) {
    super(options.name);
    parseNodeOptions("Timeout", z.object({ timeoutMs: durationMsSchema }), { timeoutMs });
  }

  protected async evaluate(context: Context): Promise<Result> {
    const [primary, fallback] = this.children;
    const link = createLinkedAbortController(context.signal);
    const handle = runtimeSetTimeout(() => {
      link.controller.abort(new TreeCancellationError(`timed out after ${this.timeoutMs}ms`));
    }, this.timeoutMs);

    try {
      return await primary.execute(context.fork({ signal: link.signal }));
    } catch (error) {
      if (!isCancellationError(error) || context.signal.aborted || !link.signal.aborted) {
        throw error;
      }
    } finally {
      runtimeClearTimeout(handle);
      link.dispose();
    }

    context.tracer.setAttribute("timed_out", true);
    return fallback ? fallback.execute(context) : Result.FAIL();
  }
}

/**
 * Marker holding the branch Terminable runs after a termination signal. Only
 * legal as the second child of a Terminable node.
 */
export class FallbackNode extends DecoratorNode {
  readonly kind: string = "Fallback";

  protected override acceptParent(parent: Node, index: number): void {
    if (!(parent instanceof TerminableNode) || index !== 1) {
      throw new TreeProgrammingError(`Fallback must be the second child of a Terminable node, found under ${parent.fullname}`);
    }
  }

  protected async evaluate(context: Context): Promise<Result> {
    return this.child.execute(context);
  }
}

export interface TerminableOptions {
  name?: string;
  /** Store polled for the termination key. Defaults to the process-wide store. */
  store?: KeyValueStore;
  /** Redis connection used when no {@link store} is given. */
  redisClient?: RedisCommandClient;
  /** Polling interval. Defaults to `TREEFLOW_TERMINABLE_INTERVAL_MS`. */
  monitorIntervalMs?: number;
}

const TerminableOptionsSchema = z.object({
  name: z.string().optional(),
  monitorIntervalMs: positiveIntSchema.optional(),
});

/**
 * Runs the primary child as a spawned task while polling a store for the key
 * produced by `keyFunc`. When the key appears first, the child is cancelled
 * and awaited, then the optional {@link FallbackNode} runs; without one the
 * node fails.
 */
export class TerminableNode<B> extends Node {
  readonly kind: string = "Terminable";
  protected override readonly minChildren: number = 1;
  protected override readonly maxChildren: number = 2;
  private readonly keyFunc: BoundCallable<B>;
  private readonly store: KeyValueStore | undefined;
  private readonly monitorIntervalMs: number | undefined;

  constructor(keyFunc: (blackboard: B) => string, options: TerminableOptions = {}) {
    const parsed = parseNodeOptions("Terminable", TerminableOptionsSchema, {
      name: options.name,
      monitorIntervalMs: options.monitorIntervalMs,
    });
    super(parsed.name);
    this.keyFunc = bindCallable(keyFunc, { maxArity: 1, label: "Terminable key function" });
    this.store = options.store ?? (options.redisClient ? new RedisKeyValueStore(options.redisClient) : undefined);
    this.monitorIntervalMs = parsed.monitorIntervalMs;
  }

  protected override acceptChild(child: Node, index: number): void {
    if (index === 0 && child instanceof FallbackNode) {
      throw new TreeProgrammingError(`Terminable node ${this.fullname} needs a primary child before its Fallback`);
    }
    if (index === 1 && !(child instanceof FallbackNode)) {
      throw new TreeProgrammingError(`the second child of Terminable node ${this.fullname} must be a Fallback node`);
    }
  }

  protected async evaluate(context: Context): Promise<Result> {
    const [primary, fallback] = this.children;
    const store = this.store ?? getDefaults().keyValueStore;
    if (!store) {
      throw new TreeProgrammingError(`Terminable node ${this.fullname} has no key-value store configured`);
    }
    const key = this.keyFunc.invoke(context.board<B>(), context.tracer);
    if (typeof key !== "string" || key.length === 0) {
      throw new TreeProgrammingError(`Terminable node ${this.fullname} key function must return a non-empty string`);
    }
    const intervalMs = this.monitorIntervalMs ?? getDefaults().settings.terminableIntervalMs;

    const link = createLinkedAbortController(context.signal);
    const monitorStop = new AbortController();
    const task = spawnTask(context, primary, { signal: link.signal }).finally(() => {
      monitorStop.abort();
    });
    const monitor = this.monitor(context, store, key, intervalMs, link.controller, monitorStop.signal);

    let outcome: PromiseSettledResult<Result>;
    let monitorOutcome: PromiseSettledResult<void>;
    try {
      [outcome, monitorOutcome] = await Promise.allSettled([task, monitor]);
    } finally {
      link.dispose();
    }

    if (monitorOutcome.status === "rejected") {
      context.logger.warn("terminable_monitor_failed", { node: this.fullname, error: describeError(monitorOutcome.reason) });
    }
    if (outcome.status === "fulfilled") {
      return outcome.value;
    }
    const error: unknown = outcome.reason;
    if (!isCancellationError(error) || context.signal.aborted || !link.signal.aborted) {
      throw error;
    }
    context.tracer.setAttribute("terminated", true);
    return fallback ? fallback.execute(context) : Result.FAIL();
  }

  /** Polls {@link key} until it appears or {@link stop} aborts. */
  private async monitor(
    context: Context,
    store: KeyValueStore,
    key: string,
    intervalMs: number,
    target: AbortController,
    stop: AbortSignal,
  ): Promise<void> {
    while (!stop.aborted) {
      try {
        await sleep(intervalMs, stop);
      } catch (error) {
        if (stop.aborted) {
          return;
        }
        throw error;
      }
      let signalled: boolean;
      try {
        signalled = await store.exists(key);
      } catch (error) {
        context.logger.warn("terminable_signal_check_failed", { node: this.fullname, key, error: describeError(error) });
        continue;
      }
      if (signalled && !stop.aborted) {
        target.abort(new TreeCancellationError(`terminated by signal ${key}`));
        return;
      }
    }
  }
}
