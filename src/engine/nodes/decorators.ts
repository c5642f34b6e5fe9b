import { z } from "zod";

import { type BlackboardFunction, type BoundCallable, bindCallable } from "../callable.js";
import type { Context } from "../context.js";
import { TreeProgrammingError } from "../errors.js";
import { DecoratorNode, Node } from "../node.js";
import { durationMsSchema, parseNodeOptions, positiveIntSchema } from "../options.js";
import { Result } from "../result.js";

import { type Condition, type BoundCondition, bindCondition } from "./composites.js";

/**
 * Marker holding the else branch of an {@link IfNode}. Only legal as the
 * second child of an If node.
 */
export class ElseNode extends DecoratorNode {
  readonly kind: string = "Else";

  protected override acceptParent(parent: Node, index: number): void {
    if (!(parent instanceof IfNode) || index !== 1) {
      throw new TreeProgrammingError(`Else must be the second child of an If node, found under ${parent.fullname}`);
    }
  }

  protected async evaluate(context: Context): Promise<Result> {
    return this.child.execute(context);
  }
}

/**
 * Runs the first child when the condition holds, the {@link ElseNode} branch
 * otherwise, or returns `OK(undefined)` when the condition fails without an
 * else branch.
 */
export class IfNode<B> extends Node {
  readonly kind: string = "If";
  protected override readonly minChildren: number = 1;
  protected override readonly maxChildren: number = 2;
  private readonly condition: BoundCondition<B>;

  constructor(condition: Condition<B>, options: { name?: string } = {}) {
    super(options.name);
    this.condition = bindCondition(condition, "If condition");
  }

  protected override acceptChild(child: Node, index: number): void {
    if (index === 0 && child instanceof ElseNode) {
      throw new TreeProgrammingError(`If node ${this.fullname} needs a then branch before its Else`);
    }
    if (index === 1 && !(child instanceof ElseNode)) {
      throw new TreeProgrammingError(`the second child of If node ${this.fullname} must be an Else node`);
    }
  }

  protected async evaluate(context: Context): Promise<Result> {
    const [thenBranch, elseBranch] = this.children;
    const holds = await this.condition.test(context);
    context.tracer.setAttribute("condition", holds);
    if (holds) {
      return thenBranch.execute(context);
    }
    return elseBranch ? elseBranch.execute(context) : Result.OK();
  }
}

/** Flips OK and FAIL, keeping the data. */
export class InvertNode extends DecoratorNode {
  readonly kind: string = "Invert";

  protected async evaluate(context: Context): Promise<Result> {
    return (await this.child.execute(context)).inverted();
  }
}

/** Optional replacement payload computed from the blackboard. */
export type DataFactory<B> = BlackboardFunction<B, unknown>;

abstract class ForcedStatusNode<B> extends DecoratorNode {
  private readonly factory: BoundCallable<B> | undefined;

  constructor(factory: DataFactory<B> | undefined, options: { name?: string }, label: string) {
    super(options.name);
    this.factory = factory ? bindCallable(factory, { maxArity: 1, label }) : undefined;
  }

  protected async childOutcome(context: Context): Promise<unknown> {
    const result = await this.child.execute(context);
    if (!this.factory) {
      return result.data;
    }
    return context.guard(this.factory.invoke(context.board<B>(), context.tracer));
  }
}

/** Always OK, with the child's data or the factory's. */
export class ForceOkNode<B> extends ForcedStatusNode<B> {
  readonly kind: string = "ForceOk";

  constructor(factory?: DataFactory<B>, options: { name?: string } = {}) {
    super(factory, options, "ForceOk data factory");
  }

  protected async evaluate(context: Context): Promise<Result> {
    return Result.OK(await this.childOutcome(context));
  }
}

/** Always FAIL, with the child's data or the factory's. */
export class ForceFailNode<B> extends ForcedStatusNode<B> {
  readonly kind: string = "ForceFail";

  constructor(factory?: DataFactory<B>, options: { name?: string } = {}) {
    super(factory, options, "ForceFail data factory");
  }

  protected async evaluate(context: Context): Promise<Result> {
    return Result.FAIL(await this.childOutcome(context));
  }
}

/** Keeps the child's status and replaces its data with the factory's output. */
export class ReturnNode<B> extends DecoratorNode {
  readonly kind: string = "Return";
  private readonly factory: BoundCallable<B>;

  constructor(factory: DataFactory<B>, options: { name?: string } = {}) {
    super(options.name);
    this.factory = bindCallable(factory, { maxArity: 1, label: "Return data factory" });
  }

  protected async evaluate(context: Context): Promise<Result> {
    const result = await this.child.execute(context);
    const data = await context.guard(this.factory.invoke(context.board<B>(), context.tracer));
    return result.isOk() ? Result.OK(data) : Result.FAIL(data);
  }
}

export interface RetryOptions {
  name?: string;
  /** Total number of attempts, the first one included. */
  maxTries: number;
  /**
   * Pause between attempts. A list is consumed gap by gap and its last element
   * is reused once exhausted. Defaults to no pause.
   */
  sleepMs?: number | number[];
}

const RetryOptionsSchema = z
  .object({
    name: z.string().optional(),
    maxTries: positiveIntSchema,
    sleepMs: z.union([durationMsSchema, z.array(durationMsSchema).min(1)]).optional(),
  })
  .strict();

/** Pause before the attempt following {@link gap} (zero-based). */
export function retryDelayMs(schedule: number | readonly number[] | undefined, gap: number): number {
  if (schedule === undefined) {
    return 0;
  }
  if (typeof schedule === "number") {
    return schedule;
  }
  return schedule[Math.min(gap, schedule.length - 1)];
}

/** Re-runs a failing child up to `maxTries` times. */
export class RetryNode extends DecoratorNode {
  readonly kind: string = "Retry";
  private readonly maxTries: number;
  private readonly sleepMs: number | number[] | undefined;

  constructor(options: RetryOptions) {
    const parsed = parseNodeOptions("Retry", RetryOptionsSchema, options);
    super(parsed.name);
    this.maxTries = parsed.maxTries;
    this.sleepMs = parsed.sleepMs;
  }

  protected async evaluate(context: Context): Promise<Result> {
    for (let attempt = 1; attempt <= this.maxTries; attempt += 1) {
      context.tracer.setAttribute("attempts", attempt);
      const result = await this.child.execute(context);
      if (result.isOk()) {
        return result;
      }
      if (attempt < this.maxTries) {
        const delay = retryDelayMs(this.sleepMs, attempt - 1);
        if (delay > 0) {
          await context.sleep(delay);
        }
      }
    }
    return Result.FAIL();
  }
}

/**
 * Scope around the child invocation. The generator acquires its resource,
 * runs `child()`, yields the child's result once and releases the resource
 * when resumed or closed.
 */
export type WrapperFactory = (child: () => Promise<Result>, context: Context) => unknown;

function isAsyncGenerator(value: unknown): value is AsyncGenerator<unknown, unknown, undefined> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.asyncIterator in value &&
    "next" in value &&
    typeof value.next === "function" &&
    "return" in value &&
    typeof value.return === "function"
  );
}

/**
 * Delegates the child invocation to a caller-provided async generator scope.
 * The scope's release code runs on every exit path. A factory that does not
 * produce a generator, or a generator that yields no {@link Result}, gives
 * `FAIL(undefined)`.
 */
export class WrapperNode extends DecoratorNode {
  readonly kind: string = "Wrapper";

  constructor(
    private readonly factory: WrapperFactory,
    options: { name?: string } = {},
  ) {
    super(options.name);
    if (typeof factory !== "function") {
      throw new TreeProgrammingError("Wrapper factory must be a function");
    }
  }

  protected async evaluate(context: Context): Promise<Result> {
    const scope = this.factory(() => this.child.execute(context), context);
    if (!isAsyncGenerator(scope)) {
      context.tracer.setAttribute("error", "wrapper factory did not return an async generator");
      return Result.FAIL();
    }

    let done = false;
    try {
      const step = await scope.next();
      done = step.done === true;
      if (done || !(step.value instanceof Result)) {
        context.tracer.setAttribute("error", "wrapper scope yielded no result");
        return Result.FAIL();
      }
      // Resuming lets the scope run its release code after the yield.
      done = (await scope.next()).done === true;
      return step.value;
    } finally {
      if (!done) {
        await scope.return(undefined);
      }
    }
  }
}

/** Derives the blackboard a subtree runs against. */
export type BlackboardFactory<B, C> = (blackboard: B) => C;

/**
 * Embeds a separately built tree. With a factory the tree runs against the
 * derived blackboard and the outer binding is restored afterwards; without
 * one it shares the parent blackboard.
 */
export class SubtreeNode<B, C> extends Node {
  readonly kind: string = "Subtree";

  constructor(
    private readonly tree: Node,
    private readonly factory: BlackboardFactory<B, C> | undefined,
    options: { name?: string } = {},
  ) {
    super(options.name);
    if (factory !== undefined && typeof factory !== "function") {
      throw new TreeProgrammingError("Subtree blackboard factory must be a function");
    }
  }

  protected async evaluate(context: Context): Promise<Result> {
    if (!this.factory) {
      return this.tree.execute(context);
    }
    const derived = this.factory(context.board<B>());
    return context.usingBlackboard(derived, () => this.tree.execute(context));
  }
}
