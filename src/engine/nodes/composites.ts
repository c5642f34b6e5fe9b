import { z } from "zod";

import { weightedShuffle } from "../../utils/random.js";
import { type BlackboardKey, readBlackboardKey } from "../blackboard.js";
import { type BlackboardFunction, type BoundCallable, bindCallable } from "../callable.js";
import type { Context } from "../context.js";
import { TreeProgrammingError } from "../errors.js";
import { CompositeNode, DecoratorNode, type Node } from "../node.js";
import { parseNodeOptions, positiveIntSchema } from "../options.js";
import { Result } from "../result.js";

/** Runs children in order and stops at the first FAIL, which it returns as is. */
export class SequenceNode extends CompositeNode {
  readonly kind: string = "Sequence";

  protected async evaluate(context: Context): Promise<Result> {
    let last = Result.OK();
    for (const child of this.children) {
      last = await child.execute(context);
      if (last.isFail()) {
        return last;
      }
    }
    return last;
  }
}

/** Runs children in the given order and returns the first OK. */
async function selectFirstOk(context: Context, children: readonly Node[]): Promise<Result> {
  for (const child of children) {
    const result = await child.execute(context);
    if (result.isOk()) {
      return result;
    }
  }
  return Result.FAIL();
}

/** Returns the first OK child result, or `FAIL(undefined)` once every child failed. */
export class SelectorNode extends CompositeNode {
  readonly kind: string = "Selector";

  protected async evaluate(context: Context): Promise<Result> {
    return selectFirstOk(context, this.children);
  }
}

export interface RandomSelectorOptions {
  name?: string;
  /** One non-negative weight per child. Uniform when omitted. */
  weights?: number[];
}

const RandomSelectorOptionsSchema = z
  .object({
    name: z.string().optional(),
    weights: z.array(z.number().finite().nonnegative()).optional(),
  })
  .strict();

/**
 * Selector visiting its children in a weighted random order drawn from the
 * context's random source on every run.
 */
export class RandomSelectorNode extends CompositeNode {
  readonly kind: string = "RandomSelector";
  private readonly weights: number[] | undefined;

  constructor(options: RandomSelectorOptions = {}) {
    const parsed = parseNodeOptions("RandomSelector", RandomSelectorOptionsSchema, options);
    super(parsed.name);
    this.weights = parsed.weights;
  }

  protected override onBuildEnd(): void {
    if (this.weights && this.weights.length !== this.children.length) {
      throw new TreeProgrammingError(
        `RandomSelector node ${this.fullname} has ${this.children.length} children but ${this.weights.length} weights`,
      );
    }
  }

  protected async evaluate(context: Context): Promise<Result> {
    const order = weightedShuffle(this.children, this.weights, context.random);
    context.tracer.setAttribute("order", order.map((child) => child.name));
    return selectFirstOk(context, order);
  }
}

/** Loop condition: a predicate over the blackboard or a blackboard key read as a boolean. */
export type Condition<B> = BlackboardKey<B> | BlackboardFunction<B, unknown>;

/** Condition resolved once at construction. */
export interface BoundCondition<B> {
  test(context: Context): Promise<boolean>;
}

export function bindCondition<B>(condition: Condition<B>, label: string): BoundCondition<B> {
  if (typeof condition === "string") {
    return { test: async (context) => Boolean(readBlackboardKey(context.blackboard, condition)) };
  }
  const callable: BoundCallable<B> = bindCallable(condition, { maxArity: 1, label });
  return {
    test: async (context) => Boolean(await context.guard(callable.invoke(context.board<B>(), context.tracer))),
  };
}

export interface WhileOptions {
  name?: string;
  /** Upper bound on the number of iterations. */
  maxLoopTimes?: number;
}

const WhileOptionsSchema = z
  .object({
    name: z.string().optional(),
    maxLoopTimes: positiveIntSchema.optional(),
  })
  .strict();

/**
 * Runs its child while the condition holds. Returns the last OK child result;
 * a failing child stops the loop without replacing it. `FAIL(undefined)` when
 * the body never succeeded.
 */
export class WhileNode<B> extends DecoratorNode {
  readonly kind: string = "While";
  private readonly condition: BoundCondition<B>;
  private readonly maxLoopTimes: number | undefined;

  constructor(condition: Condition<B>, options: WhileOptions = {}) {
    const parsed = parseNodeOptions("While", WhileOptionsSchema, options);
    super(parsed.name);
    this.condition = bindCondition(condition, "While condition");
    this.maxLoopTimes = parsed.maxLoopTimes;
  }

  protected async evaluate(context: Context): Promise<Result> {
    let lastOk: Result | undefined;
    let iterations = 0;
    try {
      while (this.maxLoopTimes === undefined || iterations < this.maxLoopTimes) {
        if (!(await this.condition.test(context))) {
          break;
        }
        const result = await this.child.execute(context);
        iterations += 1;
        if (result.isFail()) {
          break;
        }
        lastOk = result;
      }
    } finally {
      context.tracer.setAttribute("iterations", iterations);
    }
    return lastOk ?? Result.FAIL();
  }
}
