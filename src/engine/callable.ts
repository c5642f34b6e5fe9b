import { TreeProgrammingError } from "./errors.js";
import type { Tracer } from "./tracer.js";

/**
 * Callable accepted by Function nodes. It may declare fewer parameters; the
 * declared count decides what it receives. The second argument is the node's
 * span; long-running work should watch `tracer.signal` and stop once the run
 * is cancelled, since an abandoned promise is not interrupted.
 */
export type TaskFunction<B> = (blackboard: B, tracer: Tracer) => unknown;

/** Callable reading the blackboard: conditions, data factories, message builders. */
export type BlackboardFunction<B, R> = (blackboard: B) => R;

/** Arguments supplied to a bound callable, decided from its declared parameters. */
export type CallShape = "none" | "blackboard" | "blackboardAndTracer";

export interface BoundCallable<B> {
  readonly shape: CallShape;
  invoke(blackboard: B, tracer: Tracer): unknown;
}

const SHAPES_BY_ARITY: readonly CallShape[] = ["none", "blackboard", "blackboardAndTracer"];

/**
 * Resolves the call shape of {@link fn} once, from its declared parameter
 * count or from an explicit {@link arity}. Rest parameters and defaulted
 * parameters do not count towards `Function.length`; pass {@link arity} for
 * such callables.
 */
export function bindCallable<B>(
  fn: TaskFunction<B>,
  options: { arity?: number; maxArity?: 1 | 2; label?: string } = {},
): BoundCallable<B> {
  if (typeof fn !== "function") {
    throw new TreeProgrammingError(`${options.label ?? "callable"} must be a function`);
  }
  const maxArity = options.maxArity ?? 2;
  const arity = options.arity ?? fn.length;
  if (!Number.isInteger(arity) || arity < 0 || arity > maxArity) {
    throw new TreeProgrammingError(
      `${options.label ?? "callable"} must take between 0 and ${maxArity} parameters, received arity ${arity}`,
    );
  }
  const shape = SHAPES_BY_ARITY[arity];
  return {
    shape,
    invoke: (blackboard, tracer) => {
      const args = shape === "none" ? [] : shape === "blackboard" ? [blackboard] : [blackboard, tracer];
      return Reflect.apply(fn, undefined, args);
    },
  };
}
