import { jsonrepair } from "jsonrepair";

import type { LogLevel } from "../../logger.js";
import { describeValue } from "../../utils/serialize.js";
import {
  type BlackboardKey,
  type BlackboardSetter,
  readBlackboardKey,
  writeBlackboardKey,
} from "../blackboard.js";
import { type BlackboardFunction, type BoundCallable, type TaskFunction, bindCallable } from "../callable.js";
import type { Context } from "../context.js";
import { TreeProgrammingError } from "../errors.js";
import { LeafNode, Node } from "../node.js";
import { Result } from "../result.js";

/** Runs a caller function; raw return values are wrapped as OK, a {@link Result} passes through. */
export class FunctionNode<B> extends LeafNode {
  readonly kind: string = "Function";
  private readonly callable: BoundCallable<B>;

  constructor(fn: TaskFunction<B>, options: { name?: string; arity?: number } = {}) {
    super(options.name);
    this.callable = bindCallable(fn, { arity: options.arity, label: "Function" });
  }

  protected async evaluate(context: Context): Promise<Result> {
    const value = await context.guard(this.callable.invoke(context.board<B>(), context.tracer));
    return value instanceof Result ? value : Result.OK(value);
  }
}

/** `OK(true)` when the predicate is truthy, `FAIL(undefined)` otherwise. */
export class AssertNode<B> extends LeafNode {
  readonly kind: string = "Assert";
  private readonly predicate: BoundCallable<B>;

  constructor(predicate: BlackboardFunction<B, unknown>, options: { name?: string } = {}) {
    super(options.name);
    this.predicate = bindCallable(predicate, { maxArity: 1, label: "Assert predicate" });
  }

  protected async evaluate(context: Context): Promise<Result> {
    const verdict = await context.guard(this.predicate.invoke(context.board<B>(), context.tracer));
    return verdict ? Result.OK(true) : Result.FAIL();
  }
}

/** Where a node writes a value: a blackboard key or a setter callback. */
export type BlackboardDestination<B> = BlackboardKey<B> | BlackboardSetter<B>;

function writeDestination<B>(context: Context, destination: BlackboardDestination<B>, value: unknown): void {
  if (typeof destination === "string") {
    writeBlackboardKey(context.blackboard, destination, value);
  } else {
    destination(context.board<B>(), value);
  }
}

/**
 * Side-effecting tap writing the data of the wrapped child's result, or of the
 * context's last result when it has no child, and returning that result
 * unchanged.
 */
export class WriteBlackboardNode<B> extends Node {
  readonly kind: string = "WriteBlackboard";
  protected override readonly maxChildren: number = 1;

  constructor(
    private readonly destination: BlackboardDestination<B>,
    options: { name?: string } = {},
  ) {
    super(options.name);
    if (typeof destination !== "string" && typeof destination !== "function") {
      throw new TreeProgrammingError("WriteBlackboard destination must be a key or a setter function");
    }
  }

  protected async evaluate(context: Context): Promise<Result> {
    const [child] = this.children;
    const inbound = child ? await child.execute(context) : (context.lastResult ?? Result.OK());
    writeDestination(context, this.destination, inbound.data);
    return inbound;
  }
}

/** Source text of ParseJSON: a blackboard key or a getter. */
export type JsonSource<B> = BlackboardKey<B> | ((blackboard: B) => unknown);

/** Repair pass: returns the parsed value or `undefined` when the text cannot be repaired. */
export type JsonLoader = (text: string) => unknown;

export interface ParseJsonOptions<B> {
  name?: string;
  /** Defaults to the data of the context's last result. */
  src?: JsonSource<B>;
  dst?: BlackboardDestination<B>;
  jsonLoader?: JsonLoader;
}

const FENCE_PATTERN = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```$/;

/** Removes a surrounding Markdown code fence, if any. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCE_PATTERN.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

/** Default repair pass backed by `jsonrepair`. */
export function repairJson(text: string): unknown {
  let repaired: string;
  try {
    repaired = jsonrepair(text);
  } catch {
    // Unrepairable input.
    return undefined;
  }
  return JSON.parse(repaired);
}

/**
 * Parses JSON text, stripping Markdown fences and falling back to a repair
 * pass. Success writes `dst` and returns `OK(parsed)`; failure returns
 * `FAIL(text)` without writing. Non-string sources fail with the source value.
 */
export class ParseJsonNode<B> extends LeafNode {
  readonly kind: string = "ParseJSON";
  private readonly loader: JsonLoader;

  constructor(private readonly options: ParseJsonOptions<B> = {}) {
    super(options.name);
    this.loader = options.jsonLoader ?? repairJson;
  }

  protected async evaluate(context: Context): Promise<Result> {
    const source = this.readSource(context);
    if (typeof source !== "string") {
      context.tracer.setAttribute("parse_error", "source is not a string");
      return Result.FAIL(source);
    }

    const parsed = this.parse(stripCodeFence(source), context);
    if (parsed === undefined) {
      return Result.FAIL(source);
    }
    if (this.options.dst !== undefined) {
      writeDestination(context, this.options.dst, parsed);
    }
    return Result.OK(parsed);
  }

  private readSource(context: Context): unknown {
    const src = this.options.src;
    if (src === undefined) {
      return context.lastResult?.data;
    }
    if (typeof src === "string") {
      return readBlackboardKey(context.blackboard, src);
    }
    return src(context.board<B>());
  }

  private parse(text: string, context: Context): unknown {
    try {
      return JSON.parse(text);
    } catch (strictError) {
      context.tracer.setAttribute("repaired", true);
      context.logger.debug("parse_json_repair", {
        node: this.fullname,
        reason: strictError instanceof Error ? strictError.message : String(strictError),
      });
    }
    try {
      return this.loader(text);
    } catch (repairError) {
      context.tracer.setAttribute("parse_error", repairError instanceof Error ? repairError.message : String(repairError));
      return undefined;
    }
  }
}

export interface LogOptions {
  name?: string;
  level?: LogLevel;
}

/** Emits a message to the context logger and to the node's span. Always `OK(undefined)`. */
export class LogNode<B> extends LeafNode {
  readonly kind: string = "Log";
  private readonly message: string | BoundCallable<B>;
  private readonly level: LogLevel;

  constructor(message: string | BlackboardFunction<B, unknown>, options: LogOptions = {}) {
    super(options.name);
    this.message = typeof message === "string" ? message : bindCallable(message, { maxArity: 1, label: "Log message" });
    this.level = options.level ?? "info";
  }

  protected async evaluate(context: Context): Promise<Result> {
    const message =
      typeof this.message === "string"
        ? this.message
        : (describeValue(await context.guard(this.message.invoke(context.board<B>(), context.tracer))) ?? "");
    context.tracer.log(message);
    context.logger[this.level](message, { node: this.fullname });
    return Result.OK();
  }
}

/** Always `FAIL(undefined)`. */
export class FailureNode extends LeafNode {
  readonly kind: string = "Failure";

  protected async evaluate(): Promise<Result> {
    return Result.FAIL();
  }
}

/** Always `OK(value)`. */
export class ConstantNode extends LeafNode {
  readonly kind: string = "Constant";

  constructor(
    private readonly value: unknown,
    options: { name?: string } = {},
  ) {
    super(options.name);
  }

  protected async evaluate(): Promise<Result> {
    return Result.OK(this.value);
  }
}
