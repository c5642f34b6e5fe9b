import { LlmNode, type LlmNodeOptions, type MessagesFactory } from "../llm/node.js";

import type { TaskFunction, BlackboardFunction } from "./callable.js";
import { Context, type ContextOptions } from "./context.js";
import { TreeProgrammingError } from "./errors.js";
import { Node, type NodeOptions } from "./node.js";
import { CacherNode, type CacherOptions, RedisCacherNode, type RedisCacherOptions } from "./nodes/cacher.js";
import {
  type Condition,
  RandomSelectorNode,
  type RandomSelectorOptions,
  SelectorNode,
  SequenceNode,
  WhileNode,
  type WhileOptions,
} from "./nodes/composites.js";
import {
  FallbackNode,
  GatherNode,
  type GatherFactory,
  type GatherOptions,
  ParallelNode,
  type ParallelOptions,
  TerminableNode,
  type TerminableOptions,
  TimeoutNode,
} from "./nodes/concurrency.js";
import {
  type BlackboardFactory,
  type DataFactory,
  ElseNode,
  ForceFailNode,
  ForceOkNode,
  IfNode,
  InvertNode,
  RetryNode,
  ReturnNode,
  SubtreeNode,
  WrapperNode,
  type WrapperFactory,
} from "./nodes/decorators.js";
import {
  AssertNode,
  type BlackboardDestination,
  ConstantNode,
  FailureNode,
  FunctionNode,
  LogNode,
  type LogOptions,
  ParseJsonNode,
  type ParseJsonOptions,
  WriteBlackboardNode,
} from "./nodes/leaves.js";
import type { Result } from "./result.js";
import type { Tracer } from "./tracer.js";

/**
 * Named root of a node tree and its builder.
 *
 * Builder calls are flat: each call attaches one node, and the number of
 * `_()` calls preceding it gives its depth. A node at depth `d` becomes the
 * last child of the most recent node attached at depth `d - 1`; depth 0 is
 * the tree's single root node.
 *
 * ```ts
 * const tree = new Tree<Board>("Greeting")
 *   .sequence()
 *   ._().function((board) => board.name)
 *   ._().writeBlackboard("greeting")
 *   .end();
 * ```
 *
 * `end()` validates the whole tree and freezes it. Subclasses add builder
 * methods for custom node kinds through {@link attach}.
 */
export class Tree<B = unknown> extends Node {
  readonly kind: string = "Tree";
  protected override readonly minChildren: number = 1;
  protected override readonly maxChildren: number = 1;
  /** Most recent node attached at each depth. */
  private readonly cursor: Node[] = [];
  private pendingDepth = 0;
  private built = false;

  constructor(name: string) {
    super(name);
  }

  get isBuilt(): boolean {
    return this.built;
  }

  /** Indents the next attached node by one level. */
  _(): this {
    this.assertBuilding();
    this.pendingDepth += 1;
    return this;
  }

  /** Validates the tree and freezes its topology. */
  end(): this {
    this.assertBuilding();
    if (this.pendingDepth > 0) {
      throw new TreeProgrammingError(`tree ${this.name} ends with a dangling indentation`);
    }
    this.validate();
    this.built = true;
    return this;
  }

  /** Node whose fullname equals {@link path}, searched from this tree. */
  findNode(path: string): Node | undefined {
    const pending: Node[] = [this];
    while (pending.length > 0) {
      const node = pending.shift();
      if (!node) {
        break;
      }
      if (node.fullname === path) {
        return node;
      }
      pending.push(...node.children);
    }
    return undefined;
  }

  sequence(options: NodeOptions = {}): this {
    return this.attach(new SequenceNode(options.name));
  }

  selector(options: NodeOptions = {}): this {
    return this.attach(new SelectorNode(options.name));
  }

  randomSelector(options: RandomSelectorOptions = {}): this {
    return this.attach(new RandomSelectorNode(options));
  }

  parallel(options: ParallelOptions = {}): this {
    return this.attach(new ParallelNode(options));
  }

  gather<C>(factory: GatherFactory<B, C>, options: GatherOptions = {}): this {
    return this.attach(new GatherNode(factory, options));
  }

  while(condition: Condition<B>, options: WhileOptions = {}): this {
    return this.attach(new WhileNode(condition, options));
  }

  function(fn: TaskFunction<B>, options: NodeOptions & { arity?: number } = {}): this {
    return this.attach(new FunctionNode(fn, options));
  }

  assert(predicate: BlackboardFunction<B, unknown>, options: NodeOptions = {}): this {
    return this.attach(new AssertNode(predicate, options));
  }

  writeBlackboard(destination: BlackboardDestination<B>, options: NodeOptions = {}): this {
    return this.attach(new WriteBlackboardNode(destination, options));
  }

  parseJson(options: ParseJsonOptions<B> = {}): this {
    return this.attach(new ParseJsonNode(options));
  }

  log(message: string | BlackboardFunction<B, unknown>, options: LogOptions = {}): this {
    return this.attach(new LogNode(message, options));
  }

  failure(options: NodeOptions = {}): this {
    return this.attach(new FailureNode(options.name));
  }

  constant(value: unknown, options: NodeOptions = {}): this {
    return this.attach(new ConstantNode(value, options));
  }

  if(condition: Condition<B>, options: NodeOptions = {}): this {
    return this.attach(new IfNode(condition, options));
  }

  else(options: NodeOptions = {}): this {
    return this.attach(new ElseNode(options.name));
  }

  invert(options: NodeOptions = {}): this {
    return this.attach(new InvertNode(options.name));
  }

  forceOk(factory?: DataFactory<B>, options: NodeOptions = {}): this {
    return this.attach(new ForceOkNode(factory, options));
  }

  forceFail(factory?: DataFactory<B>, options: NodeOptions = {}): this {
    return this.attach(new ForceFailNode(factory, options));
  }

  return(factory: DataFactory<B>, options: NodeOptions = {}): this {
    return this.attach(new ReturnNode(factory, options));
  }

  retry(maxTries: number, options: NodeOptions & { sleepMs?: number | number[] } = {}): this {
    return this.attach(new RetryNode({ ...options, maxTries }));
  }

  timeout(timeoutMs: number, options: NodeOptions = {}): this {
    return this.attach(new TimeoutNode(timeoutMs, options));
  }

  terminable(keyFunc: (blackboard: B) => string, options: TerminableOptions = {}): this {
    return this.attach(new TerminableNode(keyFunc, options));
  }

  fallback(options: NodeOptions = {}): this {
    return this.attach(new FallbackNode(options.name));
  }

  wrapper(factory: WrapperFactory, options: NodeOptions = {}): this {
    return this.attach(new WrapperNode(factory, options));
  }

  cacher(options: CacherOptions<B>): this {
    return this.attach(new CacherNode(options));
  }

  redisCacher(options: RedisCacherOptions<B>): this {
    return this.attach(new RedisCacherNode(options));
  }

  subtree<C>(tree: Tree<C>, options: NodeOptions & { blackboard?: BlackboardFactory<B, C> } = {}): this {
    if (!tree.isBuilt) {
      throw new TreeProgrammingError(`subtree ${tree.name} must be finished with end() before it is embedded`);
    }
    return this.attach(new SubtreeNode(tree, options.blackboard, options));
  }

  llm(model: string, messages: MessagesFactory<B>, options: LlmNodeOptions<B> = {}): this {
    return this.attach(new LlmNode(model, messages, options));
  }

  /**
   * Attaches {@link node} at the pending depth. Builder methods of subclasses
   * call this with their own node kinds.
   */
  protected attach(node: Node): this {
    this.assertBuilding();
    const depth = this.pendingDepth;
    this.pendingDepth = 0;
    if (depth > this.cursor.length) {
      throw new TreeProgrammingError(
        `${node.kind} is indented ${depth} levels but only ${this.cursor.length} levels are open in tree ${this.name}`,
      );
    }
    const parent = depth === 0 ? this : this.cursor[depth - 1];
    parent.addChild(node);
    this.cursor.length = depth;
    this.cursor.push(node);
    return this;
  }

  protected async evaluate(context: Context): Promise<Result> {
    if (!this.built) {
      throw new TreeProgrammingError(`tree ${this.name} was run before end()`);
    }
    const [root] = this.children;
    return root.execute(context);
  }

  private assertBuilding(): void {
    if (this.built) {
      throw new TreeProgrammingError(`tree ${this.name} is finished and can no longer be modified`);
    }
  }
}

export interface TreeRun {
  result: Result;
  /** Root span of the run. */
  trace: Tracer;
  context: Context;
}

/** Runs {@link tree} on a fresh context bound to {@link blackboard}. */
export async function runTree<B>(
  tree: Tree<B>,
  blackboard: B,
  options: Omit<ContextOptions, "blackboard"> = {},
): Promise<TreeRun> {
  const context = new Context(options);
  const result = await context.usingBlackboard(blackboard, () => tree.execute(context));
  return { result, trace: context.traceRoot(), context };
}
