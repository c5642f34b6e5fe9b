import { describeError } from "../utils/serialize.js";

import type { Context } from "./context.js";
import { TreeProgrammingError, isCancellationError } from "./errors.js";
import { Result } from "./result.js";

/** Options shared by every builder method. */
export interface NodeOptions {
  /** Explicit node name. Defaults to the node kind, suffixed with `#n` among same-kind siblings. */
  name?: string;
}

/**
 * Executable unit of a tree. Subclasses implement {@link evaluate}; the base
 * class opens the node's span, checks cancellation and converts runtime
 * exceptions into `FAIL(undefined)`. Cancellation and programming errors are
 * rethrown unchanged.
 */
export abstract class Node {
  abstract readonly kind: string;
  /** Lowest number of children accepted when the tree is finalised. */
  protected readonly minChildren: number = 0;
  /** Highest number of children accepted by {@link addChild}. */
  protected readonly maxChildren: number = 0;
  private readonly childNodes: Node[] = [];
  private parentNode: Node | null = null;
  private assignedName: string | null = null;

  constructor(private readonly explicitName?: string) {
    if (explicitName !== undefined && (explicitName.length === 0 || explicitName.includes("/"))) {
      throw new TreeProgrammingError(`invalid node name ${JSON.stringify(explicitName)}`);
    }
  }

  get name(): string {
    return this.assignedName ?? this.explicitName ?? this.kind;
  }

  /** `/`-joined path of names from the tree root down to this node. */
  get fullname(): string {
    return this.parentNode ? `${this.parentNode.fullname}/${this.name}` : this.name;
  }

  get parent(): Node | null {
    return this.parentNode;
  }

  get children(): readonly Node[] {
    return this.childNodes;
  }

  /**
   * Appends {@link child}, enforcing the child limit, placement rules and
   * sibling name uniqueness. Called by the tree builder.
   */
  addChild(child: Node): void {
    if (child.parentNode !== null) {
      throw new TreeProgrammingError(`node ${child.name} is already attached under ${child.parentNode.fullname}`);
    }
    const index = this.childNodes.length;
    if (index >= this.maxChildren) {
      throw new TreeProgrammingError(
        this.maxChildren === 0
          ? `${this.kind} node ${this.fullname} cannot have children`
          : `${this.kind} node ${this.fullname} accepts at most ${this.maxChildren} children`,
      );
    }
    this.acceptChild(child, index);
    child.acceptParent(this, index);
    child.assignedName = this.uniqueChildName(child);
    child.parentNode = this;
    this.childNodes.push(child);
  }

  /**
   * Whole-subtree validation run by `Tree.end()`. Subclasses extend
   * {@link onBuildEnd} for their own checks.
   */
  validate(): void {
    if (this.childNodes.length < this.minChildren) {
      throw new TreeProgrammingError(
        `${this.kind} node ${this.fullname} requires at least ${this.minChildren} child${this.minChildren === 1 ? "" : "ren"}`,
      );
    }
    this.onBuildEnd();
    for (const child of this.childNodes) {
      child.validate();
    }
  }

  /**
   * Runs the node under its own span. The span is attached under the
   * context's current span before anything else happens and is finalised on
   * every exit path.
   */
  async execute(context: Context): Promise<Result> {
    const span = context.tracer.child(this.fullname, this.name, this.kind, context.signal);
    try {
      return await context.usingTracer(span, async () => {
        try {
          context.throwIfCancelled();
          const result = await this.evaluate(context);
          span.finish(result);
          context.lastResult = result;
          return result;
        } catch (error) {
          if (isCancellationError(error)) {
            span.markCancelled();
            throw error;
          }
          if (error instanceof TreeProgrammingError) {
            span.markErrored(error);
            throw error;
          }
          const described = describeError(error);
          span.setAttribute("error", described.message);
          context.logger.debug("node_failed", { node: this.fullname, kind: this.kind, error: described });
          const failure = Result.FAIL();
          span.finish(failure);
          context.lastResult = failure;
          return failure;
        }
      });
    } finally {
      context.lastTracer = span;
    }
  }

  protected abstract evaluate(context: Context): Promise<Result>;

  /** Hook rejecting a child at {@link index}. */
  protected acceptChild(_child: Node, _index: number): void {}

  /** Hook rejecting a parent. Marker nodes use it to pin their placement. */
  protected acceptParent(_parent: Node, _index: number): void {}

  protected onBuildEnd(): void {}

  private uniqueChildName(child: Node): string {
    const taken = new Set(this.childNodes.map((sibling) => sibling.name));
    if (child.explicitName !== undefined) {
      if (taken.has(child.explicitName)) {
        throw new TreeProgrammingError(`duplicate node name ${child.explicitName} under ${this.fullname}`);
      }
      return child.explicitName;
    }
    let candidate = child.kind;
    for (let occurrence = 2; taken.has(candidate); occurrence += 1) {
      candidate = `${child.kind}#${occurrence}`;
    }
    return candidate;
  }
}

/** Node without children. */
export abstract class LeafNode extends Node {}

/** Node wrapping exactly one child. */
export abstract class DecoratorNode extends Node {
  protected override readonly minChildren: number = 1;
  protected override readonly maxChildren: number = 1;

  /** The wrapped child. Throws before one is attached. */
  get child(): Node {
    const [child] = this.children;
    if (!child) {
      throw new TreeProgrammingError(`${this.kind} node ${this.fullname} has no child`);
    }
    return child;
  }
}

/** Node aggregating an ordered list of children. */
export abstract class CompositeNode extends Node {
  protected override readonly minChildren: number = 1;
  protected override readonly maxChildren: number = Number.POSITIVE_INFINITY;
}
