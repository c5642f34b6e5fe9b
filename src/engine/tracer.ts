import { describeError, describeValue } from "../utils/serialize.js";

import { toCancellationError } from "./errors.js";
import type { Result } from "./result.js";

const NEVER_ABORTED = new AbortController().signal;

/** Lifecycle state of a {@link Tracer}. */
export type TraceStatus = "RUNNING" | "OK" | "FAIL" | "CANCELLED" | "ERROR";

/** JSON document produced by {@link Tracer.toJSON}; persisted by trace storages. */
export interface TraceNodeRecord {
  name: string;
  kind: string;
  start_at: string;
  end_at: string | null;
  /** Seconds elapsed between start and end, `null` while running. */
  duration: number | null;
  finished: boolean;
  status: TraceStatus;
  cost: number;
  logs: string[];
  result: string | null;
  attributes: Record<string, unknown>;
  children: Record<string, TraceNodeRecord>;
}

/**
 * One span of the trace tree. Each node invocation opens exactly one tracer
 * under its parent's tracer before any child runs, and finalises it once the
 * outcome is known, including on errors and cancellation.
 */
export class Tracer {
  readonly startAt = new Date();
  endAt: Date | null = null;
  status: TraceStatus = "RUNNING";
  cost = 0;
  result: string | null = null;
  readonly attributes: Record<string, unknown> = {};
  readonly logs: string[] = [];
  private readonly childSpans = new Map<string, Tracer>();

  /**
   * @param signal Cancellation signal of the run executing this span's node.
   * Task functions receive the span as their second argument and stop their
   * own work once it aborts.
   */
  constructor(
    public readonly name: string,
    public readonly kind: string,
    public readonly key: string = name,
    public readonly signal: AbortSignal = NEVER_ABORTED,
  ) {}

  /**
   * Opens a child span keyed by {@link key}. A key already used under this
   * span (the same child invoked again by a loop or a retry) receives a `#n`
   * suffix so every invocation keeps its own span.
   */
  child(key: string, name: string, kind: string, signal: AbortSignal = this.signal): Tracer {
    let uniqueKey = key;
    let occurrence = 1;
    while (this.childSpans.has(uniqueKey)) {
      occurrence += 1;
      uniqueKey = `${key}#${occurrence}`;
    }
    const span = new Tracer(name, kind, uniqueKey, signal);
    this.childSpans.set(uniqueKey, span);
    return span;
  }

  get children(): ReadonlyMap<string, Tracer> {
    return this.childSpans;
  }

  get finished(): boolean {
    return this.endAt !== null;
  }

  /** Elapsed milliseconds; measured up to now while the span is running. */
  get durationMs(): number {
    return (this.endAt ?? new Date()).getTime() - this.startAt.getTime();
  }

  get cancelled(): boolean {
    return this.signal.aborted;
  }

  /** Throws the run's cancellation error once {@link signal} has aborted. */
  throwIfCancelled(): void {
    if (this.signal.aborted) {
      throw toCancellationError(this.signal.reason);
    }
  }

  setAttribute(key: string, value: unknown): void {
    this.attributes[key] = value;
  }

  setAttributes(values: Record<string, unknown>): void {
    Object.assign(this.attributes, values);
  }

  addCost(amount: number): void {
    if (Number.isFinite(amount)) {
      this.cost += amount;
    }
  }

  log(message: string): void {
    this.logs.push(message);
  }

  finish(result: Result): void {
    this.close(result.status);
    this.result = describeValue(result.data);
  }

  markCancelled(): void {
    this.close("CANCELLED");
  }

  markErrored(error: unknown): void {
    this.setAttribute("error", describeError(error).message);
    this.close("ERROR");
  }

  /** Depth-first lookup of a descendant span by its key path. */
  find(keys: readonly string[]): Tracer | undefined {
    let current: Tracer | undefined = this;
    for (const key of keys) {
      current = current?.childSpans.get(key);
    }
    return current;
  }

  toJSON(): TraceNodeRecord {
    const children: Record<string, TraceNodeRecord> = {};
    for (const [key, span] of this.childSpans) {
      children[key] = span.toJSON();
    }
    const attributes: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(this.attributes)) {
      attributes[key] = typeof value === "number" || typeof value === "boolean" ? value : describeValue(value);
    }
    return {
      name: this.name,
      kind: this.kind,
      start_at: this.startAt.toISOString(),
      end_at: this.endAt ? this.endAt.toISOString() : null,
      duration: this.endAt ? this.durationMs / 1000 : null,
      finished: this.finished,
      status: this.status,
      cost: this.cost,
      logs: [...this.logs],
      result: this.result,
      attributes,
      children,
    };
  }

  private close(status: TraceStatus): void {
    if (this.endAt !== null) {
      return;
    }
    this.status = status;
    this.endAt = new Date();
  }
}
