import { describe, it } from "mocha";
import { expect } from "chai";

import { Context } from "../src/engine/context.js";
import { configureDefaults, getDefaults, resetDefaults } from "../src/engine/defaults.js";
import { TreeCancellationError } from "../src/engine/errors.js";
import { Tracer } from "../src/engine/tracer.js";
import { createLinkedAbortController, raceAbort } from "../src/runtime/abort.js";

import { ScriptedLlmClient, createContext, deferred } from "./helpers/engine.js";

async function captureError(work: Promise<unknown>): Promise<unknown> {
  try {
    await work;
  } catch (error) {
    return error;
  }
  throw new Error("expected a rejection");
}

describe("Context", () => {
  it("creates a ROOT span when none is given", () => {
    const context = new Context();
    expect(context.traceRoot().name).to.equal("ROOT");
    expect(context.traceRoot().kind).to.equal("ROOT");
    expect(context.tracer).to.equal(context.traceRoot());
    expect(context.cancelled).to.equal(false);
  });

  it("forks a task-local context sharing the trace tree and logger", () => {
    const { context, logger } = createContext({ shared: true });
    const span = context.traceRoot().child("T/Parallel", "Parallel", "Parallel");
    context.tracer = span;

    const inherited = context.fork();
    const rebound = context.fork({ blackboard: { item: 1 } });

    expect(inherited.blackboard).to.deep.equal({ shared: true });
    expect(rebound.blackboard).to.deep.equal({ item: 1 });
    expect(rebound.traceRoot()).to.equal(context.traceRoot());
    expect(rebound.tracer).to.equal(span);
    expect(rebound.logger).to.equal(logger);
    expect(rebound.random).to.equal(context.random);
    expect(rebound.lastResult).to.equal(undefined);
  });

  it("restores the previous blackboard and tracer whatever the outcome", async () => {
    const { context } = createContext("outer");
    const span = new Tracer("inner", "Test");

    const error = await captureError(
      context.usingBlackboard("inner", async () => {
        expect(context.blackboard).to.equal("inner");
        await context.usingTracer(span, async () => {
          expect(context.tracer).to.equal(span);
        });
        throw new Error("leave");
      }),
    );

    expect(error).to.have.property("message", "leave");
    expect(context.blackboard).to.equal("outer");
    expect(context.tracer).to.equal(context.traceRoot());
  });

  it("guards pending work against cancellation", async () => {
    const controller = new AbortController();
    const { context } = createContext(undefined, { signal: controller.signal });
    const pending = deferred<string>();

    const guarded = context.guard(pending.promise);
    controller.abort(new TreeCancellationError("stop now"));

    const error = await captureError(guarded);
    expect(error).to.be.instanceOf(TreeCancellationError);
    expect(error).to.have.property("message", "stop now");
    expect(await context.guard(5).catch((reason: unknown) => reason)).to.be.instanceOf(TreeCancellationError);
  });

  it("passes plain values and settled work through", async () => {
    const { context } = createContext();
    expect(await context.guard("value")).to.equal("value");
    expect(await context.guard(Promise.resolve(3))).to.equal(3);
  });

  it("cancels a pending sleep", async () => {
    const controller = new AbortController();
    const { context } = createContext(undefined, { signal: controller.signal });

    const sleeping = context.sleep(60_000);
    controller.abort("because");

    const error = await captureError(sleeping);
    expect(error).to.be.instanceOf(TreeCancellationError);
    expect(error).to.have.property("message", "because");
  });
});

describe("abort helpers", () => {
  it("propagates a parent abort to the linked controller only", () => {
    const parent = new AbortController();
    const link = createLinkedAbortController(parent.signal);

    link.controller.abort("child only");
    expect(parent.signal.aborted).to.equal(false);

    const second = createLinkedAbortController(parent.signal);
    parent.abort("parent");
    expect(second.signal.aborted).to.equal(true);
    expect(second.signal.reason).to.equal("parent");
  });

  it("detaches from the parent once disposed", () => {
    const parent = new AbortController();
    const link = createLinkedAbortController(parent.signal);
    link.dispose();
    link.dispose();

    parent.abort();
    expect(link.signal.aborted).to.equal(false);
  });

  it("starts aborted under an aborted parent", () => {
    const parent = new AbortController();
    parent.abort("early");
    const link = createLinkedAbortController(parent.signal);
    expect(link.signal.reason).to.equal("early");
  });

  it("races work against the signal", async () => {
    const controller = new AbortController();
    const toError = (reason: unknown): Error => new Error(`aborted: ${String(reason)}`);

    expect(await raceAbort(Promise.resolve("won"), controller.signal, toError)).to.equal("won");

    const lost = raceAbort(new Promise<never>(() => undefined), controller.signal, toError);
    controller.abort("late");
    expect(await captureError(lost)).to.have.property("message", "aborted: late");

    const failed = raceAbort(Promise.reject(new Error("work failed")), new AbortController().signal, toError);
    expect(await captureError(failed)).to.have.property("message", "work failed");
  });
});

describe("process defaults", () => {
  it("re-reads the environment and drops overrides on reset", () => {
    const previous = { ...process.env };
    process.env.TREEFLOW_CACHE_EXPIRATION_MS = "5000";
    process.env.TREEFLOW_LOG_STDOUT = "false";
    try {
      configureDefaults({ llmClient: new ScriptedLlmClient({}) });
      expect(getDefaults().llmClient).to.not.equal(null);

      resetDefaults();

      expect(getDefaults().llmClient).to.equal(null);
      expect(getDefaults().settings.cacheExpirationMs).to.equal(5000);
      expect(getDefaults().settings.logToStdout).to.equal(false);
    } finally {
      process.env = previous;
    }
  });
});
