import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { runtimeTimers, sleep } from "../src/runtime/timers.js";

/**
 * Runtime timer helpers should honour global overrides (e.g. Sinon fake timers).
 * These tests replace the ambient timers with spies to verify the delegation.
 */
describe("runtimeTimers", () => {
  let originalSetTimeout: typeof globalThis.setTimeout;
  let originalClearTimeout: typeof globalThis.clearTimeout;

  beforeEach(() => {
    originalSetTimeout = globalThis.setTimeout;
    originalClearTimeout = globalThis.clearTimeout;
  });

  afterEach(() => {
    globalThis.setTimeout = originalSetTimeout;
    globalThis.clearTimeout = originalClearTimeout;
    sinon.restore();
  });

  it("delegates setTimeout calls to global overrides", () => {
    type TimeoutParameters = Parameters<typeof globalThis.setTimeout>;
    type TimeoutReturn = ReturnType<typeof globalThis.setTimeout>;

    // Acquire a genuine timeout handle so equality assertions remain type-safe.
    const fakeHandle = originalSetTimeout(() => undefined, 0);
    originalClearTimeout(fakeHandle);

    const override = sinon.stub(globalThis, "setTimeout").callsFake((...args: TimeoutParameters): TimeoutReturn => {
      const [handler] = args;
      if (typeof handler === "function") {
        handler();
      }
      return fakeHandle;
    });

    const handler = sinon.stub();
    const handle = runtimeTimers.setTimeout(handler, 25);

    sinon.assert.calledOnce(override);
    sinon.assert.calledWithExactly(override, sinon.match.func, 25);
    sinon.assert.calledOnce(handler);
    expect(handle).to.equal(fakeHandle);
  });

  it("delegates clearTimeout calls to global overrides", () => {
    const fakeHandle = originalSetTimeout(() => undefined, 0);
    originalClearTimeout(fakeHandle);

    const override = sinon.stub(globalThis, "clearTimeout");

    runtimeTimers.clearTimeout(fakeHandle);

    sinon.assert.calledOnceWithExactly(override, fakeHandle);
  });
});

describe("sleep", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("resolves once the fake clock reaches the delay", async () => {
    const clock = sinon.useFakeTimers();
    let settled = false;
    const pending = sleep(50).then(() => {
      settled = true;
    });

    await clock.tickAsync(49);
    expect(settled).to.equal(false);
    await clock.tickAsync(1);
    await pending;
    expect(settled).to.equal(true);
    clock.restore();
  });

  it("rejects with the abort reason and clears the pending timer", async () => {
    const controller = new AbortController();
    const reason = new Error("stop");
    const pending = sleep(10_000, controller.signal);

    controller.abort(reason);

    let caught: unknown;
    try {
      await pending;
    } catch (error) {
      caught = error;
    }
    expect(caught).to.equal(reason);
  });

  it("rejects straight away when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort("already");

    let caught: unknown;
    try {
      await sleep(5, controller.signal);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.equal("already");
  });
});
