import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { Result } from "../src/engine/result.js";
import { Tree, runTree } from "../src/engine/tree.js";
import { createSeededRandom, weightedShuffle } from "../src/utils/random.js";

interface Board {
  calls: string[];
  count: number;
  running?: boolean;
}

function board(): Board {
  return { calls: [], count: 0 };
}

function step(name: string, ok: boolean, data: unknown = name) {
  return (bb: Board): Result => {
    bb.calls.push(name);
    return ok ? Result.OK(data) : Result.FAIL(data);
  };
}

function outcomesTree(kind: "sequence" | "selector", outcomes: readonly boolean[]): Tree<Board> {
  const tree = kind === "sequence" ? new Tree<Board>("P").sequence() : new Tree<Board>("P").selector();
  outcomes.forEach((ok, index) => {
    tree._().function(step(String(index), ok, index));
  });
  return tree.end();
}

describe("Sequence", () => {
  it("stops at the first failure and returns it unchanged", async () => {
    const tree = new Tree<Board>("T")
      .sequence()
      ._().function(step("a", true))
      ._().function(step("b", false))
      ._().function(step("c", true))
      .end();

    const bb = board();
    const { result } = await runTree(tree, bb);

    expect(result.status).to.equal("FAIL");
    expect(result.data).to.equal("b");
    expect(bb.calls).to.deep.equal(["a", "b"]);
  });

  it("returns the last result when every child succeeds", async () => {
    const tree = new Tree<Board>("T")
      .sequence()
      ._().function(step("a", true))
      ._().function(step("b", true))
      .end();

    const { result } = await runTree(tree, board());
    expect(result.status).to.equal("OK");
    expect(result.data).to.equal("b");
  });

  it("runs children up to and including the first failure", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.boolean(), { minLength: 1, maxLength: 8 }), async (outcomes) => {
        const bb = board();
        const { result } = await runTree(outcomesTree("sequence", outcomes), bb);
        const firstFailure = outcomes.indexOf(false);
        const executed = firstFailure === -1 ? outcomes.length : firstFailure + 1;

        expect(bb.calls).to.have.length(executed);
        expect(result.status).to.equal(firstFailure === -1 ? "OK" : "FAIL");
        expect(result.data).to.equal(firstFailure === -1 ? outcomes.length - 1 : firstFailure);
      }),
    );
  });
});

describe("Selector", () => {
  it("returns the first success without running later children", async () => {
    const tree = new Tree<Board>("T")
      .selector()
      ._().function(step("a", false))
      ._().function(step("b", true))
      ._().function(step("c", true))
      .end();

    const bb = board();
    const { result } = await runTree(tree, bb);

    expect(result.status).to.equal("OK");
    expect(result.data).to.equal("b");
    expect(bb.calls).to.deep.equal(["a", "b"]);
  });

  it("fails without data once every child failed", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.boolean(), { minLength: 1, maxLength: 8 }), async (outcomes) => {
        const bb = board();
        const { result } = await runTree(outcomesTree("selector", outcomes), bb);
        const firstSuccess = outcomes.indexOf(true);
        const executed = firstSuccess === -1 ? outcomes.length : firstSuccess + 1;

        expect(bb.calls).to.have.length(executed);
        expect(result.status).to.equal(firstSuccess === -1 ? "FAIL" : "OK");
        expect(result.data).to.equal(firstSuccess === -1 ? undefined : firstSuccess);
      }),
    );
  });
});

describe("RandomSelector", () => {
  function failingTree(weights?: number[]): Tree<Board> {
    return new Tree<Board>("R")
      .randomSelector({ weights })
      ._().function(step("a", false), { name: "a" })
      ._().function(step("b", false), { name: "b" })
      ._().function(step("c", false), { name: "c" })
      .end();
  }

  it("visits children in the order drawn from the context's random source", async () => {
    const expected = weightedShuffle(["a", "b", "c"], undefined, createSeededRandom(7));

    const bb = board();
    const { result, trace } = await runTree(failingTree(), bb, { random: createSeededRandom(7) });

    expect(result.status).to.equal("FAIL");
    expect(bb.calls).to.deep.equal(expected);
    expect(trace.find(["R", "R/RandomSelector"])?.attributes.order).to.deep.equal(expected);
  });

  it("reproduces the order for the same seed", async () => {
    const first = board();
    const second = board();
    await runTree(failingTree(), first, { random: createSeededRandom(42) });
    await runTree(failingTree(), second, { random: createSeededRandom(42) });

    expect(first.calls).to.deep.equal(second.calls);
    expect([...first.calls].sort()).to.deep.equal(["a", "b", "c"]);
  });

  it("always draws the only weighted child first", async () => {
    for (let seed = 1; seed <= 5; seed += 1) {
      const bb = board();
      await runTree(failingTree([0, 0, 1]), bb, { random: createSeededRandom(seed) });
      expect(bb.calls[0]).to.equal("c");
      expect(bb.calls).to.have.length(3);
    }
  });
});

describe("While", () => {
  function counting(): (bb: Board) => number {
    return (bb) => {
      bb.count += 1;
      return bb.count;
    };
  }

  it("returns the last successful body result", async () => {
    const tree = new Tree<Board>("W")
      .while((bb) => bb.count < 3)
      ._().function(counting())
      .end();

    const { result, trace } = await runTree(tree, board());

    expect(result.status).to.equal("OK");
    expect(result.data).to.equal(3);
    const loop = trace.find(["W", "W/While"]);
    expect(loop?.attributes.iterations).to.equal(3);
    expect([...(loop?.children.keys() ?? [])]).to.deep.equal([
      "W/While/Function",
      "W/While/Function#2",
      "W/While/Function#3",
    ]);
  });

  it("fails when the condition is false on entry", async () => {
    const tree = new Tree<Board>("W")
      .while((bb) => bb.count > 0)
      ._().function(counting())
      .end();

    const bb = board();
    const { result } = await runTree(tree, bb);

    expect(result.status).to.equal("FAIL");
    expect(result.data).to.equal(undefined);
    expect(bb.count).to.equal(0);
  });

  it("stops after maxLoopTimes iterations", async () => {
    const tree = new Tree<Board>("W")
      .while(() => true, { maxLoopTimes: 2 })
      ._().function(counting())
      .end();

    const { result } = await runTree(tree, board());
    expect(result.status).to.equal("OK");
    expect(result.data).to.equal(2);
  });

  it("keeps the last success when the body fails", async () => {
    const tree = new Tree<Board>("W")
      .while(() => true)
      ._().function((bb) => {
        bb.count += 1;
        return bb.count === 2 ? Result.FAIL("two") : Result.OK(bb.count);
      })
      .end();

    const bb = board();
    const { result } = await runTree(tree, bb);

    expect(result.status).to.equal("OK");
    expect(result.data).to.equal(1);
    expect(bb.count).to.equal(2);
  });

  it("reads a blackboard key as the condition", async () => {
    const tree = new Tree<Board>("W")
      .while("running")
      ._().function((bb) => {
        bb.running = false;
        return "stopped";
      })
      .end();

    const bb: Board = { ...board(), running: true };
    const { result } = await runTree(tree, bb);
    expect(result.data).to.equal("stopped");
  });
});
