import { describe, it } from "mocha";
import { expect } from "chai";

import { Result } from "../src/engine/result.js";
import { Tree, runTree } from "../src/engine/tree.js";
import { retryDelayMs } from "../src/engine/nodes/decorators.js";

interface Board {
  count: number;
  events: string[];
  doubled?: number;
}

function board(count = 0): Board {
  return { count, events: [] };
}

describe("decorator nodes", () => {
  describe("If / Else", () => {
    function branching(): Tree<Board> {
      return new Tree<Board>("T")
        .if((bb) => bb.count > 0)
        ._().constant("then")
        ._().else()
        ._()._().constant("else")
        .end();
    }

    it("runs the then branch when the condition holds", async () => {
      const { result, trace } = await runTree(branching(), board(1));
      expect(result.data).to.equal("then");
      expect(trace.find(["T", "T/If"])?.attributes.condition).to.equal(true);
    });

    it("runs the else branch otherwise", async () => {
      const { result, trace } = await runTree(branching(), board(0));
      expect(result.status).to.equal("OK");
      expect(result.data).to.equal("else");
      expect(trace.find(["T", "T/If", "T/If/Else"])?.kind).to.equal("Else");
    });

    it("succeeds without data when the condition fails and no else exists", async () => {
      const tree = new Tree<Board>("T")
        .if("count")
        ._().constant("then")
        .end();

      const { result } = await runTree(tree, board(0));
      expect(result.status).to.equal("OK");
      expect(result.data).to.equal(undefined);
    });
  });

  describe("Invert, ForceOk, ForceFail and Return", () => {
    it("inverts the status and keeps the data", async () => {
      const tree = new Tree<Board>("T").invert()._().constant(1).end();
      const { result } = await runTree(tree, board());
      expect(result.status).to.equal("FAIL");
      expect(result.data).to.equal(1);
    });

    it("forces the status with the child's data or the factory's", async () => {
      const forcedOk = new Tree<Board>("A").forceOk()._().function(() => Result.FAIL("kept")).end();
      const forcedOkWithData = new Tree<Board>("B").forceOk((bb) => bb.count)._().failure().end();
      const forcedFail = new Tree<Board>("C").forceFail()._().constant(2).end();

      const ok = (await runTree(forcedOk, board())).result;
      expect([ok.status, ok.data]).to.deep.equal(["OK", "kept"]);
      const okWithData = (await runTree(forcedOkWithData, board(9))).result;
      expect([okWithData.status, okWithData.data]).to.deep.equal(["OK", 9]);
      const failed = (await runTree(forcedFail, board())).result;
      expect([failed.status, failed.data]).to.deep.equal(["FAIL", 2]);
    });

    it("replaces the data and keeps the status", async () => {
      const failing = new Tree<Board>("A").return(() => "replaced")._().failure().end();
      const passing = new Tree<Board>("B").return((bb) => bb.count + 1)._().constant("ignored").end();

      const failed = (await runTree(failing, board())).result;
      expect([failed.status, failed.data]).to.deep.equal(["FAIL", "replaced"]);
      const passed = (await runTree(passing, board(4))).result;
      expect([passed.status, passed.data]).to.deep.equal(["OK", 5]);
    });
  });

  describe("Retry", () => {
    it("re-runs a failing child until it succeeds", async () => {
      const tree = new Tree<Board>("T")
        .retry(3)
        ._().function((bb) => {
          bb.count += 1;
          return bb.count < 3 ? Result.FAIL(bb.count) : Result.OK("third");
        })
        .end();

      const bb = board();
      const { result, trace } = await runTree(tree, bb);

      expect(result.status).to.equal("OK");
      expect(result.data).to.equal("third");
      expect(bb.count).to.equal(3);
      expect(trace.find(["T", "T/Retry"])?.attributes.attempts).to.equal(3);
    });

    it("fails without data once the attempts are exhausted", async () => {
      const tree = new Tree<Board>("T")
        .retry(3, { sleepMs: [1, 2] })
        ._().function((bb) => {
          bb.count += 1;
          return Result.FAIL(bb.count);
        })
        .end();

      const bb = board();
      const { result } = await runTree(tree, bb);

      expect(result.status).to.equal("FAIL");
      expect(result.data).to.equal(undefined);
      expect(bb.count).to.equal(3);
    });

    it("consumes the sleep schedule gap by gap and reuses its last entry", () => {
      expect([0, 1, 2, 5].map((gap) => retryDelayMs([10, 20], gap))).to.deep.equal([10, 20, 20, 20]);
      expect(retryDelayMs(15, 3)).to.equal(15);
      expect(retryDelayMs(undefined, 0)).to.equal(0);
    });
  });

  describe("Wrapper", () => {
    it("runs the scope's release code after the child", async () => {
      const tree = new Tree<Board>("T")
        .wrapper(async function* (child, context) {
          context.board<Board>().events.push("acquire");
          try {
            yield await child();
          } finally {
            context.board<Board>().events.push("release");
          }
        })
        ._().function((bb) => {
          bb.events.push("child");
          return "inner";
        })
        .end();

      const bb = board();
      const { result } = await runTree(tree, bb);

      expect(result.status).to.equal("OK");
      expect(result.data).to.equal("inner");
      expect(bb.events).to.deep.equal(["acquire", "child", "release"]);
    });

    it("fails when the factory does not produce a generator", async () => {
      const tree = new Tree<Board>("T").wrapper(() => "nope")._().constant(1).end();
      const { result, trace } = await runTree(tree, board());

      expect(result.status).to.equal("FAIL");
      expect(trace.find(["T", "T/Wrapper"])?.attributes.error).to.equal("wrapper factory did not return an async generator");
    });

    it("fails and closes the scope when it yields something other than a result", async () => {
      const bb = board();
      const tree = new Tree<Board>("T")
        .wrapper(async function* () {
          try {
            yield 5;
          } finally {
            bb.events.push("closed");
          }
        })
        ._().constant(1)
        .end();

      const { result, trace } = await runTree(tree, bb);

      expect(result.status).to.equal("FAIL");
      expect(trace.find(["T", "T/Wrapper"])?.attributes.error).to.equal("wrapper scope yielded no result");
      expect(bb.events).to.deep.equal(["closed"]);
    });
  });

  describe("Subtree", () => {
    interface Inner {
      value: number;
    }

    it("runs against a derived blackboard and restores the outer one", async () => {
      const inner = new Tree<Inner>("Inner").function((bb) => bb.value * 2).end();
      const tree = new Tree<Board>("T")
        .sequence()
        ._().subtree(inner, { blackboard: (bb) => ({ value: bb.count }) })
        ._().writeBlackboard("doubled")
        ._().function((bb) => bb.count)
        .end();

      const bb = board(21);
      const { result, trace } = await runTree(tree, bb);

      expect(bb.doubled).to.equal(42);
      expect(result.data).to.equal(21);
      expect(trace.find(["T", "T/Sequence", "T/Sequence/Subtree", "Inner", "Inner/Function"])?.result).to.equal("42");
    });

    it("shares the parent blackboard without a factory", async () => {
      const inner = new Tree<Board>("Inner")
        .function((bb) => {
          bb.count += 1;
          return bb.count;
        })
        .end();
      const tree = new Tree<Board>("T").subtree(inner).end();

      const bb = board(1);
      const { result } = await runTree(tree, bb);

      expect(result.data).to.equal(2);
      expect(bb.count).to.equal(2);
    });
  });
});
