import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { configureDefaults, getDefaults } from "../src/engine/defaults.js";
import { TraceNotFoundError, TreeProgrammingError } from "../src/engine/errors.js";
import { Tree, runTree } from "../src/engine/tree.js";
import { FileTraceStorage } from "../src/tracing/fileStorage.js";

interface Board {
  name: string;
}

describe("FileTraceStorage", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "treeflow-traces-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("saves a finished run and reads it back", async () => {
    const tree = new Tree<Board>("Greeting")
      .sequence()
      ._().function((bb) => `hello ${bb.name}`)
      ._().constant(1)
      .end();
    const { trace } = await runTree(tree, { name: "ada" });
    const storage = new FileTraceStorage({ directory, generateId: () => "trace-1" });

    const traceId = await storage.save(trace);
    const record = await storage.query(traceId);

    expect(traceId).to.equal("trace-1");
    expect(await readdir(directory)).to.deep.equal(["trace-1.json"]);
    expect(record.name).to.equal("ROOT");
    const sequence = record.children.Greeting.children["Greeting/Sequence"];
    expect(sequence.status).to.equal("OK");
    expect(sequence.result).to.equal("1");
    expect(sequence.children["Greeting/Sequence/Function"].result).to.equal("hello ada");
    expect(sequence.children["Greeting/Sequence/Constant"].finished).to.equal(true);
  });

  it("rejects unknown and malformed identifiers as not found", async () => {
    const storage = new FileTraceStorage({ directory });

    for (const traceId of ["missing", "../outside"]) {
      let caught: unknown;
      try {
        await storage.query(traceId);
      } catch (error) {
        caught = error;
      }
      expect(caught).to.be.instanceOf(TraceNotFoundError);
      expect(caught).to.have.property("traceId", traceId);
    }
  });

  it("refuses generated identifiers that are not file-safe", async () => {
    const storage = new FileTraceStorage({ directory, generateId: () => "bad id" });
    const { trace } = await runTree(new Tree<Board>("T").constant(1).end(), { name: "x" });

    let caught: unknown;
    try {
      await storage.save(trace);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(TreeProgrammingError);
  });

  it("defaults to the configured trace directory and random identifiers", async () => {
    configureDefaults({ settings: { ...getDefaults().settings, traceDirectory: directory } });
    const storage = new FileTraceStorage();
    const { trace } = await runTree(new Tree<Board>("T").constant(1).end(), { name: "x" });

    const traceId = await storage.save(trace);

    expect(storage.directory).to.equal(path.resolve(directory));
    expect(traceId).to.match(/^[0-9a-f-]{36}$/);
    expect((await storage.query(traceId)).children.T.status).to.equal("OK");
  });
});
