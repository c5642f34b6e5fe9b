import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import { getDefaults } from "../engine/defaults.js";
import { TraceNotFoundError, TreeProgrammingError } from "../engine/errors.js";
import type { TraceNodeRecord, Tracer } from "../engine/tracer.js";

import { TRACE_ID_PATTERN, TraceNodeRecordSchema, type TraceStorage } from "./storage.js";

export interface FileTraceStorageOptions {
  /** Directory holding one `<id>.json` document per trace. Defaults to `TREEFLOW_TRACE_DIR`. */
  directory?: string;
  /** Identifier factory. Defaults to random UUIDs. */
  generateId?: () => string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Stores each trace as a pretty-printed JSON document. Writes go through a
 * temporary file renamed into place so readers never observe partial
 * documents.
 */
export class FileTraceStorage implements TraceStorage {
  readonly directory: string;
  private readonly generateId: () => string;

  constructor(options: FileTraceStorageOptions = {}) {
    this.directory = path.resolve(options.directory ?? getDefaults().settings.traceDirectory);
    this.generateId = options.generateId ?? randomUUID;
  }

  async save(root: Tracer): Promise<string> {
    const traceId = this.generateId();
    if (!TRACE_ID_PATTERN.test(traceId)) {
      throw new TreeProgrammingError(`generated trace id ${JSON.stringify(traceId)} is not a valid file name`);
    }
    const target = this.pathFor(traceId);
    await fs.mkdir(this.directory, { recursive: true });
    const tempPath = `${target}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, `${JSON.stringify(root.toJSON(), null, 2)}\n`, "utf8");
    await fs.rename(tempPath, target);
    return traceId;
  }

  async query(traceId: string): Promise<TraceNodeRecord> {
    let content: string;
    try {
      content = await fs.readFile(this.pathFor(traceId), "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new TraceNotFoundError(traceId);
      }
      throw error;
    }
    return TraceNodeRecordSchema.parse(JSON.parse(content));
  }

  private pathFor(traceId: string): string {
    if (!TRACE_ID_PATTERN.test(traceId)) {
      throw new TraceNotFoundError(traceId);
    }
    return path.join(this.directory, `${traceId}.json`);
  }
}
