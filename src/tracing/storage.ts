import { z } from "zod";

import type { TraceNodeRecord, TraceStatus, Tracer } from "../engine/tracer.js";

const TRACE_STATUSES = ["RUNNING", "OK", "FAIL", "CANCELLED", "ERROR"] as const satisfies readonly TraceStatus[];

/** Schema of a persisted span, validated when a trace is read back. */
export const TraceNodeRecordSchema: z.ZodType<TraceNodeRecord> = z.lazy(() =>
  z
    .object({
      name: z.string(),
      kind: z.string(),
      start_at: z.string(),
      end_at: z.string().nullable(),
      duration: z.number().nullable(),
      finished: z.boolean(),
      status: z.enum(TRACE_STATUSES),
      cost: z.number(),
      logs: z.array(z.string()),
      result: z.string().nullable(),
      attributes: z.record(z.unknown()),
      children: z.record(TraceNodeRecordSchema),
    })
    .strict(),
);

/** Identifiers issued by trace storages: letters, digits, `-` and `_`. */
export const TRACE_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/** Persistence backend for finished traces. */
export interface TraceStorage {
  /** Persists the span tree rooted at {@link root} and returns its identifier. */
  save(root: Tracer): Promise<string>;
  /** Reads a trace back. Rejects with `TraceNotFoundError` for unknown identifiers. */
  query(traceId: string): Promise<TraceNodeRecord>;
}
