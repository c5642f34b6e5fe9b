import { z } from "zod";

import { TreeProgrammingError } from "./errors.js";

/**
 * Parses builder options with {@link schema}, reporting violations as a
 * {@link TreeProgrammingError} naming the node kind and the offending paths.
 */
export function parseNodeOptions<S extends z.ZodTypeAny>(kind: string, schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new TreeProgrammingError(`invalid ${kind} options: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
}

/** Positive integer, used by limits and attempt counts. */
export const positiveIntSchema = z.number().int().positive();

/** Non-negative finite duration in milliseconds. */
export const durationMsSchema = z.number().finite().nonnegative();
