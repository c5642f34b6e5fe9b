import { z } from "zod";

import { jsonReplacer } from "../utils/serialize.js";

/**
 * Document stored under a cache key: the payload of an OK result and the
 * validator tag current when it was written (`null` without a validator).
 */
export const CacheEntrySchema = z
  .object({
    data: z.unknown(),
    validator: z.string().nullable(),
  })
  .strict();

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

/** Outcome of matching a stored entry against the current validator tag. */
export type CacheLookup =
  | { readonly kind: "hit"; readonly data: unknown }
  | { readonly kind: "miss"; readonly reason: "absent" | "undecodable" | "validator_mismatch" };

export function deriveCacheKey(prefix: string, key: string): string {
  return `${prefix}${key}`;
}

export function encodeCacheEntry(data: unknown, validator: string | null): string {
  return JSON.stringify({ data, validator }, jsonReplacer);
}

/** Decodes a stored document, returning `null` for anything that is not a cache entry. */
export function decodeCacheEntry(raw: string): CacheEntry | null {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch {
    // Foreign or truncated value.
    return null;
  }
  const parsed = CacheEntrySchema.safeParse(document);
  return parsed.success ? parsed.data : null;
}

/**
 * Classifies a raw store value. Without a validator any decodable entry hits;
 * with one, the stored tag must be equal to the current tag.
 */
export function matchCacheEntry(raw: string | null, validator: string | null): CacheLookup {
  if (raw === null) {
    return { kind: "miss", reason: "absent" };
  }
  const entry = decodeCacheEntry(raw);
  if (!entry) {
    return { kind: "miss", reason: "undecodable" };
  }
  if (validator !== null && entry.validator !== validator) {
    return { kind: "miss", reason: "validator_mismatch" };
  }
  return { kind: "hit", data: entry.data };
}
