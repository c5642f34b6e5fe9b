/**
 * JSON replacer widening the set of values that survive serialisation: sets
 * become arrays, maps become objects, bigints become strings and errors keep
 * their name and message.
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Set) {
    return [...value];
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Renders an arbitrary payload as display text: strings are kept verbatim,
 * absent values become `null`, everything else is serialised as JSON with
 * {@link jsonReplacer} and falls back to `String(value)` when that fails.
 */
export function describeValue(value: unknown): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "function") {
    return `[function ${value.name || "anonymous"}]`;
  }
  try {
    const serialised = JSON.stringify(value, jsonReplacer);
    return serialised === undefined ? String(value) : serialised;
  } catch {
    // Circular structures cannot be rendered as JSON.
    return String(value);
  }
}

/** Normalises an unknown throwable into a loggable record. */
export function describeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: "NonError", message: String(error) };
}
