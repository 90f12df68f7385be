import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

/**
 * Checks `v` is an array of at most `max` items.
 * Returns the array, or undefined after recording an error at `path`.
 */
export function asArray(errors: FieldError[], path: string, v: unknown, max: number): unknown[] | undefined {
  if (v == null) {
    pushErr(errors, path, "is required");
    return undefined;
  }
  if (!Array.isArray(v)) {
    pushErr(errors, path, "must be an array");
    return undefined;
  }
  if (v.length > max) {
    pushErr(errors, path, `must contain at most ${max} items`);
    return undefined;
  }
  return v;
}
