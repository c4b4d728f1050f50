/**
 * Small shared helpers.
 */

/** Message of an Error, or the stringified value for anything else thrown. */
export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** a + b, capped at Number.MAX_SAFE_INTEGER. */
export function saturatingAdd(a: number, b: number): number {
  return Math.min(a + b, Number.MAX_SAFE_INTEGER);
}

/** a - b, floored at 0. */
export function saturatingSub(a: number, b: number): number {
  return Math.max(a - b, 0);
}
