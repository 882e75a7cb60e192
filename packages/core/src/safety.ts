/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)`: runtime assertion
 * - `unreachable(value)`: mark impossible code paths
 *
 * @example
 * ```typescript
 * type Shape = { kind: "circle" } | { kind: "square" };
 * function area(shape: Shape): number {
 *   switch (shape.kind) {
 *     case "circle": return Math.PI;
 *     case "square": return 1;
 *     default: return unreachable(shape); // Type error if Shape is extended
 *   }
 * }
 * ```
 */

/**
 * Runtime invariant check.
 *
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking:
 * passing anything but `never` is a type error.
 */
export function unreachable(value: never): never {
  throw new Error(`Unreachable code reached with ${JSON.stringify(value)}`);
}
