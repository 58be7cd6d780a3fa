/**
 * Use in the `default` branch of a switch over a discriminated union: adding a
 * variant without handling it becomes a compile error.
 *
 * @throws Error if reached at runtime
 */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(value)}`);
}
