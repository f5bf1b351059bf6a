/**
 * The default get and set transform.
 */
export function identity<T>(value: T, ..._extra: unknown[]): T {
  return value;
}
