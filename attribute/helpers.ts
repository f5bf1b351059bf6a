import type { Operation } from "effection";
import type { RestrictedSignal } from "@signalbox/signal";

/**
 * Anything with a readable value and a signal announcing its changes.
 * Both kinds of attribute qualify.
 */
export interface Observable<T> {
  get(): T;
  readonly changed: RestrictedSignal<unknown[]>;
}

/**
 * Returns an operation that completes with the attribute's value as soon as
 * it matches `predicate`. The current value is checked first, then the
 * value after every change.
 */
export function* until<T>(
  attribute: Observable<T>,
  predicate: (value: T) => boolean,
): Operation<T> {
  let value = attribute.get();
  while (!predicate(value)) {
    yield* attribute.changed.wait();
    value = attribute.get();
  }
  return value;
}
