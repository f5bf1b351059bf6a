import { type Operation, resource } from "effection";
import { createSignal } from "./signal.ts";
import type { Fire, RestrictedSignal } from "./types.ts";

export type RestrictedPair<TArgs extends unknown[]> = [
  signal: RestrictedSignal<TArgs>,
  fire: Fire<TArgs>,
];

/**
 * Create a signal that others may only observe. The first element is the
 * subscribe-only view to hand out; the second is the publish function,
 * which stays with whoever created the pair.
 *
 * @example
 * ```ts
 * const [ready, announce] = yield* createRestrictedSignal<[string]>();
 *
 * ready.connect((name) => console.log(`${name} is ready`));
 * announce("db");
 * ```
 */
export function createRestrictedSignal<TArgs extends unknown[] = []>(): Operation<
  RestrictedPair<TArgs>
> {
  return resource<RestrictedPair<TArgs>>(function* (provide) {
    const signal = yield* createSignal<TArgs>();
    yield* provide([restrict(signal), signal.fire]);
  });
}

/**
 * A view of `signal` with its subscribe operations only. The view holds
 * no publish function, so none can be reached through it.
 */
export function restrict<TArgs extends unknown[]>(
  signal: RestrictedSignal<TArgs>,
): RestrictedSignal<TArgs> {
  return {
    connect: (handler) => signal.connect(handler),
    once: (handler) => signal.once(handler),
    wait: () => signal.wait(),
    disconnectAll: () => signal.disconnectAll(),
  };
}
