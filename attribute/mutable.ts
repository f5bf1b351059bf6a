import { type Operation, resource } from "effection";
import { is } from "immutable";
import { createSignal } from "@signalbox/signal";
import { identity } from "./identity.ts";
import type { MutableAttribute, Transform } from "./types.ts";

/**
 * Create an attribute that anyone holding it may read, change and observe.
 *
 * Values are compared with Immutable.js `is`, so an equal collection
 * from `immutable` counts as no change. `is` also compares the `valueOf()`
 * results of two objects: setting a different `Date` holding the same time,
 * or any object whose `valueOf()` equals the stored one's, is no change
 * either and fires nothing.
 *
 * @param initial - The value the attribute starts with.
 * @param getHandler - Applied to the stored value on every read.
 * @param setHandler - Applied to every incoming value before it is stored.
 *
 * @example
 * ```ts
 * const volume = yield* createMutable(5, identity, (value) =>
 *   Math.min(Math.max(value, 0), 10)
 * );
 *
 * volume.changed.connect((value, previous) => {
 *   console.log(`volume ${previous} -> ${value}`);
 * });
 *
 * volume.set(42); // stored as 10
 * ```
 */
export function createMutable<T, TExtra extends unknown[] = []>(
  initial: T,
  getHandler: Transform<T, TExtra> = identity,
  setHandler: Transform<T, TExtra> = identity,
): Operation<MutableAttribute<T, TExtra>> {
  return resource<MutableAttribute<T, TExtra>>(function* (provide) {
    const changed = yield* createSignal<[T, T, ...TExtra]>();

    const ref = { current: initial };

    function set(value: T, silent = false, ...extra: TExtra) {
      const next = setHandler(value, ...extra);
      if (is(next, ref.current)) {
        return;
      }

      const previous = ref.current;
      ref.current = next;

      if (!silent) {
        changed.fire(next, previous, ...extra);
      }
    }

    yield* provide({
      changed,
      set,
      get(...extra) {
        return getHandler(ref.current, ...extra);
      },
      update(updater, silent, ...extra) {
        set(updater(ref.current), silent, ...extra);
      },
      valueOf() {
        return ref.current;
      },
    });
  });
}
