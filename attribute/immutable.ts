import { type Operation, resource } from "effection";
import { createRestrictedSignal } from "@signalbox/signal";
import { identity } from "./identity.ts";
import type {
  AttributeFire,
  AttributeSetter,
  ImmutableAttribute,
  Transform,
} from "./types.ts";

export type ImmutableTriple<T, TExtra extends unknown[] = []> = [
  attribute: ImmutableAttribute<T, TExtra>,
  fire: AttributeFire<TExtra>,
  set: AttributeSetter<T, TExtra>,
];

/**
 * Create an attribute that only the caller may change. The attribute itself
 * can be handed out freely; `fire` and `set` stay with the caller.
 *
 * `set` compares by identity and stores the value as given. The get
 * transform is applied on read and to the value that `fire` publishes.
 *
 * @example
 * ```ts
 * const [status, publish, setStatus] = yield* createImmutable("idle");
 *
 * status.changed.connect((value) => console.log(value));
 *
 * setStatus("busy"); // logs "busy"
 * publish(); // logs "busy" again
 * ```
 */
export function createImmutable<T, TExtra extends unknown[] = []>(
  initial: T,
  getHandler: Transform<T, TExtra> = identity,
): Operation<ImmutableTriple<T, TExtra>> {
  return resource<ImmutableTriple<T, TExtra>>(function* (provide) {
    const [changed, publish] = yield* createRestrictedSignal<[T, ...TExtra]>();

    const ref = { current: initial };

    function get(...extra: TExtra): T {
      return getHandler(ref.current, ...extra);
    }

    function fire(...extra: TExtra) {
      publish(get(...extra), ...extra);
    }

    function set(value: T, silent = false, ...extra: TExtra) {
      if (Object.is(value, ref.current)) {
        return;
      }
      ref.current = value;
      if (!silent) {
        fire(...extra);
      }
    }

    yield* provide([{ get, changed }, fire, set]);
  });
}
