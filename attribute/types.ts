import type { RestrictedSignal, Signal } from "@signalbox/signal";

/**
 * A get or set transform. It receives the value and whatever extra
 * arguments the caller passed along.
 */
export type Transform<T, TExtra extends unknown[] = []> = (
  value: T,
  ...extra: TExtra
) => T;

/**
 * A reactive value that anyone holding it may change.
 */
export interface MutableAttribute<T, TExtra extends unknown[] = []> {
  /**
   * The stored value passed through the get transform.
   */
  get(...extra: TExtra): T;
  /**
   * Store `value` passed through the set transform and announce it on
   * {@link MutableAttribute.changed}, unless it equals the stored value or
   * `silent` is set.
   */
  set(value: T, silent?: boolean, ...extra: TExtra): void;
  /**
   * Set the value computed by `updater` from the stored value.
   */
  update(updater: (value: T) => T, silent?: boolean, ...extra: TExtra): void;
  /**
   * The stored value, without the get transform.
   */
  valueOf(): T;
  /**
   * Fires with `(value, previous, ...extra)` after every change. Holders of
   * the attribute may fire it too.
   */
  readonly changed: Signal<[T, T, ...TExtra]>;
}

/**
 * A reactive value that only its creator may change. Everyone else can
 * read it and observe it.
 */
export interface ImmutableAttribute<T, TExtra extends unknown[] = []> {
  get(...extra: TExtra): T;
  /**
   * Fires with `(get(...extra), ...extra)` whenever the owner publishes.
   */
  readonly changed: RestrictedSignal<[T, ...TExtra]>;
}

/**
 * Publish the current value of an immutable attribute without changing it.
 */
export type AttributeFire<TExtra extends unknown[] = []> = (
  ...extra: TExtra
) => void;

/**
 * Replace the value of an immutable attribute.
 */
export type AttributeSetter<T, TExtra extends unknown[] = []> = (
  value: T,
  silent?: boolean,
  ...extra: TExtra
) => void;
