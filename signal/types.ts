import type { Operation } from "effection";

/**
 * A function subscribed to a signal. When it returns a promise or an
 * operation, the dispatched task waits on that as well; any other return
 * value is ignored.
 */
export type Handler<TArgs extends unknown[]> = (...args: TArgs) => unknown;

/**
 * The publish capability of a signal.
 */
export type Fire<TArgs extends unknown[]> = (...args: TArgs) => void;

/**
 * A revocable subscription of one handler to one signal.
 */
export interface Connection {
  /**
   * `false` once {@link Connection.disconnect} has been called. Dropping
   * the whole signal with `disconnectAll()` does not change this flag.
   */
  readonly connected: boolean;
  /**
   * Remove this connection from its signal. Calling it again does nothing.
   */
  disconnect(): void;
}

/**
 * The subscribe side of a signal.
 */
export interface RestrictedSignal<TArgs extends unknown[]> {
  /**
   * Register `handler` to be invoked on every subsequent fire.
   */
  connect(handler: Handler<TArgs>): Connection;
  /**
   * Register `handler` for the next fire only. The connection is dropped
   * before the handler is scheduled, so it runs at most once.
   */
  once(handler: Handler<TArgs>): Connection;
  /**
   * Suspend until the next fire and return its arguments.
   */
  wait(): Operation<TArgs>;
  /**
   * Drop every connection at once. Invocations already scheduled still run,
   * and callers parked in {@link RestrictedSignal.wait} are not woken.
   */
  disconnectAll(): void;
}

/**
 * An event source with both its publish and subscribe sides.
 */
export interface Signal<TArgs extends unknown[]> extends RestrictedSignal<TArgs> {
  /**
   * Schedule every live handler with `args`. Returns without waiting for
   * any of them to run.
   */
  fire: Fire<TArgs>;
}

/**
 * Runs handler invocations independently of the code that fired them.
 */
export interface Dispatcher {
  dispatch<TArgs extends unknown[]>(handler: Handler<TArgs>, args: TArgs): void;
}
