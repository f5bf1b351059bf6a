import { type Operation, resource, useScope, withResolvers } from "effection";
import { namespace } from "@signalbox/logging";
import { createConnectionTable } from "./connection.ts";
import { createScopeDispatcher, DispatcherContext } from "./dispatch.ts";
import type { Handler, Signal } from "./types.ts";

/**
 * Create a signal. Handlers connected to it are invoked with the arguments
 * of every `fire()`, each as an independent task that never blocks the
 * caller of `fire()`.
 *
 * The signal lives as long as the scope that created it. When that scope
 * exits, its connections are dropped, any handler still running is halted,
 * and `fire()` does nothing from then on.
 *
 * @example
 * ```ts
 * const resized = yield* createSignal<[width: number, height: number]>();
 *
 * resized.connect((width, height) => {
 *   console.log(`now ${width}x${height}`);
 * });
 *
 * resized.fire(80, 24);
 * ```
 */
export function createSignal<TArgs extends unknown[] = []>(): Operation<
  Signal<TArgs>
> {
  return resource<Signal<TArgs>>(function* (provide) {
    yield* namespace("signal");

    const dispatcher = (yield* DispatcherContext.get()) ??
      createScopeDispatcher(yield* useScope());

    let table = createConnectionTable<TArgs>();
    let closed = false;

    function connect(handler: Handler<TArgs>) {
      if (typeof handler !== "function") {
        throw new TypeError("signal handler must be a function");
      }
      return table.add(handler, false);
    }

    function once(handler: Handler<TArgs>) {
      if (typeof handler !== "function") {
        throw new TypeError("signal handler must be a function");
      }
      return table.add(handler, true);
    }

    function fire(...args: TArgs) {
      if (closed) {
        return;
      }
      const current = table;
      for (const handle of current.handles()) {
        const handler = current.claim(handle);
        if (handler) {
          dispatcher.dispatch(handler, args);
        }
      }
    }

    function* wait(): Operation<TArgs> {
      const { operation, resolve } = withResolvers<TArgs>();
      const connection = once((...args) => resolve(args));
      try {
        return yield* operation;
      } finally {
        connection.disconnect();
      }
    }

    function disconnectAll() {
      table = createConnectionTable<TArgs>();
    }

    try {
      yield* provide({ connect, once, fire, wait, disconnectAll });
    } finally {
      closed = true;
      disconnectAll();
    }
  });
}
