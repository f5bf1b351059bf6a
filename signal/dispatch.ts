import { call, createContext, type Operation, type Scope, sleep } from "effection";
import { log } from "@signalbox/logging";
import type { Dispatcher, Handler } from "./types.ts";

/**
 * The dispatcher that signals created in the current scope will use. When
 * nothing is set, each signal dispatches into the scope it was created in.
 */
export const DispatcherContext = createContext<Dispatcher>(
  "signalbox.dispatcher",
);

/**
 * Make every signal created from here on in the current scope hand its
 * invocations to `dispatcher`.
 *
 * @example
 * ```ts
 * yield* useDispatcher({
 *   dispatch(handler, args) {
 *     queue.push(() => handler(...args));
 *   },
 * });
 * const signal = yield* createSignal<[string]>();
 * ```
 */
export function* useDispatcher(dispatcher: Dispatcher): Operation<Dispatcher> {
  return yield* DispatcherContext.set(dispatcher);
}

/**
 * A dispatcher that runs each invocation as its own task in `scope`. The
 * tasks are halted together with the scope.
 */
export function createScopeDispatcher(scope: Scope): Dispatcher {
  return {
    dispatch(handler, args) {
      scope.run(() => deliver(handler, args));
    },
  };
}

/**
 * Invoke `handler` on a later turn of the event loop and wait for whatever
 * it returns. A generator is run as an operation and a promise is awaited;
 * any other value, iterables included, is ignored. A failing handler is
 * logged and goes no further.
 */
export function* deliver<TArgs extends unknown[]>(
  handler: Handler<TArgs>,
  args: TArgs,
): Operation<void> {
  yield* sleep(0);
  yield* log.debug(`delivering ${args.length} argument(s)`);
  try {
    const result = handler(...args);
    if (isOperation(result)) {
      yield* result;
    } else if (result instanceof Promise) {
      yield* call(() => result);
    }
  } catch (error) {
    yield* log.error("handler failed", error);
  }
}

function isOperation(value: unknown): value is Operation<unknown> {
  return typeof value === "object" && value !== null &&
    Symbol.iterator in value &&
    "next" in value && typeof value.next === "function" &&
    "throw" in value && typeof value.throw === "function";
}
