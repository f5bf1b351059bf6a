import type { Operation } from "effection";
import { createApi } from "@effectionx/context-api";

/**
 * What signals report while delivering. `debug` is silent unless a scope
 * installs middleware for it with {@link loggerApi.around}.
 */
export interface Logger {
  debug: (message: string, ...args: unknown[]) => Operation<void>;
  error: (message: string, ...args: unknown[]) => Operation<void>;
}

const red = "\x1b[31m";
const reset = "\x1b[0m";

const defaultLogger: Logger = {
  *debug() {},
  *error(message: string, ...args: unknown[]) {
    console.error(`${red}[ERROR]${reset} ${message}`, ...args);
  },
};

export const loggerApi = createApi("signalbox.logger", defaultLogger);

/**
 * The logger as seen from the current scope.
 *
 * @example
 * ```ts
 * yield* log.error("handler failed", error);
 * ```
 */
export const log = loggerApi.operations;

/**
 * Prefix every message logged in the current scope with `[name]`.
 */
export function* namespace(name: string): Operation<void> {
  yield* loggerApi.around({
    *debug([message, ...args], next) {
      yield* next(`[${name}] ${message}`, ...args);
    },
    *error([message, ...args], next) {
      yield* next(`[${name}] ${message}`, ...args);
    },
  });
}
