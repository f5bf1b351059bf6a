import type { Connection, Handler } from "./types.ts";

interface Entry<TArgs extends unknown[]> {
  handler: Handler<TArgs>;
  once: boolean;
  connection: Connection;
}

/**
 * The storage behind a signal: handlers keyed by an integer handle that
 * grows with every connection. A connection holds its handle and the table
 * it was issued from, so disconnecting it touches nothing else.
 */
export interface ConnectionTable<TArgs extends unknown[]> {
  /**
   * Number of live connections.
   */
  readonly size: number;
  add(handler: Handler<TArgs>, once: boolean): Connection;
  /**
   * Handles of the live connections, most recently added first.
   */
  handles(): number[];
  /**
   * Claim the handler behind `handle` for one delivery. Returns `undefined`
   * when the connection has gone; a `once` connection is removed here.
   */
  claim(handle: number): Handler<TArgs> | undefined;
}

export function createConnectionTable<TArgs extends unknown[]>(): ConnectionTable<TArgs> {
  const entries = new Map<number, Entry<TArgs>>();
  let nextHandle = 0;

  return {
    get size() {
      return entries.size;
    },
    add(handler, once) {
      const handle = nextHandle++;
      let connected = true;
      const connection: Connection = {
        get connected() {
          return connected;
        },
        disconnect() {
          if (connected) {
            connected = false;
            entries.delete(handle);
          }
        },
      };
      entries.set(handle, { handler, once, connection });
      return connection;
    },
    handles() {
      return [...entries.keys()].reverse();
    },
    claim(handle) {
      const entry = entries.get(handle);
      if (!entry) {
        return undefined;
      }
      if (entry.once) {
        entry.connection.disconnect();
      }
      return entry.handler;
    },
  };
}
