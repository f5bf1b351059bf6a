export * from "./types.ts";
export * from "./signal.ts";
export * from "./restricted.ts";
export * from "./dispatch.ts";
export { type ConnectionTable, createConnectionTable } from "./connection.ts";
