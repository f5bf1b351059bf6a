export * from "./types.ts";
export * from "./mutable.ts";
export * from "./immutable.ts";
export * from "./helpers.ts";
export { identity } from "./identity.ts";
