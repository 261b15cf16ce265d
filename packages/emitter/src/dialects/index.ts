export type { DialectPolicy } from "./types.js";
export { createDialectPolicy } from "./policy.js";
