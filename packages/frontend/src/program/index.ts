/**
 * Program - Public API
 */

export { createProgram, createCompilerOptions } from "./creation.js";
export { createInMemoryHost } from "./in-memory-host.js";
export type { ProgramOptions, SourceProgram } from "./types.js";
