/**
 * sigbridge emitter - C, Objective-C and C++ declaration printer
 */

export * from "./languages.js";
export * from "./known-types/index.js";
export { annotateNullability } from "./nullability.js";
export * from "./dialects/index.js";
export * from "./types/index.js";
export {
  printIdentifier,
  isClangKeyword,
  isNamespaceName,
} from "./identifiers.js";
export * from "./functions/index.js";
export * from "./header/index.js";
