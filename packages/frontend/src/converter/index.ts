/**
 * Declaration reader - Public API
 */

export { convertType } from "./type-converter.js";
export { getObjectTypeAndOptionality } from "./optionality.js";
export {
  collectFunctionSignatures,
  type SignatureCollection,
} from "./signatures.js";
export { PRELUDE_MODULE } from "./references.js";
export {
  moduleNameOf,
  getSourceLocation,
  getNodeLocation,
} from "./locations.js";
