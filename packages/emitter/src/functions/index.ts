/**
 * Function declaration printing - Public API
 */

export {
  type SignatureReport,
  type CCompatibleOptions,
  printFunctionSignature,
  printAsCCompatibleDeclaration,
  printAsCxxDeclaration,
} from "./signature-printer.js";
export {
  type PrintedParameter,
  printParameter,
  printParameterList,
} from "./parameters.js";
