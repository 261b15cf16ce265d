/**
 * Header assembly - Public API
 */

export {
  type UnsupportedPolicy,
  type HeaderOptions,
  type HeaderResult,
  UNSUPPORTED_POLICIES,
  isUnsupportedPolicy,
  emitHeader,
} from "./emit-header.js";
export { headerFileName, guardMacroName, HEADER_BANNER } from "./layout.js";
