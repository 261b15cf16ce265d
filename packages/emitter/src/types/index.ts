/**
 * Type projection - Public API
 */

export { projectType } from "./emitter.js";
export { projectNominalType, printKnownType } from "./known.js";
export { projectAliasType } from "./aliases.js";
export { projectTupleType } from "./tuples.js";
export {
  type ProjectedType,
  unrepresentable,
  renderPlaceholder,
  renderProjectedType,
} from "./projected.js";
