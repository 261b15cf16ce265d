/**
 * Type projection main dispatcher
 */

import type { OptionalKind, TypeNode } from "@sigbridge/frontend";
import type { DialectPolicy } from "../dialects/index.js";
import { projectNominalType } from "./known.js";
import { projectAliasType } from "./aliases.js";
import { projectTupleType } from "./tuples.js";
import { type ProjectedType, unrepresentable } from "./projected.js";

/**
 * Project a type and its optionality into the policy's dialect
 */
export const projectType = (
  type: TypeNode,
  optionality: OptionalKind,
  policy: DialectPolicy
): ProjectedType => {
  switch (type.kind) {
    case "nominalType":
      return projectNominalType(type, optionality, policy);

    case "aliasType":
      return projectAliasType(type, optionality, policy);

    case "tupleType":
      return projectTupleType(type);

    case "opaqueType":
      return unrepresentable(type.description);
  }
};
