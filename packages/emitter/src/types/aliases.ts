/**
 * Type alias emission
 *
 * An alias that is itself in the table keeps its own spelling
 * (CInt → int, not int32_t). Otherwise one layer is peeled and the
 * underlying type is projected with the same optionality.
 */

import type { AliasTypeNode, OptionalKind } from "@sigbridge/frontend";
import type { DialectPolicy } from "../dialects/index.js";
import { printKnownType } from "./known.js";
import type { ProjectedType } from "./projected.js";
import { projectType } from "./emitter.js";

export const projectAliasType = (
  type: AliasTypeNode,
  optionality: OptionalKind,
  policy: DialectPolicy
): ProjectedType => {
  const known = policy.lookup(type.decl);
  if (known) {
    return printKnownType(known, optionality, policy);
  }
  return projectType(type.underlying, optionality, policy);
};
