/**
 * Known (table-mapped) type emission
 */

import type { OptionalKind, NominalTypeNode } from "@sigbridge/frontend";
import { describeType } from "@sigbridge/frontend";
import type { KnownTypeInfo } from "../known-types/index.js";
import type { DialectPolicy } from "../dialects/index.js";
import { type ProjectedType, unrepresentable } from "./projected.js";

/**
 * Print a table-mapped type. Types that cannot be null in the target
 * language lose their optionality here.
 */
export const printKnownType = (
  info: KnownTypeInfo,
  optionality: OptionalKind,
  policy: DialectPolicy
): ProjectedType => {
  const text = info.canBeNullable
    ? policy.annotate(info.name, optionality)
    : info.name;
  return {
    kind: "text",
    text,
    droppedOptionality: optionality !== "none" && text === info.name,
  };
};

export const projectNominalType = (
  type: NominalTypeNode,
  optionality: OptionalKind,
  policy: DialectPolicy
): ProjectedType => {
  const known = policy.lookup(type.decl);
  return known
    ? printKnownType(known, optionality, policy)
    : unrepresentable(describeType(type));
};
