/**
 * Object type and optionality resolution
 *
 * Splits a declared type into its payload and an OptionalKind, so the
 * emitter never sees the source-level optional wrapper:
 *
 *   x?: Int32              → [Int32, optional]
 *   Int32 | null           → [Int32, optional]
 *   Optional<Int32>        → [Int32, optional]
 *   Unwrapped<Int32>       → [Int32, implicitlyUnwrapped]
 *
 * Exactly one optional layer is removed.
 */

import ts from "typescript";
import {
  type OptionalKind,
  type TypeNode,
  opaqueType,
  voidType,
} from "../model/index.js";
import { convertType } from "./type-converter.js";
import { describeNode } from "./locations.js";
import { isPreludeReference, resolveTypeReference } from "./references.js";

type OptionalLayer = {
  readonly kind: Exclude<OptionalKind, "none">;
  readonly payload: readonly ts.TypeNode[];
};

const isNullish = (node: ts.TypeNode): boolean =>
  node.kind === ts.SyntaxKind.UndefinedKeyword ||
  (ts.isLiteralTypeNode(node) &&
    node.literal.kind === ts.SyntaxKind.NullKeyword);

const findOptionalLayer = (
  node: ts.TypeNode,
  checker: ts.TypeChecker,
  visited: ReadonlySet<ts.TypeAliasDeclaration>
): OptionalLayer | undefined => {
  if (ts.isParenthesizedTypeNode(node)) {
    return findOptionalLayer(node.type, checker, visited);
  }

  if (ts.isUnionTypeNode(node)) {
    const payload = node.types.filter((member) => !isNullish(member));
    return payload.length > 0 && payload.length < node.types.length
      ? { kind: "optional", payload }
      : undefined;
  }

  if (!ts.isTypeReferenceNode(node)) {
    return undefined;
  }

  const [wrapped] = node.typeArguments ?? [];
  if (wrapped && node.typeArguments?.length === 1) {
    if (isPreludeReference(node, "Unwrapped", checker)) {
      return { kind: "implicitlyUnwrapped", payload: [wrapped] };
    }
    if (isPreludeReference(node, "Optional", checker)) {
      return { kind: "optional", payload: [wrapped] };
    }
  }

  // Look through `type MaybeInt = Int32 | null`
  const resolved = resolveTypeReference(node.typeName, checker);
  if (
    resolved.kind === "declaration" &&
    ts.isTypeAliasDeclaration(resolved.declaration) &&
    !resolved.declaration.typeParameters &&
    !visited.has(resolved.declaration)
  ) {
    return findOptionalLayer(
      resolved.declaration.type,
      checker,
      new Set([...visited, resolved.declaration])
    );
  }

  return undefined;
};

const convertPayload = (
  payload: readonly ts.TypeNode[],
  checker: ts.TypeChecker
): TypeNode => {
  const [single] = payload;
  if (single && payload.length === 1) {
    return convertType(single, checker);
  }
  return opaqueType(payload.map(describeNode).join(" | "));
};

/**
 * Resolve a declaration's type to its object type and optionality.
 * An absent type (no return annotation) is the empty tuple.
 */
export const getObjectTypeAndOptionality = (
  typeNode: ts.TypeNode | undefined,
  hasQuestionToken: boolean,
  checker: ts.TypeChecker
): readonly [TypeNode, OptionalKind] => {
  if (!typeNode) {
    return [voidType, "none"];
  }

  const layer = findOptionalLayer(typeNode, checker, new Set());
  if (layer) {
    return [convertPayload(layer.payload, checker), layer.kind];
  }

  return [
    convertType(typeNode, checker),
    hasQuestionToken ? "optional" : "none",
  ];
};
