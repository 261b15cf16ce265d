/**
 * Type conversion - TypeScript type nodes to TypeNodes
 */

import ts from "typescript";
import {
  type TypeNode,
  aliasType,
  coreDecl,
  nominalType,
  opaqueType,
} from "../model/index.js";
import { convertKeyword } from "./keywords.js";
import { describeNode, moduleNameOf } from "./locations.js";
import { entityNameText, resolveTypeReference } from "./references.js";

/**
 * Alias declarations currently being expanded. A reference back into this
 * set is a cycle and is cut into an opaque type, which keeps every alias
 * chain handed to the emitter finite.
 */
type ActiveAliases = ReadonlySet<ts.TypeAliasDeclaration>;

const convertTypeReference = (
  node: ts.TypeReferenceNode,
  checker: ts.TypeChecker,
  active: ActiveAliases
): TypeNode => {
  const resolved = resolveTypeReference(node.typeName, checker);
  const typeArguments = node.typeArguments?.map((arg) =>
    convertTypeNode(arg, checker, active)
  );

  switch (resolved.kind) {
    case "prelude":
      return nominalType(coreDecl(resolved.name), typeArguments);

    case "unresolved":
      return nominalType(
        {
          module: moduleNameOf(node.getSourceFile().fileName),
          name: entityNameText(node.typeName),
        },
        typeArguments
      );

    case "declaration": {
      const decl = resolved.declaration;
      const module = moduleNameOf(decl.getSourceFile().fileName);

      if (ts.isTypeAliasDeclaration(decl)) {
        // Generic aliases would need substitution of their parameters
        if (decl.typeParameters) {
          return opaqueType(describeNode(node));
        }
        if (active.has(decl)) {
          return opaqueType(decl.name.text);
        }
        return aliasType(
          { module, name: decl.name.text },
          convertTypeNode(decl.type, checker, new Set([...active, decl]))
        );
      }

      if (
        (ts.isInterfaceDeclaration(decl) ||
          ts.isClassDeclaration(decl) ||
          ts.isEnumDeclaration(decl)) &&
        decl.name
      ) {
        return nominalType({ module, name: decl.name.text }, typeArguments);
      }

      // Type parameters, namespaces, values used as types
      return opaqueType(describeNode(node));
    }
  }
};

const convertTupleType = (
  node: ts.TupleTypeNode,
  checker: ts.TypeChecker,
  active: ActiveAliases
): TypeNode => {
  const elementTypes: TypeNode[] = [];
  for (const element of node.elements) {
    if (ts.isRestTypeNode(element) || ts.isOptionalTypeNode(element)) {
      return opaqueType(describeNode(node));
    }
    if (ts.isNamedTupleMember(element)) {
      if (element.dotDotDotToken || element.questionToken) {
        return opaqueType(describeNode(node));
      }
      elementTypes.push(convertTypeNode(element.type, checker, active));
    } else {
      elementTypes.push(convertTypeNode(element, checker, active));
    }
  }
  return { kind: "tupleType", elementTypes };
};

const convertTypeNode = (
  typeNode: ts.TypeNode,
  checker: ts.TypeChecker,
  active: ActiveAliases
): TypeNode => {
  const keyword = convertKeyword(typeNode.kind);
  if (keyword) {
    return keyword;
  }

  if (ts.isParenthesizedTypeNode(typeNode)) {
    return convertTypeNode(typeNode.type, checker, active);
  }

  if (ts.isTypeReferenceNode(typeNode)) {
    return convertTypeReference(typeNode, checker, active);
  }

  if (ts.isTupleTypeNode(typeNode)) {
    return convertTupleType(typeNode, checker, active);
  }

  // Unions, literals, object and function types have no nominal identity
  return opaqueType(describeNode(typeNode));
};

/**
 * Convert a TypeScript type node to a TypeNode
 */
export const convertType = (
  typeNode: ts.TypeNode,
  checker: ts.TypeChecker
): TypeNode => convertTypeNode(typeNode, checker, new Set());
