/**
 * Keyword type conversion
 *
 * TypeScript's structural primitives have no fixed width, so each keyword
 * stands for the widest core type that holds its values.
 */

import ts from "typescript";
import {
  type TypeNode,
  coreDecl,
  nominalType,
  voidType,
} from "../model/index.js";

export const convertKeyword = (kind: ts.SyntaxKind): TypeNode | undefined => {
  switch (kind) {
    case ts.SyntaxKind.BooleanKeyword:
      return nominalType(coreDecl("Bool"));
    case ts.SyntaxKind.NumberKeyword:
      return nominalType(coreDecl("Double"));
    case ts.SyntaxKind.BigIntKeyword:
      return nominalType(coreDecl("Int64"));
    case ts.SyntaxKind.StringKeyword:
      return nominalType(coreDecl("String"));
    case ts.SyntaxKind.VoidKeyword:
    case ts.SyntaxKind.UndefinedKeyword:
    case ts.SyntaxKind.NeverKeyword:
      return voidType;
    default:
      return undefined;
  }
};
