/**
 * Type reference resolution
 *
 * Names imported from the prelude module are the built-in nominal types.
 * Everything else resolves through the checker to its declaration.
 */

import ts from "typescript";

export const PRELUDE_MODULE = "@sigbridge/core";

export type ResolvedReference =
  | { readonly kind: "prelude"; readonly name: string }
  | { readonly kind: "declaration"; readonly declaration: ts.Declaration }
  | { readonly kind: "unresolved" };

const isPreludeSpecifier = (moduleSpecifier: ts.Expression): boolean =>
  ts.isStringLiteral(moduleSpecifier) &&
  moduleSpecifier.text === PRELUDE_MODULE;

/**
 * Name exported by the prelude that this symbol was imported as, if any.
 * import { Int32 as I32 } from "@sigbridge/core" → "Int32"
 */
const getPreludeImportName = (symbol: ts.Symbol): string | undefined => {
  for (const decl of symbol.getDeclarations() ?? []) {
    if (
      ts.isImportSpecifier(decl) &&
      isPreludeSpecifier(decl.parent.parent.parent.moduleSpecifier)
    ) {
      return (decl.propertyName ?? decl.name).text;
    }
  }
  return undefined;
};

/**
 * import * as core from "@sigbridge/core"; core.Int32
 */
const isPreludeNamespace = (symbol: ts.Symbol): boolean =>
  (symbol.getDeclarations() ?? []).some(
    (decl) =>
      ts.isNamespaceImport(decl) &&
      isPreludeSpecifier(decl.parent.parent.moduleSpecifier)
  );

export const entityNameText = (name: ts.EntityName): string =>
  ts.isIdentifier(name)
    ? name.text
    : `${entityNameText(name.left)}.${name.right.text}`;

export const resolveTypeReference = (
  typeName: ts.EntityName,
  checker: ts.TypeChecker
): ResolvedReference => {
  if (ts.isQualifiedName(typeName) && ts.isIdentifier(typeName.left)) {
    const namespaceSymbol = checker.getSymbolAtLocation(typeName.left);
    if (namespaceSymbol && isPreludeNamespace(namespaceSymbol)) {
      return { kind: "prelude", name: typeName.right.text };
    }
  }

  const symbol = checker.getSymbolAtLocation(typeName);
  if (!symbol) {
    return { kind: "unresolved" };
  }

  const preludeName = getPreludeImportName(symbol);
  if (preludeName !== undefined) {
    return { kind: "prelude", name: preludeName };
  }

  const target =
    symbol.flags & ts.SymbolFlags.Alias
      ? checker.getAliasedSymbol(symbol)
      : symbol;
  const declaration = target.getDeclarations()?.[0];
  return declaration
    ? { kind: "declaration", declaration }
    : { kind: "unresolved" };
};

/**
 * Resolve a reference to one of the prelude's wrapper types by name
 */
export const isPreludeReference = (
  node: ts.TypeReferenceNode,
  name: string,
  checker: ts.TypeChecker
): boolean => {
  const resolved = resolveTypeReference(node.typeName, checker);
  return resolved.kind === "prelude" && resolved.name === name;
};
