/**
 * Source type model (TypeNode and its variants)
 *
 * TypeNodes are produced by the declaration reader and consumed read-only by
 * the emitter. Optionality never lives inside a TypeNode: it travels beside
 * it as an OptionalKind once the source-level optional wrapper is unwrapped.
 */

/**
 * Identity of a nominal declaration.
 * Built-in primitives live in the "core" module; user declarations live in
 * the module named after their file.
 */
export type DeclarationId = {
  readonly module: string;
  readonly name: string;
};

export type TypeNode =
  | NominalTypeNode
  | AliasTypeNode
  | TupleTypeNode
  | OpaqueTypeNode;

export type NominalTypeNode = {
  readonly kind: "nominalType";
  readonly decl: DeclarationId;
  readonly typeArguments?: readonly TypeNode[];
};

/**
 * One layer of type sugar (`type CInt = Int32`).
 */
export type AliasTypeNode = {
  readonly kind: "aliasType";
  readonly decl: DeclarationId;
  readonly underlying: TypeNode;
};

/**
 * Ordered element types. The empty tuple is the "no value" type.
 */
export type TupleTypeNode = {
  readonly kind: "tupleType";
  readonly elementTypes: readonly TypeNode[];
};

/**
 * A fully reduced type with no finer classification (unions, object
 * literals, function types). Only its description survives.
 */
export type OpaqueTypeNode = {
  readonly kind: "opaqueType";
  readonly description: string;
};

export type OptionalKind = "none" | "optional" | "implicitlyUnwrapped";

export const CORE_MODULE = "core";

export const coreDecl = (name: string): DeclarationId => ({
  module: CORE_MODULE,
  name,
});

export const declarationKey = (decl: DeclarationId): string =>
  `${decl.module}.${decl.name}`;

export const nominalType = (
  decl: DeclarationId,
  typeArguments?: readonly TypeNode[]
): NominalTypeNode =>
  typeArguments && typeArguments.length > 0
    ? { kind: "nominalType", decl, typeArguments }
    : { kind: "nominalType", decl };

export const aliasType = (
  decl: DeclarationId,
  underlying: TypeNode
): AliasTypeNode => ({ kind: "aliasType", decl, underlying });

export const voidType: TupleTypeNode = { kind: "tupleType", elementTypes: [] };

export const opaqueType = (description: string): OpaqueTypeNode => ({
  kind: "opaqueType",
  description,
});

/**
 * The type an alias chain ends in. Chains are finite: the reader cuts
 * cycles into opaque types.
 */
export const unwrapAliases = (type: TypeNode): TypeNode =>
  type.kind === "aliasType" ? unwrapAliases(type.underlying) : type;

/**
 * Human-readable description of a type, as the user spelled it.
 * Aliases describe themselves by name, not by what they expand to.
 */
export const describeType = (type: TypeNode): string => {
  switch (type.kind) {
    case "nominalType":
      return type.typeArguments
        ? `${type.decl.name}<${type.typeArguments.map(describeType).join(", ")}>`
        : type.decl.name;
    case "aliasType":
      return type.decl.name;
    case "tupleType":
      return `[${type.elementTypes.map(describeType).join(", ")}]`;
    case "opaqueType":
      return type.description;
  }
};
