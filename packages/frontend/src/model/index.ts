export {
  type DeclarationId,
  type TypeNode,
  type NominalTypeNode,
  type AliasTypeNode,
  type TupleTypeNode,
  type OpaqueTypeNode,
  type OptionalKind,
  CORE_MODULE,
  coreDecl,
  declarationKey,
  nominalType,
  aliasType,
  voidType,
  opaqueType,
  describeType,
  unwrapAliases,
} from "./type-node.js";
export type { ParameterModel, FunctionSignatureModel } from "./signature.js";
