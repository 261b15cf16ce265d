/**
 * Function signature printer
 *
 * One algorithm for every dialect; the policy supplies the known-type
 * lookup, nullability spelling and parameter list conventions.
 */

import type { FunctionSignatureModel } from "@sigbridge/frontend";
import type { KnownTypeRegistry } from "../known-types/index.js";
import { createDialectPolicy, type DialectPolicy } from "../dialects/index.js";
import {
  type ProjectedType,
  projectType,
  renderProjectedType,
} from "../types/index.js";
import { printParameterList } from "./parameters.js";

export type SignatureReport = {
  /** Declaration without the trailing `;` */
  readonly text: string;
  /** Descriptions of types printed as placeholders, return type first */
  readonly unrepresentable: readonly string[];
  readonly droppedOptionality: boolean;
};

export type CCompatibleOptions = {
  readonly language?: "c" | "objc";
};

export const printFunctionSignature = (
  signature: FunctionSignatureModel,
  policy: DialectPolicy
): SignatureReport => {
  const returnProjected = projectType(
    signature.returnType,
    signature.returnOptionality,
    policy
  );
  const parameters = printParameterList(signature.parameters, policy);

  const parameterText =
    parameters.length === 0
      ? policy.emptyParameterList
      : parameters.map((p) => p.text).join(", ");

  const projections: readonly ProjectedType[] = [
    returnProjected,
    ...parameters.map((p) => p.projected),
  ];

  return {
    text: `${renderProjectedType(returnProjected)} ${signature.name}(${parameterText})`,
    unrepresentable: projections.flatMap((p) =>
      p.kind === "unrepresentable" ? [p.description] : []
    ),
    droppedOptionality: projections.some(
      (p) => p.kind === "text" && p.droppedOptionality
    ),
  };
};

/**
 * Print a declaration for C or Objective-C (default C)
 * Example: `bool foo(int32_t x)`, `void bar(void)`
 */
export const printAsCCompatibleDeclaration = (
  signature: FunctionSignatureModel,
  registry: KnownTypeRegistry,
  options: CCompatibleOptions = {}
): string =>
  printFunctionSignature(
    signature,
    createDialectPolicy(options.language ?? "c", registry)
  ).text;

/**
 * Print a C++ declaration
 * Example: `void baz(int32_t _1)`, `void bar()`
 */
export const printAsCxxDeclaration = (
  signature: FunctionSignatureModel,
  registry: KnownTypeRegistry
): string =>
  printFunctionSignature(signature, createDialectPolicy("cxx", registry))
    .text;
