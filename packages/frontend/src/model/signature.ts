/**
 * Function signature model handed to the emitter
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { OptionalKind, TypeNode } from "./type-node.js";

export type ParameterModel = {
  /** Absent for anonymous parameters */
  readonly name?: string;
  readonly type: TypeNode;
  readonly optionality: OptionalKind;
  readonly location?: SourceLocation;
};

export type FunctionSignatureModel = {
  readonly name: string;
  readonly returnType: TypeNode;
  readonly returnOptionality: OptionalKind;
  readonly parameters: readonly ParameterModel[];
  readonly location?: SourceLocation;
};
