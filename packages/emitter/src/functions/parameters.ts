/**
 * Parameter list emission
 */

import type { ParameterModel } from "@sigbridge/frontend";
import type { DialectPolicy } from "../dialects/index.js";
import { printIdentifier } from "../identifiers.js";
import {
  type ProjectedType,
  projectType,
  renderProjectedType,
} from "../types/index.js";

export type PrintedParameter = {
  readonly text: string;
  readonly projected: ProjectedType;
};

/**
 * Print one parameter at a 1-based position
 * Example: `int32_t x`, or `int32_t _1` for an anonymous C++ parameter
 */
export const printParameter = (
  parameter: ParameterModel,
  position: number,
  policy: DialectPolicy
): PrintedParameter => {
  const projected = projectType(
    parameter.type,
    parameter.optionality,
    policy
  );
  const typeText = renderProjectedType(projected);
  const name =
    parameter.name !== undefined
      ? printIdentifier(parameter.name)
      : policy.nameAnonymousParameter(position);

  return {
    text: name !== undefined ? `${typeText} ${name}` : typeText,
    projected,
  };
};

/**
 * Print the text between the parentheses of a declaration
 */
export const printParameterList = (
  parameters: readonly ParameterModel[],
  policy: DialectPolicy
): readonly PrintedParameter[] =>
  parameters.map((parameter, index) =>
    printParameter(parameter, index + 1, policy)
  );
