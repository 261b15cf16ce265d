/**
 * Tuple type emission
 *
 * Only the empty tuple has a spelling (`void`). Multi-value returns and
 * parameters are split into separate declarations before printing, so a
 * non-empty tuple here is an internal error.
 */

import type { TupleTypeNode } from "@sigbridge/frontend";
import { describeType } from "@sigbridge/frontend";
import type { ProjectedType } from "./projected.js";

export const projectTupleType = (type: TupleTypeNode): ProjectedType => {
  if (type.elementTypes.length > 0) {
    throw new Error(
      `ICE: Tuple type '${describeType(type)}' reached type projection - multi-value types must be split before printing`
    );
  }

  // Optionality on the empty tuple is meaningless and ignored
  return { kind: "text", text: "void", droppedOptionality: false };
};
