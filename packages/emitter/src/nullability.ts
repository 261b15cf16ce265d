/**
 * Nullability annotation
 *
 * C and Objective-C spell optionality with clang's nullability qualifiers,
 * written after the type. C++ output carries no textual annotation.
 */

import type { OptionalKind } from "@sigbridge/frontend";
import { type OutputLanguage, dialectOf } from "./languages.js";

const C_NULLABILITY_QUALIFIERS: Readonly<
  Record<Exclude<OptionalKind, "none">, string>
> = {
  optional: "_Nullable",
  implicitlyUnwrapped: "_Null_unspecified",
};

export const annotateNullability = (
  baseText: string,
  optionality: OptionalKind,
  language: OutputLanguage
): string => {
  if (optionality === "none" || dialectOf(language) === "cxx") {
    return baseText;
  }
  return `${baseText} ${C_NULLABILITY_QUALIFIERS[optionality]}`;
};
