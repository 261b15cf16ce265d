/**
 * Dialect policies
 *
 * C requires `(void)` to mean "no parameters"; C++ writes `()` and names
 * every parameter so the declaration reads like the source signature.
 */

import type { OutputLanguage } from "../languages.js";
import { dialectOf } from "../languages.js";
import type { KnownTypeRegistry } from "../known-types/index.js";
import { annotateNullability } from "../nullability.js";
import type { DialectPolicy } from "./types.js";

export const createDialectPolicy = (
  language: OutputLanguage,
  registry: KnownTypeRegistry
): DialectPolicy => {
  const dialect = dialectOf(language);
  return {
    language,
    dialect,
    lookup: (decl) => registry.lookup(decl, language),
    annotate: (text, optionality) =>
      annotateNullability(text, optionality, language),
    emptyParameterList: dialect === "cxx" ? "" : "void",
    nameAnonymousParameter: (position) =>
      dialect === "cxx" ? `_${position}` : undefined,
  };
};
