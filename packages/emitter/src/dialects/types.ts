/**
 * Dialect policy types
 */

import type { DeclarationId, OptionalKind } from "@sigbridge/frontend";
import type { Dialect, OutputLanguage } from "../languages.js";
import type { KnownTypeInfo } from "../known-types/index.js";

/**
 * Everything the type projection and signature printer need to know about
 * one output language.
 */
export type DialectPolicy = {
  readonly language: OutputLanguage;
  readonly dialect: Dialect;
  readonly lookup: (decl: DeclarationId) => KnownTypeInfo | undefined;
  readonly annotate: (text: string, optionality: OptionalKind) => string;
  /** Written between the parentheses of a parameterless declaration */
  readonly emptyParameterList: string;
  /** Name for an anonymous parameter at a 1-based position, if the dialect names them */
  readonly nameAnonymousParameter: (position: number) => string | undefined;
};
