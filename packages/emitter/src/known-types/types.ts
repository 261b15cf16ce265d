/**
 * Known-type table types
 */

import type { OutputLanguage } from "../languages.js";

/**
 * How a source nominal type is spelled in one output language
 */
export type KnownTypeInfo = {
  readonly name: string;
  /** Whether the target type has a "no value" state a nullability qualifier can describe */
  readonly canBeNullable: boolean;
};

/**
 * One row of the table, as stored in known-types.json and sigbridge.json.
 * A missing language column means the type is unknown in that language.
 */
export type KnownTypeEntry = {
  readonly module: string;
  readonly name: string;
  readonly canBeNullable: boolean;
} & { readonly [L in OutputLanguage]?: string };

export type KnownTypeFile = {
  readonly version: 1;
  readonly types: readonly KnownTypeEntry[];
};
