/**
 * sigbridge print command - Declarations to stdout
 */

import type { Result } from "@sigbridge/frontend";
import type { KnownTypeRegistry } from "@sigbridge/emitter";
import type { ResolvedConfig } from "../types.js";
import { type HeaderOutput, buildHeaders } from "./common.js";

/**
 * Declaration lines to print; with several languages each group is
 * preceded by a comment naming the language
 */
export const formatDeclarations = (
  outputs: readonly HeaderOutput[]
): readonly string[] =>
  outputs.length === 1
    ? outputs.flatMap((o) => o.header.declarations)
    : outputs.flatMap((o) => [`/* ${o.language} */`, ...o.header.declarations]);

export const printCommand = (
  config: ResolvedConfig,
  registry: KnownTypeRegistry
): Result<readonly string[], string> => {
  const headers = buildHeaders(config, registry);
  if (!headers.ok) {
    return headers;
  }

  const lines = formatDeclarations(headers.value);
  for (const line of lines) {
    console.log(line);
  }
  return { ok: true, value: lines };
};
