/**
 * Header assembly
 *
 * Prints every signature for one output language and decides what happens
 * to declarations that contain a placeholder.
 */

import {
  type Diagnostic,
  type FunctionSignatureModel,
  createDiagnostic,
} from "@sigbridge/frontend";
import { createDialectPolicy } from "../dialects/index.js";
import type { KnownTypeRegistry } from "../known-types/index.js";
import { type OutputLanguage, dialectOf } from "../languages.js";
import { printIdentifier } from "../identifiers.js";
import { printFunctionSignature } from "../functions/index.js";
import {
  EXTERN_C_CLOSE,
  EXTERN_C_OPEN,
  HEADER_BANNER,
  NULLABILITY_FALLBACK,
  includeLines,
} from "./layout.js";

export type UnsupportedPolicy = "omit" | "emit" | "error";

export const UNSUPPORTED_POLICIES: readonly UnsupportedPolicy[] = [
  "omit",
  "emit",
  "error",
];

export const isUnsupportedPolicy = (
  value: unknown
): value is UnsupportedPolicy =>
  value === "omit" || value === "emit" || value === "error";

export type HeaderOptions = {
  readonly language: OutputLanguage;
  readonly registry: KnownTypeRegistry;
  readonly unsupported: UnsupportedPolicy;
  /** C++ only */
  readonly namespace?: string;
  /** Use a classic include guard with this macro instead of `#pragma once` */
  readonly guardName?: string;
  readonly reportDroppedOptionality?: boolean;
};

export type HeaderResult = {
  readonly text: string;
  /** Declarations in the order they appear in the header */
  readonly declarations: readonly string[];
  readonly diagnostics: readonly Diagnostic[];
};

const quoteAll = (names: readonly string[]): string =>
  names.map((n) => `'${n}'`).join(", ");

export const emitHeader = (
  signatures: readonly FunctionSignatureModel[],
  options: HeaderOptions
): HeaderResult => {
  const { language } = options;
  const policy = createDialectPolicy(language, options.registry);
  const declarations: string[] = [];
  const diagnostics: Diagnostic[] = [];
  const seen = new Set<string>();

  for (const signature of signatures) {
    const name = printIdentifier(signature.name);
    const location = signature.location;

    if (seen.has(name)) {
      diagnostics.push(
        createDiagnostic(
          "SGB3005",
          "error",
          `Duplicate declaration name '${name}' in ${language} header`,
          location
        )
      );
      continue;
    }

    const report = printFunctionSignature({ ...signature, name }, policy);

    if (report.droppedOptionality && options.reportDroppedOptionality) {
      diagnostics.push(
        createDiagnostic(
          "SGB3004",
          "info",
          `Optionality in '${name}' cannot be expressed in ${language} and was dropped`,
          location
        )
      );
    }

    if (report.unrepresentable.length > 0) {
      const types = quoteAll(report.unrepresentable);
      switch (options.unsupported) {
        case "omit":
          diagnostics.push(
            createDiagnostic(
              "SGB3001",
              "warning",
              `Omitted '${name}': ${types} cannot be represented in ${language}`,
              location,
              "Add a knownTypes entry or export a wrapper with mapped types"
            )
          );
          continue;

        case "error":
          diagnostics.push(
            createDiagnostic(
              "SGB3003",
              "error",
              `${types} in '${name}' cannot be represented in ${language}`,
              location
            )
          );
          continue;

        case "emit":
          diagnostics.push(
            createDiagnostic(
              "SGB3002",
              "warning",
              `'${name}' emitted with a placeholder for ${types}`,
              location
            )
          );
          break;
      }
    }

    // Only printed declarations claim a name
    seen.add(name);
    declarations.push(`${report.text};`);
  }

  return {
    text: assembleHeader(declarations, options),
    declarations,
    diagnostics,
  };
};

const assembleHeader = (
  declarations: readonly string[],
  options: HeaderOptions
): string => {
  const { language, namespace, guardName } = options;
  const sections: (readonly string[])[] = [[HEADER_BANNER]];

  sections.push(
    guardName !== undefined
      ? [`#ifndef ${guardName}`, `#define ${guardName}`]
      : ["#pragma once"]
  );
  sections.push(includeLines(language));

  if (dialectOf(language) === "c-compatible") {
    sections.push(NULLABILITY_FALLBACK, EXTERN_C_OPEN);
    sections.push(declarations);
    sections.push(EXTERN_C_CLOSE);
  } else if (namespace !== undefined) {
    sections.push([`namespace ${namespace} {`]);
    sections.push(declarations);
    sections.push([`} // namespace ${namespace}`]);
  } else {
    sections.push(declarations);
  }

  if (guardName !== undefined) {
    sections.push([`#endif /* ${guardName} */`]);
  }

  return (
    sections
      .filter((section) => section.length > 0)
      .map((section) => section.join("\n"))
      .join("\n\n") + "\n"
  );
};
