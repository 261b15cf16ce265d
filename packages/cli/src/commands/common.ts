/**
 * Steps shared by generate and print
 */

import {
  type Diagnostic,
  type Result,
  formatDiagnostic,
  isDiagnosticError,
  readDeclarations,
} from "@sigbridge/frontend";
import {
  type HeaderResult,
  type KnownTypeRegistry,
  type OutputLanguage,
  DEFAULT_KNOWN_TYPES_PATH,
  emitHeader,
  guardMacroName,
  headerFileName,
  loadDefaultKnownTypes,
} from "@sigbridge/emitter";
import { CONFIG_FILE_NAME } from "../cli/constants.js";
import type { ResolvedConfig } from "../types.js";

export type HeaderOutput = {
  readonly language: OutputLanguage;
  readonly fileName: string;
  readonly header: HeaderResult;
};

/**
 * Print diagnostics to stderr; --quiet keeps only errors
 */
export const reportDiagnostics = (
  diagnostics: readonly Diagnostic[],
  config: ResolvedConfig
): void => {
  for (const diagnostic of diagnostics) {
    if (config.quiet && !isDiagnosticError(diagnostic)) continue;
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Shipped known-type table plus the config's own rows
 */
export const loadRegistry = (
  config: ResolvedConfig
): Result<KnownTypeRegistry, string> => {
  const shipped = loadDefaultKnownTypes();
  if (!shipped.ok) {
    return {
      ok: false,
      error: shipped.error.map(formatDiagnostic).join("\n"),
    };
  }

  if (config.verbose && !config.quiet) {
    console.log(
      `Known types: ${DEFAULT_KNOWN_TYPES_PATH} (${shipped.value.size} entries)`
    );
    if (config.knownTypes.length > 0) {
      console.log(
        `Known types: ${CONFIG_FILE_NAME} (${config.knownTypes.length} entries)`
      );
    }
  }

  return { ok: true, value: shipped.value.withEntries(config.knownTypes) };
};

/**
 * Read the entry files and assemble one header per configured language
 */
export const buildHeaders = (
  config: ResolvedConfig,
  registry: KnownTypeRegistry
): Result<readonly HeaderOutput[], string> => {
  const declarations = readDeclarations(config.entryPoints, {
    verbose: config.verbose && !config.quiet,
  });
  if (!declarations.ok) {
    reportDiagnostics(declarations.error.diagnostics, config);
    return { ok: false, error: "Failed to read entry files" };
  }

  const { signatures, diagnostics } = declarations.value;
  reportDiagnostics(diagnostics.diagnostics, config);

  const outputs = config.languages.map((language): HeaderOutput => {
    const fileName = headerFileName(config.headerName, language);
    return {
      language,
      fileName,
      header: emitHeader(signatures, {
        language,
        registry,
        unsupported: config.unsupported,
        namespace: config.namespace,
        guardName: config.includeGuard ? guardMacroName(fileName) : undefined,
        reportDroppedOptionality: config.reportDroppedOptionality,
      }),
    };
  });

  const headerDiagnostics = outputs.flatMap((o) => o.header.diagnostics);
  reportDiagnostics(headerDiagnostics, config);

  const errorCount = headerDiagnostics.filter(isDiagnosticError).length;
  return errorCount > 0
    ? { ok: false, error: `Generation produced ${errorCount} error(s)` }
    : { ok: true, value: outputs };
};
