/**
 * sigbridge frontend - TypeScript declaration reader and source type model
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./model/index.js";
export * from "./program/index.js";
export * from "./converter/index.js";

import type ts from "typescript";
import { createProgram } from "./program/index.js";
import type { ProgramOptions } from "./program/index.js";
import { collectFunctionSignatures } from "./converter/index.js";
import type { FunctionSignatureModel } from "./model/index.js";
import {
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnosticsCollector,
} from "./types/diagnostic.js";
import { type Result, ok } from "./types/result.js";

export type DeclarationSet = {
  readonly signatures: readonly FunctionSignatureModel[];
  /** Warnings and notes for declarations that were skipped or adjusted */
  readonly diagnostics: DiagnosticsCollector;
};

/**
 * Read the exported function signatures of the given entry files
 */
export const readDeclarations = (
  filePaths: readonly string[],
  options: ProgramOptions = {},
  host?: ts.CompilerHost
): Result<DeclarationSet, DiagnosticsCollector> => {
  const programResult = createProgram(filePaths, options, host);
  if (!programResult.ok) {
    return programResult;
  }

  const { checker, sourceFiles } = programResult.value;
  const signatures: FunctionSignatureModel[] = [];
  let diagnostics = createDiagnosticsCollector();

  for (const sourceFile of sourceFiles) {
    const collected = collectFunctionSignatures(sourceFile, checker);
    signatures.push(...collected.signatures);
    diagnostics = collected.diagnostics.reduce(addDiagnostic, diagnostics);
  }

  return ok({ signatures, diagnostics });
};
