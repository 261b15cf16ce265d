/**
 * Program creation
 */

import ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import { type Result, ok, error } from "../types/result.js";
import {
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { getSourceLocation } from "../converter/locations.js";
import type { ProgramOptions, SourceProgram } from "./types.js";

/**
 * Compiler options for reading declarations.
 * No default lib: only syntax and local symbols matter to the reader.
 */
export const createCompilerOptions = (): ts.CompilerOptions => ({
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  strict: true,
  noLib: true,
  noEmit: true,
  types: [],
});

const collectSyntaxDiagnostics = (
  program: ts.Program,
  sourceFile: ts.SourceFile,
  collector: DiagnosticsCollector
): DiagnosticsCollector =>
  program
    .getSyntacticDiagnostics(sourceFile)
    .reduce(
      (acc, diagnostic) =>
        addDiagnostic(
          acc,
          createDiagnostic(
            "SGB1002",
            "error",
            ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n"),
            diagnostic.start !== undefined
              ? getSourceLocation(
                  sourceFile,
                  diagnostic.start,
                  diagnostic.length ?? 0
                )
              : undefined
          )
        ),
      collector
    );

/**
 * Create a program from TypeScript source files.
 *
 * A custom compiler host replaces the file system (tests use in-memory hosts).
 */
export const createProgram = (
  filePaths: readonly string[],
  options: ProgramOptions = {},
  host?: ts.CompilerHost
): Result<SourceProgram, DiagnosticsCollector> => {
  const absolutePaths = filePaths.map((fp) => path.resolve(fp));

  let collector = createDiagnosticsCollector();

  if (!host) {
    for (const filePath of absolutePaths) {
      if (!fs.existsSync(filePath)) {
        collector = addDiagnostic(
          collector,
          createDiagnostic(
            "SGB1001",
            "error",
            `Source file not found: ${filePath}`
          )
        );
      }
    }
    if (collector.hasErrors) {
      return error(collector);
    }
  }

  if (options.verbose) {
    for (const filePath of absolutePaths) {
      console.log(`Reading ${filePath}`);
    }
  }

  const compilerOptions = createCompilerOptions();
  const program = host
    ? ts.createProgram(absolutePaths, compilerOptions, host)
    : ts.createProgram(absolutePaths, compilerOptions);

  // Binding happens here; converters rely on parent pointers afterwards
  const checker = program.getTypeChecker();

  const sourceFiles: ts.SourceFile[] = [];
  for (const filePath of absolutePaths) {
    const sourceFile = program.getSourceFile(filePath);
    if (!sourceFile) {
      collector = addDiagnostic(
        collector,
        createDiagnostic("SGB1001", "error", `Source file not found: ${filePath}`)
      );
      continue;
    }
    collector = collectSyntaxDiagnostics(program, sourceFile, collector);
    sourceFiles.push(sourceFile);
  }

  if (collector.hasErrors) {
    return error(collector);
  }

  return ok({ program, checker, sourceFiles });
};
