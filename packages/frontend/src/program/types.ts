/**
 * Program types
 */

import type ts from "typescript";

export type ProgramOptions = {
  /** Log each source file as it is read */
  readonly verbose?: boolean;
};

export type SourceProgram = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  /** Entry files, in the order they were requested */
  readonly sourceFiles: readonly ts.SourceFile[];
};
