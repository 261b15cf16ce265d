/**
 * Source locations and module names for declarations
 */

import ts from "typescript";
import * as path from "node:path";
import type { SourceLocation } from "../types/diagnostic.js";

/**
 * 1-based location of a position in a source file
 */
export const getSourceLocation = (
  sourceFile: ts.SourceFile,
  start: number,
  length = 0
): SourceLocation => {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(start);
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};

export const getNodeLocation = (
  node: ts.Node,
  sourceFile: ts.SourceFile
): SourceLocation =>
  getSourceLocation(
    sourceFile,
    node.getStart(sourceFile),
    node.getWidth(sourceFile)
  );

/**
 * Module name of a file: its base name without the TypeScript extension.
 * src/geometry.ts → geometry
 */
export const moduleNameOf = (fileName: string): string =>
  path.basename(fileName).replace(/(\.d)?\.[cm]?tsx?$/, "");

/**
 * Source text of a type node with whitespace collapsed
 */
export const describeNode = (node: ts.Node): string =>
  node.getText().replace(/\s+/g, " ").trim();
