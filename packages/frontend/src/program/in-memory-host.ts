/**
 * Compiler host over an in-memory file map
 */

import ts from "typescript";

export const createInMemoryHost = (
  files: Readonly<Record<string, string>>
): ts.CompilerHost => {
  const sources = new Map(Object.entries(files));

  return {
    getSourceFile: (fileName, languageVersion) => {
      const text = sources.get(fileName);
      return text === undefined
        ? undefined
        : ts.createSourceFile(
            fileName,
            text,
            languageVersion,
            true,
            ts.ScriptKind.TS
          );
    },
    writeFile: () => {},
    getCurrentDirectory: () => "/",
    getDirectories: () => [],
    fileExists: (fileName) => sources.has(fileName),
    readFile: (fileName) => sources.get(fileName),
    getCanonicalFileName: (fileName) => fileName,
    useCaseSensitiveFileNames: () => true,
    getNewLine: () => "\n",
    getDefaultLibFileName: () => "lib.d.ts",
  };
};
