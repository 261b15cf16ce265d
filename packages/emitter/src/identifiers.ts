/**
 * C-family identifier legalization
 *
 * Source names may use characters C does not allow (`$`, non-ASCII) or
 * collide with a C, C++ or Objective-C keyword. Keywords are listed in
 * data/clang-keywords.json.
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const keywordData: unknown = require("../data/clang-keywords.json");

const CLANG_KEYWORDS: ReadonlySet<string> = new Set(
  Array.isArray(keywordData)
    ? keywordData.filter((k): k is string => typeof k === "string")
    : []
);

/**
 * Check if a name is reserved in any of the output languages
 */
export const isClangKeyword = (name: string): boolean =>
  CLANG_KEYWORDS.has(name);

/**
 * Make a name usable as a C-family identifier.
 *
 * - `$x` → `_x`
 * - `2d` → `_2d`
 * - `int` → `int_`
 */
export const printIdentifier = (name: string): string => {
  const replaced = name.replace(/[^A-Za-z0-9_]/g, "_");
  if (replaced === "") {
    return "_";
  }
  const prefixed = /^[0-9]/.test(replaced) ? `_${replaced}` : replaced;
  return isClangKeyword(prefixed) ? `${prefixed}_` : prefixed;
};

/**
 * Check if a name can open a C++ namespace: identifiers joined by `::`,
 * none of them reserved.
 */
export const isNamespaceName = (name: string): boolean =>
  name
    .split("::")
    .every(
      (segment) =>
        /^[A-Za-z_][A-Za-z0-9_]*$/.test(segment) && !isClangKeyword(segment)
    );
