/**
 * Fixed header text around the declarations
 */

import type { OutputLanguage } from "../languages.js";

export const HEADER_BANNER =
  "/* Generated by sigbridge. Do not edit by hand. */";

const INCLUDES: Readonly<Record<OutputLanguage, readonly string[]>> = {
  c: ["stdbool.h", "stddef.h", "stdint.h"],
  objc: ["stdbool.h", "stddef.h", "stdint.h", "objc/objc.h"],
  cxx: ["cstddef", "cstdint"],
};

// Compilers without clang's nullability extension see the qualifiers as nothing
export const NULLABILITY_FALLBACK: readonly string[] = [
  "#if defined(__has_feature)",
  "#if !__has_feature(nullability)",
  "#define _Nullable",
  "#define _Null_unspecified",
  "#endif",
  "#else",
  "#define _Nullable",
  "#define _Null_unspecified",
  "#endif",
];

export const EXTERN_C_OPEN: readonly string[] = [
  "#ifdef __cplusplus",
  'extern "C" {',
  "#endif",
];

export const EXTERN_C_CLOSE: readonly string[] = [
  "#ifdef __cplusplus",
  "}",
  "#endif",
];

export const includeLines = (language: OutputLanguage): readonly string[] =>
  INCLUDES[language].map((header) => `#include <${header}>`);

/**
 * Header file name for a base name
 * Example: ("api", "cxx") → "api.hpp"
 */
export const headerFileName = (
  baseName: string,
  language: OutputLanguage
): string => `${baseName}.${language === "cxx" ? "hpp" : "h"}`;

/**
 * Include guard macro for a header file name
 * Example: "geo-api.hpp" → "GEO_API_HPP"
 */
export const guardMacroName = (fileName: string): string => {
  const macro = fileName.toUpperCase().replace(/[^A-Z0-9_]/g, "_");
  return /^[0-9]/.test(macro) ? `_${macro}` : macro;
};
