/**
 * Output languages and the dialect family each belongs to
 */

export type OutputLanguage = "c" | "objc" | "cxx";

/**
 * C and Objective-C share one dialect; they only read different columns
 * of the known-type table.
 */
export type Dialect = "c-compatible" | "cxx";

export const OUTPUT_LANGUAGES: readonly OutputLanguage[] = ["c", "objc", "cxx"];

export const isOutputLanguage = (value: unknown): value is OutputLanguage =>
  value === "c" || value === "objc" || value === "cxx";

export const dialectOf = (language: OutputLanguage): Dialect =>
  language === "cxx" ? "cxx" : "c-compatible";
