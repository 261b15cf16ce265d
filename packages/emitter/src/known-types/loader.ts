/**
 * Known-type JSON loader - Reads and validates known-type tables.
 *
 * The default table ships as data/known-types.json; sigbridge.json may add
 * rows with the same entry shape.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { Diagnostic, Result } from "@sigbridge/frontend";
import { OUTPUT_LANGUAGES } from "../languages.js";
import { KnownTypeRegistry } from "./registry.js";
import type { KnownTypeEntry } from "./types.js";

export const DEFAULT_KNOWN_TYPES_PATH = fileURLToPath(
  new URL("../../data/known-types.json", import.meta.url)
);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const entryError = (message: string): Diagnostic => ({
  code: "SGB9007",
  severity: "error",
  message,
});

const validateEntry = (
  item: unknown,
  where: string
): Result<KnownTypeEntry, Diagnostic[]> => {
  if (!isRecord(item)) {
    return { ok: false, error: [entryError(`${where}: must be an object`)] };
  }

  const diagnostics: Diagnostic[] = [];
  const { module, name, canBeNullable } = item;

  if (typeof module !== "string" || module === "") {
    diagnostics.push(entryError(`${where}: missing or invalid 'module'`));
  }
  if (typeof name !== "string" || name === "") {
    diagnostics.push(entryError(`${where}: missing or invalid 'name'`));
  }
  if (typeof canBeNullable !== "boolean") {
    diagnostics.push(entryError(`${where}: 'canBeNullable' must be a boolean`));
  }

  const spellings: { c?: string; objc?: string; cxx?: string } = {};
  for (const language of OUTPUT_LANGUAGES) {
    const spelling = item[language];
    if (spelling === undefined) {
      continue;
    }
    if (typeof spelling !== "string" || spelling.trim() === "") {
      diagnostics.push(
        entryError(`${where}: '${language}' must be a non-empty string`)
      );
      continue;
    }
    spellings[language] = spelling;
  }

  if (
    diagnostics.length > 0 ||
    typeof module !== "string" ||
    typeof name !== "string" ||
    typeof canBeNullable !== "boolean"
  ) {
    return { ok: false, error: diagnostics };
  }

  return { ok: true, value: { module, name, canBeNullable, ...spellings } };
};

/**
 * Validate a list of known-type entries.
 *
 * @param source - Where the entries came from, for messages
 */
export const validateKnownTypeEntries = (
  data: unknown,
  source: string
): Result<KnownTypeEntry[], Diagnostic[]> => {
  if (!Array.isArray(data)) {
    return {
      ok: false,
      error: [
        {
          code: "SGB9006",
          severity: "error",
          message: `Missing or invalid 'types' field in ${source}`,
        },
      ],
    };
  }

  const entries: KnownTypeEntry[] = [];
  const diagnostics: Diagnostic[] = [];
  data.forEach((item: unknown, index) => {
    const result = validateEntry(item, `${source} types[${index}]`);
    if (result.ok) {
      entries.push(result.value);
    } else {
      diagnostics.push(...result.error);
    }
  });

  return diagnostics.length > 0
    ? { ok: false, error: diagnostics }
    : { ok: true, value: entries };
};

/**
 * Load and validate a known-type file.
 */
export const loadKnownTypeFile = (
  filePath: string
): Result<KnownTypeRegistry, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        {
          code: "SGB9001",
          severity: "error",
          message: `Known-type file not found: ${filePath}`,
        },
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: [
        {
          code: "SGB9002",
          severity: "error",
          message: `Failed to read known-type file: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return {
      ok: false,
      error: [
        {
          code: "SGB9003",
          severity: "error",
          message: `Invalid JSON in known-type file: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }

  const fileName = path.basename(filePath);

  if (!isRecord(parsed)) {
    return {
      ok: false,
      error: [
        {
          code: "SGB9004",
          severity: "error",
          message: `Known-type file must be an object: ${fileName}`,
        },
      ],
    };
  }

  if (parsed.version !== 1) {
    return {
      ok: false,
      error: [
        {
          code: "SGB9005",
          severity: "error",
          message: `Unsupported known-type file version in ${fileName}: ${String(parsed.version)}`,
        },
      ],
    };
  }

  const entries = validateKnownTypeEntries(parsed.types, fileName);
  return entries.ok
    ? { ok: true, value: new KnownTypeRegistry(entries.value) }
    : entries;
};

/**
 * The table that ships with sigbridge
 */
export const loadDefaultKnownTypes = (): Result<
  KnownTypeRegistry,
  Diagnostic[]
> => loadKnownTypeFile(DEFAULT_KNOWN_TYPES_PATH);
