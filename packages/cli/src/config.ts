/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { type Result, moduleNameOf } from "@sigbridge/frontend";
import {
  type OutputLanguage,
  type UnsupportedPolicy,
  isNamespaceName,
  isOutputLanguage,
  isUnsupportedPolicy,
  validateKnownTypeEntries,
} from "@sigbridge/emitter";
import { CONFIG_FILE_NAME } from "./cli/constants.js";
import type { SigbridgeConfig, CliOptions, ResolvedConfig } from "./types.js";

const DEFAULT_LANGUAGES: readonly OutputLanguage[] = ["c", "cxx"];
const DEFAULT_HEADER_NAME = "declarations";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) &&
  value.every((item) => typeof item === "string" && item !== "");

const optionalString = (
  raw: Record<string, unknown>,
  field: string
): Result<string | undefined, string> => {
  const value = raw[field];
  if (value === undefined) {
    return { ok: true, value: undefined };
  }
  return typeof value === "string" && value !== ""
    ? { ok: true, value }
    : {
        ok: false,
        error: `${CONFIG_FILE_NAME}: '${field}' must be a non-empty string`,
      };
};

/**
 * Validate parsed sigbridge.json content field by field
 */
export const validateConfig = (
  raw: unknown
): Result<SigbridgeConfig, string> => {
  if (!isRecord(raw)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: must be a JSON object` };
  }

  const {
    entryPoints,
    languages,
    unsupported,
    reportDroppedOptionality,
    includeGuard,
  } = raw;

  let checkedEntryPoints: string[] | undefined;
  if (entryPoints !== undefined) {
    if (!isStringArray(entryPoints)) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: 'entryPoints' must be an array of file paths`,
      };
    }
    checkedEntryPoints = entryPoints;
  }

  const strings: Record<string, string | undefined> = {};
  for (const field of [
    "$schema",
    "outputDirectory",
    "headerName",
    "namespace",
  ]) {
    const result = optionalString(raw, field);
    if (!result.ok) {
      return result;
    }
    strings[field] = result.value;
  }

  if (strings.namespace !== undefined && !isNamespaceName(strings.namespace)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'namespace' must be C++ identifiers joined by '::'`,
    };
  }

  let checkedLanguages: OutputLanguage[] | undefined;
  if (languages !== undefined) {
    if (!Array.isArray(languages) || languages.length === 0) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: 'languages' must be a non-empty array`,
      };
    }
    checkedLanguages = [];
    for (const language of languages) {
      if (!isOutputLanguage(language)) {
        return {
          ok: false,
          error: `${CONFIG_FILE_NAME}: unknown language '${String(language)}' (expected c, objc or cxx)`,
        };
      }
      checkedLanguages.push(language);
    }
  }

  let checkedUnsupported: UnsupportedPolicy | undefined;
  if (unsupported !== undefined) {
    if (!isUnsupportedPolicy(unsupported)) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: 'unsupported' must be "omit", "emit" or "error"`,
      };
    }
    checkedUnsupported = unsupported;
  }

  let checkedReport: boolean | undefined;
  if (reportDroppedOptionality !== undefined) {
    if (typeof reportDroppedOptionality !== "boolean") {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: 'reportDroppedOptionality' must be a boolean`,
      };
    }
    checkedReport = reportDroppedOptionality;
  }

  let checkedGuard: boolean | undefined;
  if (includeGuard !== undefined) {
    if (typeof includeGuard !== "boolean") {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: 'includeGuard' must be a boolean`,
      };
    }
    checkedGuard = includeGuard;
  }

  let knownTypes: SigbridgeConfig["knownTypes"];
  if (raw.knownTypes !== undefined) {
    const entries = validateKnownTypeEntries(raw.knownTypes, CONFIG_FILE_NAME);
    if (!entries.ok) {
      return {
        ok: false,
        error: entries.error.map((d) => d.message).join("\n"),
      };
    }
    knownTypes = entries.value;
  }

  return {
    ok: true,
    value: {
      $schema: strings.$schema,
      entryPoints: checkedEntryPoints,
      outputDirectory: strings.outputDirectory,
      headerName: strings.headerName,
      languages: checkedLanguages,
      namespace: strings.namespace,
      unsupported: checkedUnsupported,
      reportDroppedOptionality: checkedReport,
      includeGuard: checkedGuard,
      knownTypes,
    },
  };
};

/**
 * Load sigbridge.json
 */
export const loadConfig = (
  configPath: string
): Result<SigbridgeConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return validateConfig(raw);
};

/**
 * Find sigbridge.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find sigbridge.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const unique = <T>(items: readonly T[]): readonly T[] => [...new Set(items)];

/**
 * Merge config file and CLI options.
 *
 * Paths from the config file resolve against the project root; entry files
 * and --out given on the command line resolve against the working directory.
 */
export const resolveConfig = (
  config: SigbridgeConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  entries: readonly string[] = []
): ResolvedConfig => {
  const entryPoints =
    entries.length > 0
      ? entries.map((entry) => resolve(entry))
      : (config.entryPoints ?? []).map((entry) => resolve(projectRoot, entry));

  const outputDirectory = cliOptions.out
    ? resolve(cliOptions.out)
    : resolve(projectRoot, config.outputDirectory ?? "generated");

  const firstEntry = entryPoints[0];
  const headerName =
    cliOptions.name ??
    config.headerName ??
    (firstEntry !== undefined ? moduleNameOf(firstEntry) : DEFAULT_HEADER_NAME);

  const languages =
    cliOptions.languages && cliOptions.languages.length > 0
      ? cliOptions.languages
      : (config.languages ?? DEFAULT_LANGUAGES);

  return {
    projectRoot,
    entryPoints,
    outputDirectory,
    headerName,
    languages: unique(languages),
    namespace: cliOptions.namespace ?? config.namespace,
    unsupported: cliOptions.unsupported ?? config.unsupported ?? "omit",
    reportDroppedOptionality: config.reportDroppedOptionality ?? false,
    includeGuard: config.includeGuard ?? false,
    knownTypes: config.knownTypes ?? [],
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
