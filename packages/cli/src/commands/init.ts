/**
 * sigbridge init command
 */

import { writeFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import type { Result } from "@sigbridge/frontend";
import { CONFIG_FILE_NAME } from "../cli/constants.js";
import type { SigbridgeConfig } from "../types.js";

export const SAMPLE_ENTRY = "src/api.ts";

export const DEFAULT_CONFIG: SigbridgeConfig = {
  entryPoints: [SAMPLE_ENTRY],
  outputDirectory: "generated",
  languages: ["c", "cxx"],
  unsupported: "omit",
};

const SAMPLE_API_TS = `import type { Bool, Int32, Optional, UnsafeMutableRawPointer } from "@sigbridge/core";

export function isEven(value: Int32): Bool {
  return value % 2 === 0;
}

export function release(handle: Optional<UnsafeMutableRawPointer>): void {}
`;

export type InitResult = {
  readonly created: readonly string[];
};

/**
 * Write sigbridge.json and, when missing, a sample entry file
 */
export const initProject = (projectRoot: string): Result<InitResult, string> => {
  const configPath = join(projectRoot, CONFIG_FILE_NAME);
  if (existsSync(configPath)) {
    return { ok: false, error: `${CONFIG_FILE_NAME} already exists` };
  }

  const created: string[] = [];
  try {
    writeFileSync(
      configPath,
      JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n",
      "utf-8"
    );
    created.push(CONFIG_FILE_NAME);

    const entryPath = join(projectRoot, SAMPLE_ENTRY);
    if (!existsSync(entryPath)) {
      mkdirSync(join(projectRoot, "src"), { recursive: true });
      writeFileSync(entryPath, SAMPLE_API_TS, "utf-8");
      created.push(SAMPLE_ENTRY);
    }
  } catch (error) {
    return {
      ok: false,
      error: `Failed to initialize project: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return { ok: true, value: { created } };
};
