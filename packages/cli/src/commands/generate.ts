/**
 * sigbridge generate command - Write header files
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join, relative } from "node:path";
import type { Result } from "@sigbridge/frontend";
import type { KnownTypeRegistry } from "@sigbridge/emitter";
import type { ResolvedConfig } from "../types.js";
import { buildHeaders } from "./common.js";

/**
 * Generate headers; returns the written file paths
 */
export const generateCommand = (
  config: ResolvedConfig,
  registry: KnownTypeRegistry
): Result<readonly string[], string> => {
  const headers = buildHeaders(config, registry);
  if (!headers.ok) {
    return headers;
  }

  try {
    mkdirSync(config.outputDirectory, { recursive: true });
  } catch (error) {
    return {
      ok: false,
      error: `Failed to create ${config.outputDirectory}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const written: string[] = [];
  for (const { language, fileName, header } of headers.value) {
    const filePath = join(config.outputDirectory, fileName);
    try {
      writeFileSync(filePath, header.text, "utf-8");
    } catch (error) {
      return {
        ok: false,
        error: `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
    written.push(filePath);

    if (!config.quiet) {
      console.log(
        `✓ ${relative(config.projectRoot, filePath)} (${language}, ${header.declarations.length} declarations)`
      );
      if (config.verbose) {
        for (const declaration of header.declarations) {
          console.log(`  ${declaration}`);
        }
      }
    }
  }

  return { ok: true, value: written };
};
