/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { initProject } from "../commands/init.js";
import { generateCommand } from "../commands/generate.js";
import { printCommand } from "../commands/print.js";
import { loadRegistry } from "../commands/common.js";
import { CONFIG_FILE_NAME, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const CONFIG_COMMANDS: ReadonlySet<string> = new Set(["generate", "print"]);

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[]): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.error) {
    console.error(`Error: ${parsed.error}`);
    console.error("Run 'sigbridge --help' for usage information");
    return 2;
  }

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`sigbridge v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  // Handle init (doesn't need config)
  if (parsed.command === "init") {
    const result = initProject(process.cwd());
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return 1;
    }
    if (!parsed.options.quiet) {
      console.log("✓ Initialized sigbridge project");
      for (const file of result.value.created) {
        console.log(`  Created: ${file}`);
      }
      console.log("\nNext steps:");
      console.log(`  1. Edit ${CONFIG_FILE_NAME} to list your entry files`);
      console.log("  2. Run: sigbridge generate");
    }
    return 0;
  }

  if (!CONFIG_COMMANDS.has(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'sigbridge --help' for usage information");
    return 2;
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(parsed.options.config)
    : findConfig(process.cwd());

  if (!configPath) {
    console.error(`Error: No ${CONFIG_FILE_NAME} found`);
    console.error("Run 'sigbridge init' to initialize a project");
    return 3;
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    console.error(`Error: ${configResult.error}`);
    return 1;
  }

  // Project root is the directory containing sigbridge.json
  const config = resolveConfig(
    configResult.value,
    parsed.options,
    dirname(configPath),
    parsed.entries
  );

  if (config.entryPoints.length === 0) {
    console.error(
      `Error: No entry files; list them under 'entryPoints' in ${CONFIG_FILE_NAME} or pass them on the command line`
    );
    return 1;
  }

  const registry = loadRegistry(config);
  if (!registry.ok) {
    console.error(`Error: ${registry.error}`);
    return 1;
  }

  // Dispatch to command handlers
  const result =
    parsed.command === "generate"
      ? generateCommand(config, registry.value)
      : printCommand(config, registry.value);

  if (!result.ok) {
    console.error(`Error: ${result.error}`);
    return 5;
  }
  return 0;
};
