/**
 * CLI argument parser
 */

import {
  isNamespaceName,
  isOutputLanguage,
  isUnsupportedPolicy,
} from "@sigbridge/emitter";
import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  entries: string[];
  options: CliOptions;
  /** Set when an option is unknown or has a bad value */
  error?: string;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const entries: string[] = [];

  const fail = (error: string): ParsedArgs => ({
    command,
    entries,
    options,
    error,
  });

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Command, then entry files
    if (!arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else {
        entries.push(arg);
      }
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", entries: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", entries: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
      case "-o":
      case "--out":
      case "-n":
      case "--namespace":
      case "--name":
      case "-l":
      case "--lang":
      case "--unsupported": {
        const value = args[++i];
        if (value === undefined || value === "") {
          return fail(`Option '${arg}' requires a value`);
        }
        const problem = applyValueOption(options, arg, value);
        if (problem) {
          return fail(problem);
        }
        break;
      }
      default:
        return fail(`Unknown option '${arg}'`);
    }
  }

  return { command, entries, options };
};

/**
 * Store an option that takes a value; returns a message for a bad value
 */
const applyValueOption = (
  options: CliOptions,
  flag: string,
  value: string
): string | undefined => {
  switch (flag) {
    case "-c":
    case "--config":
      options.config = value;
      return undefined;
    case "-o":
    case "--out":
      options.out = value;
      return undefined;
    case "-n":
    case "--namespace":
      if (!isNamespaceName(value)) {
        return `Invalid namespace '${value}' (expected identifiers joined by '::')`;
      }
      options.namespace = value;
      return undefined;
    case "--name":
      options.name = value;
      return undefined;
    case "-l":
    case "--lang":
      if (!isOutputLanguage(value)) {
        return `Invalid language '${value}' (expected c, objc or cxx)`;
      }
      options.languages = [...(options.languages ?? []), value];
      return undefined;
    case "--unsupported":
      if (!isUnsupportedPolicy(value)) {
        return `Invalid --unsupported value '${value}' (expected omit, emit or error)`;
      }
      options.unsupported = value;
      return undefined;
    default:
      return `Unknown option '${flag}'`;
  }
};
