/**
 * Type definitions for CLI
 */

import type {
  KnownTypeEntry,
  OutputLanguage,
  UnsupportedPolicy,
} from "@sigbridge/emitter";

/**
 * sigbridge configuration file (sigbridge.json)
 */
export type SigbridgeConfig = {
  readonly $schema?: string;
  readonly entryPoints?: readonly string[];
  readonly outputDirectory?: string;
  readonly headerName?: string;
  readonly languages?: readonly OutputLanguage[];
  readonly namespace?: string;
  readonly unsupported?: UnsupportedPolicy;
  readonly reportDroppedOptionality?: boolean;
  /** Guard headers with #ifndef/#define instead of #pragma once */
  readonly includeGuard?: boolean;
  readonly knownTypes?: readonly KnownTypeEntry[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  languages?: OutputLanguage[];
  namespace?: string;
  unsupported?: UnsupportedPolicy;
  name?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing sigbridge.json
  readonly entryPoints: readonly string[]; // Absolute paths
  readonly outputDirectory: string; // Absolute path
  readonly headerName: string;
  readonly languages: readonly OutputLanguage[];
  readonly namespace: string | undefined;
  readonly unsupported: UnsupportedPolicy;
  readonly reportDroppedOptionality: boolean;
  readonly includeGuard: boolean;
  readonly knownTypes: readonly KnownTypeEntry[];
  readonly verbose: boolean;
  readonly quiet: boolean;
};
