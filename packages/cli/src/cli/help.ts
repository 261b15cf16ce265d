/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
sigbridge - C, Objective-C and C++ headers for TypeScript functions v${VERSION}

USAGE:
  sigbridge <command> [options]

COMMANDS:
  init                      Create sigbridge.json and a sample entry file
  generate [entry...]       Write one header per configured language
  print [entry...]          Print declarations to stdout

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: sigbridge.json)

GENERATE/PRINT OPTIONS:
  -o, --out <dir>           Output directory (default: generated)
  -l, --lang <c|objc|cxx>   Output language, repeatable (default: c, cxx)
  -n, --namespace <ns>      C++ namespace
  --name <header>           Header base name (default: first entry's name)
  --unsupported <policy>    omit, emit or error for unmapped types

EXAMPLES:
  sigbridge init
  sigbridge generate
  sigbridge generate src/api.ts -l objc -o include
  sigbridge print src/api.ts --lang cxx --unsupported emit
`);
};
