/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const packageJson: { readonly version?: unknown } = require("../../package.json");

export const VERSION =
  typeof packageJson.version === "string" ? packageJson.version : "0.0.0";

export const CONFIG_FILE_NAME = "sigbridge.json";
