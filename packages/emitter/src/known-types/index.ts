export type { KnownTypeInfo, KnownTypeEntry, KnownTypeFile } from "./types.js";
export { KnownTypeRegistry } from "./registry.js";
export {
  DEFAULT_KNOWN_TYPES_PATH,
  loadKnownTypeFile,
  loadDefaultKnownTypes,
  validateKnownTypeEntries,
} from "./loader.js";
