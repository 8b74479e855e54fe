/**
 * Configuration Module
 *
 * Exports registry schema types and loader functions.
 */

// Schema types
export type {
  ProviderRegistryYaml,
  ProviderEntryYaml,
  RegistryDefaultsYaml,
  ProviderEntry,
  ProviderRegistryFile,
} from "./schema.js";

// Loader functions
export {
  getConfigDir,
  getDefaultRegistryPath,
  loadProviderRegistry,
  providersFromRegistry,
} from "./loader.js";
export type { Environment } from "./loader.js";
