/**
 * Configuration Schema Types
 *
 * TypeScript types representing the YAML provider registry
 * (config/providers.yml) before and after conversion.
 */

import type { AdapterKind } from "../types/provider.js";

// ============================================================================
// Provider Registry (providers.yml)
// ============================================================================

/**
 * Values applied to every provider entry that does not set its own
 */
export interface RegistryDefaultsYaml {
  timeout_ms?: number;
  max_tokens?: number;
  temperature?: number;
}

/**
 * Raw provider entry from providers.yml
 *
 * The loader reads entries by these field names.
 */
export interface ProviderEntryYaml {
  /** Unique provider identifier */
  id: string;
  /** Human-readable name */
  name?: string;
  /** Remote API family */
  adapter: AdapterKind;
  /** Base URL for the API */
  base_url?: string;
  /** Environment variable holding the base URL (azure-openai endpoints) */
  base_url_env?: string;
  /** Environment variable holding the API key */
  api_key_env: string;
  model: string;
  priority: number;
  timeout_ms?: number;
  max_tokens?: number;
  temperature?: number;
  headers?: Record<string, string>;
  api_version?: string;
  enabled?: boolean;
}

/**
 * Root structure of providers.yml
 */
export interface ProviderRegistryYaml {
  defaults?: RegistryDefaultsYaml;
  providers: ProviderEntryYaml[];
}

// ============================================================================
// Loaded Registry (after parsing and conversion)
// ============================================================================

/**
 * Parsed provider entry, credentials still referenced by variable name
 */
export interface ProviderEntry {
  id: string;
  name?: string;
  adapter: AdapterKind;
  baseUrl?: string;
  baseUrlEnv?: string;
  apiKeyEnv: string;
  model: string;
  priority: number;
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
  headers?: Record<string, string>;
  apiVersion?: string;
  enabled: boolean;
}

/**
 * Parsed provider registry
 */
export interface ProviderRegistryFile {
  /** File the registry was read from */
  filePath: string;
  providers: ProviderEntry[];
}
