/**
 * Configuration Loader
 *
 * Loads and validates the YAML provider registry and resolves its
 * credentials from the environment.
 */

import { parse } from "yaml";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { isAdapterKind } from "../types/provider.js";
import type { ProviderConfig } from "../types/config.js";
import { ConfigValidationError } from "../types/errors.js";
import { isRecord } from "../utils/guards.js";
import type {
  ProviderEntry,
  ProviderEntryYaml,
  ProviderRegistryFile,
  ProviderRegistryYaml,
  RegistryDefaultsYaml,
} from "./schema.js";

// ============================================================================
// Path Resolution
// ============================================================================

/**
 * Get the config directory path
 */
export const getConfigDir = (): string => {
  // In ESM, we need to derive __dirname from import.meta.url
  const currentFile = fileURLToPath(import.meta.url);
  const srcDir = dirname(dirname(currentFile));
  const rootDir = dirname(srcDir);
  return join(rootDir, "config");
};

/**
 * Path of the bundled registry
 */
export const getDefaultRegistryPath = (): string =>
  join(getConfigDir(), "providers.yml");

// ============================================================================
// YAML Parsing
// ============================================================================

/**
 * Parse a YAML file into an unvalidated value
 */
const parseYamlFile = (filePath: string): unknown => {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Cannot read provider registry: ${reason}`, filePath);
  }
  try {
    return parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Invalid YAML: ${reason}`, filePath);
  }
};

// ============================================================================
// Validation + Conversion (YAML -> Runtime types)
// ============================================================================

type FieldReader<K extends string> = {
  string: (key: K) => string | undefined;
  requiredString: (key: K) => string;
  number: (key: K) => number | undefined;
  boolean: (key: K) => boolean | undefined;
  headers: (key: K) => Record<string, string> | undefined;
};

/**
 * Typed accessors over one YAML mapping, failing with the entry's location
 *
 * Keys are limited to the fields of the mapping's YAML shape.
 */
const createFieldReader = <K extends string>(
  entry: Record<string, unknown>,
  where: string,
  filePath: string
): FieldReader<K> => {
  const fail = (message: string): never => {
    throw new ConfigValidationError(`${where}: ${message}`, filePath);
  };

  const string = (key: K): string | undefined => {
    const value = entry[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "string" || value.trim() === "") {
      return fail(`"${key}" must be a non-empty string`);
    }
    return value;
  };

  return {
    string,
    requiredString: (key) => string(key) ?? fail(`"${key}" is required`),
    number: (key) => {
      const value = entry[key];
      if (value === undefined || value === null) return undefined;
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return fail(`"${key}" must be a number`);
      }
      return value;
    },
    boolean: (key) => {
      const value = entry[key];
      if (value === undefined || value === null) return undefined;
      if (typeof value !== "boolean") {
        return fail(`"${key}" must be true or false`);
      }
      return value;
    },
    headers: (key) => {
      const value = entry[key];
      if (value === undefined || value === null) return undefined;
      if (!isRecord(value)) {
        return fail(`"${key}" must be a mapping of header names to values`);
      }
      const headers: Record<string, string> = {};
      for (const [name, headerValue] of Object.entries(value)) {
        if (typeof headerValue !== "string") {
          return fail(`header "${name}" must be a string`);
        }
        headers[name] = headerValue;
      }
      return headers;
    },
  };
};

const convertDefaults = (
  value: unknown,
  filePath: string
): RegistryDefaultsYaml => {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigValidationError(`"defaults" must be a mapping`, filePath);
  }
  const read = createFieldReader<keyof RegistryDefaultsYaml>(value, "defaults", filePath);
  return {
    timeout_ms: read.number("timeout_ms"),
    max_tokens: read.number("max_tokens"),
    temperature: read.number("temperature"),
  };
};

/**
 * Convert one snake_case provider entry to camelCase, defaults applied
 */
const convertProviderEntry = (
  value: unknown,
  index: number,
  defaults: RegistryDefaultsYaml,
  filePath: string
): ProviderEntry => {
  if (!isRecord(value)) {
    throw new ConfigValidationError(`providers[${index}] must be a mapping`, filePath);
  }
  const where =
    typeof value["id"] === "string" ? `provider "${value["id"]}"` : `providers[${index}]`;
  const read = createFieldReader<keyof ProviderEntryYaml>(value, where, filePath);

  const id = read.requiredString("id");
  const adapter = read.requiredString("adapter");
  if (!isAdapterKind(adapter)) {
    throw new ConfigValidationError(`${where}: unknown adapter "${adapter}"`, filePath);
  }

  const baseUrl = read.string("base_url");
  const baseUrlEnv = read.string("base_url_env");
  if (adapter === "azure-openai" && !baseUrl && !baseUrlEnv) {
    throw new ConfigValidationError(
      `${where}: azure-openai needs "base_url" or "base_url_env"`,
      filePath
    );
  }

  const priority = read.number("priority");
  if (priority === undefined) {
    throw new ConfigValidationError(`${where}: "priority" is required`, filePath);
  }

  return {
    id,
    name: read.string("name"),
    adapter,
    baseUrl,
    baseUrlEnv,
    apiKeyEnv: read.requiredString("api_key_env"),
    model: read.requiredString("model"),
    priority,
    timeoutMs: read.number("timeout_ms") ?? defaults.timeout_ms,
    maxTokens: read.number("max_tokens") ?? defaults.max_tokens,
    temperature: read.number("temperature") ?? defaults.temperature,
    headers: read.headers("headers"),
    apiVersion: read.string("api_version"),
    enabled: read.boolean("enabled") ?? true,
  };
};

// ============================================================================
// Loader Functions
// ============================================================================

/**
 * Load the provider registry from a YAML file
 *
 * @param filePath - Registry file. Default: config/providers.yml
 * @throws ConfigValidationError when the file is missing or malformed
 */
export const loadProviderRegistry = (filePath?: string): ProviderRegistryFile => {
  const path = filePath ?? getDefaultRegistryPath();
  const yaml = parseYamlFile(path);

  if (!isRecord(yaml)) {
    throw new ConfigValidationError("Registry must be a mapping with a providers list", path);
  }
  const root: Record<keyof ProviderRegistryYaml, unknown> = {
    defaults: yaml["defaults"],
    providers: yaml["providers"],
  };
  const providers = root.providers;
  if (!Array.isArray(providers) || providers.length === 0) {
    throw new ConfigValidationError(`"providers" must be a non-empty list`, path);
  }

  const defaults = convertDefaults(root.defaults, path);
  const entries = providers.map((entry, index) =>
    convertProviderEntry(entry, index, defaults, path)
  );

  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.id)) {
      throw new ConfigValidationError(`Duplicate provider id "${entry.id}"`, path);
    }
    seen.add(entry.id);
  }

  return { filePath: path, providers: entries };
};

/**
 * Environment variables to read credentials from
 */
export type Environment = Readonly<Record<string, string | undefined>>;

const readEnv = (env: Environment, name: string | undefined): string | undefined => {
  if (!name) return undefined;
  const value = env[name]?.trim();
  return value ? value : undefined;
};

/**
 * Turn registry entries into provider configs, reading credentials from env
 *
 * A provider whose key variable is unset keeps a null key, so the router
 * lists it as disabled instead of dropping it. An azure-openai provider
 * whose endpoint variable is unset keeps a null base URL the same way.
 */
export const providersFromRegistry = (
  registry: ProviderRegistryFile,
  env: Environment = process.env
): ProviderConfig[] =>
  registry.providers.map((entry) => {
    const baseUrl = entry.baseUrl ?? readEnv(env, entry.baseUrlEnv);

    return {
      id: entry.id,
      name: entry.name,
      adapter: entry.adapter,
      apiKey: readEnv(env, entry.apiKeyEnv) ?? null,
      baseUrl: baseUrl ?? (entry.baseUrlEnv ? null : undefined),
      model: entry.model,
      priority: entry.priority,
      timeoutMs: entry.timeoutMs,
      maxTokens: entry.maxTokens,
      temperature: entry.temperature,
      headers: entry.headers,
      apiVersion: entry.apiVersion,
      enabled: entry.enabled,
    };
  });
