import { readFileSync } from 'fs';
import { join } from 'path';
import type { Config } from './types.js';

export const DEFAULT_CONFIG_FILE = 'openapi-client-gen.config.json';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Loads configuration from a JSON file
 * @param configPath - Path to the config file
 * @returns Configuration object or null if file doesn't exist
 */
export function loadConfigFile(configPath: string): Config | null {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw new Error(`Failed to load config file ${configPath}: ${String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse config file ${configPath}: ${String(error)}`);
  }
  return parseConfig(parsed, configPath);
}

/**
 * Checks the shape of a parsed config file, keeping only known keys
 * @param value - Parsed JSON
 * @param source - File name used in error messages
 * @returns Configuration object
 */
export function parseConfig(value: unknown, source: string): Config {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Config file ${source} must contain a JSON object`);
  }

  const entries = new Map(Object.entries(value));
  const readString = (key: keyof Config): string | undefined => {
    const entry = entries.get(key);
    if (entry === undefined || typeof entry === 'string') {
      return entry;
    }
    throw new Error(`"${key}" in ${source} must be a string`);
  };
  const readBoolean = (key: keyof Config): boolean | undefined => {
    const entry = entries.get(key);
    if (entry === undefined || typeof entry === 'boolean') {
      return entry;
    }
    throw new Error(`"${key}" in ${source} must be a boolean`);
  };

  return filterUndefined({
    input: readString('input'),
    output: readString('output'),
    namespace: readString('namespace'),
    clean: readBoolean('clean'),
    pretty: readBoolean('pretty'),
    verbose: readBoolean('verbose'),
    tree: readBoolean('tree'),
  });
}

/**
 * Filters out undefined values from a configuration object
 * @param config - Configuration object to filter
 * @returns Configuration object without undefined values
 */
function filterUndefined(config: Config): Config {
  const filtered: Config = {};

  if (config.input !== undefined) {
    filtered.input = config.input;
  }
  if (config.output !== undefined) {
    filtered.output = config.output;
  }
  if (config.namespace !== undefined) {
    filtered.namespace = config.namespace;
  }
  if (config.clean !== undefined) {
    filtered.clean = config.clean;
  }
  if (config.pretty !== undefined) {
    filtered.pretty = config.pretty;
  }
  if (config.verbose !== undefined) {
    filtered.verbose = config.verbose;
  }
  if (config.tree !== undefined) {
    filtered.tree = config.tree;
  }

  return filtered;
}

/**
 * Merges CLI arguments with config file values (CLI takes precedence)
 * Only non-undefined CLI values override file config values
 * @param cliConfig - Configuration from CLI arguments (may contain undefined values)
 * @param configPath - Optional path to config file
 * @param cwd - Directory searched for the default config file
 * @returns Merged configuration
 */
export function mergeConfig(cliConfig: Config, configPath?: string, cwd: string = process.cwd()): Config {
  let fileConfig: Config | null = null;

  if (configPath) {
    fileConfig = loadConfigFile(configPath);
    if (!fileConfig) {
      throw new Error(`Config file not found: ${configPath}`);
    }
  } else {
    // Try default config file
    fileConfig = loadConfigFile(join(cwd, DEFAULT_CONFIG_FILE));
  }

  return {
    ...(fileConfig ?? {}),
    ...filterUndefined(cliConfig),
  };
}

/**
 * Configuration after validation: input and output are known
 */
export type ValidConfig = Config & { input: string; output: string };

/**
 * Validates that required configuration fields are present
 * @param config - Configuration to validate
 * @returns The same configuration, narrowed
 * @throws Error if required fields are missing or the namespace is not an identifier
 */
export function validateConfig(config: Config): ValidConfig {
  const { input, output } = config;
  if (!input) {
    throw new Error('Input is required. Provide --input flag or set "input" in config file.');
  }
  if (!output) {
    throw new Error('Output is required. Provide --output flag or set "output" in config file.');
  }
  if (config.namespace !== undefined && !IDENTIFIER.test(config.namespace)) {
    throw new Error(`Namespace "${config.namespace}" is not a valid identifier.`);
  }
  return { ...config, input, output };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
