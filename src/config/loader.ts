/**
 * Configuration loader for the sample-data-links server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { AppConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Environment used for substitution (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Shape of config.yaml. Every key is optional; missing ones take the defaults.
 * Numbers and booleans may arrive as strings after substitution.
 */
const fileConfigSchema = z
  .object({
    server: z
      .object({
        port: z.coerce.number().int().min(1).max(65535),
        host: z.string().min(1),
        logLevel: logLevelSchema,
        cors: z
          .object({
            enabled: z.union([z.boolean(), z.enum(['true', 'false']).transform((v) => v === 'true')]),
            origins: z.array(z.string()),
          })
          .partial(),
      })
      .partial(),
    linking: z
      .object({
        ambiguousMapping: z.enum(['warn', 'error']),
        defaultLookupMode: z.enum(['first', 'all']),
      })
      .partial(),
    experiments: z
      .object({
        seedDir: z.string().min(1),
      })
      .partial(),
  })
  .partial();

type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    // Return empty string if no value and no default
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item: unknown) => substituteEnvVarsRecursive(item, env));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

/**
 * Validate the parsed config file. An empty file counts as an empty config.
 */
export function validateConfig(config: unknown): FileConfig {
  const result = fileConfigSchema.safeParse(config ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join('.') ?? '';
    throw new ConfigValidationError(issue?.message ?? 'invalid configuration', path, valueAt(config, issue?.path ?? []));
  }
  return result.data;
}

function valueAt(config: unknown, path: readonly (string | number)[]): unknown {
  let current = config;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Merge a validated config file over the defaults.
 */
export function resolveConfig(file: FileConfig): AppConfig {
  const defaults = DEFAULT_CONFIG;
  const server = file.server ?? {};
  const linking = file.linking ?? {};
  const seedDir = file.experiments?.seedDir;
  return {
    server: {
      port: server.port ?? defaults.server.port,
      host: server.host ?? defaults.server.host,
      logLevel: server.logLevel ?? defaults.server.logLevel,
      cors: {
        enabled: server.cors?.enabled ?? defaults.server.cors.enabled,
        origins: server.cors?.origins ?? [...defaults.server.cors.origins],
      },
    },
    linking: {
      ambiguousMapping: linking.ambiguousMapping ?? defaults.linking.ambiguousMapping,
      defaultLookupMode: linking.defaultLookupMode ?? defaults.linking.defaultLookupMode,
    },
    experiments: seedDir !== undefined ? { seedDir } : {},
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath
    ?? env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return resolveConfig({});
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  return resolveConfig(validateConfig(substituteEnvVarsRecursive(parsed, env)));
}
