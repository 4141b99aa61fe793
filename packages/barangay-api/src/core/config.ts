/**
 * Barangay API Configuration Management
 *
 * Loads configuration from .barangay-apirc (YAML or JSON) with environment
 * variable overrides and defaults. The merged result is validated with Zod.
 *
 * Configuration precedence (highest to lowest):
 * 1. Explicit overrides (command-line options)
 * 2. Environment variables (BARANGAY_API_*, plus PORT and HOST)
 * 3. Config file (.barangay-apirc or --config path)
 * 4. Default values
 *
 * @module core/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_DATASET_PATH } from '../data/loaders/dataset-loader.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly corsOrigins: readonly string[];
  readonly rateLimitPerMinute: number;
}

export interface DatasetConfig {
  /** Path of the PSGC dataset bundle (JSON) */
  readonly path: string;
  /** Abort startup on dataset invariant violations */
  readonly strictIntegrity: boolean;
}

export interface LookupConfig {
  /** Require municipality == HUC name when listing barangays of an HUC */
  readonly strictLeafValidation: boolean;
}

export interface AppConfig {
  readonly server: ServerConfig;
  readonly dataset: DatasetConfig;
  readonly lookup: LookupConfig;
  /** Resolved config file path, if one was read */
  readonly configPath: string | null;
}

/**
 * Overrides accepted from the command line
 */
export interface ConfigOverrides {
  readonly port?: number;
  readonly host?: string;
  readonly corsOrigins?: readonly string[];
  readonly rateLimitPerMinute?: number;
  readonly datasetPath?: string;
  readonly strictIntegrity?: boolean;
  readonly strictLeafValidation?: boolean;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<AppConfig, 'configPath'> = {
  server: {
    port: 48573,
    host: '0.0.0.0',
    corsOrigins: ['*'],
    rateLimitPerMinute: 60,
  },
  dataset: {
    path: DEFAULT_DATASET_PATH,
    strictIntegrity: true,
  },
  lookup: {
    strictLeafValidation: false,
  },
};

// ============================================================================
// Schemas
// ============================================================================

const originsSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === 'string' ? splitList(value) : value));

/**
 * Config file structure (YAML, snake_case keys)
 */
const configFileSchema = z
  .object({
    server: z
      .object({
        port: z.number(),
        host: z.string(),
        cors_origins: originsSchema,
        rate_limit_per_minute: z.number(),
      })
      .partial()
      .strict()
      .optional(),
    dataset: z
      .object({
        path: z.string(),
        strict_integrity: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
    lookup: z
      .object({
        strict_leaf_validation: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

const appConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535),
    host: z.string().min(1),
    corsOrigins: z.array(z.string().min(1)).min(1, 'At least one CORS origin is required'),
    rateLimitPerMinute: z.coerce.number().int().positive(),
  }),
  dataset: z.object({
    path: z.string().min(1),
    strictIntegrity: z.boolean(),
  }),
  lookup: z.object({
    strictLeafValidation: z.boolean(),
  }),
});

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.barangay-apirc',
  '.barangay-apirc.yaml',
  '.barangay-apirc.yml',
  '.barangay-apirc.json',
];

/**
 * Find config file in a directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filePath}`, parsed.error.flatten());
  }
  return parsed.data;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Environment booleans: true/1 and false/0. Anything else is passed through
 * so that validation reports it.
 */
function envBool(value: string | undefined): boolean | string | undefined {
  if (value === undefined) return undefined;
  const lowered = value.toLowerCase();
  if (lowered === 'true' || lowered === '1') return true;
  if (lowered === 'false' || lowered === '0') return false;
  return value;
}

/**
 * Blank variables (`PORT=`) count as unset
 */
function withoutBlankValues(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== ''
    )
  );
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  readonly overrides?: ConfigOverrides;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when a source cannot be read or the merged values are invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = withoutBlankValues(options.env ?? process.env);
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  const explicitPath = options.configPath ?? env.BARANGAY_API_CONFIG;

  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  const file: ConfigFile = configPath ? parseConfigFile(configPath) : {};
  const fileDir = configPath ? dirname(configPath) : cwd;

  const envDatasetPath = env.BARANGAY_API_DATASET;
  const envOrigins = env.BARANGAY_API_CORS_ORIGINS;

  const datasetPath =
    overrides.datasetPath !== undefined
      ? resolve(cwd, overrides.datasetPath)
      : envDatasetPath !== undefined
        ? resolve(cwd, envDatasetPath)
        : file.dataset?.path !== undefined
          ? resolve(fileDir, file.dataset.path)
          : DEFAULT_CONFIG.dataset.path;

  const merged = {
    server: {
      port:
        overrides.port ??
        env.BARANGAY_API_PORT ??
        env.PORT ??
        file.server?.port ??
        DEFAULT_CONFIG.server.port,
      host:
        overrides.host ??
        env.BARANGAY_API_HOST ??
        env.HOST ??
        file.server?.host ??
        DEFAULT_CONFIG.server.host,
      corsOrigins:
        overrides.corsOrigins ??
        (envOrigins !== undefined ? splitList(envOrigins) : undefined) ??
        file.server?.cors_origins ??
        DEFAULT_CONFIG.server.corsOrigins,
      rateLimitPerMinute:
        overrides.rateLimitPerMinute ??
        env.BARANGAY_API_RATE_LIMIT_PER_MINUTE ??
        file.server?.rate_limit_per_minute ??
        DEFAULT_CONFIG.server.rateLimitPerMinute,
    },
    dataset: {
      path: datasetPath,
      strictIntegrity:
        overrides.strictIntegrity ??
        envBool(env.BARANGAY_API_STRICT_INTEGRITY) ??
        file.dataset?.strict_integrity ??
        DEFAULT_CONFIG.dataset.strictIntegrity,
    },
    lookup: {
      strictLeafValidation:
        overrides.strictLeafValidation ??
        envBool(env.BARANGAY_API_STRICT_LEAF_VALIDATION) ??
        file.lookup?.strict_leaf_validation ??
        DEFAULT_CONFIG.lookup.strictLeafValidation,
    },
  };

  const validated = appConfigSchema.safeParse(merged);
  if (!validated.success) {
    const fields = validated.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration (${fields.join('; ')})`, validated.error.flatten());
  }

  return { ...validated.data, configPath };
}
