/**
 * CLI Configuration Management
 *
 * Loads configuration from .vn-divisionsrc (YAML) with environment variable
 * overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (VN_DIVISIONS_*)
 * 3. Config file (.vn-divisionsrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { formatIssues } from 'vn-divisions';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Shape of the current-generation output file
 */
export type OutputFormat = 'nested-json' | 'flat-json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['nested-json', 'flat-json'];

/**
 * Absolute paths. Relative paths from a config file are taken relative to
 * that file, all others relative to the working directory.
 */
export interface PathsConfig {
  /** Directory the converted dataset is written to */
  readonly output: string;
  /** Phone area code CSV, or null when provinces get no phone code */
  readonly phones: string | null;
}

/**
 * Values written to metadata.json
 */
export interface DatasetConfig {
  readonly version: string;
  readonly effectiveDate: string;
  readonly description: string;
  readonly source: string;
}

export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly dataset: DatasetConfig;
  readonly format: OutputFormat;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const ConfigFileSchema = z.object({
  version: z.literal(1).optional(),
  paths: z
    .object({
      output: z.string().min(1).optional(),
      phones: z.string().min(1).optional(),
    })
    .optional(),
  dataset: z
    .object({
      version: z.string().min(1).optional(),
      effective_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD').optional(),
      description: z.string().optional(),
      source: z.string().optional(),
    })
    .optional(),
  format: z.enum(['nested-json', 'flat-json']).optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  paths: {
    output: './dataset',
    phones: null,
  },

  dataset: {
    version: '2025.07.1',
    effectiveDate: '2025-07-01',
    description: 'National administrative division list after the reorganization effective 2025-07-01',
    source: 'General Statistics Office division list',
  },

  format: 'nested-json',
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.vn-divisionsrc',
  '.vn-divisionsrc.yaml',
  '.vn-divisionsrc.yml',
];

/**
 * Find config file in the start directory or its parents
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

/**
 * Parse and validate a config file (YAML, which also covers JSON)
 *
 * @throws Error listing every invalid field
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content: unknown = parseYaml(readFileSync(filePath, 'utf-8'));
  const result = ConfigFileSchema.safeParse(content ?? {});
  if (!result.success) {
    throw new Error(`Invalid config file:\n${formatIssues(filePath, result.error).join('\n')}`);
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`VN_DIVISIONS_${name}`];
  return value === '' ? undefined : value;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvFormat(env: Env): OutputFormat | undefined {
  const value = getEnvVar(env, 'FORMAT');
  return OUTPUT_FORMATS.find((format) => format === value);
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  readonly cwd?: string;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly output?: string;
    readonly phones?: string;
    readonly format?: OutputFormat;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws Error if an explicit config file is missing or a file is invalid
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
  env: Env = process.env
): Promise<CLIConfig> {
  const cwd = options.cwd ?? process.cwd();
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath !== undefined) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const overrides = options.overrides ?? {};
  const configDir = configPath ? dirname(configPath) : cwd;
  const fromFile = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(configDir, path);

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      output: resolve(
        cwd,
        overrides.output ?? getEnvVar(env, 'OUTPUT_DIR') ?? fromFile(fileConfig.paths?.output) ?? DEFAULT_CONFIG.paths.output
      ),
      phones: resolveOptional(
        cwd,
        overrides.phones ?? getEnvVar(env, 'PHONES_CSV') ?? fromFile(fileConfig.paths?.phones) ?? DEFAULT_CONFIG.paths.phones
      ),
    },

    dataset: {
      version:
        getEnvVar(env, 'DATA_VERSION') ??
        fileConfig.dataset?.version ??
        DEFAULT_CONFIG.dataset.version,
      effectiveDate:
        getEnvVar(env, 'EFFECTIVE_DATE') ??
        fileConfig.dataset?.effective_date ??
        DEFAULT_CONFIG.dataset.effectiveDate,
      description: fileConfig.dataset?.description ?? DEFAULT_CONFIG.dataset.description,
      source: fileConfig.dataset?.source ?? DEFAULT_CONFIG.dataset.source,
    },

    format: overrides.format ?? getEnvFormat(env) ?? fileConfig.format ?? DEFAULT_CONFIG.format,

    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };
}

function resolveOptional(cwd: string, path: string | null): string | null {
  return path === null ? null : resolve(cwd, path);
}
