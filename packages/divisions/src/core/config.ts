/**
 * Divisions Library Configuration
 *
 * Default configuration for the division registry.
 *
 * Environment variables:
 * - VN_DIVISIONS_DATA_DIR: directory holding the canonical dataset files
 * - LOG_LEVEL: debug | info | warn | error
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

import { fileURLToPath } from 'node:url';
import { parseLogLevel, type LogLevel } from './utils/logger.js';

/**
 * Canonical dataset bundled with the package
 */
export const BUNDLED_DATA_DIR = fileURLToPath(new URL('../data/canonical/', import.meta.url));

/**
 * Dataset file names, relative to the data directory
 */
export const DATASET_FILES = {
  current: 'nested-divisions.json',
  legacy: 'legacy-nested-divisions.json',
  conversion: 'conversion-2025.json',
  metadata: 'metadata.json',
} as const;

export type DatasetFile = keyof typeof DATASET_FILES;

export interface DivisionsConfig {
  /** Directory holding the dataset files */
  readonly dataDir: string;

  /** Minimum level for the registry logger */
  readonly logLevel: LogLevel;
}

export const DEFAULT_CONFIG: DivisionsConfig = {
  dataDir: BUNDLED_DATA_DIR,
  logLevel: 'info',
};

/**
 * Create configuration: explicit overrides, then environment, then defaults
 *
 * @param overrides - Values taking precedence over the environment
 * @param env - Environment to read (defaults to process.env)
 */
export function createConfig(
  overrides: Partial<DivisionsConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): DivisionsConfig {
  const envDataDir = env.VN_DIVISIONS_DATA_DIR;

  return {
    dataDir: overrides.dataDir
      ?? (envDataDir !== undefined && envDataDir.length > 0 ? envDataDir : DEFAULT_CONFIG.dataDir),
    logLevel: overrides.logLevel
      ?? (env.LOG_LEVEL !== undefined ? parseLogLevel(env.LOG_LEVEL) : DEFAULT_CONFIG.logLevel),
  };
}
