/**
 * CLI Global Context
 *
 * Configuration and logger shared by every command, set up once in the
 * program's preAction hook.
 *
 * @module cli/lib/context
 */

import { loadConfig, type CLIConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global State
// ============================================================================

export interface CLIContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

/**
 * Options accepted on the root program
 */
export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
}

let globalContext: CLIContext | null = null;

export function getGlobalContext(): CLIContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export async function initializeContext(options: GlobalOptions): Promise<CLIContext> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
    },
  });

  globalContext = createContext(config);
  return globalContext;
}

/**
 * Context for a given configuration, without touching global state
 */
export function createContext(config: CLIConfig): CLIContext {
  return {
    config,
    logger: createCLILogger({
      level: config.verbose ? 'debug' : 'info',
      json: config.json,
    }),
  };
}
