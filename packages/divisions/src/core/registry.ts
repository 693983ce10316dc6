/**
 * Division Registry
 *
 * Owns every table built from one dataset source. Construction is cheap;
 * the dataset is read, validated and indexed on first access, at most once
 * per instance. A failed build is remembered and rethrown to every later
 * caller, so a broken dataset never yields partial tables.
 *
 * USAGE:
 * ```typescript
 * const registry = getDefaultRegistry();
 * registry.current.get('province', 15).name;       // 'Tỉnh Lào Cai'
 * registry.xref.currentForLegacy('province', 77);  // -> Thành phố Hồ Chí Minh
 * ```
 */

import { CodeRegistry } from './code-registry.js';
import { createConfig } from './config.js';
import { DataLoadError } from './errors.js';
import { LegacyXrefIndex } from './legacy-xref.js';
import { CurrentLookupTables, LegacyLookupTables } from './lookup-tables.js';
import { NameSearchIndex } from './search-index.js';
import type { DatasetMetadata } from './types.js';
import { createLogger, type LogLevel, type Logger } from './utils/logger.js';
import {
  loadDataset,
  parseDataset,
  type Dataset,
  type RawDataset,
} from '../data/loaders/dataset-loader.js';

/**
 * A data directory path, or already-read file contents
 */
export type DatasetSource = string | RawDataset;

export type DatasetLoader = (source: DatasetSource) => Dataset;

export interface RegistryOptions {
  /** Defaults to the configured data directory */
  readonly source?: DatasetSource;
  readonly logLevel?: LogLevel;
  /** Replaces the file/JSON loader, e.g. to count loads in tests */
  readonly loader?: DatasetLoader;
}

export interface RegistryTables {
  readonly codes: CodeRegistry;
  readonly current: CurrentLookupTables;
  readonly legacy: LegacyLookupTables;
  readonly xref: LegacyXrefIndex;
  readonly search: NameSearchIndex;
  readonly metadata: DatasetMetadata;
}

export const defaultLoader: DatasetLoader = (source) =>
  typeof source === 'string' ? loadDataset(source) : parseDataset(source);

export class DivisionRegistry {
  private readonly source: DatasetSource;
  private readonly loader: DatasetLoader;
  private readonly log: Logger;
  private tables: RegistryTables | undefined;
  private failure: DataLoadError | undefined;

  constructor(options: RegistryOptions = {}) {
    const config = createConfig(options.logLevel ? { logLevel: options.logLevel } : {});
    this.source = options.source ?? config.dataDir;
    this.loader = options.loader ?? defaultLoader;
    this.log = createLogger({ module: 'registry' }, config.logLevel);
  }

  get isLoaded(): boolean {
    return this.tables !== undefined;
  }

  get codes(): CodeRegistry {
    return this.build().codes;
  }

  get current(): CurrentLookupTables {
    return this.build().current;
  }

  get legacy(): LegacyLookupTables {
    return this.build().legacy;
  }

  get xref(): LegacyXrefIndex {
    return this.build().xref;
  }

  get search(): NameSearchIndex {
    return this.build().search;
  }

  get metadata(): DatasetMetadata {
    return this.build().metadata;
  }

  /** Opaque dataset version marker */
  get dataVersion(): string {
    return this.metadata.dataVersion;
  }

  /** Date the reorganization took effect (YYYY-MM-DD) */
  get effectiveDate(): string {
    return this.metadata.effectiveDate;
  }

  /**
   * Build all tables on first call; later calls return the same tables
   *
   * @throws DataLoadError on a missing or malformed dataset
   */
  build(): RegistryTables {
    if (this.tables) {
      return this.tables;
    }
    if (this.failure) {
      throw this.failure;
    }

    const startTime = Date.now();
    const origin = typeof this.source === 'string' ? this.source : 'in-memory dataset';

    let tables: RegistryTables;
    try {
      tables = buildTables(this.loader(this.source));
    } catch (error) {
      this.failure = error instanceof DataLoadError
        ? error
        : new DataLoadError(
            `Failed to load dataset: ${error instanceof Error ? error.message : String(error)}`
          );
      this.log.error('Dataset load failed', {
        source: origin,
        issues: this.failure.issues.length,
        error: this.failure.message,
      });
      throw this.failure;
    }

    this.tables = tables;
    this.log.info('Dataset loaded', {
      source: origin,
      dataVersion: tables.metadata.dataVersion,
      provinces: tables.current.table('province').size,
      wards: tables.current.table('ward').size,
      legacyProvinces: tables.legacy.table('province').size,
      legacyDistricts: tables.legacy.table('district').size,
      legacyWards: tables.legacy.table('ward').size,
      durationMs: Date.now() - startTime,
    });

    return tables;
  }
}

function buildTables(dataset: Dataset): RegistryTables {
  const current = new CurrentLookupTables(dataset.provinces, dataset.wards);
  const legacy = new LegacyLookupTables(
    dataset.legacyProvinces,
    dataset.legacyDistricts,
    dataset.legacyWards
  );
  const xref = new LegacyXrefIndex(dataset.crossReferences, current, legacy);

  return Object.freeze({
    codes: new CodeRegistry(current, legacy),
    current,
    legacy,
    xref,
    search: new NameSearchIndex(current, legacy, xref),
    metadata: dataset.metadata,
  });
}

/**
 * Create an independent registry, e.g. over an in-memory dataset in tests
 */
export function createRegistry(options: RegistryOptions = {}): DivisionRegistry {
  return new DivisionRegistry(options);
}

// ============================================================================
// Default Registry
// ============================================================================

let defaultRegistry: DivisionRegistry | null = null;

/**
 * Get the process-wide registry backing the model classes.
 * Creates it over the configured data directory if none exists.
 */
export function getDefaultRegistry(): DivisionRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new DivisionRegistry();
  }
  return defaultRegistry;
}

/**
 * Reset the process-wide registry.
 * Useful for testing.
 */
export function resetDefaultRegistry(): void {
  defaultRegistry = null;
}
