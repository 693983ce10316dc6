/**
 * vn-divisions
 *
 * Vietnam's administrative divisions in both generations:
 * - current (from 2025-07-01): Province -> Ward
 * - legacy (before 2025-07-01): Province -> District -> Ward
 *
 * @example
 * ```typescript
 * import { Province, Ward, legacy } from 'vn-divisions';
 *
 * Province.fromCode(1).name;                       // 'Thành phố Hà Nội'
 * Ward.search('ba dinh').map((w) => w.code);       // [4]
 * legacy.Province.fromCode(77).getCurrent().code;  // 79
 * ```
 */

// Models
export { Province } from './models/province.js';
export { Ward } from './models/ward.js';
export { Division, type LegacyQuery } from './models/base.js';
export * as legacy from './models/legacy/index.js';

// Registry
export {
  DivisionRegistry,
  createRegistry,
  defaultLoader,
  getDefaultRegistry,
  resetDefaultRegistry,
  type DatasetLoader,
  type DatasetSource,
  type RegistryOptions,
  type RegistryTables,
} from './core/registry.js';
export { CodeRegistry } from './core/code-registry.js';
export { CurrentLookupTables, LegacyLookupTables, LookupTable } from './core/lookup-tables.js';
export { LegacyXrefIndex } from './core/legacy-xref.js';
export { NameSearchIndex } from './core/search-index.js';

// Data
export {
  loadDataset,
  parseDataset,
  readDatasetFiles,
  type Dataset,
  type RawDataset,
} from './data/loaders/dataset-loader.js';
export { DATA_VERSION, EFFECTIVE_DATE } from './data/loaders/bundled-metadata.js';
export * from './core/schemas.js';

// Config and errors
export {
  BUNDLED_DATA_DIR,
  DATASET_FILES,
  DEFAULT_CONFIG,
  createConfig,
  type DatasetFile,
  type DivisionsConfig,
} from './core/config.js';
export {
  DataLoadError,
  DivisionError,
  LegacyCodeNotFoundError,
  UnknownCodeError,
} from './core/errors.js';

// Utilities
export {
  NAME_PREFIXES,
  foldName,
  parseDivisionType,
  shortCodename,
  toAlias,
  toCodename,
} from './core/utils/text.js';
export { Logger, createLogger, logger, type LogLevel, type LogMetadata } from './core/utils/logger.js';

export * from './core/types.js';
