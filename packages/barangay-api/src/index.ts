/**
 * Barangay API
 *
 * Lookup and fuzzy search over the Philippine Standard Geographic Code (PSGC)
 * hierarchy: regions, provinces and highly urbanized cities, municipalities
 * and cities, barangays.
 */

export * from './serving/index.js';

export { Dataset } from './data/dataset.js';
export type { DatasetMeta, DatasetStats } from './data/dataset.js';
export {
  DEFAULT_DATASET_PATH,
  loadDataset,
  parseDatasetBundle,
} from './data/loaders/dataset-loader.js';
export type { LoadDatasetOptions } from './data/loaders/dataset-loader.js';

export { FuzzyBarangayMatcher, normalizeSearchText } from './matching/fuzzy-matcher.js';

export { loadConfig, DEFAULT_CONFIG } from './core/config.js';
export type {
  AppConfig,
  ServerConfig,
  DatasetConfig,
  LookupConfig,
  ConfigOverrides,
  LoadConfigOptions,
} from './core/config.js';

export {
  NotFoundError,
  InvalidRequestError,
  DatasetIntegrityError,
  ConfigError,
} from './core/errors.js';
export type { NotFoundLevel, NotFoundCode, DatasetIssue } from './core/errors.js';

export {
  ADMINISTRATIVE_LEVELS,
  MATCH_HOOKS,
  DEFAULT_MATCH_HOOKS,
  DEFAULT_THRESHOLD,
  DEFAULT_LEN_RESULTS,
} from './core/types.js';
export type {
  AdministrativeArea,
  AdministrativeLevel,
  ProvinceNode,
  RegionNode,
  Hierarchy,
  BarangayCandidate,
  BarangayMatcher,
  MatchHook,
} from './core/types.js';

export { logger, createLogger, setLogLevel } from './core/utils/logger.js';
export type { LogLevel, LogMetadata } from './core/utils/logger.js';
