/**
 * Config module exports
 */

export {
  configSchema,
  cloneConfigSchema,
  concurrencyConfigSchema,
  storageConfigSchema,
  analysisRequestSchema,
  DEFAULT_INCLUDE_PATTERNS,
  DEFAULT_EXCLUDE_PATTERNS,
  DEFAULT_MAX_FILE_SIZE,
  type Config,
  type CloneConfig,
  type ConcurrencyConfig,
  type StorageConfig,
} from './schema.js';

export {
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  resolveAccessToken,
} from './loader.js';
