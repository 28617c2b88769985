/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  parseConfig,
  validateBackends,
  DEFAULT_CONFIG,
  CONFIG_FILE_YAML,
  CONFIG_FILE_JSON,
} from './ConfigLoader.js';
export type { StyxConfig, ProjectConfig, PackageConfig, DocsConfig } from './ConfigLoader.js';
