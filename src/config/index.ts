/**
 * Config Module
 *
 * Re-exports the option loader and the layout validator:
 *   import { loadOptions, DEFAULT_OPTIONS } from './config/index.js';
 */

export {
  loadOptions,
  resolveOptions,
  loadJsoncFile,
  loadEnvConfig,
  parseOptions,
  getConfigPaths,
  deepMerge,
  DEFAULT_OPTIONS,
} from './loader.js';
export {
  isGroupConfig,
  validateComponentConfig,
  validateEntry,
  validateLayout,
} from './validate.js';
