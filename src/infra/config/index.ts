/**
 * Configuration module exports
 */
export { getConfigDir, getBundledDataDir } from './config-paths.js';

export {
  type AdvisorRuntimeConfig,
  type AdvisorRuntimeConfigFile,
  DEFAULT_RUNTIME_CONFIG,
  RUNTIME_CONFIG_SCHEMA,
  applyEnvironmentOverrides,
  getRuntimeConfigPath,
  loadRuntimeConfig,
  loadRuntimeConfigFile,
  resolveDataPath,
  saveRuntimeConfig,
  updateRuntimeConfig,
} from './runtime-config.js';

export { parseJson, validateWithSchema } from './schema-validator.js';
