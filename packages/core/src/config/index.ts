export {
  applyEnvOverrides,
  CONFIG_FILES,
  findConfigFile,
  isRecord,
  loadConfigFile,
  loadEngineConfig,
  mergeRawConfig,
} from './loader.js';
export type { LoadEngineConfigOptions, RawConfig } from './loader.js';
export { configFileSchema, parseConfig } from './schema.js';
export type { ConfigFile, EngineConfig, LoggingConfig, LogLevel, ReportFormat } from './schema.js';
