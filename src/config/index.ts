export {
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  LOG_LEVEL_ENV_VAR,
  loadConfig,
  parseConfig,
  resolveConfigPath,
} from "./config-loader.js";
export type { LoadConfigOptions } from "./config-loader.js";
export type {
  ConfigOverrides,
  ExecutionConfig,
  IdentityConfig,
  ScanConfig,
} from "./types.js";
