export * from "./scanner/index.js";
export * from "./rules/index.js";
export * from "./report/index.js";
export * from "./config/index.js";
export * from "./providers/aws/index.js";
export { createLogger, isLogLevel, LOG_LEVELS } from "./logging/logger.js";
export type { LogLevel, Logger, LoggerOptions } from "./logging/logger.js";
export { runScanCommand } from "./cli/scan-command.js";
export type {
  ScanDependencies,
  ScanOptions,
  ScanResult,
  ShowSection,
} from "./cli/scan-command.js";
export { runRulesCommand } from "./cli/rules-command.js";
export type { RuleListing, RulesOptions } from "./cli/rules-command.js";
