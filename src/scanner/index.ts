export { evaluate, defineRuleSource } from "./rule-engine.js";
export {
  createFinding,
  createFindingId,
  createScanFailure,
  describeError,
  renderMessage,
} from "./finding-factory.js";
export { ServiceScanner } from "./service-scanner.js";
export type { ServiceScannerOptions } from "./service-scanner.js";
export { runAllScans, reportEntries } from "./orchestrator.js";
export type { ExecutionMode, RunOptions, Scanner } from "./orchestrator.js";
export { MAX_SCAN_TIMEOUT_MS, ScanTimeoutError } from "./scan-timeout.js";
export type {
  CompletedServiceResult,
  ConfigurationFinding,
  ErrorDetail,
  EvaluatedResource,
  FailedServiceResult,
  ReportEntry,
  ResourceLister,
  ResourceSnapshot,
  Rule,
  RuleDescriptor,
  RuleSource,
  ScanFailure,
  ScanReport,
  ServiceResult,
} from "./types.js";
export {
  SCAN_FAILURE_RULE_ID,
  SERVICE_ORDER,
  Service,
  Severity,
} from "./types.js";
