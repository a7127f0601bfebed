import type { ExecutionMode } from "../scanner/orchestrator.js";
import type { Service } from "../scanner/types.js";
import type { LogLevel } from "../logging/logger.js";
import type { RetryPolicy } from "../providers/aws/retry.js";
import type { RuleOverrides } from "../rules/rule-overrides.js";

export interface ExecutionConfig {
  readonly mode: ExecutionMode;
  /** Zero disables the per-service timeout. */
  readonly service_timeout_ms: number;
}

export interface IdentityConfig {
  readonly access_key_max_idle_days: number;
}

export interface ScanConfig {
  readonly region?: string;
  readonly services: readonly Service[];
  readonly log_level: LogLevel;
  readonly execution: ExecutionConfig;
  readonly retry: RetryPolicy;
  readonly identity: IdentityConfig;
  readonly rules: RuleOverrides;
}

/** Values taken from CLI flags; they win over the file and the environment. */
export interface ConfigOverrides {
  readonly region?: string;
  readonly services?: readonly string[];
  readonly logLevel?: string;
  readonly mode?: ExecutionMode;
  readonly serviceTimeoutMs?: number;
}
