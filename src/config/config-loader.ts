import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { isLogLevel } from "../logging/logger.js";
import { DEFAULT_RETRY_POLICY } from "../providers/aws/retry.js";
import { DEFAULT_ACCESS_KEY_MAX_IDLE_DAYS } from "../rules/identity.js";
import { builtinRuleCatalog } from "../rules/index.js";
import { findUnknownRuleRefs } from "../rules/rule-overrides.js";
import {
  SERVICE_ORDER,
  Severity,
  type Service,
} from "../scanner/types.js";
import type { ExecutionMode } from "../scanner/orchestrator.js";
import { MAX_SCAN_TIMEOUT_MS } from "../scanner/scan-timeout.js";
import type { ConfigOverrides, ScanConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = "skyaudit.yaml";
export const CONFIG_ENV_VAR = "SKYAUDIT_CONFIG";
export const LOG_LEVEL_ENV_VAR = "SKYAUDIT_LOG_LEVEL";

export const DEFAULT_CONFIG: ScanConfig = {
  services: SERVICE_ORDER,
  log_level: "info",
  execution: { mode: "sequential", service_timeout_ms: 300_000 },
  retry: DEFAULT_RETRY_POLICY,
  identity: { access_key_max_idle_days: DEFAULT_ACCESS_KEY_MAX_IDLE_DAYS },
  rules: {},
};

const TOP_LEVEL_KEYS = new Set([
  "region",
  "services",
  "log_level",
  "execution",
  "retry",
  "identity",
  "rules",
]);
const EXECUTION_KEYS = new Set(["mode", "service_timeout_ms"]);
const RETRY_KEYS = new Set([
  "max_attempts",
  "base_delay_ms",
  "max_delay_ms",
  "jitter_factor",
]);
const IDENTITY_KEYS = new Set(["access_key_max_idle_days"]);
const RULES_KEYS = new Set(["disabled", "severity"]);
const SEVERITIES = new Set<string>([
  Severity.Info,
  Severity.Warning,
  Severity.High,
]);

type Env = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  readonly configPath?: string;
  readonly overrides?: ConfigOverrides;
  readonly env?: Env;
  readonly cwd?: string;
}

/**
 * Resolve the configuration file: explicit path, then SKYAUDIT_CONFIG, then
 * ./skyaudit.yaml when it exists. An explicit or env path must exist.
 */
export async function resolveConfigPath(
  explicit: string | undefined,
  env: Env = process.env,
  cwd: string = process.cwd(),
): Promise<string | undefined> {
  const requested = explicit ?? env[CONFIG_ENV_VAR];
  if (requested) {
    const resolved = path.resolve(cwd, requested);
    if (!(await existsFile(resolved))) {
      throw new Error(`Configuration file not found: ${resolved}`);
    }
    return resolved;
  }

  const fallback = path.join(cwd, DEFAULT_CONFIG_FILE);
  return (await existsFile(fallback)) ? fallback : undefined;
}

export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<ScanConfig> {
  const env = options.env ?? process.env;
  const configPath = await resolveConfigPath(
    options.configPath,
    env,
    options.cwd,
  );

  let fromFile = DEFAULT_CONFIG;
  if (configPath) {
    const raw = await fs.readFile(configPath, "utf8");
    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid configuration file ${configPath}: ${reason}`);
    }
    fromFile = parseConfig(doc ?? {});
  }

  return applyOverrides(fromFile, env, options.overrides ?? {});
}

/**
 * Validate a configuration document and merge it onto the defaults. Every
 * problem is collected before throwing.
 */
export function parseConfig(input: unknown): ScanConfig {
  const errors: string[] = [];
  if (!isRecord(input)) {
    throw new Error("Invalid configuration: configuration must be a mapping");
  }
  checkKeys(input, TOP_LEVEL_KEYS, "configuration", errors);

  const execution = optionalRecord(input.execution, "execution", errors);
  const retry = optionalRecord(input.retry, "retry", errors);
  const identity = optionalRecord(input.identity, "identity", errors);
  const rules = optionalRecord(input.rules, "rules", errors);
  if (execution) checkKeys(execution, EXECUTION_KEYS, "execution", errors);
  if (retry) checkKeys(retry, RETRY_KEYS, "retry", errors);
  if (identity) checkKeys(identity, IDENTITY_KEYS, "identity", errors);
  if (rules) checkKeys(rules, RULES_KEYS, "rules", errors);

  const config: ScanConfig = {
    region: optionalString(input.region, "region", errors),
    services:
      input.services === undefined
        ? DEFAULT_CONFIG.services
        : parseServices(input.services, "services", errors),
    log_level: parseLogLevel(input.log_level, "log_level", errors),
    execution: {
      mode: parseMode(execution?.mode, "execution.mode", errors),
      service_timeout_ms: timeoutMs(
        execution?.service_timeout_ms,
        "execution.service_timeout_ms",
        DEFAULT_CONFIG.execution.service_timeout_ms,
        errors,
      ),
    },
    retry: {
      maxAttempts: positiveInteger(
        retry?.max_attempts,
        "retry.max_attempts",
        DEFAULT_CONFIG.retry.maxAttempts,
        errors,
      ),
      baseDelayMs: nonNegativeInteger(
        retry?.base_delay_ms,
        "retry.base_delay_ms",
        DEFAULT_CONFIG.retry.baseDelayMs,
        errors,
      ),
      maxDelayMs: nonNegativeInteger(
        retry?.max_delay_ms,
        "retry.max_delay_ms",
        DEFAULT_CONFIG.retry.maxDelayMs,
        errors,
      ),
      jitterFactor: fraction(
        retry?.jitter_factor,
        "retry.jitter_factor",
        DEFAULT_CONFIG.retry.jitterFactor,
        errors,
      ),
    },
    identity: {
      access_key_max_idle_days: positiveInteger(
        identity?.access_key_max_idle_days,
        "identity.access_key_max_idle_days",
        DEFAULT_CONFIG.identity.access_key_max_idle_days,
        errors,
      ),
    },
    rules: {
      disabled: optionalStringList(rules?.disabled, "rules.disabled", errors),
      severity: parseSeverityOverrides(rules?.severity, errors),
    },
  };

  const unknownRefs = findUnknownRuleRefs(config.rules, builtinRuleCatalog());
  for (const ref of unknownRefs) {
    errors.push(`rules: unknown rule ${ref}`);
  }

  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join("; ")}`);
  }
  return config;
}

function applyOverrides(
  base: ScanConfig,
  env: Env,
  overrides: ConfigOverrides,
): ScanConfig {
  const errors: string[] = [];
  const logLevel = overrides.logLevel ?? env[LOG_LEVEL_ENV_VAR];
  const region = overrides.region ?? env.AWS_REGION ?? base.region;
  const merged: ScanConfig = {
    ...base,
    region: region || undefined,
    services: overrides.services
      ? parseServices(overrides.services, "--services", errors)
      : base.services,
    log_level:
      logLevel === undefined
        ? base.log_level
        : parseLogLevel(logLevel, "log level", errors),
    execution: {
      mode: overrides.mode ?? base.execution.mode,
      service_timeout_ms: timeoutMs(
        overrides.serviceTimeoutMs,
        "--timeout",
        base.execution.service_timeout_ms,
        errors,
      ),
    },
  };
  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join("; ")}`);
  }
  return merged;
}

function parseServices(
  value: unknown,
  label: string,
  errors: string[],
): Service[] {
  if (!Array.isArray(value) || value.length === 0) {
    errors.push(`${label} must be a non-empty list`);
    return [...SERVICE_ORDER];
  }
  const items: readonly unknown[] = value;
  const requested = new Set<string>();
  for (const item of items) {
    if (typeof item !== "string" || !isService(item)) {
      errors.push(
        `${label}: unknown service ${String(item)} (expected one of ${SERVICE_ORDER.join(", ")})`,
      );
      continue;
    }
    requested.add(item);
  }
  return SERVICE_ORDER.filter((service) => requested.has(service));
}

function parseLogLevel(value: unknown, label: string, errors: string[]) {
  if (value === undefined) {
    return DEFAULT_CONFIG.log_level;
  }
  if (typeof value !== "string" || !isLogLevel(value)) {
    errors.push(`${label} must be one of fatal, error, warn, info, debug, trace, silent`);
    return DEFAULT_CONFIG.log_level;
  }
  return value;
}

function parseMode(
  value: unknown,
  label: string,
  errors: string[],
): ExecutionMode {
  if (value === undefined) {
    return DEFAULT_CONFIG.execution.mode;
  }
  if (value !== "sequential" && value !== "parallel") {
    errors.push(`${label} must be sequential or parallel`);
    return DEFAULT_CONFIG.execution.mode;
  }
  return value;
}

function parseSeverityOverrides(
  value: unknown,
  errors: string[],
): Record<string, Severity> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    errors.push("rules.severity must be a mapping");
    return undefined;
  }
  const result: Record<string, Severity> = {};
  for (const [ref, severity] of Object.entries(value)) {
    if (typeof severity !== "string" || !isSeverity(severity)) {
      errors.push(`rules.severity.${ref} must be one of info, warning, high`);
      continue;
    }
    result[ref] = severity;
  }
  return result;
}

function optionalRecord(
  value: unknown,
  label: string,
  errors: string[],
): Record<string, unknown> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    errors.push(`${label} must be a mapping`);
    return undefined;
  }
  return value;
}

function optionalString(
  value: unknown,
  label: string,
  errors: string[],
): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value.trim() === "") {
    errors.push(`${label} must be a non-empty string`);
    return undefined;
  }
  return value;
}

function optionalStringList(
  value: unknown,
  label: string,
  errors: string[],
): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const items: readonly unknown[] = Array.isArray(value) ? value : [];
  if (!Array.isArray(value) || items.some((item) => typeof item !== "string")) {
    errors.push(`${label} must be a list of strings`);
    return undefined;
  }
  return items.filter((item): item is string => typeof item === "string");
}

function nonNegativeInteger(
  value: unknown,
  label: string,
  fallback: number,
  errors: string[],
): number {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    errors.push(`${label} must be a non-negative integer`);
    return fallback;
  }
  return value;
}

function timeoutMs(
  value: unknown,
  label: string,
  fallback: number,
  errors: string[],
): number {
  const parsed = nonNegativeInteger(value, label, fallback, errors);
  if (parsed > MAX_SCAN_TIMEOUT_MS) {
    errors.push(`${label} must not exceed ${MAX_SCAN_TIMEOUT_MS} ms`);
    return fallback;
  }
  return parsed;
}

function positiveInteger(
  value: unknown,
  label: string,
  fallback: number,
  errors: string[],
): number {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    errors.push(`${label} must be a positive integer`);
    return fallback;
  }
  return value;
}

function fraction(
  value: unknown,
  label: string,
  fallback: number,
  errors: string[],
): number {
  if (value === undefined) {
    return fallback;
  }
  if (
    typeof value !== "number" ||
    !Number.isFinite(value) ||
    value < 0 ||
    value > 1
  ) {
    errors.push(`${label} must be a number between 0 and 1`);
    return fallback;
  }
  return value;
}

function checkKeys(
  value: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  label: string,
  errors: string[],
): void {
  for (const key of Object.keys(value)) {
    if (!allowed.has(key)) {
      errors.push(`${label}: unknown key ${key}`);
    }
  }
}

function isService(value: string): value is Service {
  return SERVICE_ORDER.some((service) => service === value);
}

function isSeverity(value: string): value is Severity {
  return SEVERITIES.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

async function existsFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}
