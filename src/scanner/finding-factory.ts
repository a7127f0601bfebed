import crypto from "node:crypto";
import {
  SCAN_FAILURE_RULE_ID,
  type ConfigurationFinding,
  type ErrorDetail,
  type ResourceSnapshot,
  type Rule,
  type ScanFailure,
  type Service,
} from "./types.js";

const MISSING_VALUE = "unknown";

export function createFinding<R extends ResourceSnapshot>(
  service: Service,
  rule: Rule<R>,
  resource: R,
): ConfigurationFinding {
  const message = renderMessage(rule.message, resource);
  const finding: ConfigurationFinding = {
    kind: "finding",
    id: createFindingId(service, rule.id, resource.resource_id, message),
    service,
    resource_id: resource.resource_id,
    rule_id: rule.id,
    severity: rule.severity,
    title: rule.title,
    message,
  };
  return Object.freeze(finding);
}

export function createScanFailure(
  service: Service,
  resourceKind: string,
  error: unknown,
): ScanFailure {
  const detail = describeError(error);
  const message = `Scan of ${service} stopped while listing ${resourceKind}: ${detail.name}: ${detail.detail}`;
  const failure: ScanFailure = {
    kind: "scan_failure",
    id: createFindingId(service, SCAN_FAILURE_RULE_ID, resourceKind, message),
    service,
    resource_id: resourceKind,
    rule_id: SCAN_FAILURE_RULE_ID,
    message,
    error: detail,
  };
  return Object.freeze(failure);
}

export function createFindingId(
  service: string,
  ruleId: string,
  resourceId: string,
  message: string,
): string {
  const input = `${service}:${ruleId}:${resourceId}:${message}`;
  const hash = crypto.createHash("sha256").update(input).digest("hex");
  return hash.slice(0, 12);
}

export function renderMessage(template: string, resource: object): string {
  const values = new Map<string, unknown>(Object.entries(resource));
  return template.replace(/\{([a-z0-9_]+)\}/gi, (_match, key: string) =>
    formatValue(values.get(key)),
  );
}

export function describeError(error: unknown): ErrorDetail {
  if (error instanceof Error) {
    return { name: error.name, detail: error.message };
  }
  return { name: "Error", detail: String(error) };
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return MISSING_VALUE;
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? value.map(formatValue).join(", ") : "none";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}
