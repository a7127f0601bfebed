export const enum Severity {
  Info = "info",
  Warning = "warning",
  High = "high",
}

export const enum Service {
  Compute = "compute",
  Identity = "identity",
  Serverless = "serverless",
  Database = "database",
  Network = "network",
  Storage = "storage",
}

/** Registration order; reports list services in this order. */
export const SERVICE_ORDER: readonly Service[] = [
  Service.Compute,
  Service.Identity,
  Service.Serverless,
  Service.Database,
  Service.Network,
  Service.Storage,
];

export const SCAN_FAILURE_RULE_ID = "scan-failure";

export interface ResourceSnapshot {
  readonly resource_id: string;
}

export interface Rule<R extends ResourceSnapshot> {
  readonly id: string;
  readonly title: string;
  readonly severity: Severity;
  /** `{attribute}` placeholders are filled from the resource snapshot. */
  readonly message: string;
  readonly predicate: (resource: R) => boolean;
  readonly remediation?: string;
}

export interface ConfigurationFinding {
  readonly kind: "finding";
  readonly id: string;
  readonly service: Service;
  readonly resource_id: string;
  readonly rule_id: string;
  readonly severity: Severity;
  readonly title: string;
  readonly message: string;
}

export interface ErrorDetail {
  readonly name: string;
  readonly detail: string;
}

export interface ScanFailure {
  readonly kind: "scan_failure";
  readonly id: string;
  readonly service: Service;
  /** The resource kind that was being listed when the scan stopped. */
  readonly resource_id: string;
  readonly rule_id: typeof SCAN_FAILURE_RULE_ID;
  readonly message: string;
  readonly error: ErrorDetail;
}

export type ReportEntry = ConfigurationFinding | ScanFailure;

export interface ResourceLister<R extends ResourceSnapshot> {
  readonly kind: string;
  list(signal: AbortSignal): AsyncIterable<R>;
}

export type RuleDescriptor = Omit<Rule<ResourceSnapshot>, "predicate">;

export interface EvaluatedResource {
  readonly resource_id: string;
  readonly findings: readonly ConfigurationFinding[];
}

/**
 * A lister bound to the rules that apply to its resources. The resource type
 * is erased so one service can own sources of different kinds.
 */
export interface RuleSource {
  readonly kind: string;
  readonly rules: readonly RuleDescriptor[];
  evaluateAll(
    service: Service,
    signal: AbortSignal,
  ): AsyncIterable<EvaluatedResource>;
}

export interface CompletedServiceResult {
  readonly status: "completed";
  readonly service: Service;
  readonly findings: readonly ConfigurationFinding[];
  readonly duration_ms: number;
}

export interface FailedServiceResult {
  readonly status: "failed";
  readonly service: Service;
  readonly findings: readonly ConfigurationFinding[];
  readonly failure: ScanFailure;
  readonly duration_ms: number;
}

export type ServiceResult = CompletedServiceResult | FailedServiceResult;

export type ScanReport = ReadonlyMap<Service, ServiceResult>;
