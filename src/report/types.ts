import type {
  ConfigurationFinding,
  ScanFailure,
  Service,
} from "../scanner/types.js";

export interface ToolInfo {
  readonly name: "skyaudit";
  readonly version: string;
}

export interface TargetInfo {
  readonly account_id?: string;
  readonly region?: string;
}

export interface SummaryCounts {
  high: number;
  warning: number;
  info: number;
  total: number;
}

export interface SummaryInfo {
  readonly counts: SummaryCounts;
  readonly failed_services: readonly Service[];
}

export interface ServiceSection {
  readonly service: Service;
  readonly status: "completed" | "failed";
  readonly findings: readonly ConfigurationFinding[];
  readonly failure?: ScanFailure;
  readonly duration_ms: number;
}

export interface ScanMetadata {
  readonly started_at: string;
  readonly completed_at: string;
  readonly duration_ms: number;
  readonly rules_loaded: number;
}

export interface JsonReport {
  readonly tool: ToolInfo;
  readonly target: TargetInfo;
  readonly summary: SummaryInfo;
  readonly services: readonly ServiceSection[];
  readonly scan_metadata: ScanMetadata;
}

export interface ReportMeta {
  readonly toolVersion: string;
  readonly target: TargetInfo;
  readonly scanMetadata: ScanMetadata;
}

export type ReportFormat = "text" | "json" | "sarif";
