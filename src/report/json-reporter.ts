import { Severity, type ScanReport } from "../scanner/types.js";
import type {
  JsonReport,
  ReportMeta,
  ServiceSection,
  SummaryCounts,
} from "./types.js";

/** Services keep registration order and findings keep discovery order. */
export function buildJsonReport(
  report: ScanReport,
  meta: ReportMeta,
): JsonReport {
  const services: ServiceSection[] = [];
  for (const result of report.values()) {
    services.push(
      result.status === "failed"
        ? {
            service: result.service,
            status: result.status,
            findings: result.findings,
            failure: result.failure,
            duration_ms: result.duration_ms,
          }
        : {
            service: result.service,
            status: result.status,
            findings: result.findings,
            duration_ms: result.duration_ms,
          },
    );
  }

  return {
    tool: { name: "skyaudit", version: meta.toolVersion },
    target: meta.target,
    summary: {
      counts: countFindings(services),
      failed_services: services
        .filter((section) => section.status === "failed")
        .map((section) => section.service),
    },
    services,
    scan_metadata: meta.scanMetadata,
  };
}

export function countFindings(
  services: readonly ServiceSection[],
): SummaryCounts {
  const counts: SummaryCounts = { high: 0, warning: 0, info: 0, total: 0 };

  for (const section of services) {
    for (const finding of section.findings) {
      counts.total += 1;
      switch (finding.severity) {
        case Severity.High:
          counts.high += 1;
          break;
        case Severity.Warning:
          counts.warning += 1;
          break;
        case Severity.Info:
          counts.info += 1;
          break;
        default:
          break;
      }
    }
  }

  return counts;
}
