import type { Logger } from "pino";
import type {
  ReportEntry,
  ScanReport,
  Service,
  ServiceResult,
} from "./types.js";

export type ExecutionMode = "sequential" | "parallel";

export interface Scanner {
  readonly service: Service;
  scan(): Promise<ServiceResult>;
}

export interface RunOptions {
  readonly logger: Logger;
  readonly mode?: ExecutionMode;
}

/**
 * Run every scanner once. The report lists services in registration order
 * whatever the completion order was.
 */
export async function runAllScans(
  scanners: readonly Scanner[],
  options: RunOptions,
): Promise<ScanReport> {
  const mode = options.mode ?? "sequential";
  const logger = options.logger;
  assertUniqueServices(scanners);
  logger.info(
    { mode, services: scanners.map((scanner) => scanner.service) },
    "scan started",
  );

  const results: ServiceResult[] = [];
  if (mode === "parallel") {
    results.push(...(await Promise.all(scanners.map((s) => s.scan()))));
  } else {
    for (const scanner of scanners) {
      results.push(await scanner.scan());
    }
  }

  const report = new Map<Service, ServiceResult>();
  for (const result of results) {
    report.set(result.service, result);
  }

  logger.info(
    {
      findings: results.reduce((sum, r) => sum + r.findings.length, 0),
      failed: results
        .filter((result) => result.status === "failed")
        .map((result) => result.service),
    },
    "scan completed",
  );
  return report;
}

/** Findings in discovery order, followed by the scan failure if there was one. */
export function reportEntries(result: ServiceResult): ReportEntry[] {
  const entries: ReportEntry[] = [...result.findings];
  if (result.status === "failed") {
    entries.push(result.failure);
  }
  return entries;
}

function assertUniqueServices(scanners: readonly Scanner[]): void {
  const seen = new Set<Service>();
  for (const scanner of scanners) {
    if (seen.has(scanner.service)) {
      throw new Error(`Duplicate scanner registered for ${scanner.service}`);
    }
    seen.add(scanner.service);
  }
}
