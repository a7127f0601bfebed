import fs from "node:fs/promises";
import type { DestinationStream } from "pino";
import { loadConfig } from "../config/config-loader.js";
import type { ConfigOverrides } from "../config/types.js";
import { createLogger } from "../logging/logger.js";
import {
  openAwsSession,
  type ScanSessionFactory,
} from "../providers/aws/session.js";
import { effectiveRuleCatalog, type RuleOverrides } from "../rules/index.js";
import { runAllScans } from "../scanner/orchestrator.js";
import { buildJsonReport } from "../report/json-reporter.js";
import { renderSarifReport } from "../report/sarif-reporter.js";
import {
  renderTextReport,
  type TextRenderOptions,
} from "../report/text-reporter.js";
import type { JsonReport, ReportFormat } from "../report/types.js";

export type ShowSection = "summary" | "findings" | "all";

export interface ScanOptions {
  readonly format: ReportFormat;
  readonly out?: string;
  readonly region?: string;
  readonly services?: readonly string[];
  readonly configPath?: string;
  readonly parallel?: boolean;
  readonly timeoutMs?: number;
  readonly logLevel?: string;
  readonly show?: ShowSection;
  readonly maxFindings?: number;
}

/** Seams for tests; production runs use the defaults. */
export interface ScanDependencies {
  readonly openSession?: ScanSessionFactory;
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly cwd?: string;
  readonly logDestination?: DestinationStream;
  readonly clock?: () => Date;
}

export interface ScanResult {
  readonly report: JsonReport;
  readonly output: string;
}

/**
 * Load configuration, open a session and run every selected scanner. Throws
 * only when the run cannot start; failed services end up in the report.
 */
export async function runScanCommand(
  options: ScanOptions,
  toolVersion: string,
  deps: ScanDependencies = {},
): Promise<ScanResult> {
  const clock = deps.clock ?? (() => new Date());
  const config = await loadConfig({
    configPath: options.configPath,
    env: deps.env,
    cwd: deps.cwd,
    overrides: toConfigOverrides(options),
  });
  const logger = createLogger({
    level: config.log_level,
    destination: deps.logDestination,
  });

  const openSession = deps.openSession ?? openAwsSession;
  const session = await openSession(config, logger);
  let report: JsonReport;
  try {
    const startedAt = clock();
    const scanReport = await runAllScans(session.scanners, {
      logger,
      mode: config.execution.mode,
    });
    const completedAt = clock();
    report = buildJsonReport(scanReport, {
      toolVersion,
      target: {
        account_id: session.identity.accountId,
        region: session.identity.region,
      },
      scanMetadata: {
        started_at: startedAt.toISOString(),
        completed_at: completedAt.toISOString(),
        duration_ms: completedAt.getTime() - startedAt.getTime(),
        rules_loaded: session.scanners.reduce(
          (sum, scanner) => sum + scanner.rules.length,
          0,
        ),
      },
    });
  } finally {
    session.close();
  }

  const output = buildOutput(report, options, config.rules);
  if (options.out) {
    await fs.writeFile(options.out, output, "utf8");
    logger.info({ path: options.out }, "report written");
  }
  return { report, output };
}

function toConfigOverrides(options: ScanOptions): ConfigOverrides {
  return {
    region: options.region,
    services: options.services,
    logLevel: options.logLevel,
    mode: options.parallel ? "parallel" : undefined,
    serviceTimeoutMs: options.timeoutMs,
  };
}

function buildOutput(
  report: JsonReport,
  options: ScanOptions,
  ruleOverrides: RuleOverrides,
): string {
  if (options.format === "json") {
    return JSON.stringify(report, null, 2);
  }
  if (options.format === "sarif") {
    return renderSarifReport(report, {
      catalog: effectiveRuleCatalog(ruleOverrides),
    });
  }
  return renderTextReport(report, buildTextOptions(options));
}

function buildTextOptions(options: ScanOptions): TextRenderOptions {
  const show = options.show ?? "all";
  return {
    showSummary: show === "summary" || show === "all",
    showFindings: show === "findings" || show === "all",
    maxFindings: options.maxFindings,
  };
}
