import type { JsonReport, ServiceSection } from "./types.js";
import {
  applyFindingLimit,
  renderAsciiBox,
  renderAsciiTable,
  truncateText,
} from "./report-utils.js";

export interface TextRenderOptions {
  readonly showSummary?: boolean;
  readonly showFindings?: boolean;
  /** Per service; zero or absent shows every finding. */
  readonly maxFindings?: number;
  readonly messageWidth?: number;
}

export function renderTextReport(
  report: JsonReport,
  options: TextRenderOptions = {},
): string {
  const showSummary = options.showSummary ?? true;
  const showFindings = options.showFindings ?? true;
  const lines: string[] = [];

  if (showSummary) {
    lines.push(renderHeaderBlock(report));
    lines.push("");
    lines.push(
      renderAsciiTable(
        report.services.map((section) => [
          section.service,
          section.status,
          String(section.findings.length),
          `${section.duration_ms} ms`,
        ]),
        ["Service", "Status", "Findings", "Duration"],
      ),
    );
  }

  if (!showFindings) {
    return lines.join("\n");
  }

  for (const section of report.services) {
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(...renderServiceSection(section, options));
  }
  return lines.join("\n");
}

function renderHeaderBlock(report: JsonReport): string {
  const { counts, failed_services } = report.summary;
  return renderAsciiBox([
    "SkyAudit Scan Report",
    `Account: ${report.target.account_id ?? "unknown"}`,
    `Region: ${report.target.region ?? "default"}`,
    `Findings: ${counts.total} (high ${counts.high}, warning ${counts.warning}, info ${counts.info})`,
    `Failed services: ${failed_services.length > 0 ? failed_services.join(", ") : "none"}`,
  ]);
}

function renderServiceSection(
  section: ServiceSection,
  options: TextRenderOptions,
): string[] {
  const messageWidth = options.messageWidth ?? 120;
  const lines = [`### ${section.service}`, ""];
  const findings = applyFindingLimit(section.findings, options.maxFindings);

  if (section.findings.length === 0 && !section.failure) {
    lines.push("No misconfigurations found.");
    return lines;
  }

  if (findings.length > 0) {
    lines.push(
      renderAsciiTable(
        findings.map((finding) => [
          finding.id,
          finding.severity,
          finding.rule_id,
          truncateText(finding.resource_id, 40),
          truncateText(finding.message, messageWidth),
        ]),
        ["ID", "Severity", "Rule", "Resource", "Message"],
      ),
    );
  }

  if (section.findings.length > findings.length) {
    lines.push(
      `Showing ${findings.length} of ${section.findings.length} findings. Use --max-findings to adjust.`,
    );
  }

  if (section.failure) {
    if (findings.length > 0) {
      lines.push("");
    }
    lines.push(`SCAN FAILED: ${section.failure.message}`);
  }
  return lines;
}
