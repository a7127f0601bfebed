import {
  SCAN_FAILURE_RULE_ID,
  Severity,
  type ConfigurationFinding,
  type RuleDescriptor,
  type Service,
} from "../scanner/types.js";
import type { JsonReport } from "./types.js";

type SarifLevel = "error" | "warning" | "note";

interface SarifRule {
  readonly id: string;
  readonly name: string;
  readonly shortDescription: { readonly text: string };
  readonly help?: { readonly text: string };
  readonly properties?: Record<string, string>;
}

interface SarifResult {
  readonly ruleId: string;
  readonly level: SarifLevel;
  readonly message: { readonly text: string };
  readonly locations: readonly {
    readonly logicalLocations: readonly {
      readonly name: string;
      readonly fullyQualifiedName: string;
      readonly kind: "resource";
    }[];
  }[];
  readonly partialFingerprints: { readonly findingId: string };
  readonly properties?: Record<string, string>;
}

interface SarifNotification {
  readonly level: "error";
  readonly message: { readonly text: string };
  readonly descriptor: { readonly id: string };
  readonly properties: Record<string, string>;
}

interface SarifLog {
  readonly version: "2.1.0";
  readonly $schema: string;
  readonly runs: readonly {
    readonly tool: {
      readonly driver: {
        readonly name: string;
        readonly version: string;
        readonly rules: readonly SarifRule[];
      };
    };
    readonly invocations: readonly {
      readonly executionSuccessful: boolean;
      readonly toolExecutionNotifications: readonly SarifNotification[];
    }[];
    readonly results: readonly SarifResult[];
  }[];
}

export interface SarifRenderOptions {
  /** Supplies rule help text. */
  readonly catalog?: ReadonlyMap<Service, readonly RuleDescriptor[]>;
}

export function renderSarifReport(
  report: JsonReport,
  options: SarifRenderOptions = {},
): string {
  const remediation = remediationIndex(options.catalog);
  const rules: SarifRule[] = [];
  const seen = new Set<string>();
  const results: SarifResult[] = [];
  const notifications: SarifNotification[] = [];

  for (const section of report.services) {
    for (const finding of section.findings) {
      const ruleId = `${finding.service}/${finding.rule_id}`;
      if (!seen.has(ruleId)) {
        seen.add(ruleId);
        rules.push(buildRule(ruleId, finding, remediation.get(ruleId)));
      }
      results.push(buildResult(ruleId, finding));
    }
    if (section.failure) {
      notifications.push({
        level: "error",
        message: { text: section.failure.message },
        descriptor: { id: SCAN_FAILURE_RULE_ID },
        properties: {
          service: section.failure.service,
          resource_kind: section.failure.resource_id,
          error: section.failure.error.name,
        },
      });
    }
  }

  const sarif: SarifLog = {
    version: "2.1.0",
    $schema: "https://json.schemastore.org/sarif-2.1.0.json",
    runs: [
      {
        tool: {
          driver: {
            name: "SkyAudit",
            version: report.tool.version,
            rules,
          },
        },
        invocations: [
          {
            executionSuccessful: notifications.length === 0,
            toolExecutionNotifications: notifications,
          },
        ],
        results,
      },
    ],
  };
  return JSON.stringify(sarif, null, 2);
}

function buildRule(
  ruleId: string,
  finding: ConfigurationFinding,
  remediation: string | undefined,
): SarifRule {
  return {
    id: ruleId,
    name: finding.rule_id,
    shortDescription: { text: finding.title },
    help: remediation ? { text: remediation } : undefined,
    properties: {
      service: finding.service,
      severity: finding.severity,
    },
  };
}

function buildResult(
  ruleId: string,
  finding: ConfigurationFinding,
): SarifResult {
  return {
    ruleId,
    level: toSarifLevel(finding.severity),
    message: { text: finding.message },
    locations: [
      {
        logicalLocations: [
          {
            name: finding.resource_id,
            fullyQualifiedName: `${finding.service}/${finding.resource_id}`,
            kind: "resource",
          },
        ],
      },
    ],
    partialFingerprints: { findingId: finding.id },
    properties: {
      service: finding.service,
      severity: finding.severity,
    },
  };
}

function remediationIndex(
  catalog: ReadonlyMap<Service, readonly RuleDescriptor[]> | undefined,
): Map<string, string> {
  const index = new Map<string, string>();
  for (const [service, rules] of catalog ?? []) {
    for (const rule of rules) {
      if (rule.remediation) {
        index.set(`${service}/${rule.id}`, rule.remediation);
      }
    }
  }
  return index;
}

function toSarifLevel(severity: Severity): SarifLevel {
  switch (severity) {
    case Severity.High:
      return "error";
    case Severity.Warning:
      return "warning";
    case Severity.Info:
    default:
      return "note";
  }
}
