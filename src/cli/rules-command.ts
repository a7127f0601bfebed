import { loadConfig } from "../config/config-loader.js";
import { effectiveRuleCatalog } from "../rules/index.js";
import { renderAsciiTable } from "../report/report-utils.js";
import type { Service, Severity } from "../scanner/types.js";

export interface RulesOptions {
  readonly format: "text" | "json";
  readonly configPath?: string;
}

export interface RuleListing {
  readonly service: Service;
  readonly id: string;
  readonly severity: Severity;
  readonly title: string;
  readonly message: string;
  readonly remediation?: string;
}

export interface RulesDependencies {
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly cwd?: string;
}

/** List the rules a scan would apply, after configuration overrides. */
export async function runRulesCommand(
  options: RulesOptions,
  deps: RulesDependencies = {},
): Promise<string> {
  const config = await loadConfig({
    configPath: options.configPath,
    env: deps.env,
    cwd: deps.cwd,
  });
  const listings: RuleListing[] = [];
  for (const [service, rules] of effectiveRuleCatalog(config.rules)) {
    if (!config.services.includes(service)) {
      continue;
    }
    for (const rule of rules) {
      listings.push({
        service,
        id: rule.id,
        severity: rule.severity,
        title: rule.title,
        message: rule.message,
        remediation: rule.remediation,
      });
    }
  }

  if (options.format === "json") {
    return JSON.stringify(listings, null, 2);
  }
  return renderAsciiTable(
    listings.map((rule) => [rule.service, rule.id, rule.severity, rule.title]),
    ["Service", "Rule", "Severity", "Title"],
  );
}
