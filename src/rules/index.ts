import { Service, type RuleDescriptor } from "../scanner/types.js";
import { INSTANCE_RULES } from "./compute.js";
import { DATABASE_RULES } from "./database.js";
import {
  ACCOUNT_SUMMARY_RULES,
  MANAGED_POLICY_RULES,
  PRINCIPAL_RULES,
  createAccessKeyRules,
} from "./identity.js";
import { INGRESS_RULES } from "./network.js";
import { applyRuleOverrides, type RuleOverrides } from "./rule-overrides.js";
import { FUNCTION_RULES } from "./serverless.js";
import { BUCKET_RULES } from "./storage.js";

export { INSTANCE_RULES } from "./compute.js";
export { DATABASE_RULES } from "./database.js";
export {
  ACCOUNT_SUMMARY_RULES,
  ADMIN_POLICY_NAME,
  DEFAULT_ACCESS_KEY_MAX_IDLE_DAYS,
  MANAGED_POLICY_RULES,
  PRINCIPAL_RULES,
  createAccessKeyRules,
  isFullAdminStatement,
} from "./identity.js";
export type { AccessKeyRuleOptions } from "./identity.js";
export {
  DANGEROUS_PORTS,
  INGRESS_RULES,
  WORLD_CIDR,
  exposesDangerousPort,
  formatPortRange,
} from "./network.js";
export { FUNCTION_RULES } from "./serverless.js";
export { ALL_USERS_URI, BUCKET_RULES } from "./storage.js";
export {
  applyRuleOverrides,
  findUnknownRuleRefs,
  ruleRef,
} from "./rule-overrides.js";
export type { RuleOverrides } from "./rule-overrides.js";

/** Built-in rules per service, in evaluation order. */
export function builtinRuleCatalog(): Map<Service, RuleDescriptor[]> {
  return new Map<Service, RuleDescriptor[]>([
    [Service.Compute, INSTANCE_RULES.map(describe)],
    [
      Service.Identity,
      [
        ...ACCOUNT_SUMMARY_RULES.map(describe),
        ...MANAGED_POLICY_RULES.map(describe),
        ...createAccessKeyRules().map(describe),
        ...PRINCIPAL_RULES.map(describe),
      ],
    ],
    [Service.Serverless, FUNCTION_RULES.map(describe)],
    [Service.Database, DATABASE_RULES.map(describe)],
    [Service.Network, INGRESS_RULES.map(describe)],
    [Service.Storage, BUCKET_RULES.map(describe)],
  ]);
}

/** The catalog with disabled rules removed and severities replaced. */
export function effectiveRuleCatalog(
  overrides: RuleOverrides = {},
): Map<Service, RuleDescriptor[]> {
  const catalog = new Map<Service, RuleDescriptor[]>();
  for (const [service, rules] of builtinRuleCatalog()) {
    catalog.set(service, applyRuleOverrides(service, rules, overrides));
  }
  return catalog;
}

function describe(rule: RuleDescriptor): RuleDescriptor {
  return {
    id: rule.id,
    title: rule.title,
    severity: rule.severity,
    message: rule.message,
    remediation: rule.remediation,
  };
}
