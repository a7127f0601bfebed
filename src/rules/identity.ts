import { Severity, type Rule } from "../scanner/types.js";
import type {
  AccessKeySnapshot,
  AccountSummarySnapshot,
  ManagedPolicySnapshot,
  PolicyStatement,
  PrincipalSnapshot,
} from "../resources/types.js";

export const ADMIN_POLICY_NAME = "AdministratorAccess";
export const DEFAULT_ACCESS_KEY_MAX_IDLE_DAYS = 90;

const DAY_MS = 24 * 60 * 60 * 1000;

export const ACCOUNT_SUMMARY_RULES: readonly Rule<AccountSummarySnapshot>[] = [
  {
    id: "root-mfa-disabled",
    title: "Root account has no MFA",
    severity: Severity.High,
    message: "Root account of {resource_id} does not have MFA enabled.",
    // A summary without the flag is treated as MFA disabled.
    predicate: (summary) => (summary.mfa_enabled ?? 0) === 0,
    remediation: "Enable a hardware or virtual MFA device for the root user.",
  },
];

export const MANAGED_POLICY_RULES: readonly Rule<ManagedPolicySnapshot>[] = [
  {
    id: "wildcard-policy",
    title: "Policy grants full administrative access",
    severity: Severity.High,
    message:
      "Overly permissive policy {resource_id} allows Action \"*\" on Resource \"*\".",
    predicate: (policy) => (policy.statements ?? []).some(isFullAdminStatement),
    remediation: "Scope the policy to the actions and resources the workload uses.",
  },
];

export const PRINCIPAL_RULES: readonly Rule<PrincipalSnapshot>[] = [
  {
    id: "admin-access-attached",
    title: "Principal has AdministratorAccess attached",
    severity: Severity.High,
    message: "IAM {principal_type} {resource_id} has AdministratorAccess attached.",
    predicate: (principal) =>
      (principal.attached_policy_names ?? []).includes(ADMIN_POLICY_NAME),
    remediation: "Replace AdministratorAccess with a least-privilege policy.",
  },
];

export interface AccessKeyRuleOptions {
  readonly maxIdleDays?: number;
  /** Evaluation clock; fixed at construction so the predicates stay pure. */
  readonly now?: Date;
}

export function createAccessKeyRules(
  options: AccessKeyRuleOptions = {},
): Rule<AccessKeySnapshot>[] {
  const maxIdleDays = options.maxIdleDays ?? DEFAULT_ACCESS_KEY_MAX_IDLE_DAYS;
  const nowMs = (options.now ?? new Date()).getTime();
  return [
    {
      id: "access-key-never-used",
      title: "Access key has never been used",
      severity: Severity.Warning,
      message:
        "Access key {resource_id} for user {user_name} has never been used.",
      predicate: (key) => key.last_used_at === undefined,
      remediation: "Deactivate and delete access keys that are not needed.",
    },
    {
      id: "access-key-stale",
      title: "Access key is stale",
      severity: Severity.Warning,
      message: `Access key {resource_id} for user {user_name} has not been used in over ${maxIdleDays} days (last used {last_used_at}).`,
      predicate: (key) =>
        key.last_used_at !== undefined &&
        nowMs - key.last_used_at.getTime() > maxIdleDays * DAY_MS,
      remediation: "Rotate or remove keys that are no longer in use.",
    },
  ];
}

export function isFullAdminStatement(statement: PolicyStatement): boolean {
  return (
    statement.effect === "Allow" &&
    includesWildcard(statement.action) &&
    includesWildcard(statement.resource)
  );
}

function includesWildcard(value: string | readonly string[] | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return value === "*";
  }
  return value.includes("*");
}
