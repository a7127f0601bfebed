import type { RuleDescriptor, Service, Severity } from "../scanner/types.js";

/** Rule references take the form `service/rule-id`. */
export interface RuleOverrides {
  readonly disabled?: readonly string[];
  readonly severity?: Readonly<Record<string, Severity>>;
}

export function ruleRef(service: Service, ruleId: string): string {
  return `${service}/${ruleId}`;
}

/** Works on full rules and on descriptors alike. */
export function applyRuleOverrides<T extends RuleDescriptor>(
  service: Service,
  rules: readonly T[],
  overrides: RuleOverrides = {},
): T[] {
  const disabled = new Set(overrides.disabled ?? []);
  const severities = new Map(Object.entries(overrides.severity ?? {}));
  const merged: T[] = [];
  for (const rule of rules) {
    const ref = ruleRef(service, rule.id);
    if (disabled.has(ref)) {
      continue;
    }
    const severity = severities.get(ref);
    merged.push(severity ? { ...rule, severity } : rule);
  }
  return merged;
}

export function findUnknownRuleRefs(
  overrides: RuleOverrides,
  catalog: ReadonlyMap<Service, readonly RuleDescriptor[]>,
): string[] {
  const known = new Set<string>();
  for (const [service, rules] of catalog) {
    for (const rule of rules) {
      known.add(ruleRef(service, rule.id));
    }
  }
  const refs = [
    ...(overrides.disabled ?? []),
    ...Object.keys(overrides.severity ?? {}),
  ];
  return [...new Set(refs.filter((ref) => !known.has(ref)))].sort();
}
