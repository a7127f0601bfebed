import { createFinding } from "./finding-factory.js";
import type {
  ConfigurationFinding,
  EvaluatedResource,
  ResourceLister,
  ResourceSnapshot,
  Rule,
  RuleDescriptor,
  RuleSource,
  Service,
} from "./types.js";

/**
 * Apply every rule to one resource, in table order. A resource yields at most
 * one finding per rule.
 */
export function evaluate<R extends ResourceSnapshot>(
  service: Service,
  resource: R,
  rules: readonly Rule<R>[],
): ConfigurationFinding[] {
  const findings: ConfigurationFinding[] = [];
  for (const rule of rules) {
    if (rule.predicate(resource)) {
      findings.push(createFinding(service, rule, resource));
    }
  }
  return findings;
}

export function defineRuleSource<R extends ResourceSnapshot>(
  lister: ResourceLister<R>,
  rules: readonly Rule<R>[],
): RuleSource {
  return {
    kind: lister.kind,
    rules: rules.map(describeRule),
    evaluateAll: (service, signal) =>
      evaluateListed(service, lister, rules, signal),
  };
}

async function* evaluateListed<R extends ResourceSnapshot>(
  service: Service,
  lister: ResourceLister<R>,
  rules: readonly Rule<R>[],
  signal: AbortSignal,
): AsyncGenerator<EvaluatedResource> {
  for await (const resource of lister.list(signal)) {
    signal.throwIfAborted();
    yield {
      resource_id: resource.resource_id,
      findings: evaluate(service, resource, rules),
    };
  }
}

function describeRule<R extends ResourceSnapshot>(
  rule: Rule<R>,
): RuleDescriptor {
  return {
    id: rule.id,
    title: rule.title,
    severity: rule.severity,
    message: rule.message,
    remediation: rule.remediation,
  };
}
