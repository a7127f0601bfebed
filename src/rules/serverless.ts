import { Severity, type Rule } from "../scanner/types.js";
import type { FunctionSnapshot } from "../resources/types.js";

export const FUNCTION_RULES: readonly Rule<FunctionSnapshot>[] = [
  {
    id: "env-not-kms-encrypted",
    title: "Function environment is not encrypted with a customer key",
    severity: Severity.Warning,
    message:
      "Lambda function {resource_id} environment variables are not encrypted with KMS.",
    predicate: (fn) => !fn.kms_key_arn,
    remediation: "Configure a customer managed KMS key for environment variable encryption.",
  },
  {
    id: "no-reserved-concurrency",
    title: "Function has no reserved concurrency",
    severity: Severity.Info,
    message: "Lambda function {resource_id} has no reserved concurrency set.",
    predicate: (fn) => fn.reserved_concurrency === undefined,
    remediation: "Reserve concurrency to cap how far the function can scale.",
  },
  {
    id: "resource-policy-attached",
    title: "Function has a resource policy",
    severity: Severity.Info,
    message:
      "Lambda function {resource_id} has a resource policy attached; review it for overly permissive access.",
    predicate: (fn) => fn.has_resource_policy === true,
    remediation: "Restrict the policy principals and add source ARN or account conditions.",
  },
];
