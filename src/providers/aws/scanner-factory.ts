import type { Logger } from "pino";
import { defineRuleSource } from "../../scanner/rule-engine.js";
import { ServiceScanner } from "../../scanner/service-scanner.js";
import {
  SERVICE_ORDER,
  Service,
  type RuleSource,
} from "../../scanner/types.js";
import {
  ACCOUNT_SUMMARY_RULES,
  BUCKET_RULES,
  DATABASE_RULES,
  FUNCTION_RULES,
  INGRESS_RULES,
  INSTANCE_RULES,
  MANAGED_POLICY_RULES,
  PRINCIPAL_RULES,
  applyRuleOverrides,
  createAccessKeyRules,
  type RuleOverrides,
} from "../../rules/index.js";
import type { AwsCallContext } from "./aws-call.js";
import type { AwsClients } from "./client-factory.js";
import { InstanceLister } from "./compute.js";
import { DatabaseLister } from "./database.js";
import {
  AccessKeyLister,
  AccountSummaryLister,
  ManagedPolicyLister,
  PrincipalLister,
} from "./identity.js";
import { IngressRangeLister } from "./network.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry.js";
import { FunctionLister } from "./serverless.js";
import { BucketLister } from "./storage.js";

export interface AwsScannerOptions {
  readonly clients: AwsClients;
  readonly logger: Logger;
  /** Subset to run; registration order is kept regardless of this order. */
  readonly services?: readonly Service[];
  readonly accountId?: string;
  readonly retry?: RetryPolicy;
  readonly serviceTimeoutMs?: number;
  readonly ruleOverrides?: RuleOverrides;
  readonly accessKeyMaxIdleDays?: number;
  readonly now?: Date;
}

export function createAwsScanners(options: AwsScannerOptions): ServiceScanner[] {
  const selected = new Set(options.services ?? SERVICE_ORDER);
  return SERVICE_ORDER.filter((service) => selected.has(service)).map(
    (service) =>
      new ServiceScanner({
        service,
        sources: buildSources(service, options),
        logger: options.logger,
        timeoutMs: options.serviceTimeoutMs,
      }),
  );
}

function buildSources(
  service: Service,
  options: AwsScannerOptions,
): RuleSource[] {
  const { clients, ruleOverrides } = options;
  const context: AwsCallContext = {
    retry: options.retry ?? DEFAULT_RETRY_POLICY,
    logger: options.logger.child({ service }),
  };

  switch (service) {
    case Service.Compute:
      return [
        defineRuleSource(
          new InstanceLister(clients.ec2, context),
          applyRuleOverrides(service, INSTANCE_RULES, ruleOverrides),
        ),
      ];
    case Service.Identity:
      return [
        defineRuleSource(
          new AccountSummaryLister(clients.iam, context, options.accountId),
          applyRuleOverrides(service, ACCOUNT_SUMMARY_RULES, ruleOverrides),
        ),
        defineRuleSource(
          new ManagedPolicyLister(clients.iam, context),
          applyRuleOverrides(service, MANAGED_POLICY_RULES, ruleOverrides),
        ),
        defineRuleSource(
          new AccessKeyLister(clients.iam, context),
          applyRuleOverrides(
            service,
            createAccessKeyRules({
              maxIdleDays: options.accessKeyMaxIdleDays,
              now: options.now,
            }),
            ruleOverrides,
          ),
        ),
        defineRuleSource(
          new PrincipalLister(clients.iam, context),
          applyRuleOverrides(service, PRINCIPAL_RULES, ruleOverrides),
        ),
      ];
    case Service.Serverless:
      return [
        defineRuleSource(
          new FunctionLister(clients.lambda, context),
          applyRuleOverrides(service, FUNCTION_RULES, ruleOverrides),
        ),
      ];
    case Service.Database:
      return [
        defineRuleSource(
          new DatabaseLister(clients.rds, context),
          applyRuleOverrides(service, DATABASE_RULES, ruleOverrides),
        ),
      ];
    case Service.Network:
      return [
        defineRuleSource(
          new IngressRangeLister(clients.ec2, context),
          applyRuleOverrides(service, INGRESS_RULES, ruleOverrides),
        ),
      ];
    case Service.Storage:
      return [
        defineRuleSource(
          new BucketLister(clients.s3, context),
          applyRuleOverrides(service, BUCKET_RULES, ruleOverrides),
        ),
      ];
  }
}
