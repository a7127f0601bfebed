import type { Logger } from "pino";
import type { ScanConfig } from "../../config/types.js";
import type { ServiceScanner } from "../../scanner/service-scanner.js";
import {
  createAwsClients,
  destroyAwsClients,
  resolveCallerIdentity,
  type CallerIdentity,
} from "./client-factory.js";
import { createAwsScanners } from "./scanner-factory.js";

export interface ScanSession {
  readonly identity: CallerIdentity;
  readonly scanners: readonly ServiceScanner[];
  close(): void;
}

export type ScanSessionFactory = (
  config: ScanConfig,
  logger: Logger,
) => Promise<ScanSession>;

/**
 * Build clients for the configured region and check credentials before any
 * scanner is created. A failed preflight releases the clients and rethrows.
 */
export const openAwsSession: ScanSessionFactory = async (config, logger) => {
  const clients = createAwsClients({ region: config.region });
  let identity: CallerIdentity;
  try {
    identity = await resolveCallerIdentity(clients.sts);
  } catch (error) {
    destroyAwsClients(clients);
    throw error;
  }
  logger.info(
    { account_id: identity.accountId, region: identity.region },
    "credentials resolved",
  );

  const scanners = createAwsScanners({
    clients,
    logger,
    services: config.services,
    accountId: identity.accountId,
    retry: config.retry,
    serviceTimeoutMs: config.execution.service_timeout_ms,
    ruleOverrides: config.rules,
    accessKeyMaxIdleDays: config.identity.access_key_max_idle_days,
  });
  return {
    identity,
    scanners,
    close: () => destroyAwsClients(clients),
  };
};
