export { createAwsScanners } from "./scanner-factory.js";
export type { AwsScannerOptions } from "./scanner-factory.js";
export {
  createAwsClients,
  destroyAwsClients,
  resolveCallerIdentity,
} from "./client-factory.js";
export type {
  AwsClientOptions,
  AwsClients,
  CallerIdentity,
} from "./client-factory.js";
export { DEFAULT_RETRY_POLICY, isThrottlingError, withRetry } from "./retry.js";
export type { RetryPolicy } from "./retry.js";
export { openAwsSession } from "./session.js";
export type { ScanSession, ScanSessionFactory } from "./session.js";
