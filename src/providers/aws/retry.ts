import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";

export interface RetryPolicy {
  /** Total attempts, the first call included. */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  /** Fraction of the delay added or removed at random. */
  readonly jitterFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5000,
  jitterFactor: 0.2,
};

export const THROTTLING_ERROR_NAMES: ReadonlySet<string> = new Set([
  "Throttling",
  "ThrottlingException",
  "ThrottledException",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "RequestThrottled",
  "RequestThrottledException",
  "EC2ThrottledException",
  "ProvisionedThroughputExceededException",
  "SlowDown",
  "PriorRequestNotComplete",
  "BandwidthLimitExceeded",
]);

export interface RetryOptions {
  readonly policy?: RetryPolicy;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
  readonly random?: () => number;
}

export function isThrottlingError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (THROTTLING_ERROR_NAMES.has(error.name)) {
    return true;
  }
  return httpStatusOf(error) === 429;
}

export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * 2 ** attempt;
  const capped = Math.min(exponential, policy.maxDelayMs);
  const jitter = capped * policy.jitterFactor * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

/**
 * Run an AWS call, retrying throttling errors with exponential backoff.
 * Every other error is thrown on the first attempt.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  options: RetryOptions = {},
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const canRetry =
        attempt + 1 < attempts &&
        isThrottlingError(error) &&
        !options.signal?.aborted;
      if (!canRetry) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, policy, options.random);
      options.logger?.warn(
        {
          operation: operationName,
          attempt: attempt + 1,
          max_attempts: attempts,
          delay_ms: delayMs,
          error: error instanceof Error ? error.name : String(error),
        },
        "throttled, retrying",
      );
      await sleep(delayMs, undefined, { signal: options.signal });
    }
  }
}

function httpStatusOf(error: Error): number | undefined {
  if (!("$metadata" in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (
    typeof metadata === "object" &&
    metadata !== null &&
    "httpStatusCode" in metadata &&
    typeof metadata.httpStatusCode === "number"
  ) {
    return metadata.httpStatusCode;
  }
  return undefined;
}
