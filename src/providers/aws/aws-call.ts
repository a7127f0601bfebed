import type { Logger } from "pino";
import { withRetry, type RetryPolicy } from "./retry.js";

export interface AwsCallContext {
  readonly retry: RetryPolicy;
  readonly logger: Logger;
}

export function callAws<T>(
  context: AwsCallContext,
  signal: AbortSignal,
  operationName: string,
  operation: () => Promise<T>,
): Promise<T> {
  return withRetry(operation, operationName, {
    policy: context.retry,
    signal,
    logger: context.logger,
  });
}

/** Follow a continuation token until the provider stops returning one. */
export async function* paginate<TPage>(
  fetchPage: (token: string | undefined) => Promise<TPage>,
  nextToken: (page: TPage) => string | undefined,
): AsyncGenerator<TPage> {
  let token: string | undefined;
  do {
    const page = await fetchPage(token);
    yield page;
    token = nextToken(page);
  } while (token);
}

export function isAwsError(error: unknown, ...names: string[]): boolean {
  return error instanceof Error && names.includes(error.name);
}
