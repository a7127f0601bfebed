import { pino } from "pino";
import type { AwsCallContext } from "../src/providers/aws/aws-call.js";
import type { ResourceLister, ResourceSnapshot } from "../src/scanner/types.js";

export const silentLogger = pino({ level: "silent" });

export const noDelayContext: AwsCallContext = {
  retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 },
  logger: silentLogger,
};

export function awsError(name: string, message = name): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}

/** Yields the given resources, then throws `failWith` when set. */
export class FakeLister<R extends ResourceSnapshot> implements ResourceLister<R> {
  constructor(
    readonly kind: string,
    private readonly resources: readonly R[],
    private readonly failWith?: Error,
  ) {}

  async *list(signal: AbortSignal): AsyncGenerator<R> {
    for (const resource of this.resources) {
      signal.throwIfAborted();
      yield resource;
    }
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

/** Never yields; settles only when the signal aborts. */
export class HangingLister implements ResourceLister<ResourceSnapshot> {
  readonly kind = "hanging";

  async *list(signal: AbortSignal): AsyncGenerator<ResourceSnapshot> {
    await new Promise<void>((_resolve, reject) => {
      signal.addEventListener("abort", () => reject(signal.reason), {
        once: true,
      });
    });
  }
}
