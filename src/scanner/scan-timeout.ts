/** Largest delay a Node timer honours; longer delays fire after 1 ms. */
export const MAX_SCAN_TIMEOUT_MS = 2_147_483_647;

export class ScanTimeoutError extends Error {
  constructor(
    readonly service: string,
    readonly timeoutMs: number,
  ) {
    super(`Scan of ${service} exceeded ${timeoutMs}ms`);
    this.name = "ScanTimeoutError";
  }
}

/** Rejects with the signal's reason once it aborts; never resolves. */
export function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), {
      once: true,
    });
  });
}
