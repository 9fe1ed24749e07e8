/**
 * Helpers shared by the mock transports.
 */

/**
 * Builds a response envelope.
 */
export function envelope(
  response: Record<string, unknown> = {},
  code = 0,
  message = code === 0 ? 'OK' : 'Error'
): { response: Record<string, unknown>; messages: Array<{ code: string; message: string }> } {
  return { response, messages: [{ code: String(code), message }] };
}

/**
 * Resolves after `ms`, or rejects with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
