import { TimeoutError } from "./errors.js";

/**
 * Race a promise against a timer. The timer is cleared either way so nothing
 * keeps the event loop alive after the call settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wrap fetch so every request is aborted after `ms`, on top of any signal
 * the caller passes.
 */
export function fetchWithTimeout(ms: number, fetchFn: typeof fetch = fetch): typeof fetch {
  return (input, init) => {
    const controller = new AbortController();
    for (const signal of [AbortSignal.timeout(ms), init?.signal]) {
      if (!signal) continue;
      if (signal.aborted) {
        controller.abort(signal.reason);
      } else {
        signal.addEventListener("abort", () => controller.abort(signal.reason), { once: true });
      }
    }
    return fetchFn(input, { ...init, signal: controller.signal });
  };
}
