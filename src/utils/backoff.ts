export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  attempts?: number;
  /** Delay before the first retry in ms, doubled for each one after (default: 1000) */
  delay?: number;
  /** Upper bound for any single wait in ms (default: 10000) */
  maxDelay?: number;
  /** Spread each wait by up to 25% either way (default: true) */
  jitter?: boolean;
}

export const DEFAULT_RETRY = {
  attempts: 3,
  delay: 1000,
  maxDelay: 10_000,
  jitter: true,
} as const satisfies Required<RetryOptions>;

/**
 * Wait before retry number `retry` (1-based): `delay * 2^(retry-1)`,
 * capped at `maxDelay`, then jittered.
 */
export function backoffDelay(
  retry: number,
  options: RetryOptions = {},
  random: () => number = Math.random
): number {
  const { delay, maxDelay, jitter } = { ...DEFAULT_RETRY, ...options };
  const capped = Math.min(delay * 2 ** (retry - 1), maxDelay);
  if (!jitter) return Math.max(0, Math.floor(capped));

  const spread = capped * 0.25;
  return Math.max(0, Math.floor(capped - spread + random() * spread * 2));
}

/**
 * Milliseconds requested by a `Retry-After` header: delta seconds or an
 * HTTP date. Dates in the past and unparseable values give `undefined`.
 */
export function retryAfterMs(header: string | undefined, now: number = Date.now()): number | undefined {
  if (!header) return undefined;

  if (/^\d+$/.test(header.trim())) {
    return Number(header.trim()) * 1000;
  }

  const at = Date.parse(header);
  if (Number.isNaN(at) || at <= now) return undefined;
  return at - now;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Aborted');
}

/**
 * Resolve after `ms`, or reject as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };

    timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
