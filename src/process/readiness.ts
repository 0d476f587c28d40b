/**
 * HTTP readiness check. Polls with exponential backoff until the endpoint
 * answers with an accepted status or the deadline passes.
 */

import { setTimeout as sleep } from 'node:timers/promises';

export interface ReadinessOptions {
  timeoutMs: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  /** Bound on a single attempt */
  attemptTimeoutMs?: number;
  accept?: (status: number) => boolean;
  signal?: AbortSignal;
  fetch?: typeof fetch;
}

export const acceptOk = (status: number): boolean => status === 200;
/** Any answer short of a server error means something is listening */
export const acceptListening = (status: number): boolean => status < 500;

export async function checkOnce(
  url: string,
  options: Pick<ReadinessOptions, 'attemptTimeoutMs' | 'accept' | 'signal' | 'fetch'> = {},
): Promise<boolean> {
  const fetchFn = options.fetch ?? fetch;
  const accept = options.accept ?? acceptOk;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.attemptTimeoutMs ?? 5000);
  const forward = () => controller.abort();
  options.signal?.addEventListener('abort', forward, { once: true });

  try {
    const res = await fetchFn(url, { signal: controller.signal });
    await res.arrayBuffer();
    return accept(res.status);
  } catch {
    return false;
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener('abort', forward);
  }
}

export async function waitForHttp(url: string, options: ReadinessOptions): Promise<boolean> {
  const deadline = Date.now() + options.timeoutMs;
  const maxDelay = options.maxDelayMs ?? 4000;
  let delay = options.initialDelayMs ?? 250;

  for (;;) {
    if (options.signal?.aborted) return false;
    if (await checkOnce(url, options)) return true;

    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    try {
      await sleep(Math.min(delay, remaining), undefined, { signal: options.signal });
    } catch {
      return false;
    }
    delay = Math.min(delay * 2, maxDelay);
  }
}
