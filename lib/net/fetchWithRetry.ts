import type { Logger } from '../logger';
import { CancelledError, FetchError, errorMessage } from '../errors';
import { incFetchRetries } from '../metrics';

export type BackoffStrategy = 'fixed' | 'exponential';

export interface RetryPolicy {
  maxAttempts: number; // total attempts, including the first
  baseDelayMs: number;
  backoff: BackoffStrategy;
}

export interface FetchRetryOptions {
  retry: RetryPolicy;
  timeoutMs: number; // per attempt, restarted whenever the body makes progress
  signal?: AbortSignal;
  logger: Logger;
}

/** Handed to the body reader so a steadily streaming body is not cut off by the timeout. */
export interface AttemptContext {
  signal: AbortSignal;
  keepAlive(): void;
}

export type ResponseReader<T> = (res: Response, ctx: AttemptContext) => Promise<T>;

export class HttpStatusError extends Error {
  constructor(readonly status: number, readonly retryAfterMs?: number) {
    super(`HTTP ${status}`);
    this.name = 'HttpStatusError';
  }
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  if (policy.backoff === 'fixed') return policy.baseDelayMs;
  return policy.baseDelayMs * Math.pow(2, attempt - 1);
}

/**
 * GET `url` and hand the response to `read`, retrying per `opts.retry`.
 * Connection errors, timeouts, non-2xx statuses and errors thrown by `read` all count
 * as a failed attempt. Throws `FetchError` once every attempt failed and
 * `CancelledError` as soon as `opts.signal` fires.
 */
export async function fetchWithRetry<T>(
  url: string,
  init: RequestInit,
  opts: FetchRetryOptions,
  read: ResponseReader<T>,
): Promise<T> {
  const { retry, logger, signal } = opts;
  const maxAttempts = Math.max(1, Math.floor(retry.maxAttempts));
  let lastError: unknown;
  let lastStatus: number | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) throw new CancelledError();
    try {
      return await execAttempt(url, init, opts, read);
    } catch (err) {
      if (signal?.aborted) throw new CancelledError();
      lastError = err;
      if (err instanceof HttpStatusError) lastStatus = err.status;
      if (attempt >= maxAttempts) break;

      // Retry-After may shorten the policy's delay, never lengthen it
      const policyDelay = backoffDelay(retry, attempt);
      const delay =
        err instanceof HttpStatusError && err.retryAfterMs !== undefined
          ? Math.min(err.retryAfterMs, policyDelay)
          : policyDelay;
      logger.warn(
        { url, attempt, maxAttempts, delay, err: errorMessage(err) },
        `Attempt ${attempt} failed, retrying in ${delay}ms`,
      );
      incFetchRetries();
      await delayMs(delay, signal);
    }
  }

  logger.error({ url, attempts: maxAttempts, err: errorMessage(lastError) }, 'Final attempt failed');
  throw new FetchError(`Failed to fetch data after ${maxAttempts} attempt(s): ${errorMessage(lastError)}`, {
    attempts: maxAttempts,
    status: lastStatus,
    cause: lastError,
  });
}

async function execAttempt<T>(
  url: string,
  init: RequestInit,
  opts: FetchRetryOptions,
  read: ResponseReader<T>,
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const keepAlive = () => {
    if (timer) clearTimeout(timer);
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, opts.timeoutMs);
  };
  const onAbort = () => controller.abort();
  opts.signal?.addEventListener('abort', onAbort, { once: true });
  keepAlive();

  try {
    const res = await fetch(url, { ...init, signal: controller.signal });
    if (!res.ok) {
      // release the connection before retrying
      await res.body?.cancel().catch(() => undefined);
      const ra = res.status === 429 ? res.headers.get('retry-after') : null;
      throw new HttpStatusError(res.status, ra ? parseRetryAfter(ra) : undefined);
    }
    return await read(res, { signal: controller.signal, keepAlive });
  } catch (err) {
    if (timedOut) {
      opts.logger.debug({ url, timeoutMs: opts.timeoutMs }, 'fetchWithRetry request timed out');
      throw new Error(`Request timed out after ${opts.timeoutMs}ms`, { cause: err });
    }
    opts.logger.debug({ url, err }, 'fetchWithRetry attempt error');
    throw err;
  } finally {
    if (timer) clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}

export function delayMs(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(id);
      reject(new CancelledError());
    };
    const id = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, Math.floor(ms)));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function parseRetryAfter(val: string): number {
  // If numeric -> seconds
  const n = Number(val);
  if (!Number.isNaN(n)) return n * 1000;
  // Attempt to parse HTTP-date
  const t = Date.parse(val);
  if (!Number.isNaN(t)) return Math.max(0, t - Date.now());
  return 1000;
}
