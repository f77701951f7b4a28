import dns from 'dns/promises';
import pLimit from 'p-limit';
import type { Logger } from './logger';
import { withTimeout } from './net/timeout';
import { CancelledError } from './errors';
import { incDiscarded, observeDnsLatency } from './metrics';

/** Resolves the A records of a host. */
export type A4Resolver = (host: string) => Promise<string[]>;

export type LookupOutcome =
  | { host: string; ok: true; addresses: string[] }
  | { host: string; ok: false; reason: string };

export interface DnsCheckOptions {
  concurrency: number;
  timeoutMs: number;
  /** Resolver addresses; the system resolver when empty. */
  servers?: string[];
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
  logger: Logger;
  /** Overrides `servers`; tests inject this. */
  resolver?: A4Resolver;
}

export interface DnsCheckResult {
  resolved: string[]; // input order
  outcomes: LookupOutcome[]; // one per input host, input order
}

export function createResolver(servers?: string[], timeoutMs?: number): A4Resolver {
  if (!servers || servers.length === 0) {
    return (host) => dns.resolve4(host);
  }
  const resolver = new dns.Resolver(timeoutMs ? { timeout: timeoutMs, tries: 1 } : undefined);
  resolver.setServers(servers);
  return (host) => resolver.resolve4(host);
}

function failureReason(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return 'error';
}

/**
 * Look up one host. Failures (NXDOMAIN, SERVFAIL, timeout, no network) come back as
 * `{ ok: false }`; this never throws.
 */
export async function lookupHost(host: string, timeoutMs: number, resolve: A4Resolver): Promise<LookupOutcome> {
  const started = process.hrtime.bigint();
  try {
    const addresses = await withTimeout(resolve(host), timeoutMs);
    if (addresses.length > 0) return { host, ok: true, addresses };
    return { host, ok: false, reason: 'no-records' };
  } catch (err) {
    return { host, ok: false, reason: failureReason(err) };
  } finally {
    observeDnsLatency(Number(process.hrtime.bigint() - started) / 1e9);
  }
}

function abortPromise(signal: AbortSignal): { promise: Promise<never>; dispose(): void } {
  let onAbort = () => {};
  const promise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}

/**
 * Keep the hosts that currently have an A record.
 * Lookups run `concurrency` at a time and are not retried; results are collected by
 * input index so the output order never depends on which lookup finishes first.
 */
export async function resolveHostnames(hosts: readonly string[], opts: DnsCheckOptions): Promise<DnsCheckResult> {
  const { logger, signal } = opts;
  if (signal?.aborted) throw new CancelledError();

  const resolve = opts.resolver ?? createResolver(opts.servers, opts.timeoutMs);
  const limit = pLimit(Math.max(1, Math.floor(opts.concurrency)));
  const total = hosts.length;
  let done = 0;

  logger.info({ total, concurrency: opts.concurrency }, `Checking ${total} subdomains in DNS`);

  const tasks = hosts.map((host) =>
    limit(async () => {
      if (signal?.aborted) throw new CancelledError();
      const outcome = await lookupHost(host, opts.timeoutMs, resolve);
      done++;
      opts.onProgress?.(done, total);
      if (!outcome.ok) logger.debug({ host, reason: outcome.reason }, 'DNS lookup failed, dropping host');
      return outcome;
    }),
  );

  let outcomes: LookupOutcome[];
  if (signal) {
    const aborted = abortPromise(signal);
    try {
      outcomes = await Promise.race([Promise.all(tasks), aborted.promise]);
    } catch (err) {
      // queued lookups never start; in-flight ones finish within timeoutMs
      limit.clearQueue();
      throw err;
    } finally {
      aborted.dispose();
    }
  } else {
    outcomes = await Promise.all(tasks);
  }

  const resolved: string[] = [];
  const misses = new Map<string, number>();
  for (const outcome of outcomes) {
    if (outcome.ok) resolved.push(outcome.host);
    else misses.set(outcome.reason, (misses.get(outcome.reason) ?? 0) + 1);
  }
  for (const [reason, count] of misses) incDiscarded('dns', reason, count);

  logger.info({ resolved: resolved.length, unresolved: total - resolved.length }, `${resolved.length} of ${total} subdomains resolved`);
  return { resolved, outcomes };
}
