/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `wayback_subdomains_records_fetched_total` (Counter)
 * - `wayback_subdomains_fetch_retries_total` (Counter)
 * - `wayback_subdomains_hostnames_discarded_total` (Counter, labels `stage`, `reason`)
 * - `wayback_subdomains_dns_lookup_seconds` (Histogram)
 *
 * The CLI prints `register.metrics()` when run with `--metrics`.
 */

import { Counter, Histogram, register } from 'prom-client';

export type DiscardStage = 'extract' | 'dns' | 'filter';

export const recordsFetched = new Counter({
  name: 'wayback_subdomains_records_fetched_total',
  help: 'Archive records received from the CDX index',
});

export const fetchRetries = new Counter({
  name: 'wayback_subdomains_fetch_retries_total',
  help: 'Archive requests retried after a failed attempt',
});

export const hostnamesDiscarded = new Counter({
  name: 'wayback_subdomains_hostnames_discarded_total',
  help: 'Records or hostnames dropped by a pipeline stage',
  labelNames: ['stage', 'reason'] as const,
});

export const dnsLookupLatency = new Histogram({
  name: 'wayback_subdomains_dns_lookup_seconds',
  help: 'Histogram of A record lookup latency in seconds',
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
});

export function incRecordsFetched(count = 1): void {
  recordsFetched.inc(count);
}

export function incFetchRetries(count = 1): void {
  fetchRetries.inc(count);
}

export function incDiscarded(stage: DiscardStage, reason: string, count = 1): void {
  if (count <= 0) return;
  hostnamesDiscarded.inc({ stage, reason }, count);
}

export function observeDnsLatency(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  dnsLookupLatency.observe(seconds);
}

export { register };
