import { validateDomain, Domain } from './domain';
import { fetchArchiveRecords } from './archive';
import { extractSubdomains } from './extract';
import { resolveHostnames, A4Resolver } from './dns';
import { filterSubdomains, FilterSpec } from './filter';
import { throwIfCancelled } from './errors';
import type { Logger } from './logger';
import type { RetryPolicy } from './net/fetchWithRetry';

export interface PipelineOptions {
  archive: {
    apiUrl: string;
    limit: number;
    timeoutMs: number;
    retry: RetryPolicy;
    userAgent?: string;
    collapse?: string;
  };
  dns: {
    enabled: boolean;
    concurrency: number;
    timeoutMs: number;
    servers?: string[];
    resolver?: A4Resolver;
  };
  filters?: FilterSpec;
}

export interface PipelineHooks {
  logger: Logger;
  signal?: AbortSignal;
  onFetchProgress?: (records: number) => void;
  onDnsProgress?: (done: number, total: number) => void;
}

export interface PipelineStats {
  records: number;
  extracted: number;
  skippedRecords: number;
  resolved: number;
  unresolved: number;
  filteredOut: number;
}

export type PipelineOutcome =
  | { status: 'no-data'; domain: Domain }
  | { status: 'no-subdomains'; domain: Domain; records: string[]; stats: PipelineStats }
  | { status: 'ok'; domain: Domain; subdomains: string[]; records: string[]; stats: PipelineStats };

/**
 * validate → fetch → extract → DNS check → filter, each stage consuming the whole
 * output of the previous one. Empty results are outcomes, not errors;
 * `InvalidDomainError`, `FetchError` and `CancelledError` propagate.
 */
export async function runPipeline(rawDomain: string, opts: PipelineOptions, hooks: PipelineHooks): Promise<PipelineOutcome> {
  const { logger, signal } = hooks;
  const domain = validateDomain(rawDomain);
  logger.info({ domain }, `Starting analysis for domain: ${domain}`);

  const records = await fetchArchiveRecords(domain, {
    ...opts.archive,
    signal,
    onProgress: hooks.onFetchProgress,
    logger,
  });
  if (records.length === 0) {
    logger.warn({ domain }, 'No data found for the given domain');
    return { status: 'no-data', domain };
  }

  throwIfCancelled(signal);
  const extracted = extractSubdomains(records, { logger });

  let live = extracted.hostnames;
  if (opts.dns.enabled && live.length > 0) {
    const checked = await resolveHostnames(live, {
      concurrency: opts.dns.concurrency,
      timeoutMs: opts.dns.timeoutMs,
      servers: opts.dns.servers,
      resolver: opts.dns.resolver,
      signal,
      onProgress: hooks.onDnsProgress,
      logger,
    });
    live = checked.resolved;
  }

  throwIfCancelled(signal);
  const subdomains = filterSubdomains(live, opts.filters, logger);

  const stats: PipelineStats = {
    records: records.length,
    extracted: extracted.hostnames.length,
    skippedRecords: extracted.skipped,
    resolved: live.length,
    unresolved: extracted.hostnames.length - live.length,
    filteredOut: live.length - subdomains.length,
  };

  if (subdomains.length === 0) {
    logger.warn({ domain, ...stats }, 'No subdomains could be extracted');
    return { status: 'no-subdomains', domain, records, stats };
  }
  return { status: 'ok', domain, subdomains, records, stats };
}
