import type { Logger } from './logger';
import { incDiscarded } from './metrics';

export type SkipReason = 'unparseable' | 'no-host' | 'no-dot';

export type ParseOutcome =
  | { ok: true; hostname: string }
  | { ok: false; reason: SkipReason };

export interface ExtractResult {
  hostnames: string[]; // sorted ascending, unique
  skipped: number;
}

/**
 * Hostname of one archive record: scheme, userinfo, path and port stripped,
 * lowercased, trailing root dot removed.
 */
export function parseRecord(record: string): ParseOutcome {
  let url: URL;
  try {
    url = new URL(record.trim());
  } catch {
    return { ok: false, reason: 'unparseable' };
  }

  const hostname = url.hostname.toLowerCase().replace(/\.+$/, '');
  if (!hostname) return { ok: false, reason: 'no-host' };
  if (!hostname.includes('.')) return { ok: false, reason: 'no-dot' };
  return { ok: true, hostname };
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export function extractSubdomains(records: readonly string[], opts: { logger: Logger }): ExtractResult {
  const { logger } = opts;
  logger.info({ count: records.length }, `Extracting subdomains from ${records.length} URLs`);

  const found = new Set<string>();
  const skips = new Map<SkipReason, number>();
  for (const record of records) {
    const outcome = parseRecord(record);
    if (outcome.ok) {
      found.add(outcome.hostname);
      continue;
    }
    logger.debug({ record, reason: outcome.reason }, 'Skipping archive record');
    skips.set(outcome.reason, (skips.get(outcome.reason) ?? 0) + 1);
  }

  let skipped = 0;
  for (const [reason, count] of skips) {
    incDiscarded('extract', reason, count);
    skipped += count;
  }

  const hostnames = Array.from(found).sort(compareCodeUnits);
  logger.info({ count: hostnames.length, skipped }, `Extracted ${hostnames.length} unique subdomains`);
  return { hostnames, skipped };
}
