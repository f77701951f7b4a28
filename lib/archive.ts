import type { Domain } from './domain';
import type { Logger } from './logger';
import { fetchWithRetry, RetryPolicy, AttemptContext } from './net/fetchWithRetry';
import { incRecordsFetched } from './metrics';

export interface ArchiveFetchOptions {
  apiUrl: string;
  limit: number;
  timeoutMs: number;
  retry: RetryPolicy;
  userAgent?: string;
  collapse?: string;
  signal?: AbortSignal;
  /** Called with the running record count while the body streams in. */
  onProgress?: (count: number) => void;
  logger: Logger;
}

const DEFAULT_USER_AGENT = 'wayback-subdomains/1.0';

/** CDX query for every captured URL under `*.<domain>/*`, original URL field only. */
export function buildArchiveQuery(domain: Domain, apiUrl: string, limit: number, collapse = 'urlkey'): string {
  const url = new URL(apiUrl);
  url.searchParams.set('url', `*.${domain}/*`);
  url.searchParams.set('output', 'txt');
  url.searchParams.set('fl', 'original');
  url.searchParams.set('collapse', collapse);
  url.searchParams.set('limit', String(limit));
  return url.toString();
}

function isTextual(contentType: string | null): boolean {
  if (!contentType) return true;
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return mime.startsWith('text/') || mime === '';
}

/**
 * Stream the response body line by line in one pass.
 * Invalid UTF-8 fails the attempt, as does a non-text content type.
 */
async function readRecords(
  res: Response,
  ctx: AttemptContext,
  onProgress?: (count: number) => void,
): Promise<string[]> {
  const contentType = res.headers.get('content-type');
  if (!isTextual(contentType)) {
    await res.body?.cancel().catch(() => undefined);
    throw new Error(`Unexpected content type from archive API: ${contentType}`);
  }

  const records: string[] = [];
  const push = (line: string) => {
    const trimmed = line.trim();
    if (trimmed) records.push(trimmed);
  };

  if (!res.body) return records;

  const decoder = new TextDecoder('utf-8', { fatal: true });
  const reader = res.body.getReader();
  // a timed-out or cancelled attempt must stop a read that is waiting on the network
  const onAbort = () => {
    reader.cancel().catch(() => undefined);
  };
  ctx.signal.addEventListener('abort', onAbort, { once: true });
  let pending = '';
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (ctx.signal.aborted) throw new Error('Body read aborted');
      if (done) break;
      ctx.keepAlive();
      pending += decoder.decode(value, { stream: true });
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';
      const before = records.length;
      for (const line of lines) push(line);
      if (records.length !== before) onProgress?.(records.length);
    }
    pending += decoder.decode();
  } catch (err) {
    await reader.cancel().catch(() => undefined);
    throw err;
  } finally {
    ctx.signal.removeEventListener('abort', onAbort);
  }
  const before = records.length;
  push(pending);
  if (records.length !== before) onProgress?.(records.length);
  return records;
}

/**
 * Fetch every archived URL for `domain` from the CDX index.
 * An empty array means the archive has no history for the domain; it is not an error.
 */
export async function fetchArchiveRecords(domain: Domain, opts: ArchiveFetchOptions): Promise<string[]> {
  const url = buildArchiveQuery(domain, opts.apiUrl, opts.limit, opts.collapse);
  opts.logger.info({ domain, url }, `Fetching data for domain: ${domain}`);

  const records = await fetchWithRetry(
    url,
    { headers: { 'User-Agent': opts.userAgent ?? DEFAULT_USER_AGENT } },
    { retry: opts.retry, timeoutMs: opts.timeoutMs, signal: opts.signal, logger: opts.logger },
    (res, ctx) => readRecords(res, ctx, opts.onProgress),
  );

  incRecordsFetched(records.length);
  opts.logger.info({ domain, count: records.length }, `Successfully fetched ${records.length} URLs`);
  return records;
}
