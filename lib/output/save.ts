import { promises as fs } from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';
import { domainFileStem } from '../domain';
import type { OutputFormat } from '../config';
import type { Logger } from '../logger';
import { CancelledError, PersistenceError, throwIfCancelled } from '../errors';

export interface SaveOptions {
  logger: Logger;
  signal?: AbortSignal;
  now?: Date;
}

export interface SaveResult {
  saved: Partial<Record<OutputFormat, string>>;
  failures: PersistenceError[];
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function renderText(subdomains: readonly string[]): string {
  return subdomains.join('\n');
}

export function renderJson(domain: string, subdomains: readonly string[], now: Date): string {
  const data = {
    domain,
    subdomain_count: subdomains.length,
    extraction_date: formatTimestamp(now),
    subdomains,
  };
  return JSON.stringify(data, null, 2);
}

export function renderCsv(subdomains: readonly string[]): string {
  const rows = ['index,subdomain'];
  subdomains.forEach((s, i) => rows.push(`${i + 1},${csvField(s)}`));
  return rows.join('\r\n') + '\r\n';
}

function tempPath(file: string): string {
  return path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);
}

/** Write to a temporary sibling, then rename over the target. Nothing is renamed once `signal` fired. */
export async function writeFileAtomic(file: string, contents: string, signal?: AbortSignal): Promise<void> {
  const tmp = tempPath(file);
  try {
    await fs.writeFile(tmp, contents, 'utf-8');
    throwIfCancelled(signal);
    await fs.rename(tmp, file);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/** Remove files a cancelled run already put in place. */
export async function removeFiles(files: readonly string[]): Promise<void> {
  await Promise.all(files.map((f) => fs.rm(f, { force: true })));
}

function render(format: OutputFormat, domain: string, subdomains: readonly string[], now: Date): string {
  if (format === 'json') return renderJson(domain, subdomains, now);
  if (format === 'csv') return renderCsv(subdomains);
  return renderText(subdomains);
}

export function outputPath(outputDir: string, domain: string, format: OutputFormat): string {
  return path.join(outputDir, `${domainFileStem(domain)}_subdomains.${format}`);
}

interface StagedFile {
  format: OutputFormat;
  file: string;
  tmp: string;
}

/**
 * Save `subdomains` in every requested format. A format that fails is logged and
 * reported in `failures`; the others are still written.
 *
 * Every format is written to a temporary file first and only renamed into place once all
 * of them are written, so a cancellation leaves no output behind.
 */
export async function saveResults(
  domain: string,
  subdomains: readonly string[],
  outputDir: string,
  formats: readonly OutputFormat[],
  opts: SaveOptions,
): Promise<SaveResult> {
  const { logger, signal } = opts;
  const now = opts.now ?? new Date();
  const result: SaveResult = { saved: {}, failures: [] };
  throwIfCancelled(signal);

  try {
    await fs.mkdir(outputDir, { recursive: true });
  } catch (err) {
    for (const format of new Set(formats)) {
      result.failures.push(new PersistenceError(format, outputPath(outputDir, domain, format), err));
    }
    logger.error({ outputDir, err }, 'Cannot create output directory');
    return result;
  }
  logger.info({ formats }, `Saving results in formats: ${formats.join(', ')}`);

  const fail = (format: OutputFormat, file: string, err: unknown) => {
    const failure = new PersistenceError(format, file, err);
    logger.error({ format, file, err }, failure.message);
    result.failures.push(failure);
  };

  const staged: StagedFile[] = [];
  try {
    for (const format of new Set(formats)) {
      throwIfCancelled(signal);
      const file = outputPath(outputDir, domain, format);
      const tmp = tempPath(file);
      try {
        await fs.writeFile(tmp, render(format, domain, subdomains, now), 'utf-8');
        staged.push({ format, file, tmp });
      } catch (err) {
        await fs.rm(tmp, { force: true });
        fail(format, file, err);
      }
    }
    throwIfCancelled(signal);
  } catch (err) {
    await removeFiles(staged.map((s) => s.tmp));
    throw err;
  }

  for (const { format, file, tmp } of staged) {
    try {
      await fs.rename(tmp, file);
      result.saved[format] = file;
    } catch (err) {
      await fs.rm(tmp, { force: true });
      fail(format, file, err);
    }
  }
  return result;
}

/** Unfiltered archive records, one per line; a debugging artifact of the fetch. */
export async function saveRawRecords(
  domain: string,
  records: readonly string[],
  outputDir: string,
  logger: Logger,
  signal?: AbortSignal,
): Promise<string> {
  throwIfCancelled(signal);
  const file = path.join(outputDir, `${domainFileStem(domain)}_raw_urls.txt`);
  try {
    await fs.mkdir(outputDir, { recursive: true });
    await writeFileAtomic(file, records.join('\n'), signal);
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    logger.error({ file, err }, 'Failed to save raw data');
    throw new PersistenceError('raw', file, err);
  }
  logger.info({ file }, `Raw data saved to: ${file}`);
  return file;
}
