import chalk from 'chalk';
import Table from 'cli-table3';
import type { Domain } from '../domain';
import type { OutputFormat } from '../config';
import { formatTimestamp } from './save';

export const PREVIEW_LIMIT = 20;

/** Final product of a run, handed to the console report. */
export interface PipelineResult {
  readonly domain: Domain;
  readonly subdomains: readonly string[];
  readonly records: readonly string[];
  readonly savedFiles: Readonly<Partial<Record<OutputFormat, string>>>;
  readonly rawFile?: string;
  readonly extractedAt: Date;
}

export interface SubdomainStats {
  averageLength: number;
  shortest: string | null;
  longest: string | null;
}

export function subdomainStats(subdomains: readonly string[]): SubdomainStats {
  if (subdomains.length === 0) return { averageLength: 0, shortest: null, longest: null };
  let shortest = subdomains[0];
  let longest = subdomains[0];
  let total = 0;
  for (const s of subdomains) {
    total += s.length;
    if (s.length < shortest.length) shortest = s;
    if (s.length > longest.length) longest = s;
  }
  return { averageLength: total / subdomains.length, shortest, longest };
}

export function renderReport(result: PipelineResult, opts: { verbose: boolean }): string {
  const lines: string[] = [];
  const rule = '='.repeat(60);
  const count = result.subdomains.length;

  lines.push(chalk.cyan(`\n${rule}`), chalk.cyan('           RESULTS'), chalk.cyan(rule));
  lines.push(chalk.blue(`\nDomain: ${result.domain}`));
  lines.push(chalk.green(`Total unique subdomains: ${count}`));
  lines.push(chalk.blue(`Extraction date: ${formatTimestamp(result.extractedAt)}`));

  lines.push(chalk.yellow('\nSaved files:'));
  for (const [format, file] of Object.entries(result.savedFiles)) {
    lines.push(chalk.yellow(`       ${format.toUpperCase()}: ${file}`));
  }
  if (result.rawFile) lines.push(chalk.yellow(`       Raw data: ${result.rawFile}`));

  if (count > 0) {
    lines.push(chalk.cyan('\n[RESULT] Subdomain List:'));
    const table = new Table({ head: ['Index', 'Subdomain'], colAligns: ['left', 'left'] });
    const shown = opts.verbose ? result.subdomains : result.subdomains.slice(0, PREVIEW_LIMIT);
    shown.forEach((s, i) => table.push([i + 1, s]));
    lines.push(table.toString());

    if (!opts.verbose && count > PREVIEW_LIMIT) {
      lines.push(chalk.yellow(`\n[NOTE] Only first ${PREVIEW_LIMIT} subdomains shown. Use --verbose to see all ${count} subdomains.`));
    }
  }

  if (opts.verbose) {
    const stats = subdomainStats(result.subdomains);
    lines.push(chalk.cyan('\n[STATS] Statistics:'));
    lines.push(chalk.blue(`       Average length: ${stats.averageLength.toFixed(1)} characters`));
    lines.push(chalk.blue(`       Shortest: ${stats.shortest ?? 'N/A'}`));
    lines.push(chalk.blue(`       Longest: ${stats.longest ?? 'N/A'}`));
  }

  return lines.join('\n');
}
