/**
 * Command line front end.
 *
 * Console output (chalk, ora, cli-table3) is user facing and goes to the injected
 * streams; diagnostics go through the pino logger.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, AppConfig, OUTPUT_FORMATS, OutputFormat, DEFAULT_CONFIG_FILE } from './config';
import { createLogger, Logger, LOG_LEVELS, LogLevel } from './logger';
import { validateDomain } from './domain';
import { runPipeline, PipelineOptions } from './pipeline';
import type { A4Resolver } from './dns';
import { describeFilters, FilterSpec, isFilterActive } from './filter';
import { removeFiles, saveRawRecords, saveResults } from './output/save';
import { renderReport, PipelineResult } from './output/report';
import { CancelledError, ConfigError, PipelineError, PersistenceError, errorMessage, throwIfCancelled } from './errors';
import { register } from './metrics';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export interface CliOptions {
  outputDir: string;
  format?: OutputFormat[];
  filter?: string;
  excludeWords?: string[];
  minLength?: number;
  maxLength?: number;
  maxResults?: number;
  dns: boolean;
  dnsConcurrency?: number;
  dnsTimeout?: number;
  resolver?: string[];
  raw: boolean;
  verbose: boolean;
  config?: string;
  logLevel: LogLevel;
  logFile?: string;
  metrics: boolean;
}

export interface CliDeps {
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  logger?: Logger;
  resolver?: A4Resolver;
  now?: () => Date;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Must be a positive integer.');
  return n;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Must be a non-negative integer.');
  return n;
}

/** Comma-separated words, trimmed and lowercased; blanks dropped. */
export function parseWordList(value: string): string[] {
  return value
    .split(',')
    .map((w) => w.trim().toLowerCase())
    .filter((w) => w.length > 0);
}

export function buildFilterSpec(opts: Pick<CliOptions, 'filter' | 'excludeWords' | 'minLength' | 'maxLength'>): FilterSpec {
  const spec: FilterSpec = {};
  if (opts.filter !== undefined) {
    try {
      spec.regex = new RegExp(opts.filter);
    } catch (err) {
      throw new ConfigError(`Invalid --filter pattern: ${errorMessage(err)}`, { cause: err });
    }
  }
  if (opts.excludeWords && opts.excludeWords.length > 0) spec.excludeWords = opts.excludeWords;
  if (opts.minLength !== undefined) spec.minLength = opts.minLength;
  if (opts.maxLength !== undefined) spec.maxLength = opts.maxLength;
  if (spec.minLength !== undefined && spec.maxLength !== undefined && spec.minLength > spec.maxLength) {
    throw new ConfigError(`--min-length (${spec.minLength}) is greater than --max-length (${spec.maxLength})`);
  }
  return spec;
}

/** CLI flags override the loaded configuration. */
export function applyCliOverrides(config: AppConfig, opts: CliOptions): AppConfig {
  return {
    ...config,
    outputFormats: opts.format && opts.format.length > 0 ? opts.format : config.outputFormats,
    maxResults: opts.maxResults ?? config.maxResults,
    dnsConcurrency: opts.dnsConcurrency ?? config.dnsConcurrency,
    dnsTimeoutMs: opts.dnsTimeout ?? config.dnsTimeoutMs,
  };
}

export function pipelineOptions(config: AppConfig, opts: CliOptions, filters: FilterSpec, resolver?: A4Resolver): PipelineOptions {
  return {
    archive: {
      apiUrl: config.apiUrl,
      limit: config.maxResults,
      timeoutMs: config.timeoutMs,
      retry: { maxAttempts: config.maxRetries, baseDelayMs: config.retryDelayMs, backoff: config.backoff },
      userAgent: config.userAgent,
      collapse: config.collapse,
    },
    dns: {
      enabled: opts.dns,
      concurrency: config.dnsConcurrency,
      timeoutMs: config.dnsTimeoutMs,
      servers: opts.resolver,
      resolver,
    },
    filters,
  };
}

function buildProgram(): Command {
  return new Command()
    .name('wayback-subdomains')
    .description('Extract subdomains of a domain from Wayback Machine archives, check them in DNS and filter them')
    .version('1.0.0')
    .argument('<domain>', 'Target domain to analyze (e.g., example.com)')
    .option('-o, --output-dir <dir>', 'Output directory for results', '.')
    .addOption(new Option('-f, --format <formats...>', 'Output formats (default: txt)').choices(OUTPUT_FORMATS))
    .option('--filter <regex>', 'Regex pattern subdomains must contain (e.g., "test|dev|staging")')
    .option('--exclude-words <words>', 'Comma-separated words to exclude (e.g., admin,test,dev)', parseWordList)
    .option('--min-length <n>', 'Minimum subdomain length', parseNonNegativeInt)
    .option('--max-length <n>', 'Maximum subdomain length', parseNonNegativeInt)
    .option('--max-results <n>', 'Maximum number of archive records to fetch (default: 10000)', parsePositiveInt)
    .option('--no-dns', 'Skip the DNS A record check')
    .option('--dns-concurrency <n>', 'Concurrent DNS lookups (default: 10)', parsePositiveInt)
    .option('--dns-timeout <ms>', 'Per-lookup DNS timeout in milliseconds (default: 3000)', parsePositiveInt)
    .option('--resolver <ips...>', 'DNS servers to query instead of the system resolver')
    .option('--no-raw', 'Do not save the raw archive records')
    .option('-v, --verbose', 'Show every subdomain and statistics', false)
    .option('-c, --config <file>', `JSON configuration file (default: ${DEFAULT_CONFIG_FILE} when present)`)
    .addOption(new Option('--log-level <level>', 'Logging level').choices(LOG_LEVELS).default('info'))
    .option('--log-file <file>', 'Write logs to this file instead of stderr')
    .option('--metrics', 'Print Prometheus metrics after the run', false)
    .exitOverride();
}

async function execute(domainArg: string, opts: CliOptions, deps: Required<Pick<CliDeps, 'stdout' | 'stderr'>> & CliDeps): Promise<number> {
  const { stdout, stderr, signal } = deps;
  const say = (line: string) => stdout.write(line + '\n');
  const logger = deps.logger ?? createLogger({ level: opts.logLevel, file: opts.logFile });
  const spinner = ora({ stream: stderr });
  // files already in place, removed again if the run is cancelled
  const written: string[] = [];

  try {
    const config = applyCliOverrides(await loadConfig({ file: opts.config, env: deps.env }), opts);
    const filters = buildFilterSpec(opts);
    const domain = validateDomain(domainArg);

    say(chalk.blue(`\nStarting subdomain extraction for: ${domain}`));
    if (isFilterActive(filters)) say(chalk.blue(`Active filters: ${describeFilters(filters).join(', ')}`));

    spinner.start(`Fetching URLs for ${domain}`);
    const outcome = await runPipeline(domain, pipelineOptions(config, opts, filters, deps.resolver), {
      logger,
      signal,
      onFetchProgress: (n) => {
        spinner.text = `Fetching URLs: ${n}`;
      },
      onDnsProgress: (done, total) => {
        spinner.text = `Checking DNS: ${done}/${total}`;
      },
    });
    spinner.stop();

    if (outcome.status === 'no-data') {
      say(chalk.yellow('[WARNING] No data found for the given domain.'));
      return EXIT_OK;
    }

    const failures: PersistenceError[] = [];
    let rawFile: string | undefined;
    throwIfCancelled(signal);
    if (opts.raw) {
      try {
        rawFile = await saveRawRecords(outcome.domain, outcome.records, opts.outputDir, logger, signal);
        written.push(rawFile);
      } catch (err) {
        if (!(err instanceof PersistenceError)) throw err;
        failures.push(err);
      }
    }

    if (outcome.status === 'no-subdomains') {
      reportFailures(stderr, failures);
      say(chalk.yellow('[WARNING] No subdomains could be extracted.'));
      return EXIT_OK;
    }

    const extractedAt = deps.now ? deps.now() : new Date();
    const saved = await saveResults(outcome.domain, outcome.subdomains, opts.outputDir, config.outputFormats, {
      logger,
      signal,
      now: extractedAt,
    });
    for (const file of Object.values(saved.saved)) if (file) written.push(file);
    failures.push(...saved.failures);

    const result: PipelineResult = {
      domain: outcome.domain,
      subdomains: outcome.subdomains,
      records: outcome.records,
      savedFiles: saved.saved,
      rawFile,
      extractedAt,
    };
    say(renderReport(result, { verbose: opts.verbose }));
    reportFailures(stderr, failures);

    if (Object.keys(saved.saved).length === 0) {
      stderr.write(chalk.red('\nNo output file could be written.\n'));
      return EXIT_FAILURE;
    }
    say(chalk.green('\nOperation completed successfully!'));
    return EXIT_OK;
  } catch (err) {
    spinner.stop();
    if (err instanceof CancelledError) {
      await removeFiles(written);
      logger.warn('Operation cancelled by user');
      stderr.write(chalk.yellow('\nOperation cancelled by user.\n'));
      return EXIT_CANCELLED;
    }
    if (err instanceof PipelineError) {
      logger.error({ code: err.code }, err.message);
      stderr.write(chalk.red(`\n[ERROR] ${err.message}\n`));
      return EXIT_FAILURE;
    }
    logger.error({ err }, 'Unexpected error');
    stderr.write(chalk.red(`\nUnexpected error: ${errorMessage(err)}\n`));
    return EXIT_FAILURE;
  } finally {
    if (opts.metrics) stdout.write(await register.metrics());
  }
}

function reportFailures(stderr: NodeJS.WritableStream, failures: readonly PersistenceError[]): void {
  for (const f of failures) stderr.write(chalk.red(`[ERROR] ${f.message}\n`));
}

/**
 * Parse `argv` (without the node/script prefix) and run. Resolves to the exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const program = buildProgram().configureOutput({
    writeOut: (s) => stdout.write(s),
    writeErr: (s) => stderr.write(s),
  });

  let code = EXIT_OK;
  program.action(async (domain: string, opts: CliOptions) => {
    code = await execute(domain, opts, { ...deps, stdout, stderr });
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return code;
}
