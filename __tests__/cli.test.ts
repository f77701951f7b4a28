import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { runCli, parseWordList, buildFilterSpec, EXIT_CANCELLED, EXIT_FAILURE, EXIT_OK } from '../lib/cli';
import type { A4Resolver } from '../lib/dns';
import { ConfigError } from '../lib/errors';
import { captureStream, logger, textResponse } from './helpers';

const RECORDS = 'https://sub1.example.com/page\nhttp://sub1.example.com:8080/x\nnot a url\nhttps://sub2.example.com/';
const ENV = { WAYBACK_MAX_RETRIES: '1', WAYBACK_RETRY_DELAY_MS: '1' };

describe('runCli', () => {
  let dir: string;
  let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;
  let stdout: ReturnType<typeof captureStream>;
  let stderr: ReturnType<typeof captureStream>;
  const resolver = jest.fn<Promise<string[]>, [string]>();

  const run = (args: string[], extra: { signal?: AbortSignal; resolver?: A4Resolver; now?: () => Date } = {}) =>
    runCli([...args, '--log-level', 'silent'], {
      stdout: stdout.stream,
      stderr: stderr.stream,
      env: ENV,
      logger,
      resolver: extra.resolver ?? resolver,
      signal: extra.signal,
      now: extra.now ?? (() => new Date(2025, 0, 2, 3, 4, 5)),
    });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wayback-cli-'));
    fetchMock = jest.spyOn(globalThis, 'fetch');
    stdout = captureStream();
    stderr = captureStream();
    resolver.mockReset();
    resolver.mockResolvedValue(['192.0.2.1']);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('saves results and reports success', async () => {
    fetchMock.mockResolvedValueOnce(textResponse(RECORDS));

    const code = await run(['example.com', '-o', dir, '-f', 'txt', 'csv']);

    expect(code).toBe(EXIT_OK);
    expect((await fs.readdir(dir)).sort()).toEqual([
      'example_com_raw_urls.txt',
      'example_com_subdomains.csv',
      'example_com_subdomains.txt',
    ]);
    await expect(fs.readFile(path.join(dir, 'example_com_subdomains.txt'), 'utf-8')).resolves.toBe('sub1.example.com\nsub2.example.com');
    expect(stdout.text()).toContain('Total unique subdomains: 2');
    expect(stdout.text()).toContain('Operation completed successfully!');
    expect(resolver).toHaveBeenCalledTimes(2);
  });

  test('no archive data is a clean, empty exit', async () => {
    fetchMock.mockResolvedValueOnce(textResponse(''));

    const code = await run(['example.com', '-o', dir]);

    expect(code).toBe(EXIT_OK);
    expect(stdout.text()).toContain('[WARNING] No data found for the given domain.');
    await expect(fs.readdir(dir)).resolves.toEqual([]);
    expect(resolver).not.toHaveBeenCalled();
  });

  test('nothing resolving is a clean, empty exit', async () => {
    fetchMock.mockResolvedValueOnce(textResponse(RECORDS));
    resolver.mockRejectedValue(Object.assign(new Error('NXDOMAIN'), { code: 'ENOTFOUND' }));

    const code = await run(['example.com', '-o', dir, '--no-raw']);

    expect(code).toBe(EXIT_OK);
    expect(stdout.text()).toContain('[WARNING] No subdomains could be extracted.');
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  test('an invalid domain fails without a request', async () => {
    const code = await run(['bad_domain!', '-o', dir]);

    expect(code).toBe(EXIT_FAILURE);
    expect(stderr.text()).toContain('[ERROR] Invalid domain format: bad_domain!');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test('an unreachable archive fails with a one-line message', async () => {
    fetchMock.mockImplementation(async () => textResponse('down', { status: 500 }));

    const code = await run(['example.com', '-o', dir]);

    expect(code).toBe(EXIT_FAILURE);
    expect(stderr.text()).toContain('[ERROR] Failed to fetch data after 1 attempt(s): HTTP 500');
    expect(stderr.text()).not.toContain('    at ');
  });

  test('cancellation exits 130 and writes nothing', async () => {
    const controller = new AbortController();
    controller.abort();

    const code = await run(['example.com', '-o', dir], { signal: controller.signal });

    expect(code).toBe(EXIT_CANCELLED);
    expect(stderr.text()).toContain('Operation cancelled by user.');
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  test('cancellation after the raw dump removes it again', async () => {
    fetchMock.mockResolvedValueOnce(textResponse(RECORDS));
    const controller = new AbortController();
    // the extraction timestamp is taken between the raw dump and the result files
    const now = () => {
      controller.abort();
      return new Date(2025, 0, 2, 3, 4, 5);
    };

    const code = await run(['example.com', '-o', dir, '-f', 'txt', 'json'], { signal: controller.signal, now });

    expect(code).toBe(EXIT_CANCELLED);
    expect(stderr.text()).toContain('Operation cancelled by user.');
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  test('--no-dns skips resolution and filters still apply', async () => {
    fetchMock.mockResolvedValueOnce(textResponse(RECORDS));

    const code = await run(['example.com', '-o', dir, '--no-dns', '--no-raw', '--exclude-words', 'SUB1, ,zz']);

    expect(code).toBe(EXIT_OK);
    expect(resolver).not.toHaveBeenCalled();
    expect(stdout.text()).toContain('Active filters: exclude_words=sub1,zz');
    await expect(fs.readFile(path.join(dir, 'example_com_subdomains.txt'), 'utf-8')).resolves.toBe('sub2.example.com');
  });

  test('rejects an unknown output format', async () => {
    const code = await run(['example.com', '-o', dir, '-f', 'xml']);

    expect(code).toBe(EXIT_FAILURE);
    expect(stderr.text()).toContain("error: option '-f, --format <formats...>' argument 'xml' is invalid");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test('an invalid regex is reported as a config error', async () => {
    const code = await run(['example.com', '-o', dir, '--filter', '(']);

    expect(code).toBe(EXIT_FAILURE);
    expect(stderr.text()).toContain('[ERROR] Invalid --filter pattern');
  });

  test('--metrics prints the registry', async () => {
    fetchMock.mockResolvedValueOnce(textResponse(RECORDS));

    await run(['example.com', '-o', dir, '--metrics']);

    expect(stdout.text()).toContain('# TYPE wayback_subdomains_records_fetched_total counter');
  });
});

describe('argument helpers', () => {
  test('parseWordList trims, lowercases and drops blanks', () => {
    expect(parseWordList('Admin, test,,  ,dev ')).toEqual(['admin', 'test', 'dev']);
  });

  test('buildFilterSpec', () => {
    expect(buildFilterSpec({ filter: 'dev|test', minLength: 3 })).toEqual({ regex: /dev|test/, minLength: 3 });
    expect(() => buildFilterSpec({ minLength: 10, maxLength: 5 })).toThrow(ConfigError);
  });
});
