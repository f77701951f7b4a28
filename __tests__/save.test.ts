import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { saveResults, saveRawRecords, renderCsv, formatTimestamp, outputPath } from '../lib/output/save';
import { CancelledError, PersistenceError } from '../lib/errors';
import { logger } from './helpers';

const NOW = new Date(2025, 0, 2, 3, 4, 5);
const SUBS = ['a.example.com', 'b.example.com'];

describe('output files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wayback-subdomains-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('writes every requested format', async () => {
    const result = await saveResults('example.com', SUBS, dir, ['txt', 'json', 'csv'], { logger, now: NOW });

    expect(result.failures).toEqual([]);
    expect(result.saved).toEqual({
      txt: path.join(dir, 'example_com_subdomains.txt'),
      json: path.join(dir, 'example_com_subdomains.json'),
      csv: path.join(dir, 'example_com_subdomains.csv'),
    });
    await expect(fs.readFile(path.join(dir, 'example_com_subdomains.txt'), 'utf-8')).resolves.toBe('a.example.com\nb.example.com');
    await expect(fs.readFile(path.join(dir, 'example_com_subdomains.csv'), 'utf-8')).resolves.toBe(
      'index,subdomain\r\n1,a.example.com\r\n2,b.example.com\r\n',
    );
    const json = JSON.parse(await fs.readFile(path.join(dir, 'example_com_subdomains.json'), 'utf-8'));
    expect(json).toEqual({
      domain: 'example.com',
      subdomain_count: 2,
      extraction_date: '2025-01-02 03:04:05',
      subdomains: SUBS,
    });
  });

  test('one failing format does not stop the others', async () => {
    // a directory where the txt file should go makes the rename fail
    await fs.mkdir(outputPath(dir, 'example.com', 'txt'));

    const result = await saveResults('example.com', SUBS, dir, ['txt', 'json'], { logger, now: NOW });

    expect(Object.keys(result.saved)).toEqual(['json']);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toBeInstanceOf(PersistenceError);
    expect(result.failures[0].format).toBe('txt');
    const leftovers = (await fs.readdir(dir)).filter((f) => f.endsWith('.tmp'));
    expect(leftovers).toEqual([]);
  });

  test('an unusable output directory fails every format', async () => {
    const blocker = path.join(dir, 'file');
    await fs.writeFile(blocker, 'x');

    const result = await saveResults('example.com', SUBS, path.join(blocker, 'out'), ['txt', 'csv'], { logger });

    expect(result.saved).toEqual({});
    expect(result.failures.map((f) => f.format)).toEqual(['txt', 'csv']);
  });

  test('writes nothing once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(saveResults('example.com', SUBS, dir, ['txt'], { logger, signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  test('cancelling while a format is written renames nothing', async () => {
    const controller = new AbortController();
    const writeFile = fs.writeFile.bind(fs);
    jest.spyOn(fs, 'writeFile').mockImplementationOnce(async (file, data) => {
      await writeFile(file, data);
      controller.abort();
    });

    await expect(
      saveResults('example.com', SUBS, dir, ['txt', 'json'], { logger, signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  test('raw dump is not kept once cancelled', async () => {
    const controller = new AbortController();
    const writeFile = fs.writeFile.bind(fs);
    jest.spyOn(fs, 'writeFile').mockImplementationOnce(async (file, data) => {
      await writeFile(file, data);
      controller.abort();
    });

    await expect(saveRawRecords('example.com', ['https://a.example.com/'], dir, logger, controller.signal)).rejects.toBeInstanceOf(
      CancelledError,
    );
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  test('raw dump keeps every record', async () => {
    const file = await saveRawRecords('example.com', ['https://a.example.com/', 'not a url'], dir, logger);

    expect(file).toBe(path.join(dir, 'example_com_raw_urls.txt'));
    await expect(fs.readFile(file, 'utf-8')).resolves.toBe('https://a.example.com/\nnot a url');
  });
});

describe('renderers', () => {
  test('csv quotes fields that need it', () => {
    expect(renderCsv(['a,b.example.com'])).toBe('index,subdomain\r\n1,"a,b.example.com"\r\n');
    expect(renderCsv([])).toBe('index,subdomain\r\n');
  });

  test('formatTimestamp pads every field', () => {
    expect(formatTimestamp(new Date(2024, 10, 9, 8, 7, 6))).toBe('2024-11-09 08:07:06');
  });
});
