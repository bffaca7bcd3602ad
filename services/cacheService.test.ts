import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { CacheService } from './cacheService';
import { setLogLevel } from './logger';

const HOUR = 60 * 60 * 1000;

describe('CacheService', () => {
  let directory: string;
  let now: number;
  let cache: CacheService;

  beforeAll(() => setLogLevel('silent'));
  afterAll(() => setLogLevel('info'));

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'dcf-cache-'));
    now = Date.parse('2025-03-01T12:00:00.000Z');
    cache = new CacheService(directory, 24, () => now);
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('names files by ticker and resource', () => {
    expect(CacheService.keyFor('aapl', 'income-statement')).toBe('AAPL_income-statement.json');
    expect(CacheService.keyFor('brk/b', 'key-metrics/ttm')).toBe('BRK_B_key-metrics_ttm.json');
  });

  it('adds the reporting period to statement keys', () => {
    expect(CacheService.keyFor('aapl', 'income-statement', 'quarter')).toBe('AAPL_income-statement_quarter.json');
    expect(CacheService.keyFor('aapl', 'income-statement', 'annual')).toBe('AAPL_income-statement_annual.json');
  });

  it('round-trips a payload', async () => {
    await cache.save('aapl', 'profile', [{ symbol: 'AAPL' }]);
    expect(await cache.load('AAPL', 'profile')).toEqual([{ symbol: 'AAPL' }]);
    expect(await readdir(directory)).toEqual(['AAPL_profile.json']);
  });

  it('misses on an absent entry', async () => {
    expect(await cache.load('AAPL', 'profile')).toBeNull();
  });

  it('expires entries after the TTL', async () => {
    await cache.save('AAPL', 'profile', [1]);
    now += 23 * HOUR;
    expect(await cache.load('AAPL', 'profile')).toEqual([1]);
    now += 2 * HOUR;
    expect(await cache.load('AAPL', 'profile')).toBeNull();
  });

  it('ignores a corrupt file', async () => {
    await writeFile(path.join(directory, 'AAPL_profile.json'), '{not json', 'utf8');
    expect(await cache.load('AAPL', 'profile')).toBeNull();

    await writeFile(path.join(directory, 'AAPL_profile.json'), JSON.stringify({ data: [] }), 'utf8');
    expect(await cache.load('AAPL', 'profile')).toBeNull();
  });

  it('clears one ticker or everything', async () => {
    await cache.save('AAPL', 'profile', []);
    await cache.save('AAPL', 'income-statement', []);
    await cache.save('MSFT', 'profile', []);

    expect(await cache.clear('aapl')).toBe(2);
    expect(await readdir(directory)).toEqual(['MSFT_profile.json']);
    expect(await cache.clear()).toBe(1);
    expect(await readdir(directory)).toEqual([]);
  });

  it('describes the cached files', async () => {
    await cache.save('AAPL', 'profile', [{ symbol: 'AAPL' }]);
    now += 48 * HOUR;
    await cache.save('MSFT', 'profile', [{ symbol: 'MSFT' }]);
    await writeFile(path.join(directory, 'ZZZ_profile.json'), 'oops', 'utf8');

    const info = await cache.info();

    expect(info.cache_directory).toBe(directory);
    expect(info.total_files).toBe(3);
    expect(info.files.map((f) => [f.file, f.is_valid])).toEqual([
      ['AAPL_profile.json', false],
      ['MSFT_profile.json', true],
      ['ZZZ_profile.json', false],
    ]);
    expect(info.files[1]).toMatchObject({
      ticker: 'MSFT',
      resource: 'profile',
      cached_at: '2025-03-03T12:00:00.000Z',
    });
    expect(info.files[2].error).toEqual(expect.any(String));
    expect(info.total_size_bytes).toBe(info.files.reduce((sum, f) => sum + f.size_bytes, 0));
  });

  it('treats a missing directory as an empty cache', async () => {
    const missing = new CacheService(path.join(directory, 'nope'));
    expect(await missing.info()).toEqual({
      cache_directory: path.join(directory, 'nope'),
      total_files: 0,
      total_size_bytes: 0,
      files: [],
    });
    expect(await missing.clear()).toBe(0);
  });
});
