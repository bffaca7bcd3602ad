/**
 * JSON file cache for provider responses, one file per ticker, resource and
 * reporting period.
 * Entries older than the TTL are misses but stay on disk until cleared.
 */
import { mkdir, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { createLogger } from './logger';

const log = createLogger('cache');

const CacheEntrySchema = z.object({
  ticker: z.string(),
  resource: z.string(),
  cached_at: z.string(),
  data: z.unknown(),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface CachedFileInfo {
  file: string;
  ticker: string | null;
  resource: string | null;
  cached_at: string | null;
  size_bytes: number;
  is_valid: boolean;
  error?: string;
}

export interface CacheInfo {
  cache_directory: string;
  total_files: number;
  total_size_bytes: number;
  files: CachedFileInfo[];
}

export class CacheService {
  private readonly ttlMs: number;

  constructor(
    readonly directory: string,
    ttlHours = 24,
    private readonly now: () => number = Date.now,
  ) {
    this.ttlMs = ttlHours * 60 * 60 * 1000;
  }

  /** `period` is left out for resources that have none, such as the profile. */
  static keyFor(ticker: string, resource: string, period?: string): string {
    const stem = period ? `${ticker.toUpperCase()}_${resource}_${period}` : `${ticker.toUpperCase()}_${resource}`;
    return `${stem}.json`.replace(/[\\/]/g, '_');
  }

  private pathFor(ticker: string, resource: string, period?: string): string {
    return path.join(this.directory, CacheService.keyFor(ticker, resource, period));
  }

  private isFresh(cachedAt: string): boolean {
    const at = Date.parse(cachedAt);
    return Number.isFinite(at) && this.now() - at < this.ttlMs;
  }

  private async readEntry(file: string): Promise<CacheEntry> {
    const raw = await readFile(file, 'utf8');
    return CacheEntrySchema.parse(JSON.parse(raw));
  }

  async load(ticker: string, resource: string, period?: string): Promise<unknown | null> {
    const file = this.pathFor(ticker, resource, period);
    let entry: CacheEntry;
    try {
      entry = await this.readEntry(file);
    } catch (error) {
      if (isMissingFile(error)) return null;
      log.warn(`Ignoring unreadable cache file ${file}`, error instanceof Error ? error.message : error);
      return null;
    }

    if (!this.isFresh(entry.cached_at)) {
      log.debug(`Stale cache for ${ticker} ${resource}`);
      return null;
    }
    log.debug(`Cache hit for ${ticker} ${resource}`);
    return entry.data;
  }

  async save(ticker: string, resource: string, data: unknown, period?: string): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const entry: CacheEntry = {
      ticker: ticker.toUpperCase(),
      resource,
      cached_at: new Date(this.now()).toISOString(),
      data,
    };
    await writeFile(this.pathFor(ticker, resource, period), JSON.stringify(entry), 'utf8');
    log.debug(`Cached ${ticker} ${resource}`);
  }

  /** Removes every cache file, or only the given ticker's. Returns the count removed. */
  async clear(ticker?: string): Promise<number> {
    const files = await this.listFiles();
    const prefix = ticker ? `${ticker.toUpperCase()}_` : '';
    const targets = files.filter((f) => f.startsWith(prefix));
    await Promise.all(targets.map((f) => rm(path.join(this.directory, f), { force: true })));
    log.info(`Cleared ${targets.length} cache file(s)${ticker ? ` for ${ticker.toUpperCase()}` : ''}`);
    return targets.length;
  }

  async info(): Promise<CacheInfo> {
    const files = await this.listFiles();
    const details: CachedFileInfo[] = [];

    for (const file of files) {
      const full = path.join(this.directory, file);
      const { size } = await stat(full);
      try {
        const entry = await this.readEntry(full);
        details.push({
          file,
          ticker: entry.ticker,
          resource: entry.resource,
          cached_at: entry.cached_at,
          size_bytes: size,
          is_valid: this.isFresh(entry.cached_at),
        });
      } catch (error) {
        details.push({
          file,
          ticker: null,
          resource: null,
          cached_at: null,
          size_bytes: size,
          is_valid: false,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return {
      cache_directory: this.directory,
      total_files: details.length,
      total_size_bytes: details.reduce((sum, d) => sum + d.size_bytes, 0),
      files: details,
    };
  }

  private async listFiles(): Promise<string[]> {
    try {
      const names = await readdir(this.directory);
      return names.filter((n) => n.endsWith('.json')).sort();
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';
