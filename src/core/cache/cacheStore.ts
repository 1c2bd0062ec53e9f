import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import {
  copyFileAtomic,
  ensureDirectoryExists,
  listFiles,
} from '../../utils/fileUtils.js';
import { bytesToMB, generateHash } from '../../utils/helpers.js';

const CACHE_EXTENSION = '.cache';
const HOUR_MS = 60 * 60 * 1000;

export interface CacheInfo {
  cacheDir: string;
  totalFiles: number;
  totalSizeMB: number;
  oldestFile: string | null;
  newestFile: string | null;
  ttlHours: number;
}

export interface CacheStoreOptions {
  cacheDir: string;
  ttlHours?: number;
  now?: () => number;
}

/**
 * On-disk cache of fetched payloads, one file per source URL named by the
 * URL's MD5 digest. File mtime is the freshness signal.
 */
export class CacheStore {
  public readonly cacheDir: string;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: CacheStoreOptions) {
    this.cacheDir = options.cacheDir;
    this.ttlMs = (options.ttlHours ?? 24) * HOUR_MS;
    this.now = options.now ?? Date.now;
  }

  public pathFor(url: string): string {
    return path.join(
      this.cacheDir,
      `${generateHash(url, 'md5')}${CACHE_EXTENSION}`
    );
  }

  /**
   * Path of a fresh, non-empty entry for `url`, or `null`. Entries that
   * cannot be inspected count as misses.
   */
  public async get(url: string): Promise<string | null> {
    const entryPath = this.pathFor(url);
    try {
      const stats = await fsp.stat(entryPath);
      if (!stats.isFile() || stats.size === 0) {
        return null;
      }
      if (this.now() - stats.mtimeMs >= this.ttlMs) {
        return null;
      }
      return entryPath;
    } catch {
      return null;
    }
  }

  public async put(url: string, sourcePath: string): Promise<void> {
    await ensureDirectoryExists(this.cacheDir);
    await copyFileAtomic(sourcePath, this.pathFor(url));
  }

  /**
   * Removes entries older than `olderThanHours`, or every entry when no age
   * is given. Returns the number of files removed.
   */
  public async evict(olderThanHours?: number): Promise<number> {
    const files = await listFiles(this.cacheDir, CACHE_EXTENSION);
    const cutoff =
      olderThanHours === undefined
        ? null
        : this.now() - olderThanHours * HOUR_MS;

    let removed = 0;
    for (const file of files) {
      const entryPath = path.join(this.cacheDir, file);
      try {
        if (cutoff !== null) {
          const stats = await fsp.stat(entryPath);
          if (stats.mtimeMs >= cutoff) continue;
        }
        await fsp.unlink(entryPath);
        removed++;
      } catch (error) {
        console.error(`Could not evict cache entry ${entryPath}:`, error);
      }
    }
    return removed;
  }

  public async info(): Promise<CacheInfo> {
    const files = await listFiles(this.cacheDir, CACHE_EXTENSION);
    let totalBytes = 0;
    let oldest: number | null = null;
    let newest: number | null = null;
    let counted = 0;

    for (const file of files) {
      try {
        const stats = await fsp.stat(path.join(this.cacheDir, file));
        totalBytes += stats.size;
        oldest = oldest === null ? stats.mtimeMs : Math.min(oldest, stats.mtimeMs);
        newest = newest === null ? stats.mtimeMs : Math.max(newest, stats.mtimeMs);
        counted++;
      } catch {
        continue; // removed by a concurrent eviction
      }
    }

    return {
      cacheDir: this.cacheDir,
      totalFiles: counted,
      totalSizeMB: bytesToMB(totalBytes),
      oldestFile: oldest === null ? null : new Date(oldest).toISOString(),
      newestFile: newest === null ? null : new Date(newest).toISOString(),
      ttlHours: this.ttlMs / HOUR_MS,
    };
  }
}
