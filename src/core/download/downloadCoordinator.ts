import * as path from 'node:path';
import pLimit from 'p-limit';
import { ensureDirectoryExists } from '../../utils/fileUtils.js';
import {
  bytesToMB,
  errorMessage,
  formatDuration,
  urlToFilename,
} from '../../utils/helpers.js';
import { DEFAULT_FETCH_OPTIONS, type Fetcher } from './fetcher.js';
import {
  type BatchProgressCallback,
  ProgressAggregator,
} from './progressAggregator.js';
import type {
  BatchOutcome,
  BatchStats,
  DownloadResult,
  FetchOptions,
} from './types.js';

export const DEFAULT_CONCURRENCY = 5;

export interface CoordinatorSettings {
  concurrency: number;
  progressIntervalMs: number;
  fetch: Pick<
    FetchOptions,
    'maxRetries' | 'baseDelayMs' | 'useCache' | 'supportResume'
  >;
  now?: () => number;
}

export interface DownloadBatchOptions {
  signal?: AbortSignal;
  onProgress?: BatchProgressCallback;
  useCache?: boolean;
}

export function computeBatchStats(
  results: DownloadResult[],
  totalTimeSeconds: number,
  maxConcurrent: number
): BatchStats {
  const successful = results.filter((r) => r.success);
  const failed = results.filter((r) => !r.success);
  const totalBytes = successful.reduce((sum, r) => sum + r.sizeBytes, 0);
  const totalSizeMB = bytesToMB(totalBytes);

  return {
    totalFiles: results.length,
    successfulFiles: successful.length,
    failedFiles: failed.length,
    successRatePercent:
      results.length > 0 ? (successful.length / results.length) * 100 : 0,
    totalSizeMB,
    totalTimeSeconds,
    averageSpeedMBps:
      totalTimeSeconds > 0 && totalBytes > 0
        ? totalSizeMB / totalTimeSeconds
        : 0,
    maxConcurrent,
    failedUrls: failed.map((r) => r.url),
  };
}

export function printBatchStats(stats: BatchStats): void {
  console.error('\n--- Download Stats ---');
  console.error(`Files: ${stats.successfulFiles}/${stats.totalFiles} succeeded`);
  console.error(`Success Rate: ${stats.successRatePercent.toFixed(1)}%`);
  console.error(`Total Size: ${stats.totalSizeMB.toFixed(2)} MB`);
  console.error(`Total Time: ${formatDuration(stats.totalTimeSeconds)}`);
  console.error(`Average Speed: ${stats.averageSpeedMBps.toFixed(2)} MB/s`);
  console.error(`Concurrency: ${stats.maxConcurrent}`);
  for (const url of stats.failedUrls) {
    console.error(`Failed: ${url}`);
  }
  console.error('----------------------');
}

/**
 * Fans a batch of URLs out over a bounded pool of fetch workers. A failing
 * or slow URL never holds back the results of the others; the batch
 * resolves once every URL has produced exactly one result.
 */
export class DownloadCoordinator {
  private readonly now: () => number;

  constructor(
    private readonly fetcher: Fetcher,
    private readonly settings: CoordinatorSettings = {
      concurrency: DEFAULT_CONCURRENCY,
      progressIntervalMs: 500,
      fetch: DEFAULT_FETCH_OPTIONS,
    }
  ) {
    this.now = settings.now ?? Date.now;
  }

  public async downloadBatch(
    urls: string[],
    destDir: string,
    options: DownloadBatchOptions = {}
  ): Promise<BatchOutcome> {
    const startedAt = this.now();
    const concurrency = Math.max(1, this.settings.concurrency);
    const { signal } = options;
    await ensureDirectoryExists(destDir);

    const aggregator = new ProgressAggregator({
      totalFiles: urls.length,
      intervalMs: this.settings.progressIntervalMs,
      now: this.now,
      onProgress: options.onProgress,
    });

    const fetchOptions: FetchOptions = {
      ...this.settings.fetch,
      useCache: options.useCache ?? this.settings.fetch.useCache,
      signal,
    };

    const limit = pLimit(concurrency);
    const tasks = urls.map((url, index) =>
      limit(async (): Promise<DownloadResult> => {
        const fileId = String(index);
        const result = await this.runWorker(url, index, destDir, {
          ...fetchOptions,
          onProgress: (downloadedBytes, totalBytes) =>
            aggregator.post({
              type: 'file-progress',
              fileId,
              downloadedBytes,
              totalBytes,
            }),
        });
        aggregator.post({
          type: 'file-complete',
          fileId,
          sizeBytes: result.sizeBytes,
        });
        if (!result.success) {
          console.error(`Download failed for ${url}: ${result.error}`);
        }
        return result;
      })
    );

    const results = await Promise.all(tasks);
    const totalTimeSeconds = (this.now() - startedAt) / 1000;
    return {
      results,
      stats: computeBatchStats(results, totalTimeSeconds, concurrency),
    };
  }

  private async runWorker(
    url: string,
    index: number,
    destDir: string,
    options: FetchOptions
  ): Promise<DownloadResult> {
    if (options.signal?.aborted) {
      return {
        url,
        success: false,
        error: 'Download aborted',
        sizeBytes: 0,
        durationSeconds: 0,
        fromCache: false,
      };
    }
    const destPath = path.join(destDir, urlToFilename(url, index));
    try {
      return await this.fetcher.fetch(url, destPath, options);
    } catch (error) {
      return {
        url,
        success: false,
        error: errorMessage(error),
        sizeBytes: 0,
        durationSeconds: 0,
        fromCache: false,
      };
    }
  }
}
