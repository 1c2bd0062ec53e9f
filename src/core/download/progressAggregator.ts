import { bytesToMB } from '../../utils/helpers.js';
import type { BatchProgress, ProgressMessage } from './types.js';

export type BatchProgressCallback = (progress: BatchProgress) => void;

export interface ProgressAggregatorOptions {
  totalFiles: number;
  intervalMs?: number;
  now?: () => number;
  onProgress?: BatchProgressCallback;
}

/**
 * Single consumer of the progress messages posted by download workers.
 * Owns all counters; workers never touch them directly.
 */
export class ProgressAggregator {
  private readonly inFlight = new Map<string, number>();
  private readonly totalFiles: number;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly onProgress?: BatchProgressCallback;
  private readonly startedAt: number;
  private completedFiles = 0;
  private completedBytes = 0;
  private lastReportAt = Number.NEGATIVE_INFINITY;

  constructor(options: ProgressAggregatorOptions) {
    this.totalFiles = options.totalFiles;
    this.intervalMs = options.intervalMs ?? 500;
    this.now = options.now ?? Date.now;
    this.onProgress = options.onProgress;
    this.startedAt = this.now();
  }

  public post(message: ProgressMessage): void {
    if (message.type === 'file-progress') {
      this.inFlight.set(message.fileId, message.downloadedBytes);
    } else {
      this.inFlight.delete(message.fileId);
      this.completedFiles++;
      this.completedBytes += message.sizeBytes;
    }
    this.maybeReport();
  }

  public snapshot(): BatchProgress {
    let downloaded = this.completedBytes;
    for (const bytes of this.inFlight.values()) downloaded += bytes;

    const elapsedSeconds = (this.now() - this.startedAt) / 1000;
    return {
      completedFiles: this.completedFiles,
      totalFiles: this.totalFiles,
      speedMBps: elapsedSeconds > 0 ? bytesToMB(downloaded) / elapsedSeconds : 0,
      elapsedSeconds,
    };
  }

  private maybeReport(): void {
    if (!this.onProgress) return;
    const current = this.now();
    const finished = this.completedFiles === this.totalFiles;
    if (!finished && current - this.lastReportAt < this.intervalMs) return;
    this.lastReportAt = current;
    this.onProgress(this.snapshot());
  }
}
