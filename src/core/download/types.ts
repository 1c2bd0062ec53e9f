export interface DownloadResult {
  url: string;
  success: boolean;
  localPath?: string;
  error?: string;
  sizeBytes: number;
  durationSeconds: number;
  fromCache: boolean;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type FetchErrorKind = 'retryable' | 'fatal';

export interface FetchFailure {
  kind: FetchErrorKind;
  message: string;
  status?: number;
}

export type ByteProgressCallback = (
  downloadedBytes: number,
  totalBytes: number
) => void;

export interface FetchOptions {
  maxRetries: number;
  baseDelayMs: number;
  useCache: boolean;
  supportResume: boolean;
  onProgress?: ByteProgressCallback;
  signal?: AbortSignal;
}

/** Messages posted by download workers to the progress aggregator. */
export type ProgressMessage =
  | {
      type: 'file-progress';
      fileId: string;
      downloadedBytes: number;
      totalBytes: number;
    }
  | { type: 'file-complete'; fileId: string; sizeBytes: number };

export interface BatchProgress {
  completedFiles: number;
  totalFiles: number;
  speedMBps: number;
  elapsedSeconds: number;
}

export interface BatchStats {
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;
  successRatePercent: number;
  totalSizeMB: number;
  totalTimeSeconds: number;
  averageSpeedMBps: number;
  maxConcurrent: number;
  failedUrls: string[];
}

export interface BatchOutcome {
  results: DownloadResult[];
  stats: BatchStats;
}
