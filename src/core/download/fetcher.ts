import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { performance } from 'node:perf_hooks';
import { Readable } from 'node:stream';
import axios, {
  AxiosHeaders,
  type AxiosInstance,
  type AxiosResponse,
} from 'axios';
import {
  copyFileAtomic,
  ensureDirectoryExists,
  fileSize,
  isReadableNonEmpty,
  removeFile,
} from '../../utils/fileUtils.js';
import { errorMessage, sleep } from '../../utils/helpers.js';
import type { CacheStore } from '../cache/cacheStore.js';
import type {
  DownloadResult,
  FetchFailure,
  FetchOptions,
  Result,
} from './types.js';

// Client errors where another attempt cannot change the answer.
const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 410]);

export const DEFAULT_FETCH_OPTIONS: FetchOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  useCache: true,
  supportResume: true,
};

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs,
    headers: {
      'User-Agent': options.userAgent,
      Accept: '*/*',
    },
    maxRedirects: 5,
    validateStatus: () => true,
  });
}

function readHeader(
  headers: AxiosResponse['headers'],
  name: string
): string | undefined {
  const value =
    headers instanceof AxiosHeaders
      ? headers.get(name)
      : headers[name.toLowerCase()];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function parseLength(value: string | undefined): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

export function classifyStatus(status: number): FetchFailure {
  return {
    kind: NON_RETRYABLE_STATUSES.has(status) ? 'fatal' : 'retryable',
    message: `HTTP ${status}`,
    status,
  };
}

function classifyError(error: unknown, signal?: AbortSignal): FetchFailure {
  if (signal?.aborted || axios.isCancel(error)) {
    return { kind: 'fatal', message: 'Download aborted' };
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return { kind: 'retryable', message: `Timeout: ${error.message}` };
    }
    return { kind: 'retryable', message: `Network error: ${error.message}` };
  }
  return { kind: 'retryable', message: errorMessage(error) };
}

/**
 * Retrieves one URL to a local file with cache read-through, retries with
 * exponential backoff and ranged resume of partial downloads.
 *
 * Bytes are streamed into `<destPath>.part` and renamed onto `destPath`
 * once complete, so a non-empty `destPath` always holds a finished
 * download.
 */
export class Fetcher {
  constructor(
    private readonly http: AxiosInstance,
    private readonly cache: CacheStore | null = null
  ) {}

  public async fetch(
    url: string,
    destPath: string,
    options: FetchOptions = DEFAULT_FETCH_OPTIONS
  ): Promise<DownloadResult> {
    const startedAt = performance.now();
    const elapsed = () => (performance.now() - startedAt) / 1000;
    const failure = (message: string): DownloadResult => ({
      url,
      success: false,
      error: message,
      sizeBytes: 0,
      durationSeconds: elapsed(),
      fromCache: false,
    });

    try {
      // Finished file from an earlier run
      if (await isReadableNonEmpty(destPath)) {
        return {
          url,
          success: true,
          localPath: destPath,
          sizeBytes: (await fileSize(destPath)) ?? 0,
          durationSeconds: elapsed(),
          fromCache: false,
        };
      }

      if (options.useCache && this.cache) {
        const size = await this.copyFromCache(url, destPath);
        if (size > 0) {
          return {
            url,
            success: true,
            localPath: destPath,
            sizeBytes: size,
            durationSeconds: elapsed(),
            fromCache: true,
          };
        }
      }

      const partPath = `${destPath}.part`;
      let lastFailure: FetchFailure = {
        kind: 'retryable',
        message: 'No attempt made',
      };

      for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
        const outcome = await this.attempt(url, partPath, options);
        if (outcome.ok) {
          await fsp.rename(partPath, destPath);
          await this.writeThrough(url, destPath);
          return {
            url,
            success: true,
            localPath: destPath,
            sizeBytes: outcome.value,
            durationSeconds: elapsed(),
            fromCache: false,
          };
        }

        lastFailure = outcome.error;
        if (lastFailure.kind === 'fatal' || attempt === options.maxRetries) {
          break;
        }

        const delay = options.baseDelayMs * 2 ** attempt;
        console.error(
          `Attempt ${attempt + 1} for ${url} failed (${lastFailure.message}), retrying in ${delay} ms`
        );
        try {
          await sleep(delay, options.signal);
        } catch {
          lastFailure = { kind: 'fatal', message: 'Download aborted' };
          break;
        }
      }

      if (!options.supportResume) {
        await removeFile(partPath);
      }
      return failure(lastFailure.message);
    } catch (error) {
      return failure(errorMessage(error));
    }
  }

  /**
   * HEAD probe for `Accept-Ranges: bytes`. Any failure means no resume.
   */
  public async probeRangeSupport(
    url: string,
    signal?: AbortSignal
  ): Promise<boolean> {
    try {
      const response = await this.http.head(url, {
        signal,
        validateStatus: () => true,
      });
      if (response.status >= 400) return false;
      const acceptRanges = readHeader(response.headers, 'accept-ranges') ?? '';
      return acceptRanges.toLowerCase().includes('bytes');
    } catch {
      return false;
    }
  }

  private async copyFromCache(url: string, destPath: string): Promise<number> {
    if (!this.cache) return 0;
    const cachedPath = await this.cache.get(url);
    if (!cachedPath) return 0;

    try {
      await copyFileAtomic(cachedPath, destPath);
      return (await fileSize(destPath)) ?? 0;
    } catch (error) {
      console.warn(
        `Cached copy of ${url} is unusable, downloading instead: ${errorMessage(error)}`
      );
      return 0;
    }
  }

  private async writeThrough(url: string, filePath: string): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.put(url, filePath);
    } catch (error) {
      console.warn(`Could not cache ${url}: ${errorMessage(error)}`);
    }
  }

  private async attempt(
    url: string,
    partPath: string,
    options: FetchOptions
  ): Promise<Result<number, FetchFailure>> {
    const { signal } = options;

    let resumeFrom = 0;
    if (options.supportResume) {
      const existing = (await fileSize(partPath)) ?? 0;
      if (existing > 0 && (await this.probeRangeSupport(url, signal))) {
        resumeFrom = existing;
      }
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(url, {
        responseType: 'stream',
        signal,
        validateStatus: () => true,
        headers: resumeFrom > 0 ? { Range: `bytes=${resumeFrom}-` } : {},
      });
    } catch (error) {
      return { ok: false, error: classifyError(error, signal) };
    }

    const body = response.data;
    if (response.status < 200 || response.status >= 300) {
      if (body instanceof Readable) body.destroy();
      if (response.status === 416) {
        // stale partial file; the next attempt starts over
        await removeFile(partPath);
      }
      return { ok: false, error: classifyStatus(response.status) };
    }
    if (!(body instanceof Readable)) {
      return {
        ok: false,
        error: { kind: 'retryable', message: 'Response body is not a stream' },
      };
    }

    const append = resumeFrom > 0 && response.status === 206;
    let totalBytes: number;
    if (append) {
      const contentRange = readHeader(response.headers, 'content-range');
      const match = contentRange?.match(/\/(\d+)\s*$/);
      totalBytes = match
        ? Number(match[1])
        : resumeFrom + parseLength(readHeader(response.headers, 'content-length'));
    } else {
      totalBytes = parseLength(readHeader(response.headers, 'content-length'));
    }

    await ensureDirectoryExists(path.dirname(partPath));
    let downloaded = append ? resumeFrom : 0;
    const handle = await fsp.open(partPath, append ? 'a' : 'w');
    try {
      for await (const chunk of body) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        await handle.write(buffer);
        downloaded += buffer.length;
        options.onProgress?.(downloaded, totalBytes);
      }
    } catch (error) {
      body.destroy();
      return { ok: false, error: classifyError(error, signal) };
    } finally {
      await handle.close();
    }

    const size = (await fileSize(partPath)) ?? 0;
    if (size === 0) {
      await removeFile(partPath);
      return {
        ok: false,
        error: { kind: 'retryable', message: 'Empty response body' },
      };
    }
    return { ok: true, value: size };
  }
}
