import { createHash } from 'node:crypto';

export function generateHash(content: string, algorithm = 'sha256'): string {
  return createHash(algorithm).update(content).digest('hex');
}

export function formatDuration(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  return [
    hours.toString().padStart(2, '0'),
    minutes.toString().padStart(2, '0'),
    secs.toString().padStart(2, '0'),
  ].join(':');
}

export function bytesToMB(bytes: number): number {
  return bytes / (1024 * 1024);
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${bytesToMB(bytes).toFixed(2)} MB`;
}

/**
 * Local file name for the `index`-th URL of a batch. The index prefix keeps
 * two sources with the same last path segment apart.
 */
export function urlToFilename(url: string, index: number): string {
  let name = '';
  try {
    const segments = new URL(url).pathname.split('/').filter(Boolean);
    name = decodeURIComponent(segments.at(-1) ?? '');
  } catch {
    name = '';
  }

  // Replace invalid file characters
  name = name.replace(/[\/?<>\\:*|"\s]/g, '-');
  // Clean up repeated hyphens
  name = name.replace(/-+/g, '-').replace(/^-|-$/g, '');

  if (name.length > 100) {
    const hash = generateHash(url, 'md5').substring(0, 8);
    name = `${name.substring(0, 92)}-${hash}`;
  }

  if (!name || !name.includes('.')) {
    name = `${name || 'download'}-${generateHash(url, 'md5').substring(0, 8)}.txt`;
  }

  return `${String(index).padStart(3, '0')}-${name}`;
}

/**
 * Resolves after `ms` milliseconds, or rejects with the signal's reason as
 * soon as it is aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Orders strings by Unicode code point. Differs from `<` and the default
 * `sort()` only for characters outside the Basic Multilingual Plane.
 */
export function compareCodePoints(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(i) ?? 0;
    if (left !== right) return left - right;
    if (left > 0xffff) i++;
  }
  return a.length - b.length;
}
