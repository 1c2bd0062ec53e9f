import * as fsp from 'node:fs/promises';

export type SourceKind = 'structured-fragment' | 'line-list';

export interface Source {
  readonly url: string;
  readonly kind: SourceKind;
}

/** Text layout of a line-list payload. */
export type LineFormat = 'yaml' | 'rules';

const STRUCTURED_SUFFIXES = ['.json', '.list', '.jsonl'];
const YAML_SUFFIXES = ['.yaml', '.yml'];
const SNIFF_BYTES = 4096;

export function urlPath(url: string): string {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return url.toLowerCase();
  }
}

export function classifySource(url: string): Source {
  const lowerUrl = url.toLowerCase();
  const pathname = urlPath(url);
  const structured =
    STRUCTURED_SUFFIXES.some((suffix) => pathname.endsWith(suffix)) ||
    lowerUrl.includes('json');

  return Object.freeze({
    url,
    kind: structured ? 'structured-fragment' : 'line-list',
  });
}

/**
 * Decides whether a downloaded line-list is a YAML rule provider or a
 * comma separated rule list, from the URL suffix and the first bytes of
 * the file.
 */
export async function detectLineFormat(
  localPath: string,
  url: string
): Promise<LineFormat> {
  const pathname = urlPath(url);
  if (YAML_SUFFIXES.some((suffix) => pathname.endsWith(suffix))) {
    return 'yaml';
  }

  const handle = await fsp.open(localPath, 'r');
  try {
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    const head = buffer.subarray(0, bytesRead).toString('utf-8');
    return /^\uFEFF?\s*payload\s*:/m.test(head) ? 'yaml' : 'rules';
  } finally {
    await handle.close();
  }
}
