import { readFile } from '../../utils/fileUtils.js';
import {
  detectLineFormat,
  type Source,
  urlPath,
} from '../sources/sourceClassifier.js';
import { parseFragment } from './fragmentParser.js';
import type { Payload } from './types.js';

/**
 * Turns a downloaded source into a merge payload. Structured fragments are
 * parsed here and throw when malformed; line lists stay on disk and are
 * streamed by the merge.
 */
export async function loadPayload(
  source: Source,
  localPath: string
): Promise<Payload> {
  if (source.kind === 'structured-fragment') {
    const text = await readFile(localPath);
    const fragment = parseFragment(text, {
      jsonLines: urlPath(source.url).endsWith('.jsonl'),
    });
    return { kind: 'structured-fragment', url: source.url, fragment };
  }

  const format = await detectLineFormat(localPath, source.url);
  return { kind: 'line-list', url: source.url, path: localPath, format };
}
