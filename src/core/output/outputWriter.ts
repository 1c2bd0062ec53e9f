import { writeFile } from '../../utils/fileUtils.js';
import { compareCodePoints } from '../../utils/helpers.js';
import type { MergedRuleset } from '../merge/types.js';

type Scalar = string | number | boolean;

function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function compareScalars(a: Scalar, b: Scalar): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return compareCodePoints(String(a), String(b));
}

function firstKey(value: unknown): string {
  if (typeof value !== 'object' || value === null) return '';
  return Object.keys(value).sort(compareCodePoints)[0] ?? '';
}

function canonicalList(items: unknown[], keepOrder: boolean): unknown[] {
  const canonical = items.map((item) => canonicalize(item));
  if (keepOrder) return canonical;

  const scalars: Scalar[] = canonical.filter(isScalar);
  if (scalars.length === canonical.length) {
    return scalars.sort(compareScalars);
  }
  if (
    canonical.every(
      (item) =>
        typeof item === 'object' && item !== null && !Array.isArray(item)
    )
  ) {
    return canonical.sort((a, b) => compareScalars(firstKey(a), firstKey(b)));
  }
  return canonical;
}

/** Deep copy with object keys sorted and lists put in canonical order. */
function canonicalize(value: unknown, keepListOrder = false): unknown {
  if (Array.isArray(value)) {
    return canonicalList(value, keepListOrder);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort(compareCodePoints)) {
      sorted[key] = canonicalize(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/**
 * Deterministic JSON for a ruleset: keys sorted at every level, value
 * lists sorted, the top-level `rules` list left in its assembled order.
 */
export function serializeRuleset(doc: MergedRuleset): string {
  const canonical = {
    rules: canonicalize(doc.rules, true),
    version: doc.version,
  };
  return JSON.stringify(canonical, null, 2);
}

/** Writes the ruleset and returns the number of bytes written. */
export async function writeRuleset(
  doc: MergedRuleset,
  outputPath: string
): Promise<number> {
  const content = serializeRuleset(doc);
  await writeFile(outputPath, content);
  return Buffer.byteLength(content, 'utf-8');
}
