import { z } from 'zod';
import { normalizeRuleKey } from './ruleTypes.js';
import type { HeadlessRule, LogicalRule, RuleEntry, RuleFragment } from './types.js';

const objectSchema = z.record(z.string(), z.unknown());

const logicalRuleSchema = z.object({
  type: z.literal('logical'),
  mode: z.enum(['and', 'or']),
  rules: z
    .array(z.record(z.string(), z.union([z.string(), z.array(z.string())])))
    .min(1),
  invert: z.boolean().optional(),
});

function toHeadlessRule(
  raw: Record<string, unknown>,
  diagnostics: string[]
): HeadlessRule | null {
  const rule: HeadlessRule = {};
  for (const [rawKey, rawValue] of Object.entries(raw)) {
    const key = normalizeRuleKey(rawKey);
    let values: string[];
    if (typeof rawValue === 'string') {
      values = [rawValue];
    } else if (Array.isArray(rawValue)) {
      values = rawValue.filter((item): item is string => typeof item === 'string');
      if (values.length !== rawValue.length) {
        diagnostics.push(
          `Dropped ${rawValue.length - values.length} non-string value(s) under "${rawKey}"`
        );
      }
    } else {
      diagnostics.push(`Dropped field "${rawKey}": unsupported value shape`);
      continue;
    }
    if (values.length === 0) continue;
    rule[key] = key in rule ? [...rule[key], ...values] : values;
  }
  return Object.keys(rule).length > 0 ? rule : null;
}

function toRuleEntry(raw: unknown, diagnostics: string[]): RuleEntry | null {
  const object = objectSchema.safeParse(raw);
  if (!object.success) {
    diagnostics.push('Dropped a rule that is not an object');
    return null;
  }

  if (object.data.type === 'logical') {
    const logical = logicalRuleSchema.safeParse(object.data);
    if (!logical.success) {
      diagnostics.push('Dropped a malformed logical rule');
      return null;
    }
    const rule: LogicalRule = {
      type: 'logical',
      mode: logical.data.mode,
      rules: logical.data.rules.map((subrule) =>
        Object.fromEntries(
          Object.entries(subrule).map(([key, value]) => [
            normalizeRuleKey(key),
            value,
          ])
        )
      ),
    };
    if (logical.data.invert !== undefined) rule.invert = logical.data.invert;
    return rule;
  }

  return toHeadlessRule(object.data, diagnostics);
}

function rulesOf(document: unknown): unknown[] {
  const object = objectSchema.safeParse(document);
  if (!object.success) {
    throw new Error('Rule fragment must be a JSON object');
  }
  const { rules, version: _version, ...rest } = object.data;
  // A document without a rules list is read as one rule object
  return Array.isArray(rules) ? rules : [rest];
}

/**
 * Parses a JSON rule fragment (`{"version": n, "rules": [...]}`). With
 * `jsonLines`, each non-empty line is parsed as its own document.
 * Throws on malformed JSON.
 */
export function parseFragment(
  text: string,
  options: { jsonLines?: boolean } = {}
): RuleFragment {
  const source = text.replace(/^\uFEFF/, '');
  const documents: unknown[] = options.jsonLines
    ? source
        .split(/\r?\n/)
        .filter((line) => line.trim().length > 0)
        .map((line) => JSON.parse(line))
    : [JSON.parse(source)];

  const diagnostics: string[] = [];
  const rules: RuleEntry[] = [];
  for (const document of documents) {
    for (const raw of rulesOf(document)) {
      const entry = toRuleEntry(raw, diagnostics);
      if (entry) rules.push(entry);
    }
  }
  return { rules, diagnostics };
}
