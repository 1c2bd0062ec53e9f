import * as fs from 'node:fs';
import * as readline from 'node:readline';
import { load } from 'js-yaml';
import { isIpOrCidr } from './cidr.js';
import { mapRuleKeyword, normalizeRuleKey } from './ruleTypes.js';
import type { LineRecord, LogicalRule, LogicalSubrule } from './types.js';

const LOGICAL_KEYWORD = 'AND';

/** Plain token: address/CIDR, `+.suffix` or domain. */
export function classifyPlainToken(token: string): LineRecord {
  if (token.startsWith('+.')) {
    const suffix = token.slice(2);
    return suffix
      ? { kind: 'value', ruleType: 'domain_suffix', value: suffix }
      : { kind: 'skipped', reason: `Empty domain suffix "${token}"` };
  }
  if (isIpOrCidr(token)) {
    return { kind: 'value', ruleType: 'ip_cidr', value: token };
  }
  return { kind: 'value', ruleType: 'domain', value: token };
}

// AND,((DOMAIN,foo.com),(DST-PORT,443))
function parseLogicalLine(line: string): LineRecord {
  const diagnostics: string[] = [];
  const rules: LogicalSubrule[] = [];

  for (const match of line.matchAll(/\(([^()]*)\)/g)) {
    const component = match[1];
    const comma = component.indexOf(',');
    if (comma === -1) {
      diagnostics.push(`Dropped logical component "${component}": no value`);
      continue;
    }
    const keyword = component.slice(0, comma).trim();
    const value = component.slice(comma + 1).trim();
    const ruleType = mapRuleKeyword(keyword);
    if (!ruleType) {
      diagnostics.push(
        `Dropped logical component "${component}": unknown keyword "${keyword}"`
      );
      continue;
    }
    rules.push({ [ruleType]: value });
  }

  if (rules.length === 0) {
    return {
      kind: 'skipped',
      reason: `Logical rule without usable components: ${line}`,
    };
  }
  const rule: LogicalRule = { type: 'logical', mode: 'and', rules };
  return { kind: 'logical', rule, diagnostics };
}

/**
 * Parses one line of a proxy rule list. Returns `null` for blank lines
 * and `#` comments.
 */
export function parseLine(rawLine: string): LineRecord | null {
  const line = rawLine.replace(/^\uFEFF/, '').trim();
  if (!line || line.startsWith('#')) return null;

  const fields = line.split(',').map((field) => field.trim());
  if (fields[0].toUpperCase() === LOGICAL_KEYWORD) {
    return parseLogicalLine(line);
  }
  if (fields.length === 1) {
    return classifyPlainToken(line);
  }

  const [pattern, value] = fields;
  const ruleType = mapRuleKeyword(pattern);
  if (!ruleType) {
    return { kind: 'skipped', reason: `Unknown rule keyword "${pattern}"` };
  }
  if (!value) {
    return { kind: 'skipped', reason: `Missing value for "${pattern}"` };
  }
  return { kind: 'value', ruleType, value };
}

/**
 * Streams the records of a rule list file line by line, so the file is
 * never held in memory as a whole. Skipped records carry the line number.
 */
export async function* readLineRecords(
  filePath: string
): AsyncGenerator<LineRecord> {
  const lines = readline.createInterface({
    input: fs.createReadStream(filePath, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      const record = parseLine(line);
      if (!record) continue;
      yield record.kind === 'skipped'
        ? { kind: 'skipped', reason: `Line ${lineNumber}: ${record.reason}` }
        : record;
    }
  } finally {
    lines.close();
  }
}

function payloadItems(document: unknown): unknown[] {
  if (document === null || document === undefined) return [];
  if (Array.isArray(document)) return document;
  if (typeof document === 'object' && document !== null && 'payload' in document) {
    const { payload } = document;
    if (Array.isArray(payload)) return payload;
    if (payload === null) return [];
  }
  throw new Error('YAML rule provider has no payload list');
}

function scalarText(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() || null;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Parses a YAML rule provider: a `payload` list (or a bare list) of
 * `PATTERN,address` strings, plain tokens, or `{ ruleType: value | list }`
 * objects. Throws when the text is not valid YAML.
 */
export function parseYamlRules(text: string): LineRecord[] {
  const records: LineRecord[] = [];

  for (const item of payloadItems(load(text))) {
    if (typeof item === 'string') {
      const record = parseLine(item);
      if (record) records.push(record);
      continue;
    }
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      records.push({
        kind: 'skipped',
        reason: `Unsupported payload item ${JSON.stringify(item)}`,
      });
      continue;
    }
    for (const [key, rawValue] of Object.entries(item)) {
      const ruleType = normalizeRuleKey(key);
      const values: unknown[] = Array.isArray(rawValue) ? rawValue : [rawValue];
      for (const entry of values) {
        const value = scalarText(entry);
        records.push(
          value === null
            ? { kind: 'skipped', reason: `Unsupported value under "${key}"` }
            : { kind: 'value', ruleType, value }
        );
      }
    }
  }

  return records;
}
