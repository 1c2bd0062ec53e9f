import { readFile } from '../../utils/fileUtils.js';
import { errorMessage } from '../../utils/helpers.js';
import { isIpOrCidr } from './cidr.js';
import { parseYamlRules, readLineRecords } from './lineListParser.js';
import { RuleAccumulator } from './ruleAccumulator.js';
import { CIDR_RULE_TYPES } from './ruleTypes.js';
import {
  isLogicalRule,
  type LineRecord,
  type MergeOutcome,
  type MergeStats,
  type Payload,
} from './types.js';

export interface MergeOptions {
  /** Drop `ip_cidr` / `source_ip_cidr` values that are not valid CIDRs. */
  validateCidr?: boolean;
}

class SourceFolder {
  constructor(
    private readonly target: RuleAccumulator,
    private readonly stats: MergeStats,
    private readonly options: MergeOptions,
    private readonly url: string
  ) {}

  public value(ruleType: string, value: string): void {
    this.stats.valuesSeen++;
    if (
      this.options.validateCidr &&
      CIDR_RULE_TYPES.has(ruleType) &&
      !isIpOrCidr(value.trim())
    ) {
      this.stats.invalidCidrs++;
      this.note(`Dropped malformed CIDR "${value}" under ${ruleType}`);
      return;
    }
    this.target.addValue(ruleType, value);
  }

  public record(record: LineRecord): void {
    switch (record.kind) {
      case 'value':
        this.value(record.ruleType, record.value);
        break;
      case 'logical':
        this.target.addLogical(record.rule);
        record.diagnostics.forEach((message) => this.note(message));
        break;
      case 'skipped':
        this.stats.skippedLines++;
        this.note(record.reason);
        break;
    }
  }

  public note(message: string): void {
    this.stats.diagnostics.push(`${this.url}: ${message}`);
  }
}

async function foldPayload(payload: Payload, folder: SourceFolder): Promise<void> {
  if (payload.kind === 'structured-fragment') {
    payload.fragment.diagnostics.forEach((message) => folder.note(message));
    for (const rule of payload.fragment.rules) {
      if (isLogicalRule(rule)) {
        folder.record({ kind: 'logical', rule, diagnostics: [] });
        continue;
      }
      for (const [ruleType, values] of Object.entries(rule)) {
        values.forEach((value) => folder.value(ruleType, value));
      }
    }
    return;
  }

  if (payload.format === 'yaml') {
    const records = parseYamlRules(await readFile(payload.path));
    records.forEach((record) => folder.record(record));
    return;
  }

  for await (const record of readLineRecords(payload.path)) {
    folder.record(record);
  }
}

/**
 * Merges the payloads of one ruleset into a single document. A lone
 * structured fragment is passed through with its version replaced. Any
 * other combination is folded into one accumulator; a payload that cannot
 * be read contributes nothing and is reported in `failedSources`.
 */
export async function mergePayloads(
  payloads: Payload[],
  version: number,
  options: MergeOptions = {}
): Promise<MergeOutcome> {
  const stats: MergeStats = {
    sources: 0,
    passThrough: false,
    valuesSeen: 0,
    skippedLines: 0,
    invalidCidrs: 0,
    diagnostics: [],
  };

  const [only] = payloads;
  if (payloads.length === 1 && only.kind === 'structured-fragment') {
    stats.sources = 1;
    stats.passThrough = true;
    stats.diagnostics.push(
      ...only.fragment.diagnostics.map((message) => `${only.url}: ${message}`)
    );
    return {
      ruleset: { version, rules: only.fragment.rules },
      stats,
      failedSources: [],
    };
  }

  const accumulator = new RuleAccumulator();
  const failedSources: MergeOutcome['failedSources'] = [];

  for (const payload of payloads) {
    // Staged per source so a payload that fails half way leaves nothing behind
    const staging = new RuleAccumulator();
    const sourceStats: MergeStats = { ...stats, diagnostics: [] };
    try {
      await foldPayload(
        payload,
        new SourceFolder(staging, sourceStats, options, payload.url)
      );
    } catch (error) {
      const message = errorMessage(error);
      console.error(`Failed to merge ${payload.url}: ${message}`);
      failedSources.push({ url: payload.url, error: message });
      continue;
    }
    accumulator.absorb(staging);
    stats.sources++;
    stats.valuesSeen = sourceStats.valuesSeen;
    stats.skippedLines = sourceStats.skippedLines;
    stats.invalidCidrs = sourceStats.invalidCidrs;
    stats.diagnostics.push(...sourceStats.diagnostics);
  }

  return {
    ruleset: accumulator.finalize(version),
    stats,
    failedSources,
  };
}
