import { compareCodePoints } from '../../utils/helpers.js';
import { DOMAIN_RULE_TYPE } from './ruleTypes.js';
import type { LogicalRule, MergedRuleset, RuleEntry } from './types.js';

export const FOLD_BATCH_SIZE = 1000;

interface PendingValue {
  ruleType: string;
  value: string;
}

/**
 * Per-merge accumulator. Scalar values are buffered and folded into one
 * set per rule type a batch at a time; logical rules are kept as they
 * were read. One instance serves exactly one merge and cannot be reused
 * after `finalize`.
 */
export class RuleAccumulator {
  private readonly groups = new Map<string, Set<string>>();
  private readonly logicalRules: LogicalRule[] = [];
  private readonly logicalKeys = new Set<string>();
  private pending: PendingValue[] = [];
  private finalized = false;

  constructor(private readonly batchSize = FOLD_BATCH_SIZE) {}

  public addValue(ruleType: string, value: string): void {
    this.assertOpen();
    const trimmed = value.trim();
    if (!trimmed) return;
    this.pending.push({ ruleType, value: trimmed });
    if (this.pending.length >= this.batchSize) {
      this.flush();
    }
  }

  public addValues(ruleType: string, values: Iterable<string>): void {
    for (const value of values) {
      this.addValue(ruleType, value);
    }
  }

  /** Identical logical rules are kept once, at their first position. */
  public addLogical(rule: LogicalRule): void {
    this.assertOpen();
    const key = JSON.stringify(rule);
    if (this.logicalKeys.has(key)) return;
    this.logicalKeys.add(key);
    this.logicalRules.push(rule);
  }

  /** Moves everything another accumulator holds into this one. */
  public absorb(other: RuleAccumulator): void {
    other.flush();
    for (const [ruleType, values] of other.groups) {
      this.addValues(ruleType, values);
    }
    for (const rule of other.logicalRules) {
      this.addLogical(rule);
    }
  }

  public get pendingCount(): number {
    return this.pending.length;
  }

  public get distinctValueCount(): number {
    this.flush();
    let count = 0;
    for (const values of this.groups.values()) count += values.size;
    return count;
  }

  /**
   * Builds the document: one rule per rule type with its values sorted,
   * `domain` first and the other types by name, logical rules last.
   */
  public finalize(version: number): MergedRuleset {
    this.assertOpen();
    this.flush();
    this.finalized = true;

    const ruleTypes = [...this.groups.keys()]
      .filter((ruleType) => ruleType !== DOMAIN_RULE_TYPE)
      .sort(compareCodePoints);
    if (this.groups.has(DOMAIN_RULE_TYPE)) {
      ruleTypes.unshift(DOMAIN_RULE_TYPE);
    }

    const rules: RuleEntry[] = ruleTypes.map((ruleType) => ({
      [ruleType]: [...(this.groups.get(ruleType) ?? [])].sort(
        compareCodePoints
      ),
    }));
    rules.push(...this.logicalRules);

    this.groups.clear();
    this.logicalRules.length = 0;
    this.logicalKeys.clear();
    return { version, rules };
  }

  private flush(): void {
    for (const { ruleType, value } of this.pending) {
      let group = this.groups.get(ruleType);
      if (!group) {
        group = new Set();
        this.groups.set(ruleType, group);
      }
      group.add(value);
    }
    this.pending = [];
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error('RuleAccumulator has already been finalized');
    }
  }
}
