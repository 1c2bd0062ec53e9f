import type { LineFormat } from '../sources/sourceClassifier.js';

/** Headless rule: canonical rule type to its values. */
export type HeadlessRule = Record<string, string[]>;

export type LogicalSubrule = Record<string, string | string[]>;

export interface LogicalRule {
  type: 'logical';
  mode: 'and' | 'or';
  rules: LogicalSubrule[];
  invert?: boolean;
}

export type RuleEntry = HeadlessRule | LogicalRule;

export interface MergedRuleset {
  version: number;
  rules: RuleEntry[];
}

export function isLogicalRule(rule: RuleEntry): rule is LogicalRule {
  return !Array.isArray(rule.type) && rule.type === 'logical';
}

/** A parsed structured source: its rules in source order. */
export interface RuleFragment {
  rules: RuleEntry[];
  diagnostics: string[];
}

export type Payload =
  | { kind: 'structured-fragment'; url: string; fragment: RuleFragment }
  | { kind: 'line-list'; url: string; path: string; format: LineFormat };

/** One record read from a line-list source. */
export type LineRecord =
  | { kind: 'value'; ruleType: string; value: string }
  | { kind: 'logical'; rule: LogicalRule; diagnostics: string[] }
  | { kind: 'skipped'; reason: string };

export interface MergeStats {
  sources: number;
  passThrough: boolean;
  valuesSeen: number;
  skippedLines: number;
  invalidCidrs: number;
  diagnostics: string[];
}

export interface MergeOutcome {
  ruleset: MergedRuleset;
  stats: MergeStats;
  failedSources: { url: string; error: string }[];
}
