import { type HeadlessRule, isLogicalRule, type RuleEntry } from './types.js';

export interface FilterOutcome {
  rules: RuleEntry[];
  filteredCount: number;
}

/**
 * Removes every scalar value that contains one of the denylisted
 * substrings, ignoring case. Rule types left without values are dropped,
 * as are rules left without rule types. Logical rules are kept as they are.
 */
export function filterRules(rules: RuleEntry[], denylist: string[]): FilterOutcome {
  const needles = denylist
    .map((keyword) => keyword.trim().toLowerCase())
    .filter((keyword) => keyword.length > 0);
  if (needles.length === 0) {
    return { rules: [...rules], filteredCount: 0 };
  }

  const isDenied = (value: string): boolean => {
    const haystack = value.toLowerCase();
    return needles.some((needle) => haystack.includes(needle));
  };

  let filteredCount = 0;
  const kept: RuleEntry[] = [];
  for (const rule of rules) {
    if (isLogicalRule(rule)) {
      kept.push(rule);
      continue;
    }
    const filtered: HeadlessRule = {};
    for (const [ruleType, values] of Object.entries(rule)) {
      const remaining = values.filter((value) => !isDenied(value));
      filteredCount += values.length - remaining.length;
      if (remaining.length > 0) {
        filtered[ruleType] = remaining;
      }
    }
    if (Object.keys(filtered).length > 0) {
      kept.push(filtered);
    }
  }

  return { rules: kept, filteredCount };
}
