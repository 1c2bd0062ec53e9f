// Proxy-rule keywords and the rule type each one maps to.
const RULE_TYPE_LOOKUP: ReadonlyMap<string, string> = new Map([
  ['DOMAIN-SUFFIX', 'domain_suffix'],
  ['HOST-SUFFIX', 'domain_suffix'],
  ['DOMAIN', 'domain'],
  ['HOST', 'domain'],
  ['DOMAIN-KEYWORD', 'domain_keyword'],
  ['HOST-KEYWORD', 'domain_keyword'],
  ['IP-CIDR', 'ip_cidr'],
  ['IP-CIDR6', 'ip_cidr'],
  ['IP6-CIDR', 'ip_cidr'],
  ['SRC-IP-CIDR', 'source_ip_cidr'],
  ['GEOIP', 'geoip'],
  ['DST-PORT', 'port'],
  ['SRC-PORT', 'source_port'],
  ['URL-REGEX', 'domain_regex'],
  ['DOMAIN-REGEX', 'domain_regex'],
]);

export const DOMAIN_RULE_TYPE = 'domain';

export const CIDR_RULE_TYPES: ReadonlySet<string> = new Set([
  'ip_cidr',
  'source_ip_cidr',
]);

/** Canonical rule type for a proxy-rule keyword, or `undefined`. */
export function mapRuleKeyword(keyword: string): string | undefined {
  return RULE_TYPE_LOOKUP.get(keyword.trim().toUpperCase());
}

/**
 * Key normalisation for structured fragments: known proxy keywords are
 * mapped, anything else is kept as written.
 */
export function normalizeRuleKey(key: string): string {
  return mapRuleKeyword(key) ?? key;
}
