import { describe, expect, it } from 'vitest';
import { RuleAccumulator } from '../src/core/merge/ruleAccumulator.js';
import type { LogicalRule } from '../src/core/merge/types.js';

const logical: LogicalRule = {
  type: 'logical',
  mode: 'and',
  rules: [{ domain: 'foo.com' }, { port: '443' }],
};

describe('RuleAccumulator', () => {
  it('folds buffered values once a batch is full', () => {
    const accumulator = new RuleAccumulator(3);

    accumulator.addValues('domain', ['a.com', 'b.com']);
    expect(accumulator.pendingCount).toBe(2);

    accumulator.addValue('domain', 'a.com');
    expect(accumulator.pendingCount).toBe(0);
    expect(accumulator.distinctValueCount).toBe(2);
  });

  it('sorts values by code point', () => {
    const accumulator = new RuleAccumulator();
    accumulator.addValues('domain', ['\u{1F600}.example', '\uFF5E.example', 'a.example']);

    expect(accumulator.finalize(1).rules).toEqual([
      { domain: ['a.example', '\uFF5E.example', '\u{1F600}.example'] },
    ]);
  });

  it('orders domain first, other types by name and logical rules last', () => {
    const accumulator = new RuleAccumulator();
    accumulator.addValue('ip_cidr', '10.0.0.0/8');
    accumulator.addLogical(logical);
    accumulator.addValues('domain_suffix', ['z.com', 'b.com', 'z.com']);
    accumulator.addValue('domain', 'foo.com');

    expect(accumulator.finalize(2)).toEqual({
      version: 2,
      rules: [
        { domain: ['foo.com'] },
        { domain_suffix: ['b.com', 'z.com'] },
        { ip_cidr: ['10.0.0.0/8'] },
        logical,
      ],
    });
  });

  it('trims values and ignores empty ones', () => {
    const accumulator = new RuleAccumulator();
    accumulator.addValues('domain', [' a.com ', '', '   ', 'a.com']);

    expect(accumulator.finalize(1).rules).toEqual([{ domain: ['a.com'] }]);
  });

  it('keeps identical logical rules once', () => {
    const accumulator = new RuleAccumulator();
    accumulator.addLogical(logical);
    accumulator.addLogical({ ...logical, rules: [...logical.rules] });

    expect(accumulator.finalize(1).rules).toEqual([logical]);
  });

  it('sorts values globally, not per batch', () => {
    const accumulator = new RuleAccumulator(2);
    accumulator.addValues('domain', ['d.com', 'c.com', 'b.com', 'a.com', 'e.com']);

    expect(accumulator.finalize(1).rules).toEqual([
      { domain: ['a.com', 'b.com', 'c.com', 'd.com', 'e.com'] },
    ]);
  });

  it('absorbs another accumulator', () => {
    const target = new RuleAccumulator();
    const staging = new RuleAccumulator();
    target.addValue('domain', 'a.com');
    staging.addValue('domain', 'b.com');
    staging.addLogical(logical);

    target.absorb(staging);

    expect(target.finalize(1).rules).toEqual([{ domain: ['a.com', 'b.com'] }, logical]);
  });

  it('cannot be used after finalize', () => {
    const accumulator = new RuleAccumulator();
    accumulator.finalize(1);

    expect(() => accumulator.addValue('domain', 'a.com')).toThrow(
      'RuleAccumulator has already been finalized'
    );
    expect(() => accumulator.finalize(1)).toThrow('RuleAccumulator has already been finalized');
  });
});
