import * as fsp from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { MergedRuleset } from '../src/core/merge/types.js';
import { serializeRuleset, writeRuleset } from '../src/core/output/outputWriter.js';

const doc: MergedRuleset = {
  version: 2,
  rules: [
    { domain_suffix: ['b.com', 'a.com'] },
    { domain: ['z.com'] },
    { type: 'logical', mode: 'and', rules: [{ port: '443' }, { domain: 'foo.com' }] },
  ],
};

const expected = [
  '{',
  '  "rules": [',
  '    {',
  '      "domain_suffix": [',
  '        "a.com",',
  '        "b.com"',
  '      ]',
  '    },',
  '    {',
  '      "domain": [',
  '        "z.com"',
  '      ]',
  '    },',
  '    {',
  '      "mode": "and",',
  '      "rules": [',
  '        {',
  '          "domain": "foo.com"',
  '        },',
  '        {',
  '          "port": "443"',
  '        }',
  '      ],',
  '      "type": "logical"',
  '    }',
  '  ],',
  '  "version": 2',
  '}',
].join('\n');

describe('serializeRuleset', () => {
  it('sorts keys and value lists but keeps the rule order', () => {
    expect(serializeRuleset(doc)).toBe(expected);
  });

  it('is byte-identical for the same sets in another order', () => {
    const shuffled: MergedRuleset = {
      rules: [
        { domain_suffix: ['a.com', 'b.com'] },
        { domain: ['z.com'] },
        { rules: [{ domain: 'foo.com' }, { port: '443' }], mode: 'and', type: 'logical' },
      ],
      version: 2,
    };

    expect(serializeRuleset(shuffled)).toBe(serializeRuleset(doc));
  });

  it('sorts values by code point', () => {
    const text = serializeRuleset({
      version: 1,
      rules: [{ domain: ['\u{1F600}.example', '\uFF5E.example'] }],
    });

    expect(JSON.parse(text).rules).toEqual([
      { domain: ['\uFF5E.example', '\u{1F600}.example'] },
    ]);
  });

  it('sorts keys inside a rule', () => {
    const text = serializeRuleset({ version: 1, rules: [{ ip_cidr: ['10.0.0.0/8'], domain: ['a.com'] }] });
    expect(JSON.parse(text)).toEqual({ rules: [{ domain: ['a.com'], ip_cidr: ['10.0.0.0/8'] }], version: 1 });
    expect(text.indexOf('"domain"')).toBeLessThan(text.indexOf('"ip_cidr"'));
  });
});

describe('writeRuleset', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'writer-'));
  });

  afterEach(async () => {
    await fsp.rm(workDir, { recursive: true, force: true });
  });

  it('creates parent directories and returns the byte size', async () => {
    const outputPath = path.join(workDir, 'json', 'nested', 'proxy.json');

    const bytes = await writeRuleset(doc, outputPath);

    const written = await fsp.readFile(outputPath);
    expect(written.toString('utf-8')).toBe(expected);
    expect(bytes).toBe(written.length);
  });
});
