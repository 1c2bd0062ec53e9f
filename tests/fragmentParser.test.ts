import { describe, expect, it } from 'vitest';
import { parseFragment } from '../src/core/merge/fragmentParser.js';

describe('parseFragment', () => {
  it('reads the rules list and maps proxy keywords', () => {
    const fragment = parseFragment(
      '{"version":1,"rules":[{"domain_suffix":["a.com"],"DOMAIN":"x.com"}]}'
    );

    expect(fragment).toEqual({
      rules: [{ domain_suffix: ['a.com'], domain: ['x.com'] }],
      diagnostics: [],
    });
  });

  it('reads a document without a rules list as one rule', () => {
    const fragment = parseFragment(
      '{"version":3,"domain":["a.com"],"ip_cidr":"10.0.0.0/8"}'
    );

    expect(fragment.rules).toEqual([{ domain: ['a.com'], ip_cidr: ['10.0.0.0/8'] }]);
  });

  it('passes unknown rule keys through', () => {
    const fragment = parseFragment('{"rules":[{"process_name":["curl"]}]}');
    expect(fragment.rules).toEqual([{ process_name: ['curl'] }]);
  });

  it('merges keys that map to the same rule type', () => {
    const fragment = parseFragment('{"rules":[{"DOMAIN":["a.com"],"HOST":"b.com"}]}');
    expect(fragment.rules).toEqual([{ domain: ['a.com', 'b.com'] }]);
  });

  it('keeps logical rules', () => {
    const fragment = parseFragment(
      '{"rules":[{"type":"logical","mode":"and","rules":[{"DOMAIN":"a.com"},{"port":["443"]}]}]}'
    );

    expect(fragment.rules).toEqual([
      {
        type: 'logical',
        mode: 'and',
        rules: [{ domain: 'a.com' }, { port: ['443'] }],
      },
    ]);
  });

  it('drops malformed logical rules with a diagnostic', () => {
    const fragment = parseFragment('{"rules":[{"type":"logical","mode":"xor","rules":[]}]}');
    expect(fragment).toEqual({
      rules: [],
      diagnostics: ['Dropped a malformed logical rule'],
    });
  });

  it('drops unsupported values with diagnostics', () => {
    const fragment = parseFragment('{"rules":[{"port":[443,"8080"],"invert":true},"a.com"]}');

    expect(fragment).toEqual({
      rules: [{ port: ['8080'] }],
      diagnostics: [
        'Dropped 1 non-string value(s) under "port"',
        'Dropped field "invert": unsupported value shape',
        'Dropped a rule that is not an object',
      ],
    });
  });

  it('reads one document per line in JSON lines mode', () => {
    const fragment = parseFragment(
      '{"domain":["a.com"]}\n\n{"rules":[{"domain":["b.com"]}]}\n',
      { jsonLines: true }
    );

    expect(fragment.rules).toEqual([{ domain: ['a.com'] }, { domain: ['b.com'] }]);
  });

  it('throws on malformed JSON', () => {
    expect(() => parseFragment('{"rules": [')).toThrow(SyntaxError);
  });

  it('throws when the document is not an object', () => {
    expect(() => parseFragment('[1, 2]')).toThrow('Rule fragment must be a JSON object');
  });
});
