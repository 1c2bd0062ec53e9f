import * as fsp from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../src/config/errors.js';
import { loadAppConfig } from '../src/config/index.js';
import { loadRulesetConfig, parseRulesetConfig } from '../src/config/rulesetConfig.js';

const BASE = path.resolve('/srv/rulesets');

describe('parseRulesetConfig', () => {
  it('fills in defaults and resolves paths against the base directory', () => {
    const config = parseRulesetConfig(
      { version: 2, rulesets: { proxy: ['https://example.test/a.txt'] } },
      BASE
    );

    expect(config).toEqual({
      version: 2,
      rulesets: { proxy: ['https://example.test/a.txt'] },
      filterKeywords: ['ruleset.skk.moe'],
      jsonDir: path.join(BASE, 'output/json'),
      srsDir: path.join(BASE, 'output/srs'),
      compiler: null,
      validateCidr: false,
    });
  });

  it('resolves a compiler path but leaves a bare command alone', () => {
    const withPath = parseRulesetConfig(
      { version: 2, rulesets: { a: ['https://example.test/a.txt'] }, compiler: { binary: './bin/compiler' } },
      BASE
    );
    const bare = parseRulesetConfig(
      {
        version: 2,
        rulesets: { a: ['https://example.test/a.txt'] },
        compiler: { binary: 'compiler', timeout_ms: 1000 },
      },
      BASE
    );

    expect(withPath.compiler).toEqual({ binary: path.join(BASE, 'bin/compiler'), timeoutMs: 300000 });
    expect(bare.compiler).toEqual({ binary: 'compiler', timeoutMs: 1000 });
  });

  it('names the offending field of an invalid document', () => {
    expect(() =>
      parseRulesetConfig({ version: 2, rulesets: { proxy: ['not a url'] } }, BASE)
    ).toThrow('Invalid ruleset configuration: rulesets.proxy.0: must be a valid URL');
  });

  it('rejects ruleset names that are not plain file names', () => {
    for (const name of ['../escape', 'a/b', '.hidden']) {
      expect(() =>
        parseRulesetConfig({ version: 2, rulesets: { [name]: ['https://example.test/a.txt'] } }, BASE)
      ).toThrow(/must start with a letter or digit/);
    }
    expect(
      Object.keys(
        parseRulesetConfig(
          { version: 2, rulesets: { 'geo-site_cn.v2': ['https://example.test/a.txt'] } },
          BASE
        ).rulesets
      )
    ).toEqual(['geo-site_cn.v2']);
  });

  it('rejects an empty ruleset map', () => {
    expect(() => parseRulesetConfig({ version: 2, rulesets: {} }, BASE)).toThrow(ConfigError);
  });
});

describe('loadRulesetConfig', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'config-'));
  });

  afterEach(async () => {
    await fsp.rm(workDir, { recursive: true, force: true });
  });

  it('reads a file relative to its own directory', async () => {
    const configPath = path.join(workDir, 'config.json');
    await fsp.writeFile(
      configPath,
      JSON.stringify({
        version: 3,
        rulesets: { ads: ['https://example.test/ads.txt'] },
        output: { json_dir: 'out' },
      })
    );

    const config = await loadRulesetConfig(configPath);

    expect(config.version).toBe(3);
    expect(config.jsonDir).toBe(path.join(workDir, 'out'));
    expect(config.srsDir).toBe(path.join(workDir, 'output/srs'));
  });

  it('reports a missing file', async () => {
    await expect(loadRulesetConfig(path.join(workDir, 'absent.json'))).rejects.toThrow(
      /Ruleset configuration not found/
    );
  });

  it('reports malformed JSON', async () => {
    const configPath = path.join(workDir, 'config.json');
    await fsp.writeFile(configPath, '{ "version": ');

    await expect(loadRulesetConfig(configPath)).rejects.toThrow(/is not valid JSON/);
  });
});

describe('loadAppConfig', () => {
  const root = path.resolve('/srv/forge');

  it('applies defaults', () => {
    const config = loadAppConfig({}, root);

    expect(config).toEqual({
      rulesetConfigPath: path.join(root, 'config.json'),
      tempDir: path.join(root, 'temp'),
      cacheDir: path.join(root, 'temp', 'cache'),
      cacheTtlHours: 24,
      cacheEvictHours: 48,
      maxConcurrent: 5,
      requestTimeoutMs: 30000,
      maxRetries: 3,
      retryDelayMs: 1000,
      progressIntervalMs: 500,
      userAgent: 'ruleset-forge/1.0',
    });
  });

  it('coerces numeric settings from strings', () => {
    const config = loadAppConfig({ MAX_CONCURRENT: '8', CACHE_DIR: 'cache-dir' }, root);

    expect(config.maxConcurrent).toBe(8);
    expect(config.cacheDir).toBe(path.join(root, 'cache-dir'));
  });

  it('rejects out-of-range settings', () => {
    expect(() => loadAppConfig({ MAX_CONCURRENT: '0' }, root)).toThrow(ConfigError);
  });
});
