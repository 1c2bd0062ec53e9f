import { parseArgs } from 'node:util';
import { fileURLToPath } from 'node:url';
import { type AppConfig, loadAppConfig } from '../config/index.js';
import { ConfigError } from '../config/errors.js';
import { loadRulesetConfig } from '../config/rulesetConfig.js';
import { CacheStore } from '../core/cache/cacheStore.js';
import { RuleCompiler } from '../core/compile/ruleCompiler.js';
import { DownloadCoordinator } from '../core/download/downloadCoordinator.js';
import { createHttpClient, Fetcher } from '../core/download/fetcher.js';
import {
  RulesetPipeline,
  type RunSummary,
} from '../core/pipeline/rulesetPipeline.js';

export interface CliArgs {
  force: boolean;
  clearCache: boolean;
  compile: boolean;
  only?: string;
}

export const EXIT_OK = 0;
export const EXIT_NO_ARTIFACTS = 1;
export const EXIT_INTERRUPTED = 130;

function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      force: { type: 'boolean', default: false },
      'clear-cache': { type: 'boolean', default: false },
      'no-compile': { type: 'boolean', default: false },
      only: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

export function parseCliArgs(argv: string[]): CliArgs {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid arguments: ${message}`, { cause: error });
  }

  return {
    force: values.force ?? false,
    clearCache: values['clear-cache'] ?? false,
    compile: !(values['no-compile'] ?? false),
    only: values.only,
  };
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.interrupted) return EXIT_INTERRUPTED;
  return summary.artifactsProduced > 0 ? EXIT_OK : EXIT_NO_ARTIFACTS;
}

/**
 * Loads both configuration layers, prepares the cache and runs every
 * configured ruleset (or the one named by `--only`).
 */
export async function runBuild(
  args: CliArgs,
  signal?: AbortSignal,
  appConfig: AppConfig = loadAppConfig()
): Promise<RunSummary> {
  const rulesetConfig = await loadRulesetConfig(appConfig.rulesetConfigPath);

  let rulesets = rulesetConfig.rulesets;
  if (args.only !== undefined) {
    const urls = rulesets[args.only];
    if (!urls) {
      throw new ConfigError(`Unknown ruleset "${args.only}"`);
    }
    rulesets = { [args.only]: urls };
  }

  const cache = new CacheStore({
    cacheDir: appConfig.cacheDir,
    ttlHours: appConfig.cacheTtlHours,
  });
  if (args.clearCache) {
    const removed = await cache.evict();
    console.log(`Cache cleared: ${removed} entries removed`);
  } else {
    const removed = await cache.evict(appConfig.cacheEvictHours);
    if (removed > 0) {
      console.log(
        `Evicted ${removed} cache entries older than ${appConfig.cacheEvictHours}h`
      );
    }
  }
  const info = await cache.info();
  console.log(
    `Cache: ${info.totalFiles} entries, ${info.totalSizeMB.toFixed(2)} MB in ${info.cacheDir} (TTL ${info.ttlHours}h)`
  );
  if (args.force) {
    console.log('Force update requested. Cache will be ignored for this run.');
  }

  const fetcher = new Fetcher(
    createHttpClient({
      timeoutMs: appConfig.requestTimeoutMs,
      userAgent: appConfig.userAgent,
    }),
    cache
  );
  const coordinator = new DownloadCoordinator(fetcher, {
    concurrency: appConfig.maxConcurrent,
    progressIntervalMs: appConfig.progressIntervalMs,
    fetch: {
      maxRetries: appConfig.maxRetries,
      baseDelayMs: appConfig.retryDelayMs,
      useCache: !args.force,
      supportResume: true,
    },
  });

  const compiler =
    args.compile && rulesetConfig.compiler
      ? new RuleCompiler({ ...rulesetConfig.compiler, srsDir: rulesetConfig.srsDir })
      : null;
  if (!compiler) {
    console.log('Compilation disabled; only JSON rulesets will be written.');
  }

  const pipeline = new RulesetPipeline(coordinator, compiler, {
    version: rulesetConfig.version,
    tempDir: appConfig.tempDir,
    jsonDir: rulesetConfig.jsonDir,
    filterKeywords: rulesetConfig.filterKeywords,
    validateCidr: rulesetConfig.validateCidr,
    useCache: !args.force,
  });

  console.log(`Building ${Object.keys(rulesets).length} ruleset(s)...`);
  return pipeline.run(rulesets, signal);
}

/**
 * Runs the build with SIGINT/SIGTERM wired to an abort signal and returns
 * the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  const controller = new AbortController();
  const onSignal = (signalName: NodeJS.Signals) => {
    console.error(`\nReceived ${signalName}, stopping downloads...`);
    controller.abort(new Error(`Interrupted by ${signalName}`));
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const startTime = Date.now();
  try {
    const summary = await runBuild(parseCliArgs(argv), controller.signal);
    console.log(
      `Build finished in ${(Date.now() - startTime) / 1000} seconds.`
    );
    return exitCodeFor(summary);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
    } else {
      console.error('Fatal error during ruleset build:', error);
    }
    return controller.signal.aborted ? EXIT_INTERRUPTED : EXIT_NO_ARTIFACTS;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

const scriptPath = fileURLToPath(import.meta.url);
const isDirectRun = process.argv[1] === scriptPath;

if (isDirectRun) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Unhandled error during ruleset build:', error);
      process.exit(1);
    });
}
