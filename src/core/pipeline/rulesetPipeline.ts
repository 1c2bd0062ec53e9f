import * as path from 'node:path';
import { RULESET_NAME_PATTERN } from '../../config/rulesetConfig.js';
import { removeDirectory } from '../../utils/fileUtils.js';
import {
  errorMessage,
  formatDuration,
  formatFileSize,
} from '../../utils/helpers.js';
import type { CompileResult, RuleCompiler } from '../compile/ruleCompiler.js';
import {
  type DownloadCoordinator,
  printBatchStats,
} from '../download/downloadCoordinator.js';
import type { BatchProgress, BatchStats } from '../download/types.js';
import { mergePayloads } from '../merge/mergeEngine.js';
import { loadPayload } from '../merge/payloadLoader.js';
import { filterRules } from '../merge/ruleFilter.js';
import {
  isLogicalRule,
  type MergeStats,
  type Payload,
  type RuleEntry,
} from '../merge/types.js';
import { writeRuleset } from '../output/outputWriter.js';
import { classifySource } from '../sources/sourceClassifier.js';

export interface PipelineSettings {
  version: number;
  tempDir: string;
  jsonDir: string;
  filterKeywords: string[];
  validateCidr: boolean;
  useCache: boolean;
  /** Keep the per-ruleset download directory after processing. */
  keepTemp?: boolean;
  now?: () => number;
}

export interface RulesetReport {
  name: string;
  success: boolean;
  outputPath?: string;
  sizeBytes: number;
  ruleCount: number;
  filteredCount: number;
  download?: BatchStats;
  merge?: MergeStats;
  failedSources: { url: string; error: string }[];
  compile?: CompileResult;
  error?: string;
  durationSeconds: number;
}

export interface RunSummary {
  reports: RulesetReport[];
  artifactsProduced: number;
  interrupted: boolean;
}

/** Values across headless rules plus one per logical rule. */
export function countRuleValues(rules: RuleEntry[]): number {
  return rules.reduce(
    (sum, rule) =>
      sum +
      (isLogicalRule(rule)
        ? 1
        : Object.values(rule).reduce((inner, values) => inner + values.length, 0)),
    0
  );
}

function printProgress(name: string, progress: BatchProgress): void {
  process.stderr.write(
    `\r[${name}] Downloads: ${progress.completedFiles}/${progress.totalFiles} | ${progress.speedMBps.toFixed(2)} MB/s | ${formatDuration(progress.elapsedSeconds)}`
  );
}

export function printRunSummary(summary: RunSummary): void {
  console.error('\n--- Ruleset Stats ---');
  for (const report of summary.reports) {
    if (report.success) {
      const compiled = report.compile
        ? report.compile.success
          ? ', compiled'
          : `, compile failed: ${report.compile.error}`
        : '';
      console.error(
        `${report.name}: ${report.ruleCount} values, ${report.filteredCount} filtered, ${formatFileSize(report.sizeBytes)}${compiled}`
      );
    } else {
      console.error(`${report.name}: FAILED (${report.error})`);
    }
  }
  console.error(`Artifacts: ${summary.artifactsProduced}/${summary.reports.length}`);
  if (summary.interrupted) {
    console.error('Run interrupted');
  }
  console.error('---------------------');
}

/**
 * Drives one ruleset from its URLs to a written (and optionally compiled)
 * document. A ruleset fails alone: its error is captured in its report and
 * the other rulesets are still processed.
 */
export class RulesetPipeline {
  private readonly now: () => number;

  constructor(
    private readonly coordinator: DownloadCoordinator,
    private readonly compiler: RuleCompiler | null,
    private readonly settings: PipelineSettings
  ) {
    this.now = settings.now ?? Date.now;
  }

  public async processRuleset(
    name: string,
    urls: string[],
    signal?: AbortSignal
  ): Promise<RulesetReport> {
    const startedAt = this.now();
    const report: RulesetReport = {
      name,
      success: false,
      sizeBytes: 0,
      ruleCount: 0,
      filteredCount: 0,
      failedSources: [],
      durationSeconds: 0,
    };
    if (!RULESET_NAME_PATTERN.test(name)) {
      report.error = `Invalid ruleset name: ${JSON.stringify(name)}`;
      console.error(report.error);
      return report;
    }

    // Kept apart from the cache directory, which may also live under tempDir
    const workDir = path.join(this.settings.tempDir, 'downloads', name);
    console.error(`Processing ruleset ${name} (${urls.length} sources)`);
    try {
      await this.build(name, urls, workDir, report, signal);
    } catch (error) {
      report.success = false;
      report.error = errorMessage(error);
      console.error(`Ruleset ${name} failed: ${report.error}`);
    } finally {
      // Partial downloads stay behind after an interrupt for the next run
      if (!this.settings.keepTemp && !signal?.aborted) {
        await removeDirectory(workDir);
      }
      report.durationSeconds = (this.now() - startedAt) / 1000;
    }
    return report;
  }

  public async run(
    rulesets: Record<string, string[]>,
    signal?: AbortSignal
  ): Promise<RunSummary> {
    const reports: RulesetReport[] = [];
    for (const [name, urls] of Object.entries(rulesets)) {
      if (signal?.aborted) break;
      reports.push(await this.processRuleset(name, urls, signal));
    }

    const summary: RunSummary = {
      reports,
      artifactsProduced: reports.filter((report) => report.success).length,
      interrupted: signal?.aborted ?? false,
    };
    printRunSummary(summary);
    return summary;
  }

  private async build(
    name: string,
    urls: string[],
    workDir: string,
    report: RulesetReport,
    signal?: AbortSignal
  ): Promise<void> {
    const sources = urls.map((url) => classifySource(url));
    const { results, stats } = await this.coordinator.downloadBatch(urls, workDir, {
      signal,
      useCache: this.settings.useCache,
      onProgress: (progress) => printProgress(name, progress),
    });
    report.download = stats;
    printBatchStats(stats);
    for (const result of results) {
      if (!result.success) {
        report.failedSources.push({
          url: result.url,
          error: result.error ?? 'Download failed',
        });
      }
    }

    if (signal?.aborted) {
      throw new Error('Interrupted');
    }
    if (stats.successfulFiles === 0) {
      throw new Error('No source could be downloaded');
    }

    // Configured URL order, whatever order the downloads finished in
    const payloads: Payload[] = [];
    for (const [index, result] of results.entries()) {
      if (!result.success || !result.localPath) continue;
      try {
        payloads.push(await loadPayload(sources[index], result.localPath));
      } catch (error) {
        const message = errorMessage(error);
        console.error(`Skipping unreadable source ${result.url}: ${message}`);
        report.failedSources.push({ url: result.url, error: message });
      }
    }
    if (payloads.length === 0) {
      throw new Error('No downloaded source could be parsed');
    }

    const merged = await mergePayloads(payloads, this.settings.version, {
      validateCidr: this.settings.validateCidr,
    });
    report.merge = merged.stats;
    report.failedSources.push(...merged.failedSources);
    for (const diagnostic of merged.stats.diagnostics) {
      console.warn(diagnostic);
    }

    const filtered = filterRules(merged.ruleset.rules, this.settings.filterKeywords);
    report.filteredCount = filtered.filteredCount;
    if (filtered.rules.length === 0) {
      throw new Error('No valid rules left after merging');
    }

    if (signal?.aborted) {
      throw new Error('Interrupted');
    }
    const outputPath = path.join(this.settings.jsonDir, `${name}.json`);
    report.sizeBytes = await writeRuleset(
      { version: this.settings.version, rules: filtered.rules },
      outputPath
    );
    report.outputPath = outputPath;
    report.ruleCount = countRuleValues(filtered.rules);
    report.success = true;
    console.error(
      `Wrote ${outputPath}: ${report.ruleCount} values (${formatFileSize(report.sizeBytes)}), ${filtered.filteredCount} filtered`
    );

    if (this.compiler && !signal?.aborted) {
      report.compile = await this.compiler.compile(name, outputPath, signal);
      if (!report.compile.success) {
        console.error(`Compile failed for ${name}: ${report.compile.error}`);
      }
    }
  }
}
