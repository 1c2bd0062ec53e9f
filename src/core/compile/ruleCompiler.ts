import { execFile } from 'node:child_process';
import * as path from 'node:path';
import { promisify } from 'node:util';
import type { CompilerSettings } from '../../config/rulesetConfig.js';
import {
  ensureDirectoryExists,
  fileExists,
  fileSize,
} from '../../utils/fileUtils.js';
import { errorMessage, formatFileSize } from '../../utils/helpers.js';

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  timeout: number;
  signal?: AbortSignal;
}

export type ExecFileFn = (
  file: string,
  args: string[],
  options: ExecOptions
) => Promise<{ stdout: string; stderr: string }>;

const runExecFile: ExecFileFn = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    ...options,
    encoding: 'utf8',
  });
  return { stdout, stderr };
};

export interface CompileResult {
  name: string;
  success: boolean;
  outputPath?: string;
  sizeBytes: number;
  error?: string;
}

function describeExecError(error: unknown, timeoutMs: number): string {
  if (typeof error === 'object' && error !== null) {
    if ('killed' in error && error.killed === true) {
      return `Compilation timed out after ${timeoutMs} ms`;
    }
    if (
      'stderr' in error &&
      typeof error.stderr === 'string' &&
      error.stderr.trim()
    ) {
      return `Compilation failed: ${error.stderr.trim()}`;
    }
  }
  return `Compilation failed: ${errorMessage(error)}`;
}

/**
 * Runs the external rule-set compiler on a written JSON ruleset:
 * `<binary> rule-set compile <input> --output <srsDir>/<name>.srs`.
 * The binary is a black box; success means it exited cleanly and left a
 * non-empty output file.
 */
export class RuleCompiler {
  constructor(
    private readonly settings: CompilerSettings & { srsDir: string },
    private readonly exec: ExecFileFn = runExecFile
  ) {}

  public async compile(
    name: string,
    inputPath: string,
    signal?: AbortSignal
  ): Promise<CompileResult> {
    if (!(await fileExists(inputPath))) {
      return {
        name,
        success: false,
        sizeBytes: 0,
        error: `Input file not found: ${inputPath}`,
      };
    }

    const outputPath = path.join(this.settings.srsDir, `${name}.srs`);
    try {
      await ensureDirectoryExists(this.settings.srsDir);
      console.error(`Compiling ${name}: ${inputPath} -> ${outputPath}`);
      await this.exec(
        this.settings.binary,
        ['rule-set', 'compile', inputPath, '--output', outputPath],
        { timeout: this.settings.timeoutMs, signal }
      );
    } catch (error) {
      return {
        name,
        success: false,
        sizeBytes: 0,
        error: describeExecError(error, this.settings.timeoutMs),
      };
    }

    const sizeBytes = (await fileSize(outputPath)) ?? 0;
    if (sizeBytes === 0) {
      return {
        name,
        success: false,
        sizeBytes: 0,
        error: 'Compiler produced no output file',
      };
    }
    console.error(`Compiled ${name} (${formatFileSize(sizeBytes)})`);
    return { name, success: true, outputPath, sizeBytes };
  }
}
