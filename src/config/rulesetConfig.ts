import path from 'node:path';
import { z } from 'zod';
import { fileExists, readFile } from '../utils/fileUtils.js';
import { ConfigError } from './errors.js';

export const DEFAULT_FILTER_KEYWORDS = ['ruleset.skk.moe'];

/** Ruleset names become file and directory names. */
export const RULESET_NAME_PATTERN = /^[A-Za-z0-9][\w.-]*$/;

const urlSchema = z
  .string()
  .trim()
  .refine((value) => URL.canParse(value), { message: 'must be a valid URL' });

const rulesetConfigSchema = z.object({
  version: z.number().int(),
  rulesets: z
    .record(
      z.string().regex(RULESET_NAME_PATTERN, {
        message:
          'must start with a letter or digit and use only letters, digits, ".", "_" or "-"',
      }),
      z.array(urlSchema).min(1)
    )
    .refine((value) => Object.keys(value).length > 0, {
      message: 'at least one ruleset is required',
    }),
  filter: z
    .object({ keywords: z.array(z.string().min(1)) })
    .default({ keywords: DEFAULT_FILTER_KEYWORDS }),
  output: z
    .object({
      json_dir: z.string().min(1).default('output/json'),
      srs_dir: z.string().min(1).default('output/srs'),
    })
    .default({}),
  compiler: z
    .object({
      binary: z.string().min(1),
      timeout_ms: z.number().int().positive().default(300000),
    })
    .optional(),
  validate_cidr: z.boolean().default(false),
});

type RawRulesetConfig = z.infer<typeof rulesetConfigSchema>;

export interface CompilerSettings {
  binary: string;
  timeoutMs: number;
}

export interface RulesetConfig {
  version: number;
  rulesets: Record<string, string[]>;
  filterKeywords: string[];
  jsonDir: string;
  srsDir: string;
  compiler: CompilerSettings | null;
  validateCidr: boolean;
}

function resolveAgainst(baseDir: string, target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(baseDir, target);
}

/**
 * Validates a parsed configuration document. Paths are resolved relative
 * to `baseDir`.
 */
export function parseRulesetConfig(
  input: unknown,
  baseDir: string
): RulesetConfig {
  const parsed = rulesetConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ruleset configuration: ${details}`);
  }

  const raw: RawRulesetConfig = parsed.data;
  return {
    version: raw.version,
    rulesets: raw.rulesets,
    filterKeywords: raw.filter.keywords,
    jsonDir: resolveAgainst(baseDir, raw.output.json_dir),
    srsDir: resolveAgainst(baseDir, raw.output.srs_dir),
    compiler: raw.compiler
      ? {
          // bare command names are looked up on PATH
          binary: raw.compiler.binary.includes('/')
            ? resolveAgainst(baseDir, raw.compiler.binary)
            : raw.compiler.binary,
          timeoutMs: raw.compiler.timeout_ms,
        }
      : null,
    validateCidr: raw.validate_cidr,
  };
}

export async function loadRulesetConfig(
  configPath: string
): Promise<RulesetConfig> {
  if (!(await fileExists(configPath))) {
    throw new ConfigError(`Ruleset configuration not found: ${configPath}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(await readFile(configPath));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Ruleset configuration is not valid JSON (${configPath}): ${message}`,
      { cause: error }
    );
  }

  return parseRulesetConfig(document, path.dirname(configPath));
}
