import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { formatIssues } from '@ruya-sft/record-sdk';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

export type Env = Record<string, string | undefined>;

const DEFAULT_MIN_CONTENT_LENGTH = 100;
const DEFAULT_OUTPUT_DIR = 'output';
const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const pipelineConfigSchema = z.object({
  minContentLength: z.number().int().nonnegative(),
  /** Unset means estimated from the input size. */
  maxWorkers: z.number().int().positive().optional(),
  /** Unset means derived from input size and worker count. */
  chunkSize: z.number().int().positive().optional(),
  parallel: z.boolean(),
  outputDir: z.string().min(1),
  saveProcessedData: z.boolean(),
  saveChatFormat: z.boolean(),
  savePromptFormat: z.boolean(),
  saveQualityReport: z.boolean(),
  logLevel: z.enum(LOG_LEVELS),
  logFile: z.string().min(1).optional(),
});

export type PipelineConfig = Readonly<z.infer<typeof pipelineConfigSchema>>;
export type ConfigOverrides = Partial<z.input<typeof pipelineConfigSchema>>;

/**
 * Load `.env` then `.env.local` (which wins) from `cwd`, when present.
 * Variables already set in the process environment are kept over `.env`.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  const envPath = resolve(cwd, '.env');
  const envLocalPath = resolve(cwd, '.env.local');

  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  if (existsSync(envLocalPath)) {
    loadDotenv({ path: envLocalPath, override: true });
  }
}

function readStringEnv(env: Env, name: string): string | undefined {
  return env[name]?.trim() || undefined;
}

function readIntEnv(env: Env, name: string): number | undefined {
  const raw = readStringEnv(env, name);
  if (!raw) {
    return undefined;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return undefined;
  }

  return Math.floor(parsed);
}

function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = readStringEnv(env, name);
  if (!raw) {
    return fallback;
  }

  const normalized = raw.toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

function readLogLevel(env: Env): (typeof LOG_LEVELS)[number] {
  const raw = readStringEnv(env, 'LOG_LEVEL')?.toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

function positiveOrUndefined(value: number | undefined): number | undefined {
  return value !== undefined && value > 0 ? value : undefined;
}

function definedEntries(overrides: ConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

/**
 * Build the run configuration from environment variables, with `overrides`
 * (usually CLI flags) taking precedence. Unparseable variables fall back to
 * their defaults; invalid overrides throw.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): PipelineConfig {
  const fromEnv = {
    minContentLength: readIntEnv(env, 'MIN_CONTENT_LENGTH') ?? DEFAULT_MIN_CONTENT_LENGTH,
    maxWorkers: positiveOrUndefined(readIntEnv(env, 'MAX_WORKERS')),
    chunkSize: positiveOrUndefined(readIntEnv(env, 'CHUNK_SIZE')),
    parallel: readBoolEnv(env, 'PARALLEL', false),
    outputDir: readStringEnv(env, 'OUTPUT_DIR') ?? DEFAULT_OUTPUT_DIR,
    saveProcessedData: readBoolEnv(env, 'SAVE_PROCESSED_DATA', true),
    saveChatFormat: readBoolEnv(env, 'SAVE_CHAT_FORMAT', true),
    savePromptFormat: readBoolEnv(env, 'SAVE_PROMPT_FORMAT', true),
    saveQualityReport: readBoolEnv(env, 'SAVE_QUALITY_REPORT', true),
    logLevel: readLogLevel(env),
    logFile: readStringEnv(env, 'LOG_FILE'),
  };

  const result = pipelineConfigSchema.safeParse({ ...fromEnv, ...definedEntries(overrides) });
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error.issues).join('; ')}`);
  }

  return Object.freeze(result.data);
}
