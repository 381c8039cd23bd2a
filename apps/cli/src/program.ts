import { Command, InvalidArgumentError } from 'commander';
import type { Logger } from 'pino';
import { loadConfig, type Env } from './config.js';
import { createCliLogger } from './logger.js';
import { runPipeline } from './run.js';

interface CliOptions {
  input: string;
  outputDir?: string;
  minContentLength?: number;
  parallel?: boolean;
  maxWorkers?: number;
  chunkSize?: number;
  benchmark: boolean;
}

export interface ProgramDeps {
  env?: Env;
  createLogger?: typeof createCliLogger;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parsePositiveCount(value: string): number {
  const parsed = parseCount(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const { env = process.env, createLogger = createCliLogger } = deps;

  return new Command('ruya-sft')
    .description('Convert scraped Turkish dream-interpretation records into SFT training datasets')
    .requiredOption('-i, --input <path>', 'Input JSON file with the raw records')
    .option('-o, --output-dir <dir>', 'Output directory (default: OUTPUT_DIR or "output")')
    .option('--min-content-length <n>', 'Minimum cleaned content length', parseCount)
    .option('--parallel', 'Process in concurrent chunks when the input has more than 50 records')
    .option(
      '--max-workers <n>',
      'Chunk tasks in flight at once, all on one thread (default: estimated from input size)',
      parsePositiveCount,
    )
    .option('--chunk-size <n>', 'Records per chunk (default: derived from input size)', parsePositiveCount)
    .option('--benchmark', 'Time a small sample before processing', false)
    .action(async (options: CliOptions) => {
      const config = loadConfig(env, {
        outputDir: options.outputDir,
        minContentLength: options.minContentLength,
        parallel: options.parallel,
        maxWorkers: options.maxWorkers,
        chunkSize: options.chunkSize,
      });
      const logger: Logger = createLogger({ level: config.logLevel, logFile: config.logFile });

      await runPipeline(config, {
        logger,
        inputPath: options.input,
        benchmark: options.benchmark,
      });
    });
}
