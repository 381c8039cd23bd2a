import { join } from 'node:path';
import {
  benchmarkProcessingSpeed,
  estimateWorkerCount,
  processParallel,
  processSequential,
  type BatchResult,
  type BenchmarkResult,
  type ProcessingMode,
  type ProcessingOptions,
} from '@ruya-sft/processing';
import { analyzeBatch, type QualityReport } from '@ruya-sft/quality';
import type { Logger } from 'pino';
import type { PipelineConfig } from './config.js';
import { loadRecords, toProcessedRow, writeJson, writeJsonl } from './io.js';
import { createPipelineLogger } from './pipeline-logger.js';
import { buildProcessingSummary, type ProcessingSummary } from './summary.js';

/** The chunked path only pays off above this many records. */
export const PARALLEL_THRESHOLD = 50;
const BENCHMARK_SAMPLE = 20;
/** Whole runs are expected to finish under this many seconds. */
export const PERFORMANCE_TARGET_SECONDS = 60;

export const ARTIFACT_FILES = {
  processedData: 'processed_data.json',
  chatFormat: 'chat_format.jsonl',
  promptFormat: 'prompt_format.jsonl',
  qualityReport: 'quality_report.json',
} as const;

export type ArtifactKind = keyof typeof ARTIFACT_FILES;

export interface WrittenArtifact {
  kind: ArtifactKind;
  path: string;
  count: number;
}

export interface RunDeps {
  logger: Logger;
  inputPath: string;
  benchmark?: boolean;
}

export interface RunSummary {
  mode: ProcessingMode;
  summary: ProcessingSummary;
  report: QualityReport;
  artifacts: WrittenArtifact[];
  benchmark?: BenchmarkResult;
}

async function processInput(
  records: readonly unknown[],
  config: PipelineConfig,
  options: ProcessingOptions,
  logger: Logger,
): Promise<BatchResult> {
  if (config.parallel && records.length > PARALLEL_THRESHOLD) {
    const maxWorkers = config.maxWorkers ?? estimateWorkerCount(records.length);
    logger.info(
      { event: 'processing_mode', mode: 'parallel', maxWorkers, chunkSize: config.chunkSize },
      'Using parallel processing',
    );
    return processParallel(records, { ...options, maxWorkers, chunkSize: config.chunkSize });
  }

  logger.info({ event: 'processing_mode', mode: 'sequential' }, 'Using sequential processing');
  return processSequential(records, options);
}

/**
 * Load, process, format, analyze and write the enabled artifacts. Errors from
 * loading or writing propagate; per-record and per-chunk failures do not.
 */
export async function runPipeline(config: PipelineConfig, deps: RunDeps): Promise<RunSummary> {
  const { logger } = deps;
  const startedAt = performance.now();
  const options: ProcessingOptions = {
    minContentLength: config.minContentLength,
    logger: createPipelineLogger(logger),
  };

  logger.info({ event: 'run_started', input: deps.inputPath, outputDir: config.outputDir }, 'Run started');

  const records = await loadRecords(deps.inputPath);
  logger.info({ event: 'input_loaded', records: records.length }, `Loaded ${records.length} records`);

  let benchmark: BenchmarkResult | undefined;
  if (deps.benchmark) {
    benchmark = benchmarkProcessingSpeed(records.slice(0, BENCHMARK_SAMPLE), options);
    logger.info({ event: 'benchmark_completed', ...benchmark }, 'Benchmark completed');
  }

  const batch = await processInput(records, config, options, logger);
  const report = analyzeBatch(batch.records, { logger: options.logger });

  const artifacts: WrittenArtifact[] = [];
  const outputPath = (kind: ArtifactKind): string => join(config.outputDir, ARTIFACT_FILES[kind]);

  if (config.saveProcessedData) {
    const path = outputPath('processedData');
    await writeJson(path, batch.records.map(toProcessedRow));
    artifacts.push({ kind: 'processedData', path, count: batch.records.length });
  }

  if (config.saveChatFormat) {
    const path = outputPath('chatFormat');
    await writeJsonl(path, batch.chatExamples);
    artifacts.push({ kind: 'chatFormat', path, count: batch.chatExamples.length });
  }

  if (config.savePromptFormat) {
    const path = outputPath('promptFormat');
    await writeJsonl(path, batch.promptExamples);
    artifacts.push({ kind: 'promptFormat', path, count: batch.promptExamples.length });
  }

  const summary = buildProcessingSummary({
    originalCount: records.length,
    records: batch.records,
    chatExamples: batch.chatExamples.length,
    promptExamples: batch.promptExamples.length,
    failedChunks: batch.failedChunks.length,
    durationMs: performance.now() - startedAt,
  });

  if (config.saveQualityReport) {
    const path = outputPath('qualityReport');
    await writeJson(path, { processingSummary: summary, ...report });
    artifacts.push({ kind: 'qualityReport', path, count: 1 });
  }

  for (const artifact of artifacts) {
    logger.info({ event: 'artifact_written', ...artifact }, `Wrote ${artifact.path}`);
  }

  logger.info(
    {
      event: 'run_completed',
      mode: batch.mode,
      received: batch.stats.received,
      processed: batch.stats.processed,
      filtered: batch.stats.filtered,
      failedChunks: batch.failedChunks.length,
      qualityGrade: report.summary.qualityGrade,
      durationSeconds: summary.processing.totalProcessingTimeSeconds,
    },
    'Run completed',
  );

  const durationSeconds = summary.processing.totalProcessingTimeSeconds;
  const performanceTarget = { event: 'performance_target', targetSeconds: PERFORMANCE_TARGET_SECONDS, durationSeconds };
  if (durationSeconds < PERFORMANCE_TARGET_SECONDS) {
    logger.info({ ...performanceTarget, met: true }, `Performance target met: ${durationSeconds.toFixed(2)}s`);
  } else {
    logger.warn(
      { ...performanceTarget, met: false },
      `Performance target missed: ${durationSeconds.toFixed(2)}s > ${PERFORMANCE_TARGET_SECONDS}s`,
    );
  }

  return { mode: batch.mode, summary, report, artifacts, ...(benchmark ? { benchmark } : {}) };
}
