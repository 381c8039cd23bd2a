import { processRecords } from './pipeline.js';
import type { ProcessingOptions } from './types.js';

const BENCHMARK_SAMPLE_SIZE = 10;

export interface BenchmarkResult {
  recordsPerSecond: number;
  avgProcessingTimeMs: number;
  sampleSize: number;
}

/**
 * Time the sequential path over the first few records. Samples smaller than
 * `BENCHMARK_SAMPLE_SIZE` are not measured.
 */
export function benchmarkProcessingSpeed(sample: readonly unknown[], options: ProcessingOptions): BenchmarkResult {
  if (sample.length < BENCHMARK_SAMPLE_SIZE) {
    return { recordsPerSecond: 0, avgProcessingTimeMs: 0, sampleSize: 0 };
  }

  const records = sample.slice(0, BENCHMARK_SAMPLE_SIZE);
  const start = performance.now();
  processRecords(records, options);
  const elapsedMs = performance.now() - start;

  return {
    recordsPerSecond: elapsedMs > 0 ? (records.length / elapsedMs) * 1000 : 0,
    avgProcessingTimeMs: elapsedMs / records.length,
    sampleSize: records.length,
  };
}
