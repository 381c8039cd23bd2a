import type { ChatExample, CleanedRecord, PipelineLogger, PromptExample } from '@ruya-sft/record-sdk';
import type { MarkupStrategy } from './clean.js';
import type { RejectionReason } from './validate.js';

/**
 * Outcome for a single raw record.
 */
export type RecordOutcome =
  | { status: 'accepted'; record: CleanedRecord }
  | { status: 'filtered'; record: CleanedRecord; reason: RejectionReason }
  | { status: 'error'; error: string };

/**
 * Per-batch counts. `filtered` includes records that errored.
 */
export interface ProcessingStats {
  received: number;
  processed: number;
  filtered: number;
}

export interface ProcessedBatch {
  records: CleanedRecord[];
  stats: ProcessingStats;
}

/**
 * Contiguous slice of the input. `id` is the slice's position and is only
 * used to put results back in input order.
 */
export interface RecordChunk {
  id: number;
  records: readonly unknown[];
}

export interface ChunkResult {
  chunkId: number;
  records: CleanedRecord[];
  chatExamples: ChatExample[];
  promptExamples: PromptExample[];
  stats: ProcessingStats;
  durationMs: number;
}

export interface ChunkFailure {
  chunkId: number;
  error: string;
}

export type ProcessingMode = 'sequential' | 'parallel';

/**
 * Combined result of a whole run, in input order.
 */
export interface BatchResult {
  mode: ProcessingMode;
  records: CleanedRecord[];
  chatExamples: ChatExample[];
  promptExamples: PromptExample[];
  stats: ProcessingStats;
  failedChunks: ChunkFailure[];
  durationMs: number;
}

export interface ProcessingOptions {
  minContentLength: number;
  logger?: PipelineLogger;
  markupStrategies?: readonly MarkupStrategy[];
}

export type ChunkProcessor = (chunk: RecordChunk, options: ProcessingOptions) => ChunkResult;

export interface ParallelOptions extends ProcessingOptions {
  /** Chunk tasks in flight at once; they run on the calling thread. */
  maxWorkers: number;
  chunkSize?: number;
  /** Replaces the default per-chunk work; the chunk's slice is already cut. */
  chunkProcessor?: ChunkProcessor;
  onChunkComplete?: (progress: ChunkProgress) => void;
}

export interface ChunkProgress {
  chunkId: number;
  completedChunks: number;
  totalChunks: number;
  processedRecords: number;
}
