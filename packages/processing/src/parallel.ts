import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { consoleLogger, toErrorMessage } from '@ruya-sft/record-sdk';
import { computeChunkSize, createChunks } from './chunking.js';
import { processChunk } from './pipeline.js';
import { runBounded } from './pool.js';
import type { BatchResult, ChunkFailure, ChunkResult, ParallelOptions } from './types.js';

function emptyResult(): BatchResult {
  return {
    mode: 'parallel',
    records: [],
    chatExamples: [],
    promptExamples: [],
    stats: { received: 0, processed: 0, filtered: 0 },
    failedChunks: [],
    durationMs: 0,
  };
}

/**
 * Concatenate chunk results in chunk order. Counts are summed here, after
 * every task has returned.
 */
export function combineChunkResults(results: readonly ChunkResult[]): Omit<BatchResult, 'mode' | 'failedChunks' | 'durationMs'> {
  const ordered = [...results].sort((a, b) => a.chunkId - b.chunkId);
  const combined: Omit<BatchResult, 'mode' | 'failedChunks' | 'durationMs'> = {
    records: [],
    chatExamples: [],
    promptExamples: [],
    stats: { received: 0, processed: 0, filtered: 0 },
  };

  for (const result of ordered) {
    combined.records.push(...result.records);
    combined.chatExamples.push(...result.chatExamples);
    combined.promptExamples.push(...result.promptExamples);
    combined.stats.received += result.stats.received;
    combined.stats.processed += result.stats.processed;
    combined.stats.filtered += result.stats.filtered;
  }

  return combined;
}

/**
 * Chunked path: one task per contiguous slice, at most `maxWorkers` of them in
 * flight at once. Tasks share the calling thread, so the limit bounds
 * concurrency and does not add CPU parallelism. A chunk that throws is recorded
 * in `failedChunks` and left out of the result; the other chunks are unaffected.
 */
export async function processParallel(records: readonly unknown[], options: ParallelOptions): Promise<BatchResult> {
  const { logger = consoleLogger, chunkProcessor = processChunk, onChunkComplete } = options;
  if (records.length === 0) return emptyResult();

  const start = performance.now();
  const chunkSize = computeChunkSize(records.length, options.maxWorkers, options.chunkSize);
  const chunks = createChunks(records, chunkSize);
  logger.info(
    `[parallel] ${records.length} records in ${chunks.length} chunks of ~${chunkSize}, ${options.maxWorkers} concurrent tasks`,
  );

  let completedChunks = 0;
  let processedRecords = 0;

  const tasks = chunks.map((chunk) => async (): Promise<ChunkResult> => {
    await yieldToEventLoop();
    const result = chunkProcessor(chunk, options);

    completedChunks += 1;
    processedRecords += result.stats.processed;
    logger.info(
      `[parallel] Chunk ${chunk.id}: ${result.stats.processed}/${chunk.records.length} records in ${result.durationMs.toFixed(1)}ms`,
    );
    onChunkComplete?.({ chunkId: chunk.id, completedChunks, totalChunks: chunks.length, processedRecords });
    return result;
  });

  const settled = await runBounded(tasks, options.maxWorkers);

  const succeeded: ChunkResult[] = [];
  const failedChunks: ChunkFailure[] = [];
  settled.forEach((outcome, chunkId) => {
    if (outcome.status === 'fulfilled') {
      succeeded.push(outcome.value);
    } else {
      const error = toErrorMessage(outcome.reason);
      failedChunks.push({ chunkId, error });
      logger.error(`[parallel] Chunk ${chunkId} failed: ${error}`);
    }
  });

  const combined = combineChunkResults(succeeded);
  const durationMs = performance.now() - start;

  logger.info(
    `[parallel] Done. ${combined.stats.processed}/${records.length} records kept in ${durationMs.toFixed(1)}ms`,
  );
  if (failedChunks.length > 0) {
    logger.warn(`[parallel] ${failedChunks.length} chunk(s) failed: ${failedChunks.map((f) => f.chunkId).join(', ')}`);
  }

  return { mode: 'parallel', ...combined, failedChunks, durationMs };
}
