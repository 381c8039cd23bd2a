import { formatBatch } from '@ruya-sft/formatters';
import { consoleLogger, parseRawRecord, toErrorMessage, type CleanedRecord } from '@ruya-sft/record-sdk';
import { cleanRecord } from './clean.js';
import type { BatchResult, ChunkResult, ProcessedBatch, ProcessingOptions, RecordChunk, RecordOutcome } from './types.js';
import { rejectionReason } from './validate.js';

const PROGRESS_INTERVAL = 50;

function describeRecord(raw: unknown, index: number): string {
  if (typeof raw === 'object' && raw !== null && 'Title' in raw && typeof raw.Title === 'string') {
    return raw.Title.slice(0, 50);
  }
  return `#${index}`;
}

/**
 * Run one raw record through shape check → clean → validate.
 * Never throws: unexpected failures come back as an `error` outcome.
 */
export function processRecord(raw: unknown, options: ProcessingOptions): RecordOutcome {
  try {
    const parsed = parseRawRecord(raw);
    if (!parsed.success) {
      return { status: 'error', error: `invalid record shape (${parsed.issues.join('; ')})` };
    }

    const record = cleanRecord(parsed.record, { strategies: options.markupStrategies, logger: options.logger });
    const reason = rejectionReason(record, options.minContentLength);
    return reason === null ? { status: 'accepted', record } : { status: 'filtered', record, reason };
  } catch (err) {
    return { status: 'error', error: toErrorMessage(err) };
  }
}

/**
 * Sequential path: every record in input order, keeping the accepted ones.
 */
export function processRecords(records: readonly unknown[], options: ProcessingOptions): ProcessedBatch {
  const { logger = consoleLogger } = options;
  const accepted: CleanedRecord[] = [];
  let filtered = 0;

  logger.info(`[process] Processing ${records.length} records...`);

  records.forEach((raw, index) => {
    if (index % PROGRESS_INTERVAL === 0) {
      logger.debug(`[process] Record ${index + 1}/${records.length}`);
    }

    const outcome = processRecord(raw, options);
    switch (outcome.status) {
      case 'accepted':
        accepted.push(outcome.record);
        break;
      case 'filtered':
        filtered += 1;
        logger.debug(`[process] Filtered (${outcome.reason}): ${describeRecord(raw, index)}`);
        break;
      case 'error':
        filtered += 1;
        logger.warn(`[process] Record ${describeRecord(raw, index)} skipped: ${outcome.error}`);
        break;
    }
  });

  logger.info(`[process] Done: ${accepted.length} processed, ${filtered} filtered out`);

  return {
    records: accepted,
    stats: { received: records.length, processed: accepted.length, filtered },
  };
}

/**
 * Full per-chunk work: process the slice, then emit both training formats.
 */
export function processChunk(chunk: RecordChunk, options: ProcessingOptions): ChunkResult {
  const start = performance.now();
  const { records, stats } = processRecords(chunk.records, options);

  return {
    chunkId: chunk.id,
    records,
    chatExamples: formatBatch('chat', records, { logger: options.logger }),
    promptExamples: formatBatch('prompt', records, { logger: options.logger }),
    stats,
    durationMs: performance.now() - start,
  };
}

/**
 * Process everything inline as a single chunk.
 */
export function processSequential(records: readonly unknown[], options: ProcessingOptions): BatchResult {
  const result = processChunk({ id: 0, records }, options);

  return {
    mode: 'sequential',
    records: result.records,
    chatExamples: result.chatExamples,
    promptExamples: result.promptExamples,
    stats: result.stats,
    failedChunks: [],
    durationMs: result.durationMs,
  };
}
