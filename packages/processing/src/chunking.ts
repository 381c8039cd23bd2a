import { availableParallelism } from 'node:os';
import type { RecordChunk } from './types.js';

export const MAX_WORKERS_CAP = 8;
const DEFAULT_AVG_RECORD_SIZE_KB = 10;

/**
 * Records per chunk. Small inputs get few large chunks, large inputs many
 * small ones; an explicit `override` always wins.
 */
export function computeChunkSize(totalRecords: number, workers: number, override?: number): number {
  if (override && override > 0) return Math.floor(override);

  const w = Math.max(1, workers);
  if (totalRecords <= 100) return Math.max(1, Math.floor(totalRecords / w));
  if (totalRecords <= 500) return Math.max(10, Math.floor(totalRecords / (w * 2)));
  if (totalRecords <= 2000) return Math.max(25, Math.floor(totalRecords / (w * 3)));
  return Math.max(50, Math.floor(totalRecords / (w * 4)));
}

export function createChunks(records: readonly unknown[], chunkSize: number): RecordChunk[] {
  const size = Math.max(1, Math.floor(chunkSize));
  const chunks: RecordChunk[] = [];

  for (let start = 0; start < records.length; start += size) {
    chunks.push({ id: chunks.length, records: records.slice(start, start + size) });
  }

  return chunks;
}

/**
 * Default pool size from the estimated input volume, never above
 * `MAX_WORKERS_CAP` whatever the hardware offers.
 */
export function estimateWorkerCount(
  recordCount: number,
  avgRecordSizeKb: number = DEFAULT_AVG_RECORD_SIZE_KB,
  cpuCount: number = availableParallelism(),
): number {
  const totalMb = (recordCount * avgRecordSizeKb) / 1024;
  const tierCap = totalMb < 50 ? 4 : totalMb < 200 ? 6 : MAX_WORKERS_CAP;
  return Math.max(1, Math.min(cpuCount, tierCap));
}
