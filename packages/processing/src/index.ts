// Pipeline
export { processRecord, processRecords, processChunk, processSequential } from './pipeline.js';
export { processParallel, combineChunkResults } from './parallel.js';
export { runBounded } from './pool.js';
export { computeChunkSize, createChunks, estimateWorkerCount, MAX_WORKERS_CAP } from './chunking.js';
export { benchmarkProcessingSpeed } from './benchmark.js';
export type { BenchmarkResult } from './benchmark.js';

// Individual stages
export { isAcceptable, rejectionReason, countCulturalIndicators, MIN_CULTURAL_INDICATORS } from './validate.js';
export type { RejectionReason } from './validate.js';
export { CULTURAL_INDICATORS, loadKeywordList } from './indicators.js';
export {
  cleanMarkup,
  cleanRecord,
  decodeHtmlEntities,
  extractSeoFields,
  extractSymbol,
  filterTags,
  normalizeWhitespace,
  structuredStrategy,
  regexStrategy,
  DEFAULT_MARKUP_STRATEGIES,
} from './clean.js';
export type { CleanMarkupOptions, MarkupExtraction, MarkupStrategy, SeoFields } from './clean.js';

// Types
export type {
  RecordOutcome,
  ProcessingStats,
  ProcessedBatch,
  RecordChunk,
  ChunkResult,
  ChunkFailure,
  ChunkProcessor,
  ChunkProgress,
  ProcessingMode,
  BatchResult,
  ProcessingOptions,
  ParallelOptions,
} from './types.js';
