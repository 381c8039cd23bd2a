import { round2 } from '@ruya-sft/quality';
import type { CleanedRecord } from '@ruya-sft/record-sdk';

export interface ProcessingSummary {
  processing: {
    totalProcessingTimeSeconds: number;
    originalRecordCount: number;
    processedRecordCount: number;
    /** Percentage of input records kept, 0 for empty input. */
    dataRetentionRate: number;
  };
  outputFormats: {
    chatExamples: number;
    promptExamples: number;
    formatConsistency: boolean;
  };
  metrics: {
    averageContentLength: number;
    recordsWithTags: number;
    failedChunks: number;
  };
}

export interface SummaryInput {
  originalCount: number;
  records: readonly CleanedRecord[];
  chatExamples: number;
  promptExamples: number;
  failedChunks: number;
  durationMs: number;
}

export function buildProcessingSummary(input: SummaryInput): ProcessingSummary {
  const { originalCount, records } = input;
  const totalCleanedLength = records.reduce((sum, record) => sum + record.cleanedLength, 0);

  return {
    processing: {
      totalProcessingTimeSeconds: round2(input.durationMs / 1000),
      originalRecordCount: originalCount,
      processedRecordCount: records.length,
      dataRetentionRate: originalCount > 0 ? round2((records.length / originalCount) * 100) : 0,
    },
    outputFormats: {
      chatExamples: input.chatExamples,
      promptExamples: input.promptExamples,
      formatConsistency: input.chatExamples === input.promptExamples,
    },
    metrics: {
      averageContentLength: records.length > 0 ? Math.floor(totalCleanedLength / records.length) : 0,
      recordsWithTags: records.filter((record) => record.tags.length > 0).length,
      failedChunks: input.failedChunks,
    },
  };
}
