import {
  consoleLogger,
  toErrorMessage,
  type CleanedRecord,
  type PipelineLogger,
  type TrainingExampleByFormat,
  type TrainingFormat,
} from '@ruya-sft/record-sdk';
import { toChatExamples } from './chat.js';
import { toPromptExamples } from './prompt.js';

type Emitter<F extends TrainingFormat> = (record: CleanedRecord) => TrainingExampleByFormat[F][];

const EMITTERS: { [F in TrainingFormat]: Emitter<F> } = {
  chat: toChatExamples,
  prompt: toPromptExamples,
};

export function formatRecord<F extends TrainingFormat>(format: F, record: CleanedRecord): TrainingExampleByFormat[F][] {
  const emit: Emitter<F> = EMITTERS[format];
  return emit(record);
}

export interface FormatBatchOptions {
  logger?: PipelineLogger;
}

/**
 * Emit training examples for every record. A record that fails to format is
 * logged and contributes nothing; the rest of the batch continues.
 */
export function formatBatch<F extends TrainingFormat>(
  format: F,
  records: readonly CleanedRecord[],
  options: FormatBatchOptions = {},
): TrainingExampleByFormat[F][] {
  const { logger = consoleLogger } = options;
  const examples: TrainingExampleByFormat[F][] = [];

  records.forEach((record, index) => {
    try {
      examples.push(...formatRecord(format, record));
    } catch (err) {
      logger.warn(`[format:${format}] Record ${index} (${record.originalId || 'no id'}) skipped: ${toErrorMessage(err)}`);
    }
  });

  logger.info(`[format:${format}] ${examples.length} training examples from ${records.length} records`);
  return examples;
}
