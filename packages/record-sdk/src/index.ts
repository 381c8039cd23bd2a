export type {
  RawRecord,
  CleanedRecord,
  TrainingFormat,
  ExampleMetadata,
  ChatRole,
  ChatMessage,
  ChatExample,
  PromptExample,
  TrainingExampleByFormat,
  TrainingExample,
} from './types.js';
export { rawRecordSchema, rawRecordListSchema, parseRawRecord, formatIssues } from './schema.js';
export type { ValidatedRawRecord, RawRecordParseResult } from './schema.js';
export { consoleLogger, toErrorMessage } from './logger.js';
export type { PipelineLogger } from './logger.js';
