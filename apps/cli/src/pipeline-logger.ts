import type { PipelineLogger } from '@ruya-sft/record-sdk';
import type { Logger } from 'pino';

export function createPipelineLogger(logger: Logger): PipelineLogger {
  return {
    debug: (message) => logger.debug({ event: 'pipeline_stage' }, message),
    info: (message) => logger.info({ event: 'pipeline_stage' }, message),
    warn: (message) => logger.warn({ event: 'pipeline_stage' }, message),
    error: (message) => logger.error({ event: 'pipeline_stage' }, message),
  };
}
