import type { CleanedRecord, ExampleMetadata } from '@ruya-sft/record-sdk';

export function buildMetadata(record: CleanedRecord): ExampleMetadata {
  return {
    dream_symbol: record.dreamSymbol,
    original_id: record.originalId,
    source_url: record.url,
  };
}
