import type { CleanedRecord } from '@ruya-sft/record-sdk';
import { mean, percentage } from './math.js';
import type { Completeness, CompletenessField } from './types.js';

type FieldCounts = Record<CompletenessField, number>;

function countWhere(records: readonly CleanedRecord[], check: (record: CleanedRecord) => boolean): number {
  return records.reduce((count, record) => (check(record) ? count + 1 : count), 0);
}

function toPercentages(counts: FieldCounts, total: number): FieldCounts {
  return {
    title: percentage(counts.title, total),
    content: percentage(counts.content, total),
    dreamSymbol: percentage(counts.dreamSymbol, total),
    tags: percentage(counts.tags, total),
    description: percentage(counts.description, total),
    seoTitle: percentage(counts.seoTitle, total),
    url: percentage(counts.url, total),
  };
}

/**
 * Share of records with each field filled in. The overall figure only
 * averages title, content and dream symbol.
 */
export function analyzeCompleteness(records: readonly CleanedRecord[]): Completeness {
  const counts: FieldCounts = {
    title: countWhere(records, (r) => r.title.length > 0),
    content: countWhere(records, (r) => r.cleanedContent.length > 0),
    dreamSymbol: countWhere(records, (r) => r.dreamSymbol.length > 0),
    tags: countWhere(records, (r) => r.tags.length > 0),
    description: countWhere(records, (r) => r.description.length > 0),
    seoTitle: countWhere(records, (r) => r.seoTitle.length > 0),
    url: countWhere(records, (r) => r.url.length > 0),
  };
  const percentages = toPercentages(counts, records.length);

  return {
    totalRecords: records.length,
    counts,
    percentages,
    overallCompleteness: mean([percentages.title, percentages.content, percentages.dreamSymbol]),
  };
}
