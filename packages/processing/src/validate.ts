import type { CleanedRecord } from '@ruya-sft/record-sdk';
import { CULTURAL_INDICATORS } from './indicators.js';

export const MIN_CULTURAL_INDICATORS = 2;

export type RejectionReason = 'empty_content' | 'too_short' | 'missing_symbol' | 'weak_cultural_context';

/**
 * Count distinct indicator terms contained in the text. Substring matching,
 * so inflected forms of a term still count.
 */
export function countCulturalIndicators(content: string, indicators: readonly string[] = CULTURAL_INDICATORS): number {
  const lowered = content.toLowerCase();
  return indicators.reduce((count, indicator) => (lowered.includes(indicator) ? count + 1 : count), 0);
}

/**
 * First inclusion rule the record breaks, or null when it passes them all.
 */
export function rejectionReason(
  record: Pick<CleanedRecord, 'cleanedContent' | 'dreamSymbol'>,
  minContentLength: number,
): RejectionReason | null {
  const content = record.cleanedContent;
  if (!content) return 'empty_content';
  if (content.length < minContentLength) return 'too_short';
  if (!record.dreamSymbol) return 'missing_symbol';
  if (countCulturalIndicators(content) < MIN_CULTURAL_INDICATORS) return 'weak_cultural_context';
  return null;
}

export function isAcceptable(
  record: Pick<CleanedRecord, 'cleanedContent' | 'dreamSymbol'>,
  minContentLength: number,
): boolean {
  return rejectionReason(record, minContentLength) === null;
}
