import type { CleanedRecord } from '@ruya-sft/record-sdk';
import { round2 } from './math.js';
import type { SymbolCount, SymbolCoverage } from './types.js';

const TOP_SYMBOLS = 10;
const WELL_REPRESENTED_COUNT = 5;

/**
 * Frequency of each dream symbol, most frequent first. Ties keep first-seen order.
 */
export function countSymbols(records: readonly Pick<CleanedRecord, 'dreamSymbol'>[]): SymbolCount[] {
  const counts = new Map<string, number>();
  for (const { dreamSymbol } of records) {
    if (!dreamSymbol) continue;
    counts.set(dreamSymbol, (counts.get(dreamSymbol) ?? 0) + 1);
  }

  return [...counts].map(([symbol, count]) => ({ symbol, count })).sort((a, b) => b.count - a.count);
}

export function analyzeSymbolCoverage(records: readonly Pick<CleanedRecord, 'dreamSymbol'>[]): SymbolCoverage {
  const counts = countSymbols(records);
  const total = counts.reduce((sum, { count }) => sum + count, 0);
  const unique = counts.length;
  const top = counts[0];

  const distributionBalance = top ? Math.max(0, 100 - (top.count / total) * 100) : 0;
  const wellRepresented = counts.filter(({ count }) => count >= WELL_REPRESENTED_COUNT).length;
  const coverageQuality = unique > 0 ? (wellRepresented / unique) * 100 : 0;

  return {
    totalSymbolInstances: total,
    uniqueSymbols: unique,
    distributionBalanceScore: round2(distributionBalance),
    coverageQualityScore: round2(coverageQuality),
    mostCommonSymbols: counts.slice(0, TOP_SYMBOLS),
    singletonSymbols: counts.filter(({ count }) => count === 1).length,
    avgInstancesPerSymbol: round2(total / Math.max(unique, 1)),
  };
}
