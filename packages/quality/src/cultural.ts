import type { CleanedRecord } from '@ruya-sft/record-sdk';
import { countContained, RELIGIOUS_KEYWORDS, TRADITIONAL_INDICATORS } from './keywords.js';
import { mean, percentage } from './math.js';
import type { CulturalAuthenticity } from './types.js';

const TRADITIONAL_WEIGHT = 10;
const RELIGIOUS_WEIGHT = 5;

export function culturalScore(content: string): { score: number; traditional: number; religious: number } {
  const lowered = content.toLowerCase();
  const traditional = countContained(lowered, TRADITIONAL_INDICATORS);
  const religious = countContained(lowered, RELIGIOUS_KEYWORDS);
  return {
    score: Math.min(100, traditional * TRADITIONAL_WEIGHT + religious * RELIGIOUS_WEIGHT),
    traditional,
    religious,
  };
}

export function analyzeCulturalAuthenticity(records: readonly CleanedRecord[]): CulturalAuthenticity {
  const results = records.map((record) => culturalScore(record.cleanedContent));
  const scores = results.map((r) => r.score);
  const withTraditional = results.filter((r) => r.traditional > 0).length;
  const withReligious = results.filter((r) => r.religious > 0).length;

  return {
    averageScore: mean(scores),
    recordsWithTraditionalContext: withTraditional,
    recordsWithReligiousContext: withReligious,
    traditionalContextPercentage: percentage(withTraditional, records.length),
    religiousContextPercentage: percentage(withReligious, records.length),
    distribution: {
      high: scores.filter((s) => s >= 50).length,
      medium: scores.filter((s) => s >= 20 && s < 50).length,
      low: scores.filter((s) => s < 20).length,
    },
  };
}
