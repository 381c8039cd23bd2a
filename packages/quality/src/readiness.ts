import type { CleanedRecord } from '@ruya-sft/record-sdk';
import { analyzeContentQuality } from './content.js';
import { mean, percentage } from './math.js';
import type { QualityDistribution, TrainingReadiness } from './types.js';

export const NO_RECORDS_RECOMMENDATION = 'No records to analyze';

const READY_MIN_SCORE = 70;
const READY_MIN_LENGTH = 100;
const TARGET_READINESS = 80;
const TARGET_CORPUS_SIZE = 1000;

function distributionOf(scores: readonly number[]): QualityDistribution {
  return {
    excellent: scores.filter((s) => s >= 90).length,
    good: scores.filter((s) => s >= 70 && s < 90).length,
    fair: scores.filter((s) => s >= 50 && s < 70).length,
    poor: scores.filter((s) => s < 50).length,
  };
}

/**
 * A record is ready when its content scores above 70, it has a dream symbol
 * and its content is at least 100 characters long.
 */
export function analyzeTrainingReadiness(records: readonly CleanedRecord[]): TrainingReadiness {
  if (records.length === 0) {
    return {
      readyCount: 0,
      readinessPercentage: 0,
      averageQualityScore: 0,
      qualityDistribution: distributionOf([]),
      recommendations: [NO_RECORDS_RECOMMENDATION],
    };
  }

  const scores: number[] = [];
  let readyCount = 0;

  for (const record of records) {
    const { qualityScore } = analyzeContentQuality(record.cleanedContent);
    scores.push(qualityScore);

    if (qualityScore > READY_MIN_SCORE && record.dreamSymbol && record.cleanedContent.length >= READY_MIN_LENGTH) {
      readyCount += 1;
    }
  }

  const averageQualityScore = mean(scores);
  const readinessPercentage = percentage(readyCount, records.length);

  const recommendations: string[] = [];
  if (averageQualityScore < READY_MIN_SCORE) {
    recommendations.push('Improve content quality by better HTML cleaning');
  }
  if (readinessPercentage < TARGET_READINESS) {
    recommendations.push('Filter out low-quality records before training');
  }
  if (records.length < TARGET_CORPUS_SIZE) {
    recommendations.push('Consider data augmentation to increase dataset size');
  }

  return {
    readyCount,
    readinessPercentage,
    averageQualityScore,
    qualityDistribution: distributionOf(scores),
    recommendations,
  };
}
