import { consoleLogger, type CleanedRecord, type PipelineLogger } from '@ruya-sft/record-sdk';
import { analyzeCompleteness } from './completeness.js';
import { analyzeCulturalAuthenticity } from './cultural.js';
import { mean, round2 } from './math.js';
import { analyzeTrainingReadiness, NO_RECORDS_RECOMMENDATION } from './readiness.js';
import { analyzeSymbolCoverage } from './coverage.js';
import type { CulturalAuthenticity, QualityGrade, QualityReport, TrainingReadiness } from './types.js';

export interface AnalyzeBatchOptions {
  logger?: PipelineLogger;
}

export function gradeFor(score: number): QualityGrade {
  if (score >= 90) return 'EXCELLENT';
  if (score >= 75) return 'GOOD';
  if (score >= 60) return 'FAIR';
  return 'NEEDS_IMPROVEMENT';
}

function recommend(overall: number, readiness: TrainingReadiness, cultural: CulturalAuthenticity): string[] {
  const recommendations: string[] = [];

  if (overall < 70) {
    recommendations.push('Overall data quality needs significant improvement');
  }
  if (readiness.readinessPercentage < 80) {
    recommendations.push('Consider additional data cleaning and filtering');
  }
  if (cultural.averageScore < 30) {
    recommendations.push('Enhance cultural context preservation in content cleaning');
  }
  if (readiness.averageQualityScore < 70) {
    recommendations.push('Improve HTML cleaning and content extraction algorithms');
  }
  if (overall >= 80) {
    recommendations.push('Data quality is excellent - ready for SFT training');
  }
  if (readiness.readinessPercentage >= 90) {
    recommendations.push('High training readiness - consider advanced data augmentation');
  }

  return recommendations;
}

/**
 * Run every analysis over the cleaned records and combine them into one report.
 * The overall score is the mean of completeness, readiness, cultural score and
 * symbol distribution balance.
 */
export function analyzeBatch(records: readonly CleanedRecord[], options: AnalyzeBatchOptions = {}): QualityReport {
  const { logger = consoleLogger } = options;
  logger.info(`[quality] Analyzing quality for ${records.length} records...`);

  const symbolCoverage = analyzeSymbolCoverage(records);
  const completeness = analyzeCompleteness(records);
  const readiness = analyzeTrainingReadiness(records);
  const cultural = analyzeCulturalAuthenticity(records);

  const overall = mean([
    completeness.overallCompleteness,
    readiness.readinessPercentage,
    cultural.averageScore,
    symbolCoverage.distributionBalanceScore,
  ]);

  return {
    summary: {
      overallQualityScore: round2(overall),
      qualityGrade: gradeFor(overall),
      totalRecordsAnalyzed: records.length,
    },
    symbolCoverage,
    completeness,
    readiness,
    cultural,
    recommendations: records.length === 0 ? [NO_RECORDS_RECOMMENDATION] : recommend(overall, readiness, cultural),
  };
}
