export { analyzeBatch, gradeFor } from './report.js';
export type { AnalyzeBatchOptions } from './report.js';
export { analyzeContentQuality } from './content.js';
export { analyzeSymbolCoverage, countSymbols } from './coverage.js';
export { analyzeCompleteness } from './completeness.js';
export { analyzeTrainingReadiness, NO_RECORDS_RECOMMENDATION } from './readiness.js';
export { analyzeCulturalAuthenticity, culturalScore } from './cultural.js';
export { round2 } from './math.js';
export { DREAM_KEYWORDS, NOISE_MARKERS, TRADITIONAL_INDICATORS, RELIGIOUS_KEYWORDS } from './keywords.js';

export type {
  ContentIssue,
  ContentQuality,
  SymbolCount,
  SymbolCoverage,
  CompletenessField,
  Completeness,
  QualityDistribution,
  TrainingReadiness,
  CulturalAuthenticity,
  QualityGrade,
  QualityReport,
} from './types.js';
