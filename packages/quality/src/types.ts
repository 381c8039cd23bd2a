export type ContentIssue =
  | 'empty_content'
  | 'too_short'
  | 'too_long'
  | 'low_cultural_context'
  | 'long_sentences'
  | 'short_sentences'
  | 'repetitive_content'
  | `contains_${string}`;

export interface ContentQuality {
  qualityScore: number;
  issues: ContentIssue[];
  culturalIndicators: number;
  readabilityScore: number;
  contentLength: number;
  sentenceCount: number;
  avgSentenceLength: number;
  uniqueWords: number;
}

export interface SymbolCount {
  symbol: string;
  count: number;
}

export interface SymbolCoverage {
  totalSymbolInstances: number;
  uniqueSymbols: number;
  distributionBalanceScore: number;
  coverageQualityScore: number;
  mostCommonSymbols: SymbolCount[];
  singletonSymbols: number;
  avgInstancesPerSymbol: number;
}

export type CompletenessField = 'title' | 'content' | 'dreamSymbol' | 'tags' | 'description' | 'seoTitle' | 'url';

export interface Completeness {
  totalRecords: number;
  counts: Record<CompletenessField, number>;
  percentages: Record<CompletenessField, number>;
  overallCompleteness: number;
}

export interface QualityDistribution {
  excellent: number;
  good: number;
  fair: number;
  poor: number;
}

export interface TrainingReadiness {
  readyCount: number;
  readinessPercentage: number;
  averageQualityScore: number;
  qualityDistribution: QualityDistribution;
  recommendations: string[];
}

export interface CulturalAuthenticity {
  averageScore: number;
  recordsWithTraditionalContext: number;
  recordsWithReligiousContext: number;
  traditionalContextPercentage: number;
  religiousContextPercentage: number;
  distribution: { high: number; medium: number; low: number };
}

export type QualityGrade = 'EXCELLENT' | 'GOOD' | 'FAIR' | 'NEEDS_IMPROVEMENT';

export interface QualityReport {
  summary: {
    overallQualityScore: number;
    qualityGrade: QualityGrade;
    totalRecordsAnalyzed: number;
  };
  symbolCoverage: SymbolCoverage;
  completeness: Completeness;
  readiness: TrainingReadiness;
  cultural: CulturalAuthenticity;
  recommendations: string[];
}
