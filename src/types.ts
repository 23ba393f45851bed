export const SENTIMENT_LABELS = ['positive', 'neutral', 'negative'] as const;
export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

export const ASPECT_DIMENSIONS = [
  'logistics',
  'quality',
  'price',
  'packaging',
  'service',
  'other',
] as const;
export type AspectDimension = (typeof ASPECT_DIMENSIONS)[number];

export const RISK_CATEGORIES = ['legal', 'safety', 'refund', 'complaint'] as const;
export type RiskCategory = (typeof RISK_CATEGORIES)[number];

export const RISK_SEVERITIES = ['low', 'medium', 'high'] as const;
export type RiskSeverity = (typeof RISK_SEVERITIES)[number];

export type Review = {
  readonly id: string;
  readonly rawText: string;
  readonly sourceLanguage: string; // ISO 639-1, 'de' unless the source says otherwise
  readonly receivedAt: Date;
  readonly sourceId?: string; // marketplace / listing the review came from
};

export type NormalizedText = {
  text: string;
  emojiCount: number;
  negativeEmojiCount: number;
  contentHash: string;
};

export type SentimentResult = {
  label: SentimentLabel;
  confidence: number; // 0–1
};

export type AspectScore = {
  dimension: AspectDimension;
  score: number; // -1 (negative) … 1 (positive)
  confidence: number;
};

export type RiskFlag = {
  category: RiskCategory;
  severity: RiskSeverity;
  matchedTerms: string[];
};

export type PipelineStage =
  | 'normalization'
  | 'classification'
  | 'translation'
  | 'keywords'
  | 'risk';

export type ReviewStatus =
  | 'pending'
  | 'normalizing'
  | 'analyzing'
  | 'finalized'
  | 'failed';

export type StageError = {
  stage: PipelineStage;
  code: string;
  message: string;
};

export type SentimentWords = {
  positive: string[];
  negative: string[];
};

export type AnalysisResult = {
  readonly reviewId: string;
  readonly status: Extract<ReviewStatus, 'finalized' | 'failed'>;
  readonly contentHash?: string;
  readonly sentiment?: Readonly<SentimentResult>;
  readonly aspectScores: ReadonlyArray<Readonly<AspectScore>>;
  readonly sentimentWords?: Readonly<SentimentWords>;
  readonly riskFlags: ReadonlyArray<Readonly<RiskFlag>>;
  readonly translatedText?: string;
  readonly targetLanguage?: string;
  readonly keywords: ReadonlyArray<string>;
  readonly errors: ReadonlyArray<Readonly<StageError>>;
};

export type SentimentDistribution = Record<SentimentLabel, number>;

export type RiskCategorySummary = {
  total: number;
  bySeverity: Record<RiskSeverity, number>;
};

export type AspectSummary = {
  meanScore: number;
  count: number;
  positiveRate: number; // share of scores above 0.2, in percent
};

export type KeywordCount = {
  term: string;
  count: number;
};

export type BatchReport = {
  totalReviews: number;
  finalizedCount: number;
  failedCount: number;
  partialCount: number;
  skippedCount: number;
  duplicateCount: number;
  sentimentDistribution: SentimentDistribution;
  averageConfidence: number;
  riskSummary: Record<RiskCategory, RiskCategorySummary>;
  aspectSummary: Partial<Record<AspectDimension, AspectSummary>>;
  topKeywords: KeywordCount[];
  topPositiveTerms: KeywordCount[];
  topNegativeTerms: KeywordCount[];
  keyInsights: string[];
  generatedAt: string;
};

export type BatchAnalysis = {
  report: BatchReport;
  results: AnalysisResult[];
  cancelled: boolean;
};

export type DimensionEvidence = Partial<Record<AspectDimension, number>>;

export type InferenceOutput = {
  label: SentimentLabel;
  confidence: number;
  classScores?: Partial<Record<SentimentLabel, number>>;
  dimensionEvidence: DimensionEvidence;
  sentimentWords?: SentimentWords; // polar terms found in the text, when the model reports them
};

/**
 * Sentiment / aspect inference capability. Implementations may be local
 * (lexicon) or remote (LLM); callers only see this contract.
 */
export interface SentimentModel {
  readonly name: string;
  infer(text: string): Promise<InferenceOutput>;
}

export interface TranslationBackend {
  readonly name: string;
  translate(text: string, targetLanguage: string): Promise<string>;
}
