export * from './types';
export * from './errors';
export { loadConfig } from './config';
export type { PipelineConfig } from './config';
export { createPipeline } from './pipeline';
export type { PipelineOverrides } from './pipeline';
export { createReview, createReviews } from './review';
export type { ReviewInput } from './review';
export { TextNormalizer } from './text/textNormalizer';
export { Classifier } from './analysis/classifier';
export type { Classification } from './analysis/classifier';
export { Translator } from './translation/translator';
export { TranslationCache } from './translation/translationCache';
export { RiskDetector } from './analysis/riskDetector';
export { KeywordExtractor } from './analysis/keywordExtractor';
export { PipelineOrchestrator } from './analysis/pipelineOrchestrator';
export type {
  BatchOptions,
  PipelineComponents,
  PipelineOptions,
} from './analysis/pipelineOrchestrator';
export { BatchAggregator } from './analysis/batchAggregator';
export type { InsightThresholds } from './analysis/batchAggregator';
export { LexiconSentimentModel } from './lexicon/lexiconSentimentModel';
export { GroqClient } from './groq/groqClient';
export { streamReportPdf } from './pdf/reportPdf';
