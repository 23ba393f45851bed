import { BatchAggregator } from '../src/analysis/batchAggregator';
import { Classifier } from '../src/analysis/classifier';
import { KeywordExtractor } from '../src/analysis/keywordExtractor';
import { PipelineComponents } from '../src/analysis/pipelineOrchestrator';
import { RiskDetector } from '../src/analysis/riskDetector';
import { LexiconSentimentModel } from '../src/lexicon/lexiconSentimentModel';
import { createReview } from '../src/review';
import { TextNormalizer } from '../src/text/textNormalizer';
import { TranslationCache } from '../src/translation/translationCache';
import { Translator } from '../src/translation/translator';
import {
  AnalysisResult,
  InferenceOutput,
  NormalizedText,
  Review,
  SentimentModel,
  TranslationBackend,
} from '../src/types';

export const FIXED_NOW = new Date('2025-03-01T12:00:00Z');

export function review(id: string, rawText: string): Review {
  return createReview({ id, rawText }, FIXED_NOW);
}

export function normalized(text: string, negativeEmojiCount = 0): NormalizedText {
  return { text, emojiCount: negativeEmojiCount, negativeEmojiCount, contentHash: `hash-${text}` };
}

export class FakeSentimentModel implements SentimentModel {
  public readonly name = 'fake-model';
  public calls: string[] = [];

  constructor(private readonly respond: (text: string) => InferenceOutput | Promise<InferenceOutput>) {}

  async infer(text: string): Promise<InferenceOutput> {
    this.calls.push(text);
    return this.respond(text);
  }
}

export class FakeTranslationBackend implements TranslationBackend {
  public readonly name = 'fake-translator';
  public calls: Array<{ text: string; targetLanguage: string }> = [];

  constructor(
    private readonly respond: (text: string, targetLanguage: string) => Promise<string> = async (
      text,
      targetLanguage,
    ) => `[${targetLanguage}] ${text}`,
  ) {}

  async translate(text: string, targetLanguage: string): Promise<string> {
    this.calls.push({ text, targetLanguage });
    return this.respond(text, targetLanguage);
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function buildComponents(
  overrides: {
    model?: SentimentModel;
    translationBackend?: TranslationBackend;
  } = {},
): PipelineComponents {
  return {
    normalizer: new TextNormalizer(),
    classifier: new Classifier(overrides.model ?? new LexiconSentimentModel()),
    translator: overrides.translationBackend
      ? new Translator(overrides.translationBackend, new TranslationCache())
      : undefined,
    riskDetector: new RiskDetector(),
    keywordExtractor: new KeywordExtractor(),
    aggregator: new BatchAggregator({ now: () => FIXED_NOW }),
  };
}

export function result(overrides: Partial<AnalysisResult> & { reviewId: string }): AnalysisResult {
  return {
    status: 'finalized',
    contentHash: `hash-${overrides.reviewId}`,
    sentiment: { label: 'neutral', confidence: 0.5 },
    aspectScores: [],
    riskFlags: [],
    keywords: [],
    errors: [],
    ...overrides,
  };
}
