import { BatchAggregator } from './analysis/batchAggregator';
import { Classifier } from './analysis/classifier';
import { KeywordExtractor } from './analysis/keywordExtractor';
import { PipelineOrchestrator, StatusListener } from './analysis/pipelineOrchestrator';
import { RiskDetector } from './analysis/riskDetector';
import { PipelineConfig } from './config';
import { GroqClient } from './groq/groqClient';
import { LexiconSentimentModel } from './lexicon/lexiconSentimentModel';
import { categoryLogger, LogCategory } from './logger';
import { TextNormalizer } from './text/textNormalizer';
import { TranslationCache } from './translation/translationCache';
import { Translator } from './translation/translator';
import { SentimentModel, TranslationBackend } from './types';

const log = categoryLogger(LogCategory.PIPELINE);

export type PipelineOverrides = {
  sentimentModel?: SentimentModel;
  translationBackend?: TranslationBackend;
  translationCache?: TranslationCache;
  onStatusChange?: StatusListener;
};

function selectSentimentModel(config: PipelineConfig, groq?: GroqClient): SentimentModel {
  if (config.sentimentBackend === 'groq' && groq) return groq;
  return new LexiconSentimentModel();
}

/** Wires an orchestrator from configuration; overrides replace the backends. */
export function createPipeline(
  config: PipelineConfig,
  overrides: PipelineOverrides = {},
): PipelineOrchestrator {
  const groq = config.groq.apiKey
    ? new GroqClient({
        apiKey: config.groq.apiKey,
        model: config.groq.model,
        timeoutMs: config.groq.timeoutMs,
      })
    : undefined;

  const sentimentModel = overrides.sentimentModel ?? selectSentimentModel(config, groq);
  const translationBackend = overrides.translationBackend ?? groq;

  let translator: Translator | undefined;
  if (config.translationEnabled && translationBackend) {
    translator = new Translator(
      translationBackend,
      overrides.translationCache ?? new TranslationCache(config.translationCacheSize),
    );
  } else if (config.translationEnabled) {
    log.warn('Translation is enabled but no translation backend is configured (GROQ_API_KEY); skipping it.');
  }

  log.debug(
    `Pipeline: sentiment=${sentimentModel.name}, translation=${translator?.backendName ?? 'off'}`,
  );

  return new PipelineOrchestrator(
    {
      normalizer: new TextNormalizer({ stripEmoji: config.stripEmoji }),
      classifier: new Classifier(sentimentModel, { aspectThreshold: config.aspectThreshold }),
      translator,
      riskDetector: new RiskDetector({
        emojiEscalationThreshold: config.emojiEscalationThreshold,
      }),
      keywordExtractor: new KeywordExtractor(),
      aggregator: new BatchAggregator({ topKeywordLimit: config.topKeywordLimit }),
    },
    {
      targetLanguage: config.targetLanguage,
      keywordLimit: config.keywordLimit,
      stageTimeoutMs: config.stageTimeoutMs,
      concurrency: config.concurrency,
      onStatusChange: overrides.onStatusChange,
    },
  );
}
