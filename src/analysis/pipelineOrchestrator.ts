import { ErrorCode, PipelineError, StageTimeoutError, toError } from '../errors';
import { categoryLogger, LogCategory } from '../logger';
import { TextNormalizer } from '../text/textNormalizer';
import { Translator } from '../translation/translator';
import {
  AnalysisResult,
  BatchAnalysis,
  NormalizedText,
  PipelineStage,
  Review,
  ReviewStatus,
  StageError,
} from '../types';
import { DEFAULT_STAGE_TIMEOUT_MS, withTimeout } from '../util/withTimeout';
import { BatchAggregator } from './batchAggregator';
import { Classifier } from './classifier';
import { DEFAULT_KEYWORD_LIMIT, KeywordExtractor } from './keywordExtractor';
import { RiskDetector } from './riskDetector';

const log = categoryLogger(LogCategory.PIPELINE);

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_TARGET_LANGUAGE = 'en';

export type PipelineComponents = {
  normalizer: TextNormalizer;
  classifier: Classifier;
  translator?: Translator; // absent: translation disabled
  riskDetector: RiskDetector;
  keywordExtractor: KeywordExtractor;
  aggregator: BatchAggregator;
};

export type StatusListener = (reviewId: string, status: ReviewStatus) => void;

export type PipelineOptions = {
  targetLanguage?: string;
  keywordLimit?: number;
  stageTimeoutMs?: number;
  concurrency?: number;
  onStatusChange?: StatusListener;
};

export type BatchOptions = {
  signal?: AbortSignal;
};

type StageOutcome<T> = { ok: true; value: T } | { ok: false; error: StageError };

const ABORTED = Symbol('aborted');

const UNAVAILABLE_CODES: Partial<Record<PipelineStage, ErrorCode>> = {
  classification: ErrorCode.CLASSIFICATION_UNAVAILABLE,
  translation: ErrorCode.TRANSLATION_UNAVAILABLE,
};

function freezeResult(result: AnalysisResult): AnalysisResult {
  if (result.sentiment) Object.freeze(result.sentiment);
  result.aspectScores.forEach((a) => Object.freeze(a));
  if (result.sentimentWords) {
    Object.freeze(result.sentimentWords.positive);
    Object.freeze(result.sentimentWords.negative);
    Object.freeze(result.sentimentWords);
  }
  result.riskFlags.forEach((f) => {
    Object.freeze(f.matchedTerms);
    Object.freeze(f);
  });
  result.errors.forEach((e) => Object.freeze(e));
  Object.freeze(result.aspectScores);
  Object.freeze(result.riskFlags);
  Object.freeze(result.keywords);
  Object.freeze(result.errors);
  return Object.freeze(result);
}

function toStageError(stage: PipelineStage, err: unknown): StageError {
  if (err instanceof StageTimeoutError) {
    return {
      stage,
      code: UNAVAILABLE_CODES[stage] ?? ErrorCode.STAGE_TIMEOUT,
      message: err.message,
    };
  }
  if (err instanceof PipelineError) {
    return { stage, code: err.code, message: err.message };
  }
  return { stage, code: ErrorCode.STAGE_FAILED, message: toError(err).message };
}

/**
 * Runs one review through normalization and the four analysis stages, or a
 * batch of reviews with bounded concurrency. Item-level failures end up in
 * `AnalysisResult.errors`; nothing item-level is thrown to the caller.
 */
export class PipelineOrchestrator {
  private readonly targetLanguage: string;
  private readonly keywordLimit: number;
  private readonly stageTimeoutMs: number;
  private readonly concurrency: number;
  private readonly onStatusChange?: StatusListener;

  constructor(
    private readonly components: PipelineComponents,
    options: PipelineOptions = {},
  ) {
    this.targetLanguage = options.targetLanguage ?? DEFAULT_TARGET_LANGUAGE;
    this.keywordLimit = options.keywordLimit ?? DEFAULT_KEYWORD_LIMIT;
    this.stageTimeoutMs = options.stageTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
    this.onStatusChange = options.onStatusChange;
  }

  async analyzeReview(review: Review): Promise<AnalysisResult> {
    this.transition(review.id, 'pending');
    this.transition(review.id, 'normalizing');

    let normalized: NormalizedText;
    try {
      normalized = this.components.normalizer.normalize(review.rawText);
    } catch (err) {
      const error = err instanceof PipelineError ? err.toStageError() : toStageError('normalization', err);
      log.warn(`Normalization failed: ${error.message}`, { reviewId: review.id });
      this.transition(review.id, 'failed');
      return freezeResult({
        reviewId: review.id,
        status: 'failed',
        aspectScores: [],
        riskFlags: [],
        keywords: [],
        errors: [error],
      });
    }

    this.transition(review.id, 'analyzing');
    const { text } = normalized;
    const { classifier, translator, riskDetector, keywordExtractor } = this.components;

    const [classification, translation, keywords, risks] = await Promise.all([
      this.runStage(review, 'classification', () => classifier.classify(text)),
      this.runStage(review, 'translation', async () =>
        translator
          ? translator.translate(text, this.targetLanguage, review.sourceLanguage)
          : undefined,
      ),
      this.runStage(review, 'keywords', () =>
        keywordExtractor.extractKeywords(text, this.keywordLimit),
      ),
      this.runStage(review, 'risk', () => riskDetector.detectRisks(normalized)),
    ]);

    const errors: StageError[] = [];
    for (const outcome of [classification, translation, keywords, risks]) {
      if (!outcome.ok) errors.push(outcome.error);
    }

    const translatedText = translation.ok ? translation.value : undefined;
    const result = freezeResult({
      reviewId: review.id,
      status: 'finalized',
      contentHash: normalized.contentHash,
      sentiment: classification.ok ? { ...classification.value.sentiment } : undefined,
      aspectScores: classification.ok
        ? classification.value.aspectScores.map((a) => ({ ...a }))
        : [],
      sentimentWords: classification.ok ? classification.value.sentimentWords : undefined,
      riskFlags: risks.ok
        ? risks.value.map((f) => ({ ...f, matchedTerms: [...f.matchedTerms] }))
        : [],
      translatedText,
      targetLanguage: translatedText !== undefined ? this.targetLanguage : undefined,
      keywords: keywords.ok ? [...keywords.value] : [],
      errors,
    });

    this.transition(review.id, 'finalized');
    return result;
  }

  /**
   * Analyzes `reviews` with at most `concurrency` items in flight. On abort,
   * no new items start and items still in flight are dropped; everything
   * already finalized is kept and aggregated.
   */
  async analyzeBatch(
    reviews: ReadonlyArray<Review>,
    options: BatchOptions = {},
  ): Promise<BatchAnalysis> {
    const { signal } = options;
    const started = Date.now();
    log.info(`Analyzing batch of ${reviews.length} reviews (concurrency ${this.concurrency})`);

    let detach = (): void => undefined;
    const aborted = new Promise<typeof ABORTED>((resolve) => {
      if (!signal) return;
      const onAbort = (): void => resolve(ABORTED);
      signal.addEventListener('abort', onAbort, { once: true });
      detach = () => signal.removeEventListener('abort', onAbort);
    });

    const slots: Array<AnalysisResult | undefined> = new Array(reviews.length);
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < reviews.length && !signal?.aborted) {
        const index = cursor++;
        const outcome = await Promise.race([this.analyzeReview(reviews[index]), aborted]);
        if (outcome === ABORTED) return;
        slots[index] = outcome;
      }
    };

    try {
      const workers = Math.min(this.concurrency, reviews.length);
      await Promise.all(Array.from({ length: workers }, () => worker()));
    } finally {
      detach();
    }

    const results = slots.filter((r): r is AnalysisResult => r !== undefined);
    const cancelled = signal?.aborted ?? false;
    const report = this.components.aggregator.aggregate(results, {
      skippedCount: reviews.length - results.length,
    });

    log.info(
      `Batch done in ${Date.now() - started}ms: ${report.finalizedCount} finalized, ` +
        `${report.failedCount} failed, ${report.partialCount} partial, ${report.skippedCount} skipped`,
    );
    if (cancelled) log.warn('Batch was cancelled; unfinished reviews were skipped.');

    return { report, results, cancelled };
  }

  private async runStage<T>(
    review: Review,
    stage: PipelineStage,
    work: () => T | Promise<T>,
  ): Promise<StageOutcome<T>> {
    try {
      const value = await withTimeout(
        Promise.resolve().then(work),
        this.stageTimeoutMs,
        stage,
      );
      return { ok: true, value };
    } catch (err) {
      const error = toStageError(stage, err);
      log.warn(`Stage ${stage} failed: ${error.message}`, { reviewId: review.id });
      return { ok: false, error };
    }
  }

  private transition(reviewId: string, status: ReviewStatus): void {
    if (!this.onStatusChange) return;
    try {
      this.onStatusChange(reviewId, status);
    } catch (err) {
      log.warn(`Status listener threw: ${toError(err).message}`, { reviewId });
    }
  }
}
