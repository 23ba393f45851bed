import {
  AnalysisResult,
  ASPECT_DIMENSIONS,
  AspectDimension,
  AspectSummary,
  BatchReport,
  KeywordCount,
  RISK_CATEGORIES,
  RiskCategory,
  RiskCategorySummary,
  SentimentDistribution,
} from '../types';

export type InsightThresholds = {
  positiveShare: number;
  negativeShare: number;
  riskShare: Record<RiskCategory, number>;
  negativeAspectMean: number;
  positiveAspectMean: number;
  minAspectReviews: number;
};

export const DEFAULT_INSIGHT_THRESHOLDS: InsightThresholds = {
  positiveShare: 0.6,
  negativeShare: 0.4,
  riskShare: { legal: 0.05, safety: 0.05, refund: 0.1, complaint: 0.1 },
  negativeAspectMean: -0.3,
  positiveAspectMean: 0.5,
  minAspectReviews: 5,
};

export const DEFAULT_TOP_KEYWORD_LIMIT = 10;
const POSITIVE_ASPECT_SCORE = 0.2;

export type BatchAggregatorOptions = {
  thresholds?: Partial<Omit<InsightThresholds, 'riskShare'>> & {
    riskShare?: Partial<Record<RiskCategory, number>>;
  };
  topKeywordLimit?: number;
  now?: () => Date;
};

export type AggregateContext = {
  skippedCount?: number;
};

function percent(part: number, whole: number): string {
  return ((part / whole) * 100).toFixed(1);
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function emptyCategorySummary(): RiskCategorySummary {
  return { total: 0, bySeverity: { low: 0, medium: 0, high: 0 } };
}

function emptyRiskSummary(): Record<RiskCategory, RiskCategorySummary> {
  return {
    legal: emptyCategorySummary(),
    safety: emptyCategorySummary(),
    refund: emptyCategorySummary(),
    complaint: emptyCategorySummary(),
  };
}

export class BatchAggregator {
  private readonly thresholds: InsightThresholds;
  private readonly topKeywordLimit: number;
  private readonly now: () => Date;

  constructor(options: BatchAggregatorOptions = {}) {
    this.thresholds = {
      ...DEFAULT_INSIGHT_THRESHOLDS,
      ...options.thresholds,
      riskShare: {
        ...DEFAULT_INSIGHT_THRESHOLDS.riskShare,
        ...options.thresholds?.riskShare,
      },
    };
    this.topKeywordLimit = options.topKeywordLimit ?? DEFAULT_TOP_KEYWORD_LIMIT;
    this.now = options.now ?? (() => new Date());
  }

  aggregate(
    results: ReadonlyArray<AnalysisResult>,
    context: AggregateContext = {},
  ): BatchReport {
    const skippedCount = context.skippedCount ?? 0;
    const finalized = results.filter((r) => r.status === 'finalized');
    const failedCount = results.length - finalized.length;
    const partialCount = finalized.filter((r) => r.errors.length > 0).length;

    const sentimentDistribution: SentimentDistribution = {
      positive: 0,
      neutral: 0,
      negative: 0,
    };
    let confidenceSum = 0;
    let withSentiment = 0;
    for (const result of finalized) {
      if (!result.sentiment) continue;
      sentimentDistribution[result.sentiment.label] += 1;
      confidenceSum += result.sentiment.confidence;
      withSentiment += 1;
    }

    const riskSummary = emptyRiskSummary();
    for (const result of results) {
      for (const flag of result.riskFlags) {
        riskSummary[flag.category].total += 1;
        riskSummary[flag.category].bySeverity[flag.severity] += 1;
      }
    }

    const seenHashes = new Set<string>();
    let duplicateCount = 0;
    for (const result of finalized) {
      if (!result.contentHash) continue;
      if (seenHashes.has(result.contentHash)) duplicateCount += 1;
      else seenHashes.add(result.contentHash);
    }

    const aspectSummary = this.summarizeAspects(finalized);

    return {
      totalReviews: results.length + skippedCount,
      finalizedCount: finalized.length,
      failedCount,
      partialCount,
      skippedCount,
      duplicateCount,
      sentimentDistribution,
      averageConfidence: withSentiment ? round(confidenceSum / withSentiment) : 0,
      riskSummary,
      aspectSummary,
      topKeywords: this.rankTerms(results.map((r) => r.keywords)),
      topPositiveTerms: this.rankTerms(finalized.map((r) => r.sentimentWords?.positive ?? [])),
      topNegativeTerms: this.rankTerms(finalized.map((r) => r.sentimentWords?.negative ?? [])),
      keyInsights: this.buildInsights({
        total: results.length + skippedCount,
        fullyAnalyzed: finalized.length - partialCount,
        sentimentDistribution,
        riskSummary,
        aspectSummary,
      }),
      generatedAt: this.now().toISOString(),
    };
  }

  private summarizeAspects(
    results: AnalysisResult[],
  ): Partial<Record<AspectDimension, AspectSummary>> {
    const scores = new Map<AspectDimension, number[]>();
    for (const result of results) {
      for (const aspect of result.aspectScores) {
        const list = scores.get(aspect.dimension) ?? [];
        list.push(aspect.score);
        scores.set(aspect.dimension, list);
      }
    }

    const summary: Partial<Record<AspectDimension, AspectSummary>> = {};
    for (const dimension of ASPECT_DIMENSIONS) {
      const list = scores.get(dimension);
      if (!list?.length) continue;
      const positives = list.filter((s) => s > POSITIVE_ASPECT_SCORE).length;
      summary[dimension] = {
        meanScore: round(list.reduce((a, b) => a + b, 0) / list.length),
        count: list.length,
        positiveRate: Number(percent(positives, list.length)),
      };
    }
    return summary;
  }

  // Every appearance in a per-result list counts once.
  private rankTerms(lists: ReadonlyArray<ReadonlyArray<string>>): KeywordCount[] {
    const stats = new Map<string, { count: number; firstSeen: number }>();
    let position = 0;
    for (const list of lists) {
      for (const term of list) {
        const entry = stats.get(term);
        if (entry) entry.count += 1;
        else stats.set(term, { count: 1, firstSeen: position });
        position += 1;
      }
    }

    return [...stats.entries()]
      .sort(([, a], [, b]) => b.count - a.count || a.firstSeen - b.firstSeen)
      .slice(0, this.topKeywordLimit)
      .map(([term, { count }]) => ({ term, count }));
  }

  private buildInsights(input: {
    total: number;
    fullyAnalyzed: number;
    sentimentDistribution: SentimentDistribution;
    riskSummary: Record<RiskCategory, RiskCategorySummary>;
    aspectSummary: Partial<Record<AspectDimension, AspectSummary>>;
  }): string[] {
    const insights: string[] = [];
    const t = this.thresholds;
    const { total } = input;

    // Shares are taken over every review in the batch, failed and skipped included.
    if (total > 0) {
      const { positive, negative } = input.sentimentDistribution;
      if (positive / total > t.positiveShare) {
        insights.push(
          `Overall sentiment is positive: ${percent(positive, total)}% of reviews are positive`,
        );
      } else if (negative / total > t.negativeShare) {
        insights.push(
          `High share of negative reviews: ${percent(negative, total)}% of reviews are negative`,
        );
      }

      for (const category of RISK_CATEGORIES) {
        const flagged = input.riskSummary[category].total;
        if (flagged / total > t.riskShare[category]) {
          insights.push(
            `Elevated ${category}-risk signal detected in ${percent(flagged, total)}% of reviews`,
          );
        }
      }
    }

    for (const dimension of ASPECT_DIMENSIONS) {
      const stats = input.aspectSummary[dimension];
      if (!stats || stats.count < t.minAspectReviews) continue;
      if (stats.meanScore < t.negativeAspectMean) {
        insights.push(`Negative sentiment concentrated in ${dimension}`);
      } else if (stats.meanScore > t.positiveAspectMean) {
        insights.push(`Positive sentiment concentrated in ${dimension}`);
      }
    }

    if (input.fullyAnalyzed < input.total) {
      insights.push(`Fully analyzed ${input.fullyAnalyzed} of ${input.total} reviews`);
    }
    return insights;
  }
}
