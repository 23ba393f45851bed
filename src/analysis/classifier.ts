import { ClassificationUnavailable, toError } from '../errors';
import {
  ASPECT_DIMENSIONS,
  AspectScore,
  InferenceOutput,
  SENTIMENT_LABELS,
  SentimentLabel,
  SentimentModel,
  SentimentResult,
  SentimentWords,
} from '../types';

export const DEFAULT_ASPECT_THRESHOLD = 0.3;
const TIE_MARGIN = 0.01;
// Two-decimal scores such as 0.46 and 0.45 differ by slightly more than 0.01 in floating point.
const TIE_EPSILON = 1e-9;

export type ClassifierOptions = {
  aspectThreshold?: number;
};

export type Classification = {
  sentiment: SentimentResult;
  aspectScores: AspectScore[];
  sentimentWords: SentimentWords;
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function classScoresOf(output: InferenceOutput): Record<SentimentLabel, number> {
  const scores: Record<SentimentLabel, number> = { positive: 0, neutral: 0, negative: 0 };
  if (output.classScores) {
    for (const label of SENTIMENT_LABELS) {
      scores[label] = clamp(output.classScores[label] ?? 0, 0, 1);
    }
  } else {
    scores[output.label] = clamp(output.confidence, 0, 1);
  }
  return scores;
}

/** Positive minus negative class score, in [-1, 1]. */
export function polarityOf(output: InferenceOutput): number {
  const scores = classScoresOf(output);
  return clamp(scores.positive - scores.negative, -1, 1);
}

export function pickSentiment(output: InferenceOutput): SentimentResult {
  const ranked = Object.entries(classScoresOf(output))
    .map(([label, score]) => ({ label, score }))
    .sort((a, b) => b.score - a.score);
  const [top, runnerUp] = ranked;

  const label = SENTIMENT_LABELS.find((l) => l === top.label) ?? 'neutral';
  if (runnerUp && top.score - runnerUp.score <= TIE_MARGIN + TIE_EPSILON) {
    return { label: 'neutral', confidence: round(top.score) };
  }
  return { label, confidence: round(top.score) };
}

export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?;\n]+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

export class Classifier {
  private readonly aspectThreshold: number;

  constructor(
    private readonly model: SentimentModel,
    options: ClassifierOptions = {},
  ) {
    this.aspectThreshold = options.aspectThreshold ?? DEFAULT_ASPECT_THRESHOLD;
  }

  async classify(normalizedText: string): Promise<Classification> {
    const document = await this.infer(normalizedText);
    const sentences = splitSentences(normalizedText);

    const sentenceOutputs =
      sentences.length > 1
        ? await Promise.all(sentences.map((sentence) => this.infer(sentence)))
        : [document];

    return {
      sentiment: pickSentiment(document),
      aspectScores: this.scoreAspects(sentenceOutputs),
      sentimentWords: {
        positive: [...(document.sentimentWords?.positive ?? [])],
        negative: [...(document.sentimentWords?.negative ?? [])],
      },
    };
  }

  private scoreAspects(outputs: InferenceOutput[]): AspectScore[] {
    const aspectScores: AspectScore[] = [];

    for (const dimension of ASPECT_DIMENSIONS) {
      let weight = 0;
      let weightedPolarity = 0;
      let weightedConfidence = 0;

      for (const output of outputs) {
        const evidence = output.dimensionEvidence[dimension];
        if (evidence === undefined || evidence <= this.aspectThreshold) continue;
        weight += evidence;
        weightedPolarity += evidence * polarityOf(output);
        weightedConfidence += evidence * clamp(output.confidence, 0, 1);
      }

      // Dimensions without qualifying evidence are left out, not zero-filled.
      if (weight === 0) continue;
      aspectScores.push({
        dimension,
        score: round(clamp(weightedPolarity / weight, -1, 1)),
        confidence: round(weightedConfidence / weight),
      });
    }
    return aspectScores;
  }

  private async infer(text: string): Promise<InferenceOutput> {
    try {
      return await this.model.infer(text);
    } catch (err) {
      const cause = toError(err);
      throw new ClassificationUnavailable(
        `Sentiment model "${this.model.name}" is unavailable: ${cause.message}`,
        cause,
      );
    }
  }
}
