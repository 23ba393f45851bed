import {
  ASPECT_DIMENSIONS,
  DimensionEvidence,
  InferenceOutput,
  SentimentLabel,
  SentimentModel,
  SentimentWords,
} from '../types';
import { GermanLexicon, germanLexicon, TermMatcher, tokenize } from './germanLexicon';

const NEGATION_WINDOW = 3;
const INTENSIFIER_WEIGHT = 1.5;
const NEUTRAL_PRIOR = 0.5;

type Polarity = 'positive' | 'negative';

export type PolarityMass = {
  positive: number;
  negative: number;
  words: SentimentWords;
};

/**
 * Offline sentiment/aspect backend. Scores sentiment words with a
 * three-token negation window and intensifier boost; aspect evidence is
 * hits / (hits + 1) over the dimension's keyword list.
 */
export class LexiconSentimentModel implements SentimentModel {
  public readonly name = 'lexicon';
  private readonly matcher: TermMatcher;

  constructor(private readonly lexicon: GermanLexicon = germanLexicon) {
    this.matcher = new TermMatcher(lexicon.inflectionSuffixes);
  }

  async infer(text: string): Promise<InferenceOutput> {
    const mass = this.polarityMass(text);
    const denominator = mass.positive + mass.negative + NEUTRAL_PRIOR;
    const classScores: Record<SentimentLabel, number> = {
      positive: mass.positive / denominator,
      neutral: NEUTRAL_PRIOR / denominator,
      negative: mass.negative / denominator,
    };

    let label: SentimentLabel = 'neutral';
    if (classScores.positive > classScores[label]) label = 'positive';
    if (classScores.negative > classScores[label]) label = 'negative';

    return {
      label,
      confidence: classScores[label],
      classScores,
      dimensionEvidence: this.dimensionEvidence(text),
      sentimentWords: mass.words,
    };
  }

  /**
   * Weighted positive and negative mass, plus the lexicon terms behind it.
   * Negated occurrences count toward the opposite mass but are not listed
   * as words.
   */
  polarityMass(text: string): PolarityMass {
    const tokens = tokenize(text);
    const mass: PolarityMass = { positive: 0, negative: 0, words: { positive: [], negative: [] } };

    tokens.forEach((token, i) => {
      const positiveTerm = this.matcher.findWord(token, this.lexicon.positiveTerms);
      const term = positiveTerm ?? this.matcher.findWord(token, this.lexicon.negativeTerms);
      if (term === undefined) return;
      const polarity: Polarity = positiveTerm !== undefined ? 'positive' : 'negative';

      const previous = tokens[i - 1];
      const weight =
        previous && this.lexicon.intensifiers.includes(previous.value)
          ? INTENSIFIER_WEIGHT
          : 1;

      const window = tokens.slice(Math.max(0, i - NEGATION_WINDOW), i);
      if (window.some((t) => this.lexicon.negators.includes(t.value))) {
        mass[polarity === 'positive' ? 'negative' : 'positive'] += weight;
        return;
      }

      mass[polarity] += weight;
      if (!mass.words[polarity].includes(term)) mass.words[polarity].push(term);
    });

    return mass;
  }

  dimensionEvidence(text: string): DimensionEvidence {
    const tokens = tokenize(text);
    const evidence: DimensionEvidence = {};

    for (const dimension of ASPECT_DIMENSIONS) {
      const keywords = this.lexicon.aspects[dimension];
      const hits = keywords.reduce(
        (sum, keyword) => sum + this.matcher.findAll(tokens, keyword).length,
        0,
      );
      if (hits > 0) {
        evidence[dimension] = hits / (hits + 1);
      }
    }
    return evidence;
  }
}
