import { germanLexicon, RiskDictionary, TermMatcher, tokenize } from '../lexicon/germanLexicon';
import {
  NormalizedText,
  RISK_CATEGORIES,
  RISK_SEVERITIES,
  RiskCategory,
  RiskFlag,
  RiskSeverity,
} from '../types';

export const DEFAULT_EMOJI_ESCALATION_THRESHOLD = 2;

export type RiskDetectorOptions = {
  dictionaries?: Record<RiskCategory, RiskDictionary>;
  emojiEscalationThreshold?: number;
};

type TermMatch = {
  category: RiskCategory;
  term: string;
  position: number;
  severity: RiskSeverity;
};

function severityRank(severity: RiskSeverity): number {
  return RISK_SEVERITIES.indexOf(severity);
}

function maxSeverity(a: RiskSeverity, b: RiskSeverity): RiskSeverity {
  return severityRank(a) >= severityRank(b) ? a : b;
}

function escalate(severity: RiskSeverity): RiskSeverity {
  return RISK_SEVERITIES[Math.min(severityRank(severity) + 1, RISK_SEVERITIES.length - 1)];
}

/**
 * Merges flags of the same category: union of matched terms (first-seen
 * order) and the highest severity. Two or more distinct terms make a flag
 * high severity.
 */
export function mergeFlags(flags: RiskFlag[]): RiskFlag[] {
  const merged = new Map<RiskCategory, RiskFlag>();

  for (const flag of flags) {
    const existing = merged.get(flag.category);
    if (!existing) {
      merged.set(flag.category, { ...flag, matchedTerms: [...flag.matchedTerms] });
      continue;
    }
    for (const term of flag.matchedTerms) {
      if (!existing.matchedTerms.includes(term)) existing.matchedTerms.push(term);
    }
    existing.severity = maxSeverity(existing.severity, flag.severity);
  }

  return RISK_CATEGORIES.flatMap((category) => {
    const flag = merged.get(category);
    if (!flag || !flag.matchedTerms.length) return [];
    if (flag.matchedTerms.length >= 2) flag.severity = 'high';
    return [flag];
  });
}

export class RiskDetector {
  private readonly dictionaries: Record<RiskCategory, RiskDictionary>;
  private readonly emojiEscalationThreshold: number;
  private readonly matcher = new TermMatcher();

  constructor(options: RiskDetectorOptions = {}) {
    this.dictionaries = options.dictionaries ?? germanLexicon.risk;
    this.emojiEscalationThreshold =
      options.emojiEscalationThreshold ?? DEFAULT_EMOJI_ESCALATION_THRESHOLD;
  }

  detectRisks(normalized: NormalizedText): RiskFlag[] {
    const matches = this.findMatches(normalized.text);

    const flags = mergeFlags(
      matches.map((match) => ({
        category: match.category,
        severity: match.severity,
        matchedTerms: [match.term],
      })),
    );

    if (
      this.emojiEscalationThreshold > 0 &&
      normalized.negativeEmojiCount >= this.emojiEscalationThreshold
    ) {
      for (const flag of flags) flag.severity = escalate(flag.severity);
    }
    return flags;
  }

  private findMatches(text: string): TermMatch[] {
    const tokens = tokenize(text);
    const matches: TermMatch[] = [];

    for (const category of RISK_CATEGORIES) {
      const dictionary = this.dictionaries[category];
      for (const term of dictionary.terms) {
        const positions = this.matcher.findAll(tokens, term);
        if (!positions.length) continue;
        matches.push({
          category,
          term,
          position: positions[0],
          severity: dictionary.critical.includes(term)
            ? 'high'
            : dictionary.weak.includes(term)
              ? 'low'
              : 'medium',
        });
      }
    }

    // Stable sort keeps dictionary order for terms starting at the same token.
    return matches.sort((a, b) => a.position - b.position);
  }
}
