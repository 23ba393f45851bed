import { foldUmlauts, germanLexicon, tokenize } from '../lexicon/germanLexicon';

export const DEFAULT_KEYWORD_LIMIT = 10;
const MIN_KEYWORD_LENGTH = 3;

export class KeywordExtractor {
  private readonly stopwords: ReadonlySet<string>;

  constructor(stopwords: string[] = germanLexicon.stopwords) {
    this.stopwords = new Set(stopwords.map(foldUmlauts));
  }

  /**
   * Terms ranked by frequency within the text, ties broken by first
   * occurrence.
   */
  extractKeywords(normalizedText: string, limit = DEFAULT_KEYWORD_LIMIT): string[] {
    if (limit <= 0) return [];

    const stats = new Map<string, { count: number; firstSeen: number }>();
    for (const token of tokenize(normalizedText)) {
      if (token.value.length < MIN_KEYWORD_LENGTH) continue;
      if (/^\d+$/.test(token.value)) continue;
      if (this.stopwords.has(token.folded)) continue;

      const entry = stats.get(token.value);
      if (entry) entry.count += 1;
      else stats.set(token.value, { count: 1, firstSeen: token.position });
    }

    return [...stats.entries()]
      .sort(([, a], [, b]) => b.count - a.count || a.firstSeen - b.firstSeen)
      .slice(0, limit)
      .map(([term]) => term);
  }
}
