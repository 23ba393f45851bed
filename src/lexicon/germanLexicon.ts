import { z } from 'zod';
import rawLexicon from '../data/germanLexicon.json';
import { ASPECT_DIMENSIONS, RISK_CATEGORIES } from '../types';

const termList = z.array(z.string().min(1));

const riskDictionarySchema = z.object({
  terms: termList.min(1),
  critical: termList,
  weak: termList,
});

const lexiconSchema = z.object({
  inflectionSuffixes: termList,
  stopwords: termList,
  positiveTerms: termList,
  negativeTerms: termList,
  negators: termList,
  intensifiers: termList,
  aspects: z.object({
    logistics: termList,
    quality: termList,
    price: termList,
    packaging: termList,
    service: termList,
    other: termList,
  }),
  risk: z.object({
    legal: riskDictionarySchema,
    safety: riskDictionarySchema,
    refund: riskDictionarySchema,
    complaint: riskDictionarySchema,
  }),
  negativeEmoji: termList,
});

export type GermanLexicon = z.infer<typeof lexiconSchema>;
export type RiskDictionary = z.infer<typeof riskDictionarySchema>;

export const germanLexicon: GermanLexicon = lexiconSchema.parse(rawLexicon);

// Sanity: every dimension and risk category has an entry.
for (const dimension of ASPECT_DIMENSIONS) {
  if (!germanLexicon.aspects[dimension].length) {
    throw new Error(`Lexicon has no keywords for dimension "${dimension}".`);
  }
}
for (const category of RISK_CATEGORIES) {
  const dictionary = germanLexicon.risk[category];
  const unknown = [...dictionary.critical, ...dictionary.weak].filter(
    (term) => !dictionary.terms.includes(term),
  );
  if (unknown.length) {
    throw new Error(`Risk dictionary "${category}" lists unknown terms: ${unknown.join(', ')}`);
  }
}

const UMLAUT_MAP: Record<string, string> = {
  ä: 'ae',
  ö: 'oe',
  ü: 'ue',
  ß: 'ss',
};

export function foldUmlauts(token: string): string {
  return token.replace(/[äöüß]/g, (ch) => UMLAUT_MAP[ch] ?? ch);
}

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

export type Token = {
  value: string; // lower-cased surface form
  folded: string; // umlauts transliterated, used for matching
  position: number; // index in the token sequence
};

export function tokenize(text: string): Token[] {
  const matches = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  return matches.map((value, position) => ({
    value,
    folded: foldUmlauts(value),
    position,
  }));
}

/**
 * Matches dictionary terms (single words or phrases) against token
 * sequences. A term word matches a token when they are equal or the token
 * is the word plus a regular German inflection suffix.
 */
export class TermMatcher {
  private readonly suffixes: ReadonlySet<string>;

  constructor(suffixes: string[] = germanLexicon.inflectionSuffixes) {
    this.suffixes = new Set(suffixes.map(foldUmlauts));
  }

  wordMatches(token: Token, word: string): boolean {
    const folded = foldUmlauts(word);
    if (token.folded === folded) return true;
    return (
      token.folded.startsWith(folded) &&
      this.suffixes.has(token.folded.slice(folded.length))
    );
  }

  /** Positions at which `term` starts in `tokens`. */
  findAll(tokens: Token[], term: string): number[] {
    const words = tokenize(term).map((t) => t.value);
    if (!words.length) return [];

    const positions: number[] = [];
    for (let i = 0; i + words.length <= tokens.length; i++) {
      if (words.every((word, offset) => this.wordMatches(tokens[i + offset], word))) {
        positions.push(i);
      }
    }
    return positions;
  }

  /** First of `words` that `token` matches. */
  findWord(token: Token, words: Iterable<string>): string | undefined {
    for (const word of words) {
      if (this.wordMatches(token, word)) return word;
    }
    return undefined;
  }
}
