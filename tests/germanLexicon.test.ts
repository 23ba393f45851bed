import { foldUmlauts, germanLexicon, TermMatcher, tokenize } from '../src/lexicon/germanLexicon';
import { ASPECT_DIMENSIONS, RISK_CATEGORIES } from '../src/types';

describe('germanLexicon', () => {
  it('has keywords for every aspect dimension and risk category', () => {
    for (const dimension of ASPECT_DIMENSIONS) {
      expect(germanLexicon.aspects[dimension].length).toBeGreaterThan(0);
    }
    for (const category of RISK_CATEGORIES) {
      expect(germanLexicon.risk[category].terms.length).toBeGreaterThan(0);
    }
  });
});

describe('tokenize', () => {
  it('lower-cases and splits on non-word characters', () => {
    expect(tokenize('Preis-Leistung: 10/10!').map((t) => t.value)).toEqual([
      'preis',
      'leistung',
      '10',
      '10',
    ]);
  });

  it('folds umlauts', () => {
    expect(foldUmlauts('größe')).toBe('groesse');
    expect(tokenize('Rückerstattung')[0].folded).toBe('rueckerstattung');
  });
});

describe('TermMatcher', () => {
  const matcher = new TermMatcher();

  it('matches inflected forms', () => {
    const [token] = tokenize('Lieferungen');
    expect(matcher.wordMatches(token, 'lieferung')).toBe(true);
  });

  it('does not match compounds', () => {
    const [token] = tokenize('Lieferungsschein');
    expect(matcher.wordMatches(token, 'lieferung')).toBe(false);
  });

  it('matches transliterated umlauts', () => {
    const [token] = tokenize('Rueckerstattung');
    expect(matcher.wordMatches(token, 'rückerstattung')).toBe(true);
  });

  it('finds every start position of a phrase', () => {
    const tokens = tokenize('Nie wieder bestellen, nie wieder!');
    expect(matcher.findAll(tokens, 'nie wieder')).toEqual([0, 3]);
  });
});
