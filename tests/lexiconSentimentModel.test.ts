import { LexiconSentimentModel } from '../src/lexicon/lexiconSentimentModel';

describe('LexiconSentimentModel', () => {
  const model = new LexiconSentimentModel();

  it('scores an intensified negative review', async () => {
    const output = await model.infer('Die Lieferung war sehr langsam und das Produkt ist kaputt.');
    expect(output.label).toBe('negative');
    expect(output.confidence).toBeCloseTo(0.8333, 4);
    expect(output.classScores?.neutral).toBeCloseTo(0.1667, 4);
    expect(output.dimensionEvidence).toEqual({ logistics: 0.5, quality: 0.5 });
    expect(output.sentimentWords).toEqual({ positive: [], negative: ['langsam', 'kaputt'] });
  });

  it('scores a positive review', async () => {
    const output = await model.infer('Super Qualität, schnelle Lieferung!');
    expect(output.label).toBe('positive');
    expect(output.confidence).toBeCloseTo(0.8, 4);
    expect(output.dimensionEvidence).toEqual({ logistics: 0.5, quality: 0.5 });
    expect(output.sentimentWords).toEqual({ positive: ['super', 'schnell'], negative: [] });
  });

  it('flips polarity after a negator', async () => {
    const output = await model.infer('Das ist nicht gut');
    expect(output.label).toBe('negative');
    expect(output.confidence).toBeCloseTo(0.6667, 4);
    expect(output.sentimentWords).toEqual({ positive: [], negative: [] });
  });

  it('boosts words after an intensifier', async () => {
    const output = await model.infer('sehr gut');
    expect(output.label).toBe('positive');
    expect(output.confidence).toBeCloseTo(0.75, 4);
  });

  it('is neutral without sentiment words', async () => {
    const output = await model.infer('Das Produkt kam am Dienstag');
    expect(output.label).toBe('neutral');
    expect(output.confidence).toBe(1);
  });

  it('grows dimension evidence with repeated keywords', () => {
    expect(model.dimensionEvidence('Verpackung und Karton')).toEqual({ packaging: 2 / 3 });
  });
});
