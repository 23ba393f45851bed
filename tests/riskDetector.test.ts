import { mergeFlags, RiskDetector } from '../src/analysis/riskDetector';
import { normalized } from './helpers';

describe('RiskDetector', () => {
  const detector = new RiskDetector();

  it('merges legal terms into one high-severity flag', () => {
    expect(detector.detectRisks(normalized('Ich schicke Ihnen eine Abmahnung, das ist Betrug!'))).toEqual([
      { category: 'legal', severity: 'high', matchedTerms: ['abmahnung', 'betrug'] },
    ]);
  });

  it('flags a complaint with medium severity', () => {
    expect(detector.detectRisks(normalized('Ich habe eine Reklamation eingereicht.'))).toEqual([
      { category: 'complaint', severity: 'medium', matchedTerms: ['reklamation'] },
    ]);
  });

  it('flags weak terms with low severity', () => {
    expect(detector.detectRisks(normalized('Bezahlt per PayPal, alles okay'))).toEqual([
      { category: 'refund', severity: 'low', matchedTerms: ['paypal'] },
    ]);
  });

  it('lists matched terms in text order', () => {
    expect(
      detector.detectRisks(normalized('Das Kabel hat überhitzt und ich wurde verletzt')),
    ).toEqual([{ category: 'safety', severity: 'high', matchedTerms: ['überhitzt', 'verletzt'] }]);
  });

  it('matches phrases', () => {
    expect(detector.detectRisks(normalized('Leider keine Antwort vom Händler'))).toEqual([
      { category: 'complaint', severity: 'medium', matchedTerms: ['keine antwort'] },
    ]);
  });

  it('matches inflected forms', () => {
    expect(detector.detectRisks(normalized('Mit Klagen wurde gedroht'))).toEqual([
      { category: 'legal', severity: 'high', matchedTerms: ['klage'] },
    ]);
  });

  it('returns flags in category order', () => {
    const flags = detector.detectRisks(normalized('Beschwerde eingereicht, ich will Rückerstattung'));
    expect(flags.map((f) => f.category)).toEqual(['refund', 'complaint']);
  });

  it('gives the same flags for the same text', () => {
    const text = 'Abmahnung wegen Betrug, das Gerät hat überhitzt. Rückerstattung per PayPal!';
    const first = detector.detectRisks(normalized(text));

    expect(first.map((f) => f.category)).toEqual(['legal', 'safety', 'refund']);
    for (let i = 0; i < 3; i++) {
      expect(detector.detectRisks(normalized(text))).toEqual(first);
    }
    expect(new RiskDetector().detectRisks(normalized(text))).toEqual(first);
  });

  it('does not flag everyday nouns that share a legal or service word', () => {
    expect(
      detector.detectRisks(
        normalized('Das Gericht war lecker und der Kundenservice super freundlich'),
      ),
    ).toEqual([]);
    expect(detector.detectRisks(normalized('Die Anzeige am Display ist hell'))).toEqual([]);
  });

  it('flags court and criminal-complaint threats', () => {
    expect(detector.detectRisks(normalized('Wir sehen uns vor Gericht'))).toEqual([
      { category: 'legal', severity: 'high', matchedTerms: ['vor gericht'] },
    ]);
    expect(detector.detectRisks(normalized('Ich werde Strafanzeige stellen'))).toEqual([
      { category: 'legal', severity: 'high', matchedTerms: ['strafanzeige'] },
    ]);
  });

  it('returns no flags for ordinary complaints about the product', () => {
    expect(detector.detectRisks(normalized('Das Paket war kaputt'))).toEqual([]);
  });

  it('escalates severity when negative emoji reach the threshold', () => {
    const text = 'Ich habe eine Reklamation eingereicht.';
    expect(detector.detectRisks(normalized(text, 2))[0].severity).toBe('high');
    expect(detector.detectRisks(normalized(text, 1))[0].severity).toBe('medium');
    expect(detector.detectRisks(normalized('Bezahlt per PayPal', 3))[0].severity).toBe('medium');
  });

  it('does not escalate when the threshold is zero', () => {
    const noEscalation = new RiskDetector({ emojiEscalationThreshold: 0 });
    expect(noEscalation.detectRisks(normalized('Bezahlt per PayPal', 5))[0].severity).toBe('low');
  });

  it('does not escalate without flags', () => {
    expect(detector.detectRisks(normalized('Alles bestens', 4))).toEqual([]);
  });
});

describe('mergeFlags', () => {
  it('keeps the highest severity and unique terms per category', () => {
    expect(
      mergeFlags([
        { category: 'legal', severity: 'low', matchedTerms: ['falsch'] },
        { category: 'legal', severity: 'medium', matchedTerms: ['falsch'] },
      ]),
    ).toEqual([{ category: 'legal', severity: 'medium', matchedTerms: ['falsch'] }]);
  });
});
