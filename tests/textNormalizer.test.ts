import { EmptyInputError, ErrorCode } from '../src/errors';
import { contentHash, decodeHtmlEntities, TextNormalizer } from '../src/text/textNormalizer';

describe('TextNormalizer', () => {
  const normalizer = new TextNormalizer();

  it('decodes entities and strips markup', () => {
    const result = normalizer.normalize('Tolle &Uuml;berraschung &amp; <b>schnell</b> geliefert');
    expect(result.text).toBe('Tolle Überraschung & schnell geliefert');
  });

  it('removes URLs and e-mail addresses', () => {
    const result = normalizer.normalize(
      'Siehe https://shop.example.de/p/1 und mail an info@shop.example.de bitte',
    );
    expect(result.text).toBe('Siehe und mail an bitte');
  });

  it('counts and strips emoji', () => {
    const result = normalizer.normalize('Kaputt angekommen 😡😡 👍');
    expect(result.text).toBe('Kaputt angekommen');
    expect(result.emojiCount).toBe(3);
    expect(result.negativeEmojiCount).toBe(2);
  });

  it('keeps emoji when stripping is turned off', () => {
    const keeping = new TextNormalizer({ stripEmoji: false });
    const result = keeping.normalize('Super 👍');
    expect(result.text).toBe('Super 👍');
    expect(result.emojiCount).toBe(1);
    expect(result.negativeEmojiCount).toBe(0);
  });

  it('throws EmptyInputError when nothing is left', () => {
    expect(() => normalizer.normalize('   ')).toThrow(EmptyInputError);
    expect(() => normalizer.normalize('😡😡')).toThrow(EmptyInputError);
    expect(() => normalizer.normalize('<br/>')).toThrow(EmptyInputError);
  });

  it('reports the normalization stage on empty input', () => {
    let caught: unknown;
    try {
      normalizer.normalize('');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EmptyInputError);
    if (caught instanceof EmptyInputError) {
      expect(caught.toStageError()).toEqual({
        stage: 'normalization',
        code: ErrorCode.EMPTY_INPUT,
        message: 'Review text is empty after normalization.',
      });
    }
  });

  it('hashes the normalized text', () => {
    const a = normalizer.normalize('Gut  verpackt');
    const b = normalizer.normalize(' Gut verpackt ');
    expect(a.contentHash).toBe(b.contentHash);
    expect(a.contentHash).toBe(contentHash('Gut verpackt'));
    expect(a.contentHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is idempotent on normalized text', () => {
    const once = normalizer.normalize('Sehr  gut &amp; <i>günstig</i>');
    expect(normalizer.normalize(once.text).text).toBe(once.text);
  });
});

describe('decodeHtmlEntities', () => {
  it('decodes numeric entities', () => {
    expect(decodeHtmlEntities('&#252;ber &#xE4;')).toBe('über ä');
  });

  it('leaves unknown entities alone', () => {
    expect(decodeHtmlEntities('a &bogus; b')).toBe('a &bogus; b');
  });
});
