import { TranslationUnavailable } from '../src/errors';
import { TranslationCache } from '../src/translation/translationCache';
import { Translator } from '../src/translation/translator';
import { delay, FakeTranslationBackend } from './helpers';

describe('Translator', () => {
  it('translates through the backend', async () => {
    const backend = new FakeTranslationBackend();
    const translator = new Translator(backend);

    await expect(translator.translate('Sehr gut', 'en')).resolves.toBe('[en] Sehr gut');
    expect(backend.calls).toEqual([{ text: 'Sehr gut', targetLanguage: 'en' }]);
  });

  it('returns the text unchanged when source and target match', async () => {
    const backend = new FakeTranslationBackend();
    const translator = new Translator(backend);

    await expect(translator.translate('Sehr gut', 'de', 'DE')).resolves.toBe('Sehr gut');
    expect(backend.calls).toHaveLength(0);
  });

  it('serves repeated texts from the cache', async () => {
    const backend = new FakeTranslationBackend();
    const cache = new TranslationCache();
    const translator = new Translator(backend, cache);

    await translator.translate('Sehr gut', 'en');
    await translator.translate('Sehr gut', 'en');
    await translator.translate('Sehr gut', 'fr');

    expect(backend.calls).toHaveLength(2);
    expect(cache.stats()).toEqual({ hits: 1, misses: 2, size: 2, inFlight: 0 });
  });

  it('shares one backend call between concurrent requests', async () => {
    const backend = new FakeTranslationBackend(async (text) => {
      await delay(10);
      return `EN: ${text}`;
    });
    const translator = new Translator(backend);

    const results = await Promise.all([
      translator.translate('Schnell geliefert', 'en'),
      translator.translate('Schnell geliefert', 'en'),
    ]);

    expect(results).toEqual(['EN: Schnell geliefert', 'EN: Schnell geliefert']);
    expect(backend.calls).toHaveLength(1);
  });

  it('does not cache failures', async () => {
    let attempts = 0;
    const backend = new FakeTranslationBackend(async (text) => {
      attempts += 1;
      if (attempts === 1) throw new Error('offline');
      return `EN: ${text}`;
    });
    const translator = new Translator(backend);

    await expect(translator.translate('Gut', 'en')).rejects.toThrow(TranslationUnavailable);
    await expect(translator.translate('Gut', 'en')).resolves.toBe('EN: Gut');
    expect(backend.calls).toHaveLength(2);
  });

  it('reports the backend failure', async () => {
    const backend = new FakeTranslationBackend(async () => {
      throw new Error('offline');
    });
    await expect(new Translator(backend).translate('Gut', 'en')).rejects.toThrow(
      'Translation backend "fake-translator" failed: offline',
    );
  });
});

describe('TranslationCache', () => {
  it('evicts the least recently used entry', async () => {
    const cache = new TranslationCache(2);
    const load = (value: string) => async () => value;

    await cache.getOrLoad('a', 'en', load('A'));
    await cache.getOrLoad('b', 'en', load('B'));
    await cache.getOrLoad('c', 'en', load('C'));

    expect(cache.stats().size).toBe(2);
    await expect(cache.getOrLoad('a', 'en', load('A2'))).resolves.toBe('A2');
    await expect(cache.getOrLoad('c', 'en', load('C2'))).resolves.toBe('C');
  });

  it('keys by target language and text', () => {
    expect(TranslationCache.keyFor('Gut', 'en')).not.toBe(TranslationCache.keyFor('Gut', 'fr'));
    expect(TranslationCache.keyFor('Gut', 'en')).toBe(TranslationCache.keyFor('Gut', 'en'));
  });
});
