import { toError, TranslationUnavailable } from '../errors';
import { TranslationBackend } from '../types';
import { TranslationCache } from './translationCache';

export class Translator {
  constructor(
    private readonly backend: TranslationBackend,
    private readonly cache: TranslationCache = new TranslationCache(),
  ) {}

  get backendName(): string {
    return this.backend.name;
  }

  async translate(
    normalizedText: string,
    targetLanguage: string,
    sourceLanguage = 'de',
  ): Promise<string> {
    if (sourceLanguage.toLowerCase() === targetLanguage.toLowerCase()) {
      return normalizedText;
    }

    try {
      return await this.cache.getOrLoad(normalizedText, targetLanguage, () =>
        this.backend.translate(normalizedText, targetLanguage),
      );
    } catch (err) {
      const cause = toError(err);
      throw new TranslationUnavailable(
        `Translation backend "${this.backend.name}" failed: ${cause.message}`,
        cause,
      );
    }
  }
}
