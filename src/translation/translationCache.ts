import { createHash } from 'crypto';
import { LRUCache } from 'lru-cache';
import { categoryLogger, LogCategory } from '../logger';

const log = categoryLogger(LogCategory.TRANSLATION);

export const DEFAULT_TRANSLATION_CACHE_SIZE = 1000;

export type TranslationCacheStats = {
  hits: number;
  misses: number;
  size: number;
  inFlight: number;
};

/**
 * Read-through translation cache keyed by a content hash of
 * (targetLanguage, sourceText). Concurrent misses for the same key share a
 * single in-flight load; failed loads are not cached.
 */
export class TranslationCache {
  private readonly entries: LRUCache<string, string>;
  private readonly pending = new Map<string, Promise<string>>();
  private hits = 0;
  private misses = 0;

  constructor(maxEntries: number = DEFAULT_TRANSLATION_CACHE_SIZE) {
    this.entries = new LRUCache<string, string>({ max: maxEntries });
  }

  static keyFor(sourceText: string, targetLanguage: string): string {
    return createHash('sha256')
      .update(targetLanguage)
      .update('\u0000')
      .update(sourceText)
      .digest('hex');
  }

  async getOrLoad(
    sourceText: string,
    targetLanguage: string,
    load: () => Promise<string>,
  ): Promise<string> {
    const key = TranslationCache.keyFor(sourceText, targetLanguage);

    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.hits += 1;
      log.debug(`Cache hit for ${key.slice(0, 12)} (${targetLanguage})`);
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      this.hits += 1;
      return inFlight;
    }

    this.misses += 1;
    const loading = load()
      .then((translated) => {
        this.entries.set(key, translated);
        return translated;
      })
      .finally(() => {
        this.pending.delete(key);
      });
    this.pending.set(key, loading);
    return loading;
  }

  stats(): TranslationCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      inFlight: this.pending.size,
    };
  }

  clear(): void {
    this.entries.clear();
  }
}
