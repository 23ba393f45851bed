import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LOG_LEVELS, LogLevel } from './logger';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  SENTIMENT_BACKEND: z.enum(['lexicon', 'groq']).default('lexicon'),
  GROQ_API_KEY: z.string().optional(),
  GROQ_MODEL: z.string().optional(),
  GROQ_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  TRANSLATION_ENABLED: booleanFlag.default('true'),
  TARGET_LANGUAGE: z.string().min(2).default('en'),
  ASPECT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  KEYWORD_LIMIT: z.coerce.number().int().min(0).default(10),
  TOP_KEYWORD_LIMIT: z.coerce.number().int().min(0).default(10),
  PIPELINE_CONCURRENCY: z.coerce.number().int().positive().default(4),
  STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TRANSLATION_CACHE_SIZE: z.coerce.number().int().positive().default(1000),
  STRIP_EMOJI: booleanFlag.default('true'),
  EMOJI_ESCALATION_THRESHOLD: z.coerce.number().int().min(0).default(2),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type PipelineConfig = {
  sentimentBackend: 'lexicon' | 'groq';
  groq: {
    apiKey?: string;
    model?: string;
    timeoutMs: number;
  };
  translationEnabled: boolean;
  targetLanguage: string;
  aspectThreshold: number;
  keywordLimit: number;
  topKeywordLimit: number;
  concurrency: number;
  stageTimeoutMs: number;
  translationCacheSize: number;
  stripEmoji: boolean;
  emojiEscalationThreshold: number;
  logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  // Blank variables count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  if (vars.SENTIMENT_BACKEND === 'groq' && !vars.GROQ_API_KEY) {
    throw new ConfigurationError('SENTIMENT_BACKEND=groq requires GROQ_API_KEY.');
  }

  return {
    sentimentBackend: vars.SENTIMENT_BACKEND,
    groq: {
      apiKey: vars.GROQ_API_KEY,
      model: vars.GROQ_MODEL,
      timeoutMs: vars.GROQ_TIMEOUT_MS,
    },
    translationEnabled: vars.TRANSLATION_ENABLED,
    targetLanguage: vars.TARGET_LANGUAGE.toLowerCase(),
    aspectThreshold: vars.ASPECT_THRESHOLD,
    keywordLimit: vars.KEYWORD_LIMIT,
    topKeywordLimit: vars.TOP_KEYWORD_LIMIT,
    concurrency: vars.PIPELINE_CONCURRENCY,
    stageTimeoutMs: vars.STAGE_TIMEOUT_MS,
    translationCacheSize: vars.TRANSLATION_CACHE_SIZE,
    stripEmoji: vars.STRIP_EMOJI,
    emojiEscalationThreshold: vars.EMOJI_ESCALATION_THRESHOLD,
    logLevel: vars.LOG_LEVEL,
  };
}
