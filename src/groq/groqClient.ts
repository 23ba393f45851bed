import fetch from 'node-fetch';
import { z } from 'zod';
import { categoryLogger, LogCategory } from '../logger';
import {
  ASPECT_DIMENSIONS,
  DimensionEvidence,
  InferenceOutput,
  SentimentLabel,
  SentimentModel,
  TranslationBackend,
} from '../types';

const GROQ_API_URL = 'https://api.groq.com/openai/v1/chat/completions';
export const DEFAULT_GROQ_MODEL = 'llama-3.3-70b-versatile';
const DEFAULT_MAX_INPUT_CHARS = 4000;

const log = categoryLogger(LogCategory.GROQ);

export type GroqClientOptions = {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  maxInputChars?: number;
};

type ChatMessage = {
  role: 'system' | 'user';
  content: string;
};

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

const probability = z.number().min(0).max(1);

const inferenceReplySchema = z.object({
  scores: z.object({
    positive: probability,
    neutral: probability,
    negative: probability,
  }),
  dimensions: z
    .object({
      logistics: probability,
      quality: probability,
      price: probability,
      packaging: probability,
      service: probability,
      other: probability,
    })
    .partial()
    .default({}),
  words: z
    .object({
      positive: z.array(z.string()).default([]),
      negative: z.array(z.string()).default([]),
    })
    .optional(),
});

const INFERENCE_PROMPT = `
You analyze German e-commerce product reviews.
Return only JSON of this form:
{
  "scores": { "positive": number, "neutral": number, "negative": number },
  "dimensions": { "logistics"?: number, "quality"?: number, "price"?: number, "packaging"?: number, "service"?: number, "other"?: number },
  "words": { "positive": string[], "negative": string[] }
}
"scores" are class probabilities summing to 1.
"dimensions" gives, for each aspect the review actually talks about, how strongly (0-1) the text refers to it.
Leave out aspects the review does not mention.
"words" lists the positive and negative sentiment words of the review, lower-cased, as they appear in the text.
`.trim();

/** Pulls the first JSON object out of a model reply that may wrap it in prose. */
export function extractJson(text: string): unknown {
  const match = text.match(/\{[\s\S]*\}/);
  return JSON.parse(match ? match[0] : text);
}

/**
 * Splits text into chunks of at most `maxChars`, breaking after sentence
 * punctuation where possible.
 */
export function chunkText(text: string, maxChars: number): string[] {
  const pieces = text.split(/(?<=[.!?])\s+/).flatMap((sentence) => {
    const parts: string[] = [];
    for (let i = 0; i < sentence.length; i += maxChars) {
      parts.push(sentence.slice(i, i + maxChars));
    }
    return parts;
  });

  const chunks: string[] = [];
  let current = '';
  for (const piece of pieces) {
    if (current && current.length + 1 + piece.length > maxChars) {
      chunks.push(current);
      current = piece;
    } else {
      current = current ? `${current} ${piece}` : piece;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

/**
 * Groq chat-completions client. Serves as both the sentiment/aspect
 * inference backend and the translation backend.
 */
export class GroqClient implements SentimentModel, TranslationBackend {
  public readonly name = 'groq';
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxInputChars: number;

  constructor(options: GroqClientOptions) {
    if (!options.apiKey) {
      throw new Error('GROQ_API_KEY is not set.');
    }
    this.apiKey = options.apiKey;
    this.model = options.model || DEFAULT_GROQ_MODEL;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxInputChars = options.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
  }

  async createChatCompletion(messages: ChatMessage[], temperature = 0.3): Promise<string> {
    const res = await fetch(GROQ_API_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.model,
        messages,
        temperature,
      }),
      timeout: this.timeoutMs,
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Groq API error: ${res.status} ${text}`);
    }

    const parsed = completionSchema.safeParse(await res.json());
    const content = parsed.success ? parsed.data.choices[0].message.content : undefined;
    if (!content) {
      throw new Error('Groq API returned empty content.');
    }
    return content;
  }

  async infer(text: string): Promise<InferenceOutput> {
    if (text.length > this.maxInputChars) {
      log.warn(
        `Review of ${text.length} chars truncated to ${this.maxInputChars} chars for inference`,
      );
    }
    const reply = await this.createChatCompletion(
      [
        { role: 'system', content: INFERENCE_PROMPT },
        { role: 'user', content: text.slice(0, this.maxInputChars) },
      ],
      0,
    );

    const parsed = inferenceReplySchema.safeParse(extractJson(reply));
    if (!parsed.success) {
      log.debug(`Unexpected inference reply: ${reply.slice(0, 200)}`);
      throw new Error(`Groq inference reply did not match the expected shape: ${parsed.error.message}`);
    }

    const { scores, dimensions, words } = parsed.data;
    let label: SentimentLabel = 'neutral';
    if (scores.positive > scores[label]) label = 'positive';
    if (scores.negative > scores[label]) label = 'negative';

    const dimensionEvidence: DimensionEvidence = {};
    for (const dimension of ASPECT_DIMENSIONS) {
      const evidence = dimensions[dimension];
      if (evidence !== undefined && evidence > 0) dimensionEvidence[dimension] = evidence;
    }

    return {
      label,
      confidence: scores[label],
      classScores: scores,
      dimensionEvidence,
      sentimentWords: words,
    };
  }

  async translate(text: string, targetLanguage: string): Promise<string> {
    const chunks = chunkText(text, this.maxInputChars);
    if (chunks.length > 1) {
      log.debug(`Translating ${text.length} chars in ${chunks.length} chunks`);
    }

    const translated: string[] = [];
    for (const chunk of chunks) {
      translated.push(await this.translateChunk(chunk, targetLanguage));
    }
    return translated.join(' ');
  }

  private async translateChunk(text: string, targetLanguage: string): Promise<string> {
    const reply = await this.createChatCompletion(
      [
        {
          role: 'system',
          content:
            'You translate German customer reviews. Reply with the translation only, no notes or quotes.',
        },
        {
          role: 'user',
          content: `Translate into the language with ISO code "${targetLanguage}":\n\n${text}`,
        },
      ],
      0.2,
    );
    return reply.trim();
  }
}
