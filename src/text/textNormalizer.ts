import { createHash } from 'crypto';
import { EmptyInputError } from '../errors';
import { germanLexicon } from '../lexicon/germanLexicon';
import { NormalizedText } from '../types';

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  auml: 'ä',
  ouml: 'ö',
  uuml: 'ü',
  Auml: 'Ä',
  Ouml: 'Ö',
  Uuml: 'Ü',
  szlig: 'ß',
  euro: '€',
  hellip: '…',
  ndash: '–',
  mdash: '—',
  laquo: '«',
  raquo: '»',
  bdquo: '„',
  ldquo: '“',
  rdquo: '”',
};

const ENTITY_PATTERN = /&(#x[0-9a-f]+|#\d+|[a-z]+);/gi;
const TAG_PATTERN = /<[^>]+>/g;
const URL_PATTERN = /https?:\/\/\S+/gi;
const EMAIL_PATTERN = /\S+@\S+\.\S+/g;
const EMOJI_PATTERN = /\p{Extended_Pictographic}/gu;
// Joiners, variation selectors and skin-tone modifiers left behind by emoji.
const EMOJI_RESIDUE_PATTERN = /[\u200d\ufe0e\ufe0f\u{1f3fb}-\u{1f3ff}]/gu;

export type TextNormalizerOptions = {
  stripEmoji?: boolean;
  negativeEmoji?: string[];
};

export function decodeHtmlEntities(text: string): string {
  return text.replace(ENTITY_PATTERN, (entity, body: string) => {
    if (body.startsWith('#')) {
      const codePoint =
        body[1] === 'x' || body[1] === 'X'
          ? parseInt(body.slice(2), 16)
          : parseInt(body.slice(1), 10);
      return Number.isFinite(codePoint) && codePoint <= 0x10ffff
        ? String.fromCodePoint(codePoint)
        : entity;
    }
    return NAMED_ENTITIES[body] ?? entity;
  });
}

export function contentHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export class TextNormalizer {
  private readonly stripEmoji: boolean;
  private readonly negativeEmoji: ReadonlySet<string>;

  constructor(options: TextNormalizerOptions = {}) {
    this.stripEmoji = options.stripEmoji ?? true;
    this.negativeEmoji = new Set(options.negativeEmoji ?? germanLexicon.negativeEmoji);
  }

  /**
   * Cleans raw review text. Throws EmptyInputError when nothing but
   * whitespace (or stripped emoji) is left.
   */
  normalize(rawText: string): NormalizedText {
    let text = decodeHtmlEntities(rawText)
      .replace(TAG_PATTERN, ' ')
      .replace(URL_PATTERN, ' ')
      .replace(EMAIL_PATTERN, ' ')
      .normalize('NFC');

    const emoji = text.match(EMOJI_PATTERN) ?? [];
    const negativeEmojiCount = emoji.filter((e) => this.negativeEmoji.has(e)).length;

    if (this.stripEmoji) {
      text = text.replace(EMOJI_PATTERN, ' ').replace(EMOJI_RESIDUE_PATTERN, '');
    }

    text = text.replace(/\s+/g, ' ').trim();

    if (!text) {
      throw new EmptyInputError();
    }

    return {
      text,
      emojiCount: emoji.length,
      negativeEmojiCount,
      contentHash: contentHash(text),
    };
  }
}
