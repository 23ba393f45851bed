import { z } from 'zod';
import { ReviewValidationError } from './errors';
import { Review } from './types';

// rawText may be empty here: empty text is a per-item normalization
// failure, not an input error.
export const reviewInputSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  rawText: z.string(),
  sourceLanguage: z.string().min(2).default('de'),
  receivedAt: z.coerce.date().optional(),
  sourceId: z.string().optional(),
});

export type ReviewInput = z.input<typeof reviewInputSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function createReview(input: ReviewInput, now: Date = new Date()): Review {
  const parsed = reviewInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ReviewValidationError(`Invalid review: ${issues.join('; ')}`, issues);
  }

  const { id, rawText, sourceLanguage, receivedAt, sourceId } = parsed.data;
  const review: Review = {
    id,
    rawText,
    sourceLanguage: sourceLanguage.toLowerCase(),
    receivedAt: receivedAt ?? now,
    ...(sourceId !== undefined ? { sourceId } : {}),
  };
  return Object.freeze(review);
}

/** Builds a batch of reviews; ids must be unique within the batch. */
export function createReviews(inputs: unknown, now: Date = new Date()): Review[] {
  const list = z.array(z.unknown()).safeParse(inputs);
  if (!list.success) {
    throw new ReviewValidationError('Expected an array of reviews.');
  }

  const seen = new Set<string>();
  return list.data.map((item, index) => {
    const parsed = reviewInputSchema.safeParse(item);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error).map((issue) => `[${index}] ${issue}`);
      throw new ReviewValidationError(`Invalid review at index ${index}`, issues);
    }
    const review = createReview(parsed.data, now);
    if (seen.has(review.id)) {
      throw new ReviewValidationError(`Duplicate review id "${review.id}"`, [
        `[${index}] id: duplicate`,
      ]);
    }
    seen.add(review.id);
    return review;
  });
}
