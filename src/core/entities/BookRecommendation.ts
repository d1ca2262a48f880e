import { z } from 'zod';

export const MIN_RECOMMENDATIONS = 3;
export const MAX_RECOMMENDATIONS = 5;

export const requiredText = z.string().trim().min(1, 'must not be empty');

export const bookRecommendationSchema = z.object({
  title: requiredText,
  author: requiredText,
  genre: requiredText,
  description: requiredText.max(1000, 'must be at most 1000 characters'),
  reason: requiredText.max(500, 'must be at most 500 characters'),
});

export const bookRecommendationSetSchema = z.object({
  recommendations: z
    .array(bookRecommendationSchema)
    .min(MIN_RECOMMENDATIONS, `must contain at least ${MIN_RECOMMENDATIONS} recommendations`)
    .max(MAX_RECOMMENDATIONS, `must contain at most ${MAX_RECOMMENDATIONS} recommendations`),
});

export type BookRecommendation = z.infer<typeof bookRecommendationSchema>;
export type BookRecommendationSet = z.infer<typeof bookRecommendationSetSchema>;
