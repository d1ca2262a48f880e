import { z } from 'zod';
import { requiredText, BookRecommendation } from './BookRecommendation';

export const movieRecommendationSchema = z.object({
  title: requiredText,
  year: requiredText,
  description: requiredText,
  reason: requiredText,
});

export const gameRecommendationSchema = z.object({
  title: requiredText,
  platform: requiredText,
  description: requiredText,
  reason: requiredText,
});

export const songRecommendationSchema = z.object({
  title: requiredText,
  artist: requiredText,
  description: requiredText,
  reason: requiredText,
});

// All three slots are mandatory; a partial set is not a result.
export const crossDomainMediaSetSchema = z.object({
  movie: movieRecommendationSchema,
  game: gameRecommendationSchema,
  song: songRecommendationSchema,
});

export type MovieRecommendation = z.infer<typeof movieRecommendationSchema>;
export type GameRecommendation = z.infer<typeof gameRecommendationSchema>;
export type SongRecommendation = z.infer<typeof songRecommendationSchema>;
export type CrossDomainMediaSet = z.infer<typeof crossDomainMediaSetSchema>;

// What the backend is told about the selected book. The recommendation reason stays local.
export type MediaRequest = Pick<BookRecommendation, 'title' | 'author' | 'genre' | 'description'>;

export function toMediaRequest(book: BookRecommendation): MediaRequest {
  return {
    title: book.title,
    author: book.author,
    genre: book.genre,
    description: book.description,
  };
}
