// JSON schemas sent to the Responses API (strict mode). The zod schemas in
// core/entities stay the source of truth; these only steer generation.

import { MIN_RECOMMENDATIONS, MAX_RECOMMENDATIONS } from '../../core/entities/BookRecommendation';

function record(fields: string[]) {
  return {
    type: 'object',
    additionalProperties: false,
    properties: Object.fromEntries(fields.map((f) => [f, { type: 'string' }])),
    required: fields,
  };
}

export const BOOK_FIELDS = ['title', 'author', 'genre', 'description', 'reason'];
export const MOVIE_FIELDS = ['title', 'year', 'description', 'reason'];
export const GAME_FIELDS = ['title', 'platform', 'description', 'reason'];
export const SONG_FIELDS = ['title', 'artist', 'description', 'reason'];

export function bookRecommendationSetJsonSchema(): Record<string, unknown> {
  return {
    type: 'object',
    additionalProperties: false,
    properties: {
      recommendations: {
        type: 'array',
        minItems: MIN_RECOMMENDATIONS,
        maxItems: MAX_RECOMMENDATIONS,
        items: record(BOOK_FIELDS),
      },
    },
    required: ['recommendations'],
  };
}

export function crossDomainMediaSetJsonSchema(): Record<string, unknown> {
  return {
    type: 'object',
    additionalProperties: false,
    properties: {
      movie: record(MOVIE_FIELDS),
      game: record(GAME_FIELDS),
      song: record(SONG_FIELDS),
    },
    required: ['movie', 'game', 'song'],
  };
}
