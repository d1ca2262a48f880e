import {
  parseBookRecommendationSet,
  parseCrossDomainMediaSet,
  requireBookSelection,
} from '../ResultValidator';
import { ResponseValidationError, ValidationError } from '../../errors';
import { BOOKS, MEDIA, bookSet } from '../../../test/fixtures';

function captureError<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error('expected function to throw');
}

describe('parseBookRecommendationSet', () => {
  it.each([3, 4, 5])('accepts a set of %i recommendations', (count) => {
    const result = parseBookRecommendationSet(bookSet(count));

    expect(result.recommendations).toHaveLength(count);
    expect(result).toEqual(bookSet(count));
  });

  it('rejects a set of 2', () => {
    const error = captureError(() => parseBookRecommendationSet(bookSet(2)), ResponseValidationError);

    expect(error.issues).toEqual([
      'recommendations: must contain at least 3 recommendations',
    ]);
  });

  it('rejects a set of 6 rather than truncating it', () => {
    const error = captureError(() => parseBookRecommendationSet(bookSet(6)), ResponseValidationError);

    expect(error.issues).toEqual([
      'recommendations: must contain at most 5 recommendations',
    ]);
  });

  it('rejects a record with a missing field', () => {
    const { reason: _reason, ...withoutReason } = BOOKS[1];
    const input = { recommendations: [BOOKS[0], withoutReason, BOOKS[2]] };

    const error = captureError(() => parseBookRecommendationSet(input), ResponseValidationError);

    expect(error.issues).toEqual(['recommendations.1.reason: Required']);
  });

  it('rejects a blank field', () => {
    const input = { recommendations: [BOOKS[0], BOOKS[1], { ...BOOKS[2], author: '   ' }] };

    expect(() => parseBookRecommendationSet(input)).toThrow(
      'Backend returned an invalid book recommendation set: recommendations.2.author: must not be empty'
    );
  });

  it('rejects an overlong description', () => {
    const input = { recommendations: [BOOKS[0], BOOKS[1], { ...BOOKS[2], description: 'x'.repeat(1001) }] };

    expect(() => parseBookRecommendationSet(input)).toThrow('recommendations.2.description: must be at most 1000 characters');
  });

  it('trims surrounding whitespace from fields', () => {
    const input = { recommendations: [{ ...BOOKS[0], title: '  The Long Quiet\n' }, BOOKS[1], BOOKS[2]] };

    expect(parseBookRecommendationSet(input).recommendations[0].title).toBe('The Long Quiet');
  });

  it('rejects a missing recommendations key', () => {
    expect(() => parseBookRecommendationSet({ items: BOOKS.slice(0, 3) })).toThrow(ResponseValidationError);
  });
});

describe('parseCrossDomainMediaSet', () => {
  it('accepts a complete set', () => {
    expect(parseCrossDomainMediaSet(MEDIA)).toEqual(MEDIA);
  });

  it.each(['movie', 'game', 'song'] as const)('rejects a set missing the %s slot', (slot) => {
    const partial: Record<string, unknown> = { ...MEDIA };
    delete partial[slot];

    const error = captureError(() => parseCrossDomainMediaSet(partial), ResponseValidationError);

    expect(error.issues).toEqual([`${slot}: Required`]);
  });

  it('rejects a slot missing its type-specific attribute', () => {
    const { platform: _platform, ...game } = MEDIA.game;

    expect(() => parseCrossDomainMediaSet({ ...MEDIA, game })).toThrow('game.platform: Required');
  });
});

describe('requireBookSelection', () => {
  it('returns a valid book', () => {
    expect(requireBookSelection(BOOKS[0])).toEqual(BOOKS[0]);
  });

  it('rejects a missing selection as an input error', () => {
    expect(() => requireBookSelection(undefined)).toThrow(ValidationError);
    expect(() => requireBookSelection(undefined)).toThrow('A book must be selected before asking for media recommendations');
  });

  it('rejects an incomplete selection', () => {
    const error = captureError(() => requireBookSelection({ ...BOOKS[0], genre: '' }), ValidationError);

    expect(error.issues).toEqual(['genre: must not be empty']);
  });
});
