import { parseRecommendArgs } from '../args';
import { ValidationError } from '../../core/errors';

const argv = (...args: string[]) => ['node', 'recommend-books.ts', ...args];

describe('parseRecommendArgs', () => {
  it('joins positional words into the intent', () => {
    expect(parseRecommendArgs(argv('books', 'about', 'bees'))).toEqual({ intent: 'books about bees', save: true });
  });

  it('reads --media with a separate value', () => {
    expect(parseRecommendArgs(argv('--media', '2', 'sea stories'))).toEqual({ intent: 'sea stories', media: 2, save: true });
  });

  it('reads --media=<n> and --no-save', () => {
    expect(parseRecommendArgs(argv('sea stories', '--media=3', '--no-save'))).toEqual({
      intent: 'sea stories',
      media: 3,
      save: false,
    });
  });

  it('leaves the intent empty when none is given', () => {
    expect(parseRecommendArgs(argv()).intent).toBe('');
  });

  it('does not take a following flag as the book number', () => {
    expect(() => parseRecommendArgs(argv('sea', '--media', '--no-save'))).toThrow(
      new ValidationError('--media expects a book number, got "--no-save"')
    );
  });

  it('rejects a book number with trailing characters', () => {
    expect(() => parseRecommendArgs(argv('sea', '--media', '2x'))).toThrow('--media expects a book number, got "2x"');
    expect(() => parseRecommendArgs(argv('sea', '--media=2x'))).toThrow(ValidationError);
  });

  it('rejects zero and a missing book number', () => {
    expect(() => parseRecommendArgs(argv('sea', '-m', '0'))).toThrow('--media expects a book number, got "0"');
    expect(() => parseRecommendArgs(argv('sea', '--media'))).toThrow('--media expects a book number, got nothing');
  });
});
