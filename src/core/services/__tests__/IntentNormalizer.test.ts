import { TextIntentNormalizer } from '../IntentNormalizer';
import { ValidationError } from '../../errors';

describe('TextIntentNormalizer', () => {
  const normalizer = new TextIntentNormalizer();
  const intent = 'I want to read something about first contact with aliens';

  it('packages the text as a request', () => {
    expect(normalizer.normalize(intent).thought).toBe(intent);
  });

  it('is idempotent for the same input', () => {
    const first = normalizer.normalize(intent);
    const second = normalizer.normalize(intent);
    const again = normalizer.normalize(first.thought);

    expect(first.equals(second)).toBe(true);
    expect(again.equals(first)).toBe(true);
  });

  it('fails validation on empty input instead of producing an empty request', () => {
    expect(() => normalizer.normalize('')).toThrow(ValidationError);
  });
});
