import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ResponseValidationError, ValidationError } from '../errors';
import { bookRecommendationSchema, bookRecommendationSetSchema, BookRecommendation, BookRecommendationSet } from '../entities/BookRecommendation';
import { crossDomainMediaSetSchema, CrossDomainMediaSet } from '../entities/MediaRecommendation';

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, raw: unknown, label: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ResponseValidationError(`Backend returned an invalid ${label}`, formatIssues(result.error));
  }
  return result.data;
}

export function parseBookRecommendationSet(raw: unknown): BookRecommendationSet {
  return parseWith(bookRecommendationSetSchema, raw, 'book recommendation set');
}

export function parseCrossDomainMediaSet(raw: unknown): CrossDomainMediaSet {
  return parseWith(crossDomainMediaSetSchema, raw, 'cross-domain media set');
}

// Book selection comes from the user side, so a bad one is an input error.
export function requireBookSelection(book: unknown): BookRecommendation {
  if (book == null) {
    throw new ValidationError('A book must be selected before asking for media recommendations');
  }
  const result = bookRecommendationSchema.safeParse(book);
  if (!result.success) {
    throw new ValidationError('Selected book is incomplete', formatIssues(result.error));
  }
  return result.data;
}
