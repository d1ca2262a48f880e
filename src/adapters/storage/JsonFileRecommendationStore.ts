import fs from 'fs/promises';
import path from 'path';
import { RecommendationStore, SavedRecommendations } from '../../core/repositories/RecommendationStore';
import { BookRecommendationSet, bookRecommendationSetSchema } from '../../core/entities/BookRecommendation';
import { CrossDomainMediaSet, crossDomainMediaSetSchema } from '../../core/entities/MediaRecommendation';
import { ValidationError } from '../../core/errors';
import { formatIssues } from '../../core/services/ResultValidator';
import { Logger } from '../../core/services/Logger';

// YYYYMMDD_HHMMSS in local time
export function timestamp(d: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  return (
    d.getFullYear().toString() +
    pad(d.getMonth() + 1) +
    pad(d.getDate()) + '_' +
    pad(d.getHours()) +
    pad(d.getMinutes()) +
    pad(d.getSeconds())
  );
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export class JsonFileRecommendationStore implements RecommendationStore {
  constructor(
    private directory: string,
    private logger: Logger,
    private now: () => Date = () => new Date()
  ) {}

  // Never overwrites: a name already taken in the same second gets a _1, _2, ... suffix.
  private async write(prefix: string, payload: unknown): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });
    const base = `${prefix}_${timestamp(this.now())}`;
    const content = JSON.stringify(payload, null, 2) + '\n';

    for (let n = 0; ; n++) {
      const filePath = path.join(this.directory, n === 0 ? `${base}.json` : `${base}_${n}.json`);
      try {
        await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
      } catch (error) {
        if (isAlreadyExists(error)) continue;
        throw error;
      }
      this.logger.info(`Recommendations saved to ${filePath}`);
      return filePath;
    }
  }

  async saveBooks(set: BookRecommendationSet): Promise<string> {
    return this.write('recommendations', set);
  }

  async saveMedia(set: CrossDomainMediaSet): Promise<string> {
    return this.write('media_recommendations', set);
  }

  async load(location: string): Promise<SavedRecommendations> {
    let content: string;
    try {
      content = await fs.readFile(location, 'utf-8');
    } catch (error) {
      this.logger.error(`Could not read ${location}:`, error);
      throw new ValidationError(`Could not read saved recommendations from ${location}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new ValidationError(`${location} is not valid JSON`);
    }

    const books = bookRecommendationSetSchema.safeParse(raw);
    if (books.success) return { kind: 'books', books: books.data };

    const media = crossDomainMediaSetSchema.safeParse(raw);
    if (media.success) return { kind: 'media', media: media.data };

    const looksLikeBooks = typeof raw === 'object' && raw !== null && 'recommendations' in raw;
    throw new ValidationError(
      `${location} does not contain saved recommendations`,
      formatIssues(looksLikeBooks ? books.error : media.error)
    );
  }
}
