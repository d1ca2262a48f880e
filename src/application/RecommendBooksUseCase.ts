import { RecommendationRequest } from '../core/entities/RecommendationRequest';
import { BookRecommendationSet } from '../core/entities/BookRecommendation';
import { IntentNormalizer } from '../core/services/IntentNormalizer';
import { BookRecommender } from '../core/services/Recommenders';
import { RecommendationStore } from '../core/repositories/RecommendationStore';
import { Logger } from '../core/services/Logger';

export interface BookRecommendationResult {
  request: RecommendationRequest;
  books: BookRecommendationSet;
  savedTo?: string;
}

export class RecommendBooksUseCase {
  constructor(
    private normalizer: IntentNormalizer,
    private recommender: BookRecommender,
    private logger: Logger,
    private store?: RecommendationStore // results are only displayed when absent
  ) {}

  async execute(intent: unknown): Promise<BookRecommendationResult> {
    const request = this.normalizer.normalize(intent);

    this.logger.time('recommend-books');
    try {
      const books = await this.recommender.recommend(request);
      this.logger.timeLog('recommend-books', `Generated ${books.recommendations.length} books`);
      const savedTo = this.store ? await this.store.saveBooks(books) : undefined;
      const totalTime = this.logger.timeEnd('recommend-books');
      this.logger.info(`Recommended ${books.recommendations.length} books in ${totalTime}ms`);
      return { request, books, savedTo };
    } catch (error) {
      this.logger.timeEnd('recommend-books');
      this.logger.error(`Error recommending books for "${request.thought}":`, error);
      throw error;
    }
  }
}
