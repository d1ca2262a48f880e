import { BookRecommendation } from '../core/entities/BookRecommendation';
import { CrossDomainMediaSet } from '../core/entities/MediaRecommendation';
import { MediaRecommender } from '../core/services/Recommenders';
import { RecommendationStore } from '../core/repositories/RecommendationStore';
import { requireBookSelection } from '../core/services/ResultValidator';
import { Logger } from '../core/services/Logger';

export interface MediaRecommendationResult {
  book: BookRecommendation;
  media: CrossDomainMediaSet;
  savedTo?: string;
}

export class RecommendMediaUseCase {
  constructor(
    private recommender: MediaRecommender,
    private logger: Logger,
    private store?: RecommendationStore
  ) {}

  async execute(selection: BookRecommendation | undefined): Promise<MediaRecommendationResult> {
    const book = requireBookSelection(selection);

    this.logger.time('recommend-media');
    try {
      const media = await this.recommender.recommend(book);
      this.logger.timeLog('recommend-media', 'Generated movie, game and song');
      const savedTo = this.store ? await this.store.saveMedia(media) : undefined;
      const totalTime = this.logger.timeEnd('recommend-media');
      this.logger.info(`Recommended media for "${book.title}" in ${totalTime}ms`);
      return { book, media, savedTo };
    } catch (error) {
      this.logger.timeEnd('recommend-media');
      this.logger.error(`Error recommending media for "${book.title}":`, error);
      throw error;
    }
  }
}
