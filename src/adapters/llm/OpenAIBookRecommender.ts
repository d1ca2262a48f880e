import { BookRecommender } from '../../core/services/Recommenders';
import { RecommendationRequest } from '../../core/entities/RecommendationRequest';
import { BookRecommendationSet } from '../../core/entities/BookRecommendation';
import { parseBookRecommendationSet } from '../../core/services/ResultValidator';
import { Logger } from '../../core/services/Logger';
import { OpenAIStructuredClient } from './OpenAIStructuredClient';
import { BOOK_PROMPT, buildBookUserPrompt, buildSystemPrompt } from './prompts';
import { bookRecommendationSetJsonSchema } from './schemas';

export class OpenAIBookRecommender implements BookRecommender {
  constructor(
    private generator: OpenAIStructuredClient,
    private logger: Logger
  ) {}

  async recommend(request: RecommendationRequest): Promise<BookRecommendationSet> {
    this.logger.info('Running book recommendation agent', request.toJSON());

    const set = await this.generator.generate({
      name: 'book_recommendations',
      system: buildSystemPrompt(BOOK_PROMPT),
      user: buildBookUserPrompt(request),
      schema: bookRecommendationSetJsonSchema(),
      parse: parseBookRecommendationSet,
    });

    this.logger.info('Book recommendations generated', { count: set.recommendations.length });
    return set;
  }
}
