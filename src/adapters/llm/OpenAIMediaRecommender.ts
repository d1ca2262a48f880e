import { MediaRecommender } from '../../core/services/Recommenders';
import { BookRecommendation } from '../../core/entities/BookRecommendation';
import { CrossDomainMediaSet, toMediaRequest } from '../../core/entities/MediaRecommendation';
import { parseCrossDomainMediaSet, requireBookSelection } from '../../core/services/ResultValidator';
import { Logger } from '../../core/services/Logger';
import { OpenAIStructuredClient } from './OpenAIStructuredClient';
import { MEDIA_PROMPT, buildMediaUserPrompt, buildSystemPrompt } from './prompts';
import { crossDomainMediaSetJsonSchema } from './schemas';

export class OpenAIMediaRecommender implements MediaRecommender {
  constructor(
    private generator: OpenAIStructuredClient,
    private logger: Logger
  ) {}

  async recommend(book: BookRecommendation): Promise<CrossDomainMediaSet> {
    const request = toMediaRequest(requireBookSelection(book));
    this.logger.info('Running media recommendation agent', request);

    const set = await this.generator.generate({
      name: 'cross_domain_media',
      system: buildSystemPrompt(MEDIA_PROMPT),
      user: buildMediaUserPrompt(request),
      schema: crossDomainMediaSetJsonSchema(),
      parse: parseCrossDomainMediaSet,
    });

    this.logger.info('Media recommendations generated', {
      book: request.title,
      movie: set.movie.title,
      game: set.game.title,
      song: set.song.title,
    });
    return set;
  }
}
