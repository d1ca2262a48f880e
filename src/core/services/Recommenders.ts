import { RecommendationRequest } from '../entities/RecommendationRequest';
import { BookRecommendation, BookRecommendationSet } from '../entities/BookRecommendation';
import { CrossDomainMediaSet } from '../entities/MediaRecommendation';

export interface BookRecommender {
  // Resolves with 3 to 5 validated books, or rejects; never a partial set
  recommend(request: RecommendationRequest): Promise<BookRecommendationSet>;
}

export interface MediaRecommender {
  recommend(book: BookRecommendation): Promise<CrossDomainMediaSet>;
}
