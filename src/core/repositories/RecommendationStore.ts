import { BookRecommendationSet } from '../entities/BookRecommendation';
import { CrossDomainMediaSet } from '../entities/MediaRecommendation';

export type SavedRecommendations =
  | { kind: 'books'; books: BookRecommendationSet }
  | { kind: 'media'; media: CrossDomainMediaSet };

export interface RecommendationStore {
  saveBooks(set: BookRecommendationSet): Promise<string>; // returns the written location
  saveMedia(set: CrossDomainMediaSet): Promise<string>;
  load(location: string): Promise<SavedRecommendations>;
}
