import { RecommendationRequest } from '../entities/RecommendationRequest';

export interface IntentNormalizer {
  normalize(input: unknown): RecommendationRequest;
}

export class TextIntentNormalizer implements IntentNormalizer {
  normalize(input: unknown): RecommendationRequest {
    return RecommendationRequest.create(input);
  }
}
