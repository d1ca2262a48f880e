import { ValidationError } from '../errors';

export class RecommendationRequest {
  private constructor(public readonly thought: string) {}

  // The thought is kept exactly as typed; blank input never produces a request.
  static create(thought: unknown): RecommendationRequest {
    if (typeof thought !== 'string') {
      throw new ValidationError('Reading intent is required');
    }
    if (thought.trim() === '') {
      throw new ValidationError('Reading intent must not be empty');
    }
    return new RecommendationRequest(thought);
  }

  equals(other: RecommendationRequest): boolean {
    return this.thought === other.thought;
  }

  toJSON(): { thought: string } {
    return { thought: this.thought };
  }
}
