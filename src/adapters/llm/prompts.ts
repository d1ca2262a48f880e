// Centralized prompt templates for both recommendation stages

import { RecommendationRequest } from '../../core/entities/RecommendationRequest';
import { MediaRequest } from '../../core/entities/MediaRecommendation';

export interface PromptTemplate {
  background: string[];
  steps: string[];
  outputInstructions: string[];
}

export const BOOK_PROMPT: PromptTemplate = {
  background: [
    'You are an expert librarian and book recommender.',
    'Your goal is to provide thoughtful, personalized book recommendations.',
    'You have extensive knowledge of literature across all genres and periods.',
    'You focus on providing accurate, well-researched recommendations.',
  ],
  steps: [
    "Analyze the user's reading interests from their input.",
    'Consider both popular and lesser-known books that match.',
    "Ensure recommendations are diverse within the user's interests.",
    'Generate detailed, accurate descriptions.',
    'Provide specific reasons why each book matches.',
  ],
  outputInstructions: [
    'Provide 3-5 high-quality recommendations.',
    'Include accurate book information.',
    'Write clear, informative descriptions (under 1000 characters).',
    'Explain specifically why each book matches (under 500 characters).',
    "Ensure all recommendations truly align with the user's interests.",
  ],
};

export const MEDIA_PROMPT: PromptTemplate = {
  background: [
    'You are an expert content recommender who can find thematic connections across different media types.',
    'Your goal is to recommend media that shares deep thematic connections with a given book.',
    'You have extensive knowledge of movies, video games, and music across all genres and periods.',
    'You focus on meaningful thematic links rather than superficial genre similarities.',
  ],
  steps: [
    'Analyze the core themes, mood, and ideas of the input book.',
    'Consider both classic and contemporary options in each media type.',
    'Focus on thematic resonance over genre matching.',
    'Find one perfect match in each media category.',
    'Explain the specific thematic connections for each recommendation.',
  ],
  outputInstructions: [
    'Recommend exactly ONE movie, ONE game, and ONE song.',
    'Ensure each recommendation has a strong thematic connection.',
    'Provide clear, specific reasons for each connection.',
    'Include accurate details for each media item (release year, platform, artist).',
    'Write engaging, informative descriptions.',
  ],
};

export function buildSystemPrompt(template: PromptTemplate): string {
  return [
    '# IDENTITY and PURPOSE',
    ...template.background.map((line) => `- ${line}`),
    '',
    '# INTERNAL ASSISTANT STEPS',
    ...template.steps.map((line, i) => `${i + 1}. ${line}`),
    '',
    '# OUTPUT INSTRUCTIONS',
    ...template.outputInstructions.map((line) => `- ${line}`),
    '- Return strictly valid JSON matching the provided schema.',
  ].join('\n');
}

export function buildBookUserPrompt(request: RecommendationRequest): string {
  return [
    `Reading interest: ${JSON.stringify(request.thought)}.`,
    'Return an object { "recommendations": [...] } with 3 to 5 items strictly matching the schema.',
  ].join(' ');
}

export function buildMediaUserPrompt(book: MediaRequest): string {
  return [
    `Book: ${JSON.stringify(book)}.`,
    'Return an object { "movie": {...}, "game": {...}, "song": {...} } strictly matching the schema.',
  ].join(' ');
}
