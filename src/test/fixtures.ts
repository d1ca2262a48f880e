import { Logger } from '../core/services/Logger';
import { BookRecommendation } from '../core/entities/BookRecommendation';
import { CrossDomainMediaSet } from '../core/entities/MediaRecommendation';

export const BOOKS: BookRecommendation[] = [
  {
    title: 'The Long Quiet',
    author: 'Mara Ellison',
    genre: 'Science Fiction',
    description: 'A linguist is flown to a research ship to decode a signal repeating from a probe above the Pacific.',
    reason: 'It treats first contact as a problem of language rather than war.',
  },
  {
    title: 'Harbor of Glass',
    author: 'Tomas Reyes',
    genre: 'Science Fiction',
    description: 'A fishing town wakes to find a transparent vessel anchored in its bay, and nobody can agree on what it wants.',
    reason: 'A small-scale, human view of contact told through one community.',
  },
  {
    title: 'Signal Seven',
    author: 'Ada Brannock',
    genre: 'Hard Science Fiction',
    description: 'Radio astronomers race to answer a message before a rival observatory does.',
    reason: 'Scientific detail about how contact might really be detected.',
  },
  {
    title: 'The Visitors Ledger',
    author: 'June Okafor',
    genre: 'Literary Fiction',
    description: 'An archivist records the first year after the arrival, one testimony at a time.',
    reason: 'Shows the social aftermath of contact from many voices.',
  },
  {
    title: 'Cold Orbit',
    author: 'Pieter Vos',
    genre: 'Thriller',
    description: 'A station crew must decide whether to open the door to an object that docked by itself.',
    reason: 'Tense, claustrophobic take on meeting the unknown.',
  },
  {
    title: 'Second Sun',
    author: 'Lena Marsh',
    genre: 'Science Fiction',
    description: 'A colony discovers its new home was already spoken for.',
    reason: 'Flips the perspective so humans are the aliens.',
  },
];

export function bookSet(count: number): { recommendations: BookRecommendation[] } {
  return { recommendations: BOOKS.slice(0, count) };
}

export const MEDIA: CrossDomainMediaSet = {
  movie: {
    title: 'Tidewater Signal',
    year: '2014',
    description: 'A coastal radio operator picks up voices that should not exist.',
    reason: 'Shares the focus on listening and translation.',
  },
  game: {
    title: 'Outer Relay',
    platform: 'PC',
    description: 'Explore an abandoned relay station and piece together who built it.',
    reason: 'Contact through artifacts rather than conversation.',
  },
  song: {
    title: 'Hello From Far',
    artist: 'The Night Orchard',
    description: 'A slow ballad written as a message to someone light years away.',
    reason: 'Captures the loneliness of reaching out into silence.',
  },
};

export function mockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    time: jest.fn(),
    timeEnd: jest.fn().mockReturnValue(0),
    timeLog: jest.fn(),
  };
}

// Shape of a completed Responses API payload carrying one JSON text part.
export function completedResponse(payload: unknown) {
  return {
    status: 'completed',
    output: [
      {
        type: 'message',
        content: [{ type: 'output_text', text: JSON.stringify(payload) }],
      },
    ],
  };
}

export function fakeClient(...responses: unknown[]) {
  const create = jest.fn();
  for (const res of responses) create.mockResolvedValueOnce(res);
  return { responses: { create } };
}
