import { BookRecommendation } from '../core/entities/BookRecommendation';
import {
  CrossDomainMediaSet,
  GameRecommendation,
  MovieRecommendation,
  SongRecommendation,
} from '../core/entities/MediaRecommendation';

export const PANEL_WIDTH = 72;

// Greedy word wrap. A word longer than the width gets a line of its own.
export function wrapText(text: string, width: number = PANEL_WIDTH): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    if (current && current.length + 1 + word.length > width) {
      lines.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

export function rule(label?: string, width: number = PANEL_WIDTH): string {
  if (!label) return '─'.repeat(width);
  const head = `── ${label} `;
  return head + '─'.repeat(Math.max(0, width - head.length));
}

function body(description: string, why: string): string[] {
  return ['', ...wrapText(description), '', ...wrapText(why)];
}

export function formatBookRecommendation(book: BookRecommendation): string {
  return [
    rule(),
    `📚 ${book.title}`,
    `by ${book.author}`,
    `Genre: ${book.genre}`,
    ...body(book.description, `Why this book: ${book.reason}`),
  ].join('\n');
}

export function formatMovieRecommendation(movie: MovieRecommendation): string {
  return [
    rule('Movie Recommendation'),
    `🎬 ${movie.title} (${movie.year})`,
    ...body(movie.description, `Why this movie: ${movie.reason}`),
  ].join('\n');
}

export function formatGameRecommendation(game: GameRecommendation): string {
  return [
    rule('Game Recommendation'),
    `🎮 ${game.title}`,
    `Platform: ${game.platform}`,
    ...body(game.description, `Why this game: ${game.reason}`),
  ].join('\n');
}

export function formatSongRecommendation(song: SongRecommendation): string {
  return [
    rule('Song Recommendation'),
    `🎵 ${song.title}`,
    `by ${song.artist}`,
    ...body(song.description, `Why this song: ${song.reason}`),
  ].join('\n');
}

export function formatMediaRecommendations(set: CrossDomainMediaSet): string[] {
  return [
    formatMovieRecommendation(set.movie),
    formatGameRecommendation(set.game),
    formatSongRecommendation(set.song),
  ];
}

export function formatBookChoices(books: BookRecommendation[]): string[] {
  return books.map((book, i) => `${i + 1}. ${book.title} by ${book.author}`);
}
