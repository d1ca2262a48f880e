import { Prompter } from '../core/services/Prompter';
import { BookRecommendation } from '../core/entities/BookRecommendation';
import { RecommendBooksUseCase, BookRecommendationResult } from '../application/RecommendBooksUseCase';
import { RecommendMediaUseCase } from '../application/RecommendMediaUseCase';
import { formatBookChoices, formatBookRecommendation, formatMediaRecommendations } from './formatters';

const QUIT_WORDS = ['q', 'quit', 'exit'];

function isQuit(answer: string): boolean {
  return QUIT_WORDS.includes(answer.trim().toLowerCase());
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class InteractiveSession {
  constructor(
    private prompter: Prompter,
    private recommendBooks: RecommendBooksUseCase,
    private recommendMedia: RecommendMediaUseCase,
    private write: (text: string) => void = (text) => console.log(text)
  ) {}

  async run(): Promise<void> {
    this.write('\nWelcome to the Book Recommendation System!');
    this.write("Share your thoughts on what you'd like to read, and I'll recommend some books.\n");

    for (;;) {
      const thought = await this.prompter.ask('What kind of book are you looking for? ');
      if (thought === null || isQuit(thought)) break;
      await this.handleIntent(thought);
    }

    this.write('\nThank you for using the Book Recommendation System!');
  }

  private async handleIntent(thought: string): Promise<void> {
    this.write('\nThinking about your request...');

    let result: BookRecommendationResult;
    try {
      result = await this.recommendBooks.execute(thought);
    } catch (error) {
      this.write(`Error getting recommendations: ${describeError(error)}\n`);
      return;
    }

    this.write('\nHere are your personalized book recommendations:\n');
    for (const book of result.books.recommendations) {
      this.write(formatBookRecommendation(book) + '\n');
    }
    if (result.savedTo) this.write(`Recommendations saved to ${result.savedTo}\n`);

    const answer = await this.prompter.ask(
      'Would you like movie, game, and song recommendations based on one of these books? (y/N) '
    );
    if (answer === null || answer.trim().toLowerCase() !== 'y') return;

    const book = await this.selectBook(result.books.recommendations);
    if (book) await this.showMedia(book);
  }

  private async selectBook(books: BookRecommendation[]): Promise<BookRecommendation | undefined> {
    this.write('\nSelect a book to get related media recommendations:');
    for (const line of formatBookChoices(books)) this.write(line);

    for (;;) {
      const choice = await this.prompter.ask("Enter the number of your choice (or 'q' to quit): ");
      if (choice === null || isQuit(choice)) return undefined;

      const trimmed = choice.trim();
      if (!/^\d+$/.test(trimmed)) {
        this.write('Please enter a valid number.');
        continue;
      }
      const index = Number(trimmed) - 1;
      if (index >= 0 && index < books.length) return books[index];
      this.write('Invalid choice. Please try again.');
    }
  }

  private async showMedia(book: BookRecommendation): Promise<void> {
    this.write('\nFinding related media recommendations...');
    try {
      const result = await this.recommendMedia.execute(book);
      this.write('\nHere are media recommendations based on your selected book:\n');
      for (const panel of formatMediaRecommendations(result.media)) {
        this.write(panel + '\n');
      }
      if (result.savedTo) this.write(`Recommendations saved to ${result.savedTo}\n`);
    } catch (error) {
      this.write(`Error getting media recommendations: ${describeError(error)}\n`);
    }
  }
}
