import { ValidationError } from '../core/errors';

export interface RecommendArgs {
  intent: string;
  media?: number; // 1-based book number for the media step
  save: boolean;
}

function bookNumber(value: string | undefined): number {
  if (value === undefined || !/^[1-9]\d*$/.test(value)) {
    throw new ValidationError(
      `--media expects a book number, got ${value === undefined ? 'nothing' : JSON.stringify(value)}`
    );
  }
  return Number(value);
}

export function parseRecommendArgs(argv: string[]): RecommendArgs {
  const out: RecommendArgs = { intent: '', save: true };
  const words: string[] = [];
  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--no-save') {
      out.save = false;
    } else if (arg === '--media' || arg === '-m') {
      out.media = bookNumber(argv[i + 1]);
      i++;
    } else if (arg.startsWith('--media=')) {
      out.media = bookNumber(arg.slice('--media='.length));
    } else {
      words.push(arg);
    }
  }
  out.intent = words.join(' ');
  return out;
}
