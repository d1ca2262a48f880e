#!/usr/bin/env node

import { config } from '../config';
import { createApplication, createLogger } from '../app';
import { RecommendArgs, parseRecommendArgs } from './args';
import { formatBookRecommendation, formatMediaRecommendations } from './formatters';
import { describeError } from './InteractiveSession';

function printUsage() {
  console.error('Usage: npm run recommend -- "<what you want to read>" [--media <n>] [--no-save]');
  console.error('Example: npm run recommend -- "I want to read something about first contact with aliens" --media 1');
}

async function main() {
  let args: RecommendArgs;
  try {
    args = parseRecommendArgs(process.argv);
  } catch (error) {
    console.error(describeError(error));
    printUsage();
    process.exitCode = 1;
    return;
  }
  if (!args.intent.trim()) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(config);
  const app = createApplication(config, logger, { save: args.save && config.output.save });

  const { books, savedTo } = await app.recommendBooks.execute(args.intent);
  console.log('\nHere are your personalized book recommendations:\n');
  books.recommendations.forEach((book, index) => {
    console.log(`${index + 1}.`);
    console.log(formatBookRecommendation(book) + '\n');
  });
  if (savedTo) console.log(`Recommendations saved to ${savedTo}`);

  if (args.media === undefined) return;

  // --media is 1-based; an out-of-range number reaches the use case as a missing selection
  const media = await app.recommendMedia.execute(books.recommendations[args.media - 1]);
  console.log(`\nMedia recommendations based on "${media.book.title}":\n`);
  for (const panel of formatMediaRecommendations(media.media)) {
    console.log(panel + '\n');
  }
  if (media.savedTo) console.log(`Recommendations saved to ${media.savedTo}`);
}

main().catch((err) => {
  console.error('Failed to get recommendations:', err instanceof Error ? err.message : err);
  process.exit(1);
});
