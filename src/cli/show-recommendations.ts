#!/usr/bin/env node

import { config } from '../config';
import { createLogger, createStore } from '../app';
import { formatBookRecommendation, formatMediaRecommendations } from './formatters';

async function showRecommendations(filePath: string) {
  const logger = createLogger(config);
  const saved = await createStore(config, logger).load(filePath);

  if (saved.kind === 'books') {
    console.log(`Book recommendations from ${filePath}:\n`);
    for (const book of saved.books.recommendations) {
      console.log(formatBookRecommendation(book) + '\n');
    }
    return;
  }

  console.log(`Media recommendations from ${filePath}:\n`);
  for (const panel of formatMediaRecommendations(saved.media)) {
    console.log(panel + '\n');
  }
}

const filePath = process.argv[2];

if (!filePath) {
  console.error('Usage: npm run show -- <file-path>');
  console.error('Example: npm run show -- recommendations_20240101_120000.json');
  process.exit(1);
}

showRecommendations(filePath).catch((err) => {
  console.error('Error reading saved recommendations:', err instanceof Error ? err.message : err);
  process.exit(1);
});
