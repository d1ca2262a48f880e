#!/usr/bin/env node

import { config } from './config';
import { createApplication, createLogger } from './app';
import { ReadlinePrompter } from './adapters/console/ReadlinePrompter';
import { InteractiveSession, describeError } from './cli/InteractiveSession';

async function main() {
  // Initialize logger first
  const logger = createLogger(config);
  const prompter = new ReadlinePrompter();

  try {
    logger.info('Starting interactive recommendation session...');
    logger.info(`Environment: ${config.nodeEnv}`);

    const app = createApplication(config, logger);
    const session = new InteractiveSession(prompter, app.recommendBooks, app.recommendMedia);
    await session.run();
    logger.info('Session finished');
  } catch (error) {
    logger.error('Error running application:', error);
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  } finally {
    prompter.close();
  }
}

main().catch((err) => {
  console.error('Unexpected failure:', err);
  process.exit(1);
});
