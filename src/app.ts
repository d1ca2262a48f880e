import OpenAI from 'openai';
import { Config } from './config/validation';
import { ConfigurationError } from './core/errors';
import { Logger } from './core/services/Logger';
import { TextIntentNormalizer } from './core/services/IntentNormalizer';
import { RecommendationStore } from './core/repositories/RecommendationStore';
import { ConsoleLogger } from './adapters/logging/ConsoleLogger';
import { OpenAIStructuredClient, ResponsesClient } from './adapters/llm/OpenAIStructuredClient';
import { OpenAIBookRecommender } from './adapters/llm/OpenAIBookRecommender';
import { OpenAIMediaRecommender } from './adapters/llm/OpenAIMediaRecommender';
import { JsonFileRecommendationStore } from './adapters/storage/JsonFileRecommendationStore';
import { RecommendBooksUseCase } from './application/RecommendBooksUseCase';
import { RecommendMediaUseCase } from './application/RecommendMediaUseCase';

export interface Application {
  recommendBooks: RecommendBooksUseCase;
  recommendMedia: RecommendMediaUseCase;
}

export function createLogger(config: Config): ConsoleLogger {
  return new ConsoleLogger(config.logging.level, config.logging.filePath, {
    rotate: config.logging.rotate,
    maxSizeBytes: config.logging.maxSizeMB * 1024 * 1024,
    maxFiles: config.logging.maxFiles,
    console: config.logging.console,
  });
}

export function createStore(config: Config, logger: Logger): RecommendationStore {
  return new JsonFileRecommendationStore(config.output.directory, logger);
}

export function createOpenAIClient(config: Config): OpenAI {
  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY environment variable is required');
  }
  return new OpenAI({
    apiKey,
    baseURL: config.openai.baseURL,
    maxRetries: config.llm.maxRetries,
    timeout: config.llm.timeoutMs,
  });
}

// Wires concrete adapters into the use cases. `client` is swappable for tests.
export function createApplication(
  config: Config,
  logger: Logger,
  options: { save?: boolean; client?: ResponsesClient } = {}
): Application {
  const client = options.client ?? createOpenAIClient(config);

  logger.info(`LLM model: ${config.llm.model}`);
  const generator = new OpenAIStructuredClient(client, config.llm.model, logger, {
    temperature: config.llm.temperature,
    timeoutMs: config.llm.timeoutMs,
    maxOutputTokens: config.llm.maxOutputTokens,
  });

  const save = options.save ?? config.output.save;
  const store = save ? createStore(config, logger) : undefined;

  return {
    recommendBooks: new RecommendBooksUseCase(
      new TextIntentNormalizer(),
      new OpenAIBookRecommender(generator, logger),
      logger,
      store
    ),
    recommendMedia: new RecommendMediaUseCase(new OpenAIMediaRecommender(generator, logger), logger, store),
  };
}
