import dotenv from 'dotenv';
import { configSchema, Config } from './validation';
import { ConfigurationError } from '../core/errors';
import { formatIssues } from '../core/services/ResultValidator';

// Load environment variables based on NODE_ENV
const envFile = process.env.NODE_ENV === 'production'
  ? '.env.production'
  : '.env.dev';
dotenv.config({ path: envFile });

type Env = Record<string, string | undefined>;

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim().toLowerCase() === 'true';
}

// Blank values fall through to schema defaults instead of failing number coercion.
function optional(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadConfig(env: Env = process.env): Config {
  const logFile = env.LOG_FILE ?? './logs/app.log';
  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV || 'development',
    openai: {
      apiKey: optional(env.OPENAI_API_KEY),
      baseURL: optional(env.OPENAI_BASE_URL),
    },
    llm: {
      model: optional(env.LLM_MODEL),
      temperature: optional(env.LLM_TEMPERATURE),
      timeoutMs: optional(env.LLM_TIMEOUT_MS),
      maxOutputTokens: optional(env.LLM_MAX_OUTPUT_TOKENS),
      maxRetries: optional(env.LLM_MAX_RETRIES),
    },
    output: {
      save: flag(env.SAVE_RESULTS, true),
      directory: optional(env.OUTPUT_DIR),
    },
    logging: {
      level: optional(env.LOG_LEVEL),
      filePath: logFile.trim() === '' ? undefined : logFile,
      console: flag(env.LOG_CONSOLE, false),
      rotate: optional(env.LOG_ROTATE),
      maxSizeMB: optional(env.LOG_MAX_SIZE_MB),
      maxFiles: optional(env.LOG_MAX_FILES),
    },
  });
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error).join('; ')}`);
  }
  return result.data;
}

export const config: Config = loadConfig();
