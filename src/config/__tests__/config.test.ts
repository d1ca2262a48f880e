import { loadConfig } from '../index';
import { ConfigurationError } from '../../core/errors';

describe('loadConfig', () => {
  it('fills in defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe('development');
    expect(config.openai.apiKey).toBeUndefined();
    expect(config.llm).toEqual({
      model: 'gpt-4o-mini',
      temperature: 0.7,
      timeoutMs: 60000,
      maxOutputTokens: 4096,
      maxRetries: 0,
    });
    expect(config.output).toEqual({ save: true, directory: '.' });
    expect(config.logging).toEqual({
      level: 'info',
      filePath: './logs/app.log',
      console: false,
      rotate: 'size',
      maxSizeMB: 5,
      maxFiles: 3,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
      LLM_MODEL: 'gpt-4.1-mini',
      LLM_TEMPERATURE: '0.2',
      LLM_MAX_RETRIES: '2',
      SAVE_RESULTS: 'false',
      OUTPUT_DIR: './out',
      LOG_LEVEL: 'debug',
      LOG_CONSOLE: 'TRUE',
      LOG_ROTATE: 'none',
    });

    expect(config.openai).toEqual({ apiKey: 'test-secret', baseURL: 'http://localhost:8080/v1' });
    expect(config.llm.model).toBe('gpt-4.1-mini');
    expect(config.llm.temperature).toBe(0.2);
    expect(config.llm.maxRetries).toBe(2);
    expect(config.output).toEqual({ save: false, directory: './out' });
    expect(config.logging.level).toBe('debug');
    expect(config.logging.console).toBe(true);
    expect(config.logging.rotate).toBe('none');
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ OPENAI_API_KEY: '  ', LLM_TIMEOUT_MS: '', SAVE_RESULTS: ' ' });

    expect(config.openai.apiKey).toBeUndefined();
    expect(config.llm.timeoutMs).toBe(60000);
    expect(config.output.save).toBe(true);
  });

  it('disables the log file when LOG_FILE is empty', () => {
    expect(loadConfig({ LOG_FILE: '' }).logging.filePath).toBeUndefined();
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid configuration: logging\.level: /);
  });

  it('rejects an output budget above the cap', () => {
    expect(() => loadConfig({ LLM_MAX_OUTPUT_TOKENS: '50000' })).toThrow(/llm\.maxOutputTokens/);
  });
});
