import { describe, it, expect } from 'vitest';
import { loadConfig } from './index';
import { ConfigurationError } from '../errors';

describe('loadConfig', () => {
  it('fills in defaults around the required key', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });

    expect(config).toMatchObject({
      PORT: 8080,
      INFERENCE_PROVIDER: 'openai',
      OPENAI_API_KEY: 'test-secret',
      MODEL_NAME: 'gpt-3.5-turbo',
      DEFAULT_TEMPERATURE: 0.7,
      MAX_TOKENS: 1000,
      HISTORY_WINDOW: 10,
      CONVERSATION_STORE: 'mongodb',
      DATABASE_NAME: 'smart_chatbot',
      CORS_ORIGINS: ['*'],
      SERPAPI_API_KEY: '',
      SEARCH_RESULTS: 5,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('requires the key of the selected provider only', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({ OPENAI_API_KEY: '   ' })).toThrow('OPENAI_API_KEY');

    const groq = loadConfig({ INFERENCE_PROVIDER: 'groq', GROQ_API_KEY: 'test-secret' });
    expect(groq.GROQ_API_KEY).toBe('test-secret');
    expect(groq.OPENAI_API_KEY).toBe('');
  });

  it('parses numbers and comma-separated origins', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      PORT: '3000',
      DEFAULT_TEMPERATURE: '0',
      CORS_ORIGINS: 'http://a.test, http://b.test,',
    });
    expect(config.PORT).toBe(3000);
    expect(config.DEFAULT_TEMPERATURE).toBe(0);
    expect(config.CORS_ORIGINS).toEqual(['http://a.test', 'http://b.test']);
  });

  it.each([
    [{ PORT: 'eighty' }, "Environment variable PORT must be an integer, got 'eighty'"],
    [{ MAX_TOKENS: '12.5' }, "Environment variable MAX_TOKENS must be an integer, got '12.5'"],
    [{ CONVERSATION_STORE: 'sqlite' }, "Environment variable CONVERSATION_STORE must be one of mongodb, redis, memory, got 'sqlite'"],
    [{ HISTORY_WINDOW: '-1' }, 'HISTORY_WINDOW must not be negative'],
  ])('rejects %o', (overrides, message) => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-secret', ...overrides })).toThrow(message);
  });
});
