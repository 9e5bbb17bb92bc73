// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';
import { ConfigurationError } from '../errors';
import logger from '../utils/logger';

export type InferenceProvider = 'openai' | 'groq';
export type StoreDriver = 'mongodb' | 'redis' | 'memory';

export interface AppConfig {
  PORT: number;
  NODE_ENV: string;
  API_VERSION: string;
  PROJECT_NAME: string;
  INFERENCE_PROVIDER: InferenceProvider;
  OPENAI_API_KEY: string;
  GROQ_API_KEY: string;
  MODEL_NAME: string;
  DEFAULT_TEMPERATURE: number;
  MAX_TOKENS: number;
  HISTORY_WINDOW: number;
  CONVERSATION_STORE: StoreDriver;
  MONGODB_URL: string;
  DATABASE_NAME: string;
  REDIS_URL: string;
  CORS_ORIGINS: string[];
  RESEARCH_MODEL: string;
  SERPAPI_API_KEY: string;
  SEARCH_RESULTS: number;
}

type Env = Record<string, string | undefined>;

let dotenvLoaded = false;

/**
 * Loads `.env` from the project root once. Variables already present in the
 * environment win over the file.
 */
export function initialiseEnv(): void {
  if (dotenvLoaded) return;
  // src/config -> project root
  const projectRootEnvPath = path.resolve(__dirname, '../../.env');
  const result = dotenv.config({ path: projectRootEnvPath });
  if (result.error) {
    logger.warn(`[config] No .env file loaded from ${projectRootEnvPath}; relying on process environment`);
  }
  dotenvLoaded = true;
}

// Helper to get environment variables with defaults and critical checks
const getEnvVar = (env: Env, key: string, defaultValue?: string, isCritical: boolean = false): string => {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    if (defaultValue !== undefined) {
      logger.debug(`[config] ${key} is not set, using default value '${defaultValue}'`);
      return defaultValue;
    }
    if (isCritical) {
      throw new ConfigurationError(`Environment variable ${key} is missing or empty and has no default`);
    }
    return '';
  }
  return value.trim();
};

const getNumber = (env: Env, key: string, defaultValue: number, { integer = false } = {}): number => {
  const raw = getEnvVar(env, key, String(defaultValue));
  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new ConfigurationError(`Environment variable ${key} must be ${integer ? 'an integer' : 'a number'}, got '${raw}'`);
  }
  return value;
};

function oneOf<T extends string>(key: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ConfigurationError(`Environment variable ${key} must be one of ${allowed.join(', ')}, got '${value}'`);
  }
  return match;
}

/**
 * Builds the application configuration from an environment map. Pure apart
 * from debug logging, so tests can pass a plain object.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const provider = oneOf('INFERENCE_PROVIDER', getEnvVar(env, 'INFERENCE_PROVIDER', 'openai'), ['openai', 'groq'] as const);

  const config: AppConfig = {
    PORT: getNumber(env, 'PORT', 8080, { integer: true }),
    NODE_ENV: getEnvVar(env, 'NODE_ENV', 'development'),
    API_VERSION: getEnvVar(env, 'API_VERSION', 'v1'),
    PROJECT_NAME: getEnvVar(env, 'PROJECT_NAME', 'Smart Chatbot API'),
    INFERENCE_PROVIDER: provider,
    OPENAI_API_KEY: getEnvVar(env, 'OPENAI_API_KEY', undefined, provider === 'openai'),
    GROQ_API_KEY: getEnvVar(env, 'GROQ_API_KEY', undefined, provider === 'groq'),
    MODEL_NAME: getEnvVar(env, 'MODEL_NAME', 'gpt-3.5-turbo'),
    DEFAULT_TEMPERATURE: getNumber(env, 'DEFAULT_TEMPERATURE', 0.7),
    MAX_TOKENS: getNumber(env, 'MAX_TOKENS', 1000, { integer: true }),
    HISTORY_WINDOW: getNumber(env, 'HISTORY_WINDOW', 10, { integer: true }),
    CONVERSATION_STORE: oneOf('CONVERSATION_STORE', getEnvVar(env, 'CONVERSATION_STORE', 'mongodb'), ['mongodb', 'redis', 'memory'] as const),
    MONGODB_URL: getEnvVar(env, 'MONGODB_URL', 'mongodb://localhost:27017'),
    DATABASE_NAME: getEnvVar(env, 'DATABASE_NAME', 'smart_chatbot'),
    REDIS_URL: getEnvVar(env, 'REDIS_URL', 'redis://localhost:6379'),
    CORS_ORIGINS: getEnvVar(env, 'CORS_ORIGINS', '*')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    RESEARCH_MODEL: getEnvVar(env, 'RESEARCH_MODEL', 'gpt-4o-mini'),
    SERPAPI_API_KEY: getEnvVar(env, 'SERPAPI_API_KEY'),
    SEARCH_RESULTS: getNumber(env, 'SEARCH_RESULTS', 5, { integer: true }),
  };

  if (config.HISTORY_WINDOW < 0) {
    throw new ConfigurationError('HISTORY_WINDOW must not be negative');
  }

  return Object.freeze(config);
}
