// utils/config.ts
import dotenv from 'dotenv';
import { z } from 'zod';
import logger from './logger';

dotenv.config();

const numberFromEnv = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().finite());

const positiveFromEnv = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().finite().positive());

const booleanFromEnv = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform((value) => value === 'true');

// Empty strings in .env mean "not set"
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

// Define the schema for our environment variables
const envSchema = z.object({
  PORT: positiveFromEnv('3001'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Completion Service
  // Optional at boot: a missing key is reported when generation is first needed.
  OPENAI_API_KEY: optionalSecret,
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_TEMPERATURE: numberFromEnv('0.7').pipe(z.number().min(0).max(2)),
  MAX_TOKENS: positiveFromEnv('1000'),

  // Search Providers
  NEWS_API_KEY: optionalSecret,
  GNEWS_API_KEY: optionalSecret,
  BRAVE_API_KEY: optionalSecret,
  MAX_SEARCH_RESULTS: positiveFromEnv('10'),
  RESEARCH_DAYS_BACK: positiveFromEnv('30'),

  // Research Cache
  CACHE_ENABLED: booleanFromEnv('true'),
  CACHE_TTL_HOURS: positiveFromEnv('24'),
  CACHE_BACKEND: z.enum(['file', 'redis']).default('file'),
  CACHE_DIR: z.string().min(1).default('data/cache'),
  REDIS_URL: optionalSecret,

  // HTTP
  CORS_ORIGINS: z.string().default(''),
  RATE_LIMIT_WINDOW_MS: positiveFromEnv('900000'), // 15 minutes
  RATE_LIMIT_MAX_API: positiveFromEnv('150'),
  RATE_LIMIT_MAX_GENERATION: positiveFromEnv('30'),
});

// Parse and validate
const parseConfig = () => {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    logger.error('❌ Invalid Environment Configuration:');
    result.error.issues.forEach((issue) => {
      logger.error(`   -> ${issue.path.join('.')}: ${issue.message}`);
    });
    process.exit(1);
  }
  return result.data;
};

const env = parseConfig();

// Comma-separated list; empty means "reflect any origin"
const getCorsOrigins = (): string[] | boolean => {
  const origins = env.CORS_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : true;
};

const config = {
  port: env.PORT,
  isProduction: env.NODE_ENV === 'production',
  isDevelopment: env.NODE_ENV === 'development',
  corsOrigins: getCorsOrigins(),

  completion: {
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    model: env.OPENAI_MODEL,
    temperature: env.OPENAI_TEMPERATURE,
    maxTokens: env.MAX_TOKENS,
  },

  keys: {
    newsApi: env.NEWS_API_KEY,
    gnews: env.GNEWS_API_KEY,
    brave: env.BRAVE_API_KEY,
  },

  research: {
    maxSearchResults: env.MAX_SEARCH_RESULTS,
    daysBack: env.RESEARCH_DAYS_BACK,
  },

  cache: {
    enabled: env.CACHE_ENABLED,
    ttlHours: env.CACHE_TTL_HOURS,
    backend: env.CACHE_BACKEND,
    dir: env.CACHE_DIR,
  },

  redisUrl: env.REDIS_URL,

  rateLimit: {
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    maxApi: env.RATE_LIMIT_MAX_API,
    maxGeneration: env.RATE_LIMIT_MAX_GENERATION,
  },
};

export type AppConfig = typeof config;

logger.info('✅ Configuration Validated & Loaded');

export default config;
