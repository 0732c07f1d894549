import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { CONFIG } from './constants';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(4000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Location search API
  LOCATOR_API_URL: z
    .string()
    .url()
    .default('https://prod-cdn.us.yextapis.com/v2/accounts/me/search/query'),
  LOCATOR_API_KEY: z.string().min(1, 'LOCATOR_API_KEY is required'),

  // Retailer catalogue, relative to the working directory
  RETAILERS_FILE: z.string().default('server/config/retailers.json'),

  // Outbound proxy used by non-direct retailer proxy modes
  PROXY_URL: z.string().url().optional(),

  // Cache
  CACHE_BACKEND: z.enum(['file', 'memory', 'redis']).default('file'),
  CACHE_DIR: z.string().default('data'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  RESPONSE_CACHE_TTL_DAYS: z.coerce.number().min(0).default(CONFIG.CACHE.RESPONSE_CACHE_TTL_DAYS),

  // HTTP retry policy
  HTTP_MAX_RETRIES: z.coerce.number().int().positive().default(CONFIG.HTTP.MAX_RETRIES),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(CONFIG.HTTP.TIMEOUT_MS),
  RATE_LIMIT_BASE_WAIT_MS: z.coerce.number().int().min(0).default(CONFIG.HTTP.RATE_LIMIT_BASE_WAIT_MS),
  SERVER_ERROR_WAIT_MS: z.coerce.number().int().min(0).default(CONFIG.HTTP.SERVER_ERROR_WAIT_MS),

  // JWT
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(100),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }
  return parsed.data;
}

export const env = loadEnv();
