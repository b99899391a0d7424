import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(8080),

  // Airtable
  AIRTABLE_API_KEY: z.string().min(1, 'AIRTABLE_API_KEY is required'),
  AIRTABLE_BASE_URL: z.string().url().default('https://api.airtable.com/v0'),
  AIRTABLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  AIRTABLE_VIEW: z.string().default('Production'),
  AIRTABLE_RATE_LIMIT_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
  PROJECTS_BASE_ID: z.string().min(1, 'PROJECTS_BASE_ID is required'),
  INVENTORY_BASE_ID: z.string().min(1, 'INVENTORY_BASE_ID is required'),
  RESIDENTIAL_PROJECTS_TABLE_ID: z.string().default('residential projects'),
  COMMERCIAL_PROJECTS_TABLE_ID: z.string().min(1, 'COMMERCIAL_PROJECTS_TABLE_ID is required'),
  RESIDENTIAL_PROPERTIES_TABLE_ID: z.string().min(1, 'RESIDENTIAL_PROPERTIES_TABLE_ID is required'),
  COMMERCIAL_PROPERTIES_TABLE_ID: z.string().min(1, 'COMMERCIAL_PROPERTIES_TABLE_ID is required'),
  LOCALITIES_TABLE_ID: z.string().min(1, 'LOCALITIES_TABLE_ID is required'),

  // Cache population
  FETCH_BACKOFF_MS: z.coerce.number().int().min(0).default(10_000),
  WARM_CACHE_ON_START: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),

  // JWT (admin refresh trigger)
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(300),

  // CORS
  CORS_ORIGIN: z.string().default('*'),
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
