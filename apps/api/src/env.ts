import { z } from 'zod';
import { DEFAULT_THRESHOLDS } from './search/filter.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),

  WALLAPOP_API_BASE_URL: z.string().url().default('https://api.wallapop.com/api/v3/search'),
  WALLAPOP_WEB_BASE_URL: z.string().url().default('https://it.wallapop.com'),

  SEARCH_LATITUDE: z.coerce.number().min(-90).max(90).default(43.318611),
  SEARCH_LONGITUDE: z.coerce.number().min(-180).max(180).default(11.330556),

  FUZZY_TITLE_THRESHOLD: z.coerce.number().min(0).max(100).default(DEFAULT_THRESHOLDS.title),
  FUZZY_DESCRIPTION_THRESHOLD: z.coerce.number().min(0).max(100).default(DEFAULT_THRESHOLDS.description),
  FUZZY_EXCLUDED_THRESHOLD: z.coerce.number().min(0).max(100).default(DEFAULT_THRESHOLDS.excluded),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  HTTP_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  HTTP_BACKOFF_MS: z.coerce.number().int().min(0).default(500)
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}
