import express from 'express';
import cors from 'cors';
import { createSearchRouter } from './routes/search.js';
import type { SearchConfig } from './types.js';

export interface AppOptions {
  search: SearchConfig;
  corsOrigin?: string;
}

export function createApp(options: AppOptions) {
  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (options.corsOrigin ? options.corsOrigin.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        if (allowedOrigins.length === 0) return callback(null, true);

        const normalized = normalizeOrigin(origin);
        return callback(null, allowedOrigins.includes(normalized));
      }
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(createSearchRouter(options.search));

  return app;
}
