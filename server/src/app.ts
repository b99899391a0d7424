import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { env } from './config/env';
import { errorHandler } from './middleware/errorHandler.middleware';
import { cacheStore, CacheStore } from './services/CacheStore';
import { createAdminRouter } from './routes/admin.routes';
import { createHealthRouter } from './routes/health.routes';
import { createProjectsRouter } from './routes/projects.routes';
import { createPropertiesRouter } from './routes/properties.routes';
import { createSearchRouter } from './routes/search.routes';

export function createApp(store: CacheStore = cacheStore): Express {
  const app = express();

  // ── Security headers ────────────────────────────────────────────────────────
  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: 'cross-origin' },
      hsts: { maxAge: 31_536_000, includeSubDomains: true, preload: true },
    }),
  );

  // ── CORS ─────────────────────────────────────────────────────────────────────
  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      methods: ['GET', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    }),
  );

  // ── Compression ──────────────────────────────────────────────────────────────
  app.use(compression());

  // ── Logging ───────────────────────────────────────────────────────────────────
  if (env.NODE_ENV !== 'test') {
    app.use(morgan('combined'));
  }

  // ── Rate limiting ─────────────────────────────────────────────────────────────
  app.use(
    rateLimit({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX_REQUESTS,
      standardHeaders: true,
      legacyHeaders: false,
      message: { status: 'error', message: 'Too many requests, please try again later.' },
    }),
  );

  // ── Routes ────────────────────────────────────────────────────────────────────
  app.use(createHealthRouter(store));
  app.use(createProjectsRouter(store));
  app.use(createSearchRouter(store));
  app.use(createPropertiesRouter(store));
  app.use(createAdminRouter(store));

  // ── 404 catch-all ─────────────────────────────────────────────────────────────
  app.use((_req, res) => {
    res.status(404).json({ status: 'error', message: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}

// ── Startup ───────────────────────────────────────────────────────────────────
function start(): void {
  const app = createApp();

  app.listen(env.PORT, () => {
    console.info(`Server listening on http://localhost:${env.PORT}`);
    console.info(`   NODE_ENV: ${env.NODE_ENV}`);

    if (env.WARM_CACHE_ON_START) {
      console.info('   Warming cache in the background');
      cacheStore.ensureInitialized();
    }
  });
}

if (require.main === module) {
  start();
}
