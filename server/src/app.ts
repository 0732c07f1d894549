import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { env } from './config/env';
import { cacheService } from './services/CacheService';
import { createErrorHandler } from './middleware/errorHandler.middleware';
import scanRoutes from './routes/scan.routes';
import { createLogger } from './utils/logger';

const logger = createLogger(env.LOG_LEVEL);
const app = express();

// ── Security headers ─────────────────────────────────────────────────────────
app.use(
  helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: { maxAge: 31_536_000, includeSubDomains: true },
  }),
);

// ── CORS ─────────────────────────────────────────────────────────────────────
app.use(
  cors({
    origin: env.CORS_ORIGIN,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }),
);

// ── Body parsing & compression ────────────────────────────────────────────────
app.use(express.json({ limit: '100kb' }));
app.use(compression());

// ── Logging ───────────────────────────────────────────────────────────────────
if (env.NODE_ENV !== 'test') {
  app.use(morgan('combined'));
}

// ── Rate limiting ─────────────────────────────────────────────────────────────
const limiter = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  max: env.RATE_LIMIT_MAX_REQUESTS,
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later.' },
});
app.use('/api/', limiter);

// ── Health checks ─────────────────────────────────────────────────────────────
app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.get('/api/health/cache', (_req, res) => {
  res.json({
    status: 'ok',
    backend: cacheService.backendKind,
    timestamp: new Date().toISOString(),
  });
});

// ── Routes ────────────────────────────────────────────────────────────────────
app.use('/api/v1', scanRoutes);

// ── 404 catch-all ─────────────────────────────────────────────────────────────
app.use((_req, res) => {
  res.status(404).json({ error: 'Not found' });
});

app.use(createErrorHandler(logger.child('http')));

// ── Startup ───────────────────────────────────────────────────────────────────
async function start(): Promise<void> {
  await cacheService.connect();

  app.listen(env.PORT, () => {
    logger.info(`Server listening on http://localhost:${env.PORT}`);
    logger.info(`NODE_ENV: ${env.NODE_ENV}`);
    logger.info(`Cache backend: ${cacheService.backendKind}`);
  });
}

if (require.main === module) {
  start().catch((err: unknown) => {
    logger.error('Failed to start server', err);
    process.exit(1);
  });
}

export { app };
