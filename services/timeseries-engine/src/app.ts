import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import { cfg } from './config/index.js';
import type { TimeseriesEngine } from './engine.js';
import { errorHandler } from './middleware/error.js';
import { requestId } from './middleware/request-id.js';
import { apiRouter, type ApiOptions } from './routes/index.js';
import { logger } from './utils/logger.js';

export function buildApp(engine: TimeseriesEngine, opts: ApiOptions) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: true, credentials: false }));
  app.use(express.json({ limit: '5mb' }));
  app.use(requestId);

  if (cfg.env !== 'production') {
    // dev-friendly HTTP logs
    app.use(pinoHttp({ logger, autoLogging: true }));
  }

  app.use(cfg.apiPrefix, apiRouter(engine, opts));

  // Global error handler
  app.use(errorHandler);

  return app;
}
