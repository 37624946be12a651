import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import type { ProcessEngine } from '@core/engine';
import { errorHandler, requestLogger } from './middleware/index';
import apiRouter from './routes/index';

export interface AppOptions {
  clientUrl: string;
  /** Request logging; off in tests. */
  logRequests?: boolean;
}

export function createApp(engine: ProcessEngine, options: AppOptions) {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: options.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  if (options.logRequests ?? true) app.use(requestLogger);

  app.locals.engine = engine;
  app.use(API_PREFIX, apiRouter);
  app.use(errorHandler);

  return app;
}
