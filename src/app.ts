import express, { type Express } from 'express';
import { Logger } from './logger.js';
import { cors, errorHandler, notFound, requestLogger } from './middleware.js';
import { stringsRouter } from './routes/strings.js';
import type { StringStore } from './store.js';

export const SERVICE_NAME = 'String Facets API';

export interface AppOptions {
  store: StringStore;
  logger?: Logger;
  /** Add permissive CORS headers (default: true) */
  cors?: boolean;
  /** Largest accepted JSON body, in body-parser notation (default: 1mb) */
  bodyLimit?: string;
}

export function createApp(options: AppOptions): Express {
  const logger = options.logger ?? new Logger({ namespace: 'http' });
  const app = express();

  app.use(requestLogger(logger));
  if (options.cors ?? true) {
    app.use(cors());
  }
  app.use(express.json({ limit: options.bodyLimit ?? '1mb' }));

  // Health check
  app.get('/', (_req, res) => {
    res.status(200).json({ status: `${SERVICE_NAME} is running` });
  });

  app.use('/strings', stringsRouter(options.store, logger));

  app.use(notFound);
  app.use(errorHandler(logger));

  return app;
}
