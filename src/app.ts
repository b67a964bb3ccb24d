import cors from 'cors';
import express from 'express';

import { CorsConfig, HttpStatus, ServerConfig } from './config';
import { requireApiAuth } from './middleware/auth';
import { createRequestLogger } from './middleware/requestLogger';
import exportRouter from './routes/export';
import { logger as defaultLogger } from './utils/logger';

import type { Logger } from './utils/logger';

/**
 * Resolve allowed CORS origins from the environment.
 * Unset or '*' allows every origin.
 */
function resolveCorsOrigin(): string | string[] {
  const origins = process.env[CorsConfig.originsEnvVar];
  if (!origins || origins.trim() === '*') return '*';
  return origins
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

/**
 * Build the express application without binding a port.
 */
export function createApp(logger: Logger = defaultLogger): express.Express {
  const app = express();
  app.disable('x-powered-by'); // Prevent version disclosure

  app.use(
    cors({
      allowedHeaders: [...CorsConfig.allowedHeaders],
      methods: [...CorsConfig.allowedMethods],
      origin: resolveCorsOrigin(),
    }),
  );

  app.use(express.json({ limit: ServerConfig.bodyLimit }));

  // Request logging runs before auth so rejected requests are traced too
  app.use(createRequestLogger(logger));

  app.use('/api/export', requireApiAuth, exportRouter);

  app.get('/health', (_req: express.Request, res: express.Response) => {
    res.status(HttpStatus.OK).send('OK');
  });

  return app;
}
