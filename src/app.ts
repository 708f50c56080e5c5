import cors from 'cors';
import express from 'express';

import { AuthConfig, HttpStatus, ServerConfig } from './config';
import { requireWriteAuth } from './middleware/auth';
import { requestLogger } from './middleware/requestLogger';
import { requestTimeout } from './middleware/requestTimeout';
import { createTransformRouter } from './routes/transform';

import type { TransformControllerOptions } from './controllers/transform';

const corsOptions = {
  allowedHeaders: ['Content-Type', 'Authorization', AuthConfig.headerName],
  methods: ['GET', 'POST', 'OPTIONS'],
  origin: '*',
};

/**
 * Build the Express application. Listening is left to the caller.
 */
export function createApp(options: TransformControllerOptions): express.Express {
  const app = express();
  app.disable('x-powered-by'); // Prevent version disclosure

  // eslint-disable-next-line sonarjs/cors -- CORS is intentionally enabled for API access
  app.use(cors(corsOptions));
  app.use(express.json({ limit: ServerConfig.bodyLimit }));

  // Request logging first: later middleware logs through req.log
  app.use(requestLogger);
  app.use(requestTimeout);

  app.use('/api', requireWriteAuth, createTransformRouter(options));

  app.get('/health', (_req: express.Request, res: express.Response) => {
    res.status(HttpStatus.OK).send('OK');
  });

  return app;
}
