import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { strategyRoutes } from './routes/strategy.js';
import { apiKeyAuth } from './middleware/auth.js';
import { toAppError } from './errors.js';

export const API_VERSION = '0.1.0';

export interface AppOptions {
  /** Required bearer key for /api/v1/*; unset leaves the API open. */
  apiKey?: string;
}

export function createApp(options: AppOptions = {}) {
  const app = new Hono();

  app.use('*', cors());
  app.use('*', logger());

  app.onError((err, c) => {
    const appError = toAppError(err);
    return c.json(
      {
        error: {
          code: appError.code,
          message: appError.message,
          suggestion: appError.suggestion,
        },
      },
      appError.status,
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: API_VERSION }));

  app.use('/api/v1/*', apiKeyAuth(options.apiKey));

  app.route('/api/v1/strategy', strategyRoutes());

  return app;
}
