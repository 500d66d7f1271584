import type { MiddlewareHandler } from 'hono';
import { AppError } from '../errors.js';

const BEARER = /^Bearer\s+(\S+)$/i;

const unauthorized = (message: string, suggestion: string) =>
  new AppError('UNAUTHORIZED', message, 401, suggestion);

/**
 * Bearer-key guard for the planning endpoints. With no key configured every
 * request passes, which is how the API runs locally.
 */
export function apiKeyAuth(apiKey: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    if (!apiKey) {
      await next();
      return;
    }

    const header = c.req.header('Authorization');
    if (!header) {
      throw unauthorized('Missing Authorization header', 'Send Authorization: Bearer <api-key>');
    }

    const token = BEARER.exec(header)?.[1];
    if (token === undefined) {
      throw unauthorized('Authorization header is not a bearer token', 'Use the Bearer scheme');
    }
    if (token !== apiKey) {
      throw unauthorized('Invalid API key', 'Check the key configured in DEBT_PLANNER_API_KEY');
    }

    await next();
  };
}
