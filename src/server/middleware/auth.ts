import type { MiddlewareHandler } from 'hono';
import { jsonError } from '../http.js';

export const MISSING_CREDENTIALS = 'Missing authorization header or token parameter';
export const INVALID_TOKEN = 'Invalid token';

/**
 * Extract a bearer token from an Authorization header value.
 */
export function parseBearer(header: string | undefined): string | null {
  if (!header) return null;
  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') return null;
  return parts[1];
}

/**
 * Bearer token check. The `token` query parameter is accepted as a fallback
 * for EventSource clients, which cannot set headers.
 */
export function createAuthMiddleware(apiToken: string): MiddlewareHandler {
  return async (c, next) => {
    const header = c.req.header('authorization');
    const queryToken = c.req.query('token');

    if (parseBearer(header) === apiToken || queryToken === apiToken) {
      await next();
      return;
    }

    if (!header && !queryToken) {
      return jsonError(c, 401, MISSING_CREDENTIALS);
    }
    return jsonError(c, 401, INVALID_TOKEN);
  };
}
