/**
 * HTTP application
 *
 * Hono app serving the chat stream and the read-only session, suggestion,
 * metrics and health endpoints.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as accessLogger } from 'hono/logger';
import type { ServerConfig } from '../config/schema.js';
import type { DocumentStore } from '../integrations/persistence/document-store.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import { systemClock, type Clock } from '../integrations/utilities/time.js';
import type { ChatService } from '../service/chat-service.js';
import { jsonError } from './http.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { createChatRoutes } from './routes/chat.js';
import { createMetricsRoutes } from './routes/metrics.js';
import { createSessionsRoutes } from './routes/sessions.js';
import { createSuggestionsRoutes } from './routes/suggestions.js';

export interface AppDeps {
  chat: ChatService;
  store: DocumentStore;
  logger?: StructuredLogger;
  clock?: Clock;
}

export function createApp(deps: AppDeps, config: ServerConfig): Hono {
  const log = deps.logger ?? createComponentLogger('http');
  const clock = deps.clock ?? systemClock;
  const repository = deps.chat.repository;

  const app = new Hono();

  // Middleware
  app.use('*', accessLogger((message, ...rest) => log.debug(message, rest.length > 0 ? { rest } : undefined)));
  app.use(
    '*',
    cors({
      origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization'],
    }),
  );

  if (config.apiToken) {
    app.use('/chat/*', createAuthMiddleware(config.apiToken));
  } else {
    log.warn('No API token configured; /chat endpoints are unauthenticated');
  }

  // API routes
  app.route('/chat', createChatRoutes({ chat: deps.chat, logger: log }));
  app.route('/sessions', createSessionsRoutes(repository, log));
  app.route('/suggestions', createSuggestionsRoutes(repository, log));
  app.route(
    '/',
    createMetricsRoutes({ store: deps.store, repository, logger: log, clock, startedAt: clock.now() }),
  );

  app.notFound((c) => jsonError(c, 404, 'Not found'));
  app.onError((err, c) => {
    log.error('Unhandled route error', { path: c.req.path, error: err.message });
    return jsonError(c, 500, 'Internal server error');
  });

  return app;
}
