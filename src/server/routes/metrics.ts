/**
 * Metrics and health routes: per-session request metrics, store health
 * and process-wide vitals.
 */

import { Hono } from 'hono';
import { formatErrorForLog } from '../../errors/index.js';
import type { ChatRepository } from '../../integrations/persistence/chat-repository.js';
import type { DocumentStore } from '../../integrations/persistence/document-store.js';
import type { StructuredLogger } from '../../integrations/utilities/logger.js';
import { systemClock, toIsoString, type Clock } from '../../integrations/utilities/time.js';
import { jsonError } from '../http.js';

export interface MetricsRouteDeps {
  store: DocumentStore;
  repository: ChatRepository;
  logger: StructuredLogger;
  clock?: Clock;
  /** Epoch ms the process started serving */
  startedAt: number;
}

export function createMetricsRoutes(deps: MetricsRouteDeps): Hono {
  const routes = new Hono();
  const clock = deps.clock ?? systemClock;

  routes.get('/metrics/:sessionId', async (c) => {
    const sessionId = c.req.param('sessionId');
    try {
      const metrics = await deps.repository.getSessionMetrics(sessionId);
      return c.json({ success: true, data: metrics });
    } catch (err) {
      deps.logger.error('Failed to load metrics', { sessionId, error: formatErrorForLog(err) });
      return jsonError(c, 500, 'Failed to load metrics');
    }
  });

  routes.get('/health', async (c) => {
    const connected = await deps.store.ping();
    return c.json(
      {
        status: connected ? 'healthy' : 'unhealthy',
        database: connected ? 'connected' : 'disconnected',
        timestamp: toIsoString(clock.now()),
      },
      connected ? 200 : 503,
    );
  });

  routes.get('/vitals', async (c) => {
    try {
      const vitals = await deps.repository.getVitals();
      return c.json({
        success: true,
        data: {
          uptimeSeconds: Math.floor((clock.now() - deps.startedAt) / 1000),
          ...vitals,
        },
      });
    } catch (err) {
      deps.logger.error('Failed to load vitals', { error: formatErrorForLog(err) });
      return jsonError(c, 500, 'Failed to load vitals');
    }
  });

  return routes;
}
