/**
 * Sessions API Routes
 */

import { Hono } from 'hono';
import { formatErrorForLog } from '../../errors/index.js';
import type { ChatRepository } from '../../integrations/persistence/chat-repository.js';
import type { StructuredLogger } from '../../integrations/utilities/logger.js';
import { jsonError, parseLimit } from '../http.js';

export const DEFAULT_MESSAGE_LIMIT = 50;

export function createSessionsRoutes(repository: ChatRepository, logger: StructuredLogger): Hono {
  const routes = new Hono();

  // Session document with its message count
  routes.get('/:sessionId', async (c) => {
    const sessionId = c.req.param('sessionId');
    try {
      const session = await repository.getSessionOverview(sessionId);
      if (!session) {
        return jsonError(c, 404, 'Session not found');
      }
      return c.json({ success: true, data: session });
    } catch (err) {
      logger.error('Failed to load session', { sessionId, error: formatErrorForLog(err) });
      return jsonError(c, 500, 'Failed to load session');
    }
  });

  // Messages, oldest first
  routes.get('/:sessionId/messages', async (c) => {
    const sessionId = c.req.param('sessionId');
    const limit = parseLimit(c.req.query('limit'), DEFAULT_MESSAGE_LIMIT);
    try {
      const messages = await repository.getMessages(sessionId, limit);
      return c.json({ success: true, data: messages });
    } catch (err) {
      logger.error('Failed to list messages', { sessionId, error: formatErrorForLog(err) });
      return jsonError(c, 500, 'Failed to list messages');
    }
  });

  return routes;
}
