/**
 * Suggestions API Routes
 */

import { Hono } from 'hono';
import { formatErrorForLog } from '../../errors/index.js';
import type { ChatRepository } from '../../integrations/persistence/chat-repository.js';
import type { StructuredLogger } from '../../integrations/utilities/logger.js';
import { jsonError, parseLimit } from '../http.js';

export const DEFAULT_SUGGESTION_LIMIT = 10;

export function createSuggestionsRoutes(repository: ChatRepository, logger: StructuredLogger): Hono {
  const routes = new Hono();

  // Newest first
  routes.get('/session/:sessionId', async (c) => {
    const sessionId = c.req.param('sessionId');
    const limit = parseLimit(c.req.query('limit'), DEFAULT_SUGGESTION_LIMIT);
    try {
      const suggestions = await repository.getSessionSuggestions(sessionId, limit);
      return c.json({ success: true, data: suggestions });
    } catch (err) {
      logger.error('Failed to list suggestions', { sessionId, error: formatErrorForLog(err) });
      return jsonError(c, 500, 'Failed to list suggestions');
    }
  });

  routes.get('/:messageId', async (c) => {
    const messageId = c.req.param('messageId');
    try {
      const suggestions = await repository.getSuggestions(messageId);
      if (!suggestions) {
        return jsonError(c, 404, 'Suggestions not found');
      }
      return c.json({ success: true, data: suggestions });
    } catch (err) {
      logger.error('Failed to load suggestions', { messageId, error: formatErrorForLog(err) });
      return jsonError(c, 500, 'Failed to load suggestions');
    }
  });

  return routes;
}
