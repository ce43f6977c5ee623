/**
 * Chat API Routes
 *
 * POST /chat/stream runs one request through the pipeline and streams its
 * events as server-sent events. A client disconnect cancels the request.
 */

import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { ChatRequestSchema, toServerSentEvent } from '../../core/protocol/types.js';
import { createCancellationTokenSource } from '../../integrations/cancellation.js';
import type { StructuredLogger } from '../../integrations/utilities/logger.js';
import type { ChatService } from '../../service/chat-service.js';
import { formatZodError, jsonError, readJsonBody } from '../http.js';

export interface ChatRouteDeps {
  chat: ChatService;
  logger: StructuredLogger;
}

export function createChatRoutes(deps: ChatRouteDeps): Hono {
  const routes = new Hono();

  routes.post('/stream', async (c) => {
    const parsed = ChatRequestSchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      return jsonError(c, 400, 'Invalid request body', formatZodError(parsed.error));
    }
    const request = parsed.data;

    return streamSSE(
      c,
      async (stream) => {
        const cts = createCancellationTokenSource();
        stream.onAbort(() => cts.cancel('Client disconnected'));

        try {
          for await (const event of deps.chat.chat(request, { cancellationToken: cts.token })) {
            if (stream.aborted) break;
            await stream.writeSSE(toServerSentEvent(event));
          }
        } finally {
          cts.dispose();
        }
      },
      async (err, stream) => {
        deps.logger.error('Chat stream failed', { error: err.message });
        await stream.writeSSE({ event: 'error', data: JSON.stringify({ error: err.message }) });
      },
    );
  });

  return routes;
}
