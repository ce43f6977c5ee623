/**
 * Chat Protocol Types
 *
 * Requests flow from client to pipeline, events flow back as a
 * server-sent event stream. Each event's `type` is the SSE event name;
 * the remaining fields are its JSON payload.
 */

import { z } from 'zod';
import type { RequestTimings, StageName } from '../../types.js';

// =============================================================================
// REQUESTS (Client -> Pipeline)
// =============================================================================

export const ChatRequestSchema = z.object({
  sessionId: z.string().min(1, 'sessionId must not be empty'),
  userId: z.string().min(1, 'userId must not be empty'),
  prompt: z.string().min(1, 'prompt must not be empty'),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

// =============================================================================
// EVENTS (Pipeline -> Client)
// =============================================================================

/**
 * A stage has run.
 */
export interface AgentEvent {
  type: 'agent';
  name: StageName;
}

export interface ToolCallStartedEvent {
  type: 'tool_call_started';
  tool: string;
  args: Record<string, unknown>;
}

export interface ToolCallCompletedEvent {
  type: 'tool_call_completed';
  tool: string;
  ok: boolean;
  latencyMs: number;
}

/**
 * One whitespace-delimited unit of the answer, trailing whitespace included.
 */
export interface TokenEvent {
  type: 'token';
  text: string;
}

/**
 * Terminal on success. Sent exactly once, after persistence.
 */
export interface DoneEvent {
  type: 'done';
  fullText: string;
  suggestions: string[];
  timings: RequestTimings;
}

/**
 * Terminal on failure. Never follows or precedes a `done`.
 */
export interface ErrorEvent {
  type: 'error';
  error: string;
}

export type RelayEvent =
  | AgentEvent
  | ToolCallStartedEvent
  | ToolCallCompletedEvent
  | TokenEvent
  | DoneEvent
  | ErrorEvent;

export type RelayEventType = RelayEvent['type'];

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Split an event into its SSE name and JSON payload.
 */
export function toServerSentEvent(event: RelayEvent): { event: RelayEventType; data: string } {
  const { type, ...payload } = event;
  return { event: type, data: JSON.stringify(payload) };
}
