/**
 * Persisted record shapes.
 *
 * Documents come back from the store as untyped JSON, so every read goes
 * through one of these schemas. Writes use the inferred types.
 */

import { z } from 'zod';

export const MessageRecordSchema = z.object({
  sessionId: z.string(),
  userId: z.string(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  metadata: z.record(z.unknown()).default({}),
  /** ISO timestamp */
  createdAt: z.string(),
  /** Epoch milliseconds, used for ordering */
  timestamp: z.number(),
});

export const SessionRecordSchema = z.object({
  sessionId: z.string(),
  userId: z.string(),
  summary: z.string().nullable().default(null),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const SuggestionRecordSchema = z.object({
  sessionId: z.string(),
  userId: z.string(),
  messageId: z.string(),
  suggestions: z.array(z.string()),
  createdAt: z.string(),
});

export const MetricsRecordSchema = z.object({
  sessionId: z.string(),
  userId: z.string(),
  messageId: z.string(),
  ttftMs: z.number().nullable(),
  totalMs: z.number(),
  toolCallCount: z.number().int(),
  agentTimings: z.record(z.number()),
  timestamp: z.number(),
});

export const ToolCallDocumentSchema = z.object({
  sessionId: z.string(),
  userId: z.string(),
  messageId: z.string(),
  tool: z.string(),
  args: z.record(z.unknown()),
  status: z.enum(['ok', 'error']),
  /** Document count on success, error text on failure */
  count: z.number().int().nullable(),
  error: z.string().nullable(),
  latencyMs: z.number(),
  timestamp: z.number(),
});

export type MessageRecord = z.infer<typeof MessageRecordSchema>;
export type SessionRecord = z.infer<typeof SessionRecordSchema>;
export type SuggestionRecord = z.infer<typeof SuggestionRecordSchema>;
export type MetricsRecord = z.infer<typeof MetricsRecordSchema>;
export type ToolCallDocument = z.infer<typeof ToolCallDocumentSchema>;

/** A record read back from the store, with its id */
export type WithId<T> = T & { id: string };
