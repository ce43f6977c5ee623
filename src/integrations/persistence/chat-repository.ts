/**
 * Chat repository: the atomic commit of one completed interaction and the
 * read queries behind the session, suggestion, metrics and vitals endpoints.
 */

import { randomUUID } from 'node:crypto';
import type { RequestTimings, StageTimings, StoredDocument, ToolCallRecord } from '../../types.js';
import { toIsoString } from '../utilities/time.js';
import { createComponentLogger } from '../utilities/logger.js';
import { COLLECTIONS, type DocumentStore, type InsertEntry } from './document-store.js';
import { buildMessageRecord, toMessageRecord } from './memory-store.js';
import {
  SessionRecordSchema,
  SuggestionRecordSchema,
  type MessageRecord,
  type MetricsRecord,
  type SessionRecord,
  type SuggestionRecord,
  type ToolCallDocument,
  type WithId,
} from './records.js';

const log = createComponentLogger('ChatRepository');

// =============================================================================
// TYPES
// =============================================================================

export interface InteractionCommit {
  sessionId: string;
  userId: string;
  prompt: string;
  answer: string;
  suggestions: readonly string[];
  toolCalls: readonly ToolCallRecord[];
  timings: RequestTimings;
  agentTimings: StageTimings;
}

export interface CommitResult {
  userMessageId: string;
  assistantMessageId: string;
}

export interface SessionOverview extends WithId<SessionRecord> {
  messageCount: number;
}

export interface SessionMetricsSummary {
  sessionId: string;
  totalRequests: number;
  avgTtftMs: number | null;
  avgTotalMs: number | null;
  totalToolCalls: number;
}

export interface VitalsSnapshot {
  totalSessions: number;
  totalMessages: number;
  totalToolCalls: number;
  totalRequests: number;
  avgResponseTimeMs: number | null;
}

// =============================================================================
// HELPERS
// =============================================================================

function toToolCallDocument(
  call: ToolCallRecord,
  base: { sessionId: string; userId: string; messageId: string },
): ToolCallDocument {
  return {
    ...base,
    tool: call.tool,
    args: call.args,
    status: call.result.status,
    count: call.result.status === 'ok' ? call.result.count : null,
    error: call.result.status === 'error' ? call.result.error : null,
    latencyMs: call.latencyMs,
    timestamp: call.timestamp,
  };
}

function timingsRecord(timings: StageTimings): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [stage, ms] of Object.entries(timings)) {
    if (typeof ms === 'number') out[stage] = ms;
  }
  return out;
}

function parseWithId<T>(
  doc: StoredDocument,
  schema: { safeParse(data: unknown): { success: true; data: T } | { success: false } },
): WithId<T> | null {
  const parsed = schema.safeParse(doc);
  return parsed.success ? { ...parsed.data, id: doc._id } : null;
}

// =============================================================================
// REPOSITORY
// =============================================================================

export class ChatRepository {
  constructor(private readonly store: DocumentStore) {}

  /**
   * Persist both messages, the suggestions, the metrics and every tool call
   * in one transaction.
   */
  async commitInteraction(commit: InteractionCommit): Promise<CommitResult> {
    const userMessageId = randomUUID();
    const assistantMessageId = randomUUID();
    const { sessionId, userId, timings } = commit;

    const userMessage: MessageRecord = buildMessageRecord({
      sessionId,
      userId,
      role: 'user',
      content: commit.prompt,
      timestamp: timings.requestStart,
    });
    const assistantMessage: MessageRecord = buildMessageRecord({
      sessionId,
      userId,
      role: 'assistant',
      content: commit.answer,
      timestamp: timings.completedAt,
      metadata: { toolCallCount: commit.toolCalls.length, ttftMs: timings.ttftMs, totalMs: timings.totalMs },
    });
    const suggestions: SuggestionRecord = {
      sessionId,
      userId,
      messageId: assistantMessageId,
      suggestions: [...commit.suggestions],
      createdAt: toIsoString(timings.completedAt),
    };
    const metrics: MetricsRecord = {
      sessionId,
      userId,
      messageId: assistantMessageId,
      ttftMs: timings.ttftMs,
      totalMs: timings.totalMs,
      toolCallCount: commit.toolCalls.length,
      agentTimings: timingsRecord(commit.agentTimings),
      timestamp: timings.completedAt,
    };

    const entries: InsertEntry[] = [
      { collection: COLLECTIONS.messages, document: { ...userMessage, _id: userMessageId } },
      { collection: COLLECTIONS.messages, document: { ...assistantMessage, _id: assistantMessageId } },
      { collection: COLLECTIONS.suggestions, document: suggestions },
      { collection: COLLECTIONS.metrics, document: metrics },
      ...commit.toolCalls.map((call) => ({
        collection: COLLECTIONS.toolCalls,
        document: toToolCallDocument(call, { sessionId, userId, messageId: assistantMessageId }),
      })),
    ];

    await this.store.insertMany(entries);
    await this.store.upsert(
      COLLECTIONS.sessions,
      { sessionId },
      { updatedAt: toIsoString(timings.completedAt) },
      { userId, summary: null, createdAt: toIsoString(timings.requestStart) },
    );

    log.debug('Committed interaction', {
      sessionId,
      assistantMessageId,
      toolCalls: commit.toolCalls.length,
    });
    return { userMessageId, assistantMessageId };
  }

  async getSessionOverview(sessionId: string): Promise<SessionOverview | null> {
    const doc = await this.store.findOne(COLLECTIONS.sessions, { sessionId });
    if (!doc) return null;
    const session = parseWithId(doc, SessionRecordSchema);
    if (!session) return null;
    const messageCount = await this.store.count(COLLECTIONS.messages, { sessionId });
    return { ...session, messageCount };
  }

  /** The last `limit` messages, oldest first */
  async getMessages(sessionId: string, limit: number): Promise<Array<WithId<MessageRecord>>> {
    const docs = await this.store.find(
      COLLECTIONS.messages,
      { sessionId },
      { limit, sort: { field: 'timestamp', direction: 'desc' } },
    );
    const records: Array<WithId<MessageRecord>> = [];
    for (const doc of docs) {
      const record = toMessageRecord(doc);
      if (record) records.push(record);
    }
    return records.reverse();
  }

  async getSuggestions(messageId: string): Promise<WithId<SuggestionRecord> | null> {
    const doc = await this.store.findOne(COLLECTIONS.suggestions, { messageId });
    return doc ? parseWithId(doc, SuggestionRecordSchema) : null;
  }

  /** Newest first */
  async getSessionSuggestions(sessionId: string, limit: number): Promise<Array<WithId<SuggestionRecord>>> {
    const docs = await this.store.find(
      COLLECTIONS.suggestions,
      { sessionId },
      { limit, sort: { field: 'createdAt', direction: 'desc' } },
    );
    const records: Array<WithId<SuggestionRecord>> = [];
    for (const doc of docs) {
      const record = parseWithId(doc, SuggestionRecordSchema);
      if (record) records.push(record);
    }
    return records;
  }

  async getSessionMetrics(sessionId: string): Promise<SessionMetricsSummary> {
    const agg = await this.store.aggregate(COLLECTIONS.metrics, {
      match: { sessionId },
      sum: ['toolCallCount'],
      avg: ['ttftMs', 'totalMs'],
    });
    return {
      sessionId,
      totalRequests: agg.count,
      avgTtftMs: agg.avg.ttftMs ?? null,
      avgTotalMs: agg.avg.totalMs ?? null,
      totalToolCalls: agg.sum.toolCallCount ?? 0,
    };
  }

  async getVitals(): Promise<VitalsSnapshot> {
    const [totalSessions, totalMessages, totalToolCalls, metrics] = await Promise.all([
      this.store.count(COLLECTIONS.sessions),
      this.store.count(COLLECTIONS.messages),
      this.store.count(COLLECTIONS.toolCalls),
      this.store.aggregate(COLLECTIONS.metrics, { avg: ['totalMs'] }),
    ]);
    return {
      totalSessions,
      totalMessages,
      totalToolCalls,
      totalRequests: metrics.count,
      avgResponseTimeMs: metrics.avg.totalMs ?? null,
    };
  }
}
