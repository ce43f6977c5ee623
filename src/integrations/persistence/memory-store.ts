/**
 * Conversation memory over the document store: turns from the `messages`
 * collection, the running summary from `sessions`.
 */

import type { MemoryCollaborator } from '../../core/collaborators.js';
import type { Role, StoredDocument, Turn } from '../../types.js';
import { toIsoString } from '../utilities/time.js';
import { createComponentLogger } from '../utilities/logger.js';
import { COLLECTIONS, type DocumentStore } from './document-store.js';
import {
  MessageRecordSchema,
  SessionRecordSchema,
  type MessageRecord,
  type SessionRecord,
  type WithId,
} from './records.js';

const log = createComponentLogger('ConversationMemory');

export interface NewMessage {
  sessionId: string;
  userId: string;
  role: Role;
  content: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

export function buildMessageRecord(message: NewMessage): MessageRecord {
  return {
    sessionId: message.sessionId,
    userId: message.userId,
    role: message.role,
    content: message.content,
    metadata: message.metadata ?? {},
    createdAt: toIsoString(message.timestamp),
    timestamp: message.timestamp,
  };
}

export function toMessageRecord(doc: StoredDocument): WithId<MessageRecord> | null {
  const parsed = MessageRecordSchema.safeParse(doc);
  if (!parsed.success) {
    log.warn('Skipping malformed message document', { id: doc._id });
    return null;
  }
  return { ...parsed.data, id: doc._id };
}

function toTurns(docs: StoredDocument[]): Turn[] {
  const turns: Turn[] = [];
  for (const doc of docs) {
    const record = toMessageRecord(doc);
    if (record) {
      turns.push({ role: record.role, content: record.content, timestamp: record.timestamp });
    }
  }
  return turns;
}

export class ConversationMemory implements MemoryCollaborator {
  constructor(private readonly store: DocumentStore) {}

  async getSummary(sessionId: string): Promise<string | null> {
    const session = await this.getSession(sessionId);
    return session?.summary ? session.summary : null;
  }

  async getRecentTurns(sessionId: string, limit: number): Promise<Turn[]> {
    if (limit <= 0) return [];
    const docs = await this.store.find(
      COLLECTIONS.messages,
      { sessionId },
      { limit, sort: { field: 'timestamp', direction: 'desc' } },
    );
    return toTurns(docs).reverse();
  }

  async getAllTurns(sessionId: string): Promise<Turn[]> {
    const docs = await this.store.find(
      COLLECTIONS.messages,
      { sessionId },
      { sort: { field: 'timestamp', direction: 'asc' } },
    );
    return toTurns(docs);
  }

  async countTurns(sessionId: string): Promise<number> {
    return this.store.count(COLLECTIONS.messages, { sessionId });
  }

  async setSummary(sessionId: string, summary: string, userId: string): Promise<void> {
    const now = new Date().toISOString();
    await this.store.upsert(
      COLLECTIONS.sessions,
      { sessionId },
      { summary, updatedAt: now },
      { userId, createdAt: now },
    );
  }

  async appendMessage(message: NewMessage): Promise<string> {
    return this.store.insert(COLLECTIONS.messages, buildMessageRecord(message));
  }

  async getSession(sessionId: string): Promise<WithId<SessionRecord> | null> {
    const doc = await this.store.findOne(COLLECTIONS.sessions, { sessionId });
    if (!doc) return null;
    const parsed = SessionRecordSchema.safeParse(doc);
    if (!parsed.success) {
      log.warn('Malformed session document', { sessionId, id: doc._id });
      return null;
    }
    return { ...parsed.data, id: doc._id };
  }

  /**
   * Create the session document on first use. Existing sessions are left as they are.
   * The lookup and insert share one store transaction, so concurrent first requests create one document.
   */
  async ensureSession(sessionId: string, userId: string): Promise<void> {
    const now = new Date().toISOString();
    const record = {
      sessionId,
      userId,
      summary: null,
      createdAt: now,
      updatedAt: now,
    } satisfies SessionRecord;
    await this.store.upsert(COLLECTIONS.sessions, { sessionId }, {}, record);
  }
}
