/**
 * SqliteDocumentStore tests against an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { StoreError } from '../../../src/errors/index.js';
import {
  applyMigrations,
  getLatestSchemaVersion,
  getSchemaVersion,
} from '../../../src/integrations/persistence/schema.js';
import type { SqliteDocumentStore } from '../../../src/integrations/persistence/sqlite-store.js';
import { createTestStore } from '../../helpers/fakes.js';

describe('schema migrations', () => {
  it('should migrate a fresh database to the latest version once', () => {
    const db = new Database(':memory:');
    expect(getSchemaVersion(db)).toBe(0);

    const first = applyMigrations(db);
    const second = applyMigrations(db);

    expect(first.applied).toBe(getLatestSchemaVersion());
    expect(second.applied).toBe(0);
    expect(getSchemaVersion(db)).toBe(getLatestSchemaVersion());
    db.close();
  });
});

describe('SqliteDocumentStore', () => {
  let store: SqliteDocumentStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(async () => {
    await store.close();
  });

  it('should be initialized on creation', () => {
    expect(store.isInitialized).toBe(true);
    expect(store.schemaVersion).toBe(getLatestSchemaVersion());
  });

  it('should insert and find documents by equality filter, in insertion order', async () => {
    await store.insert('messages', { sessionId: 's1', content: 'a' });
    await store.insert('messages', { sessionId: 's2', content: 'b' });
    await store.insert('messages', { sessionId: 's1', content: 'c' });

    const docs = await store.find('messages', { sessionId: 's1' });

    expect(docs.map((d) => d.content)).toEqual(['a', 'c']);
    expect(typeof docs[0]._id).toBe('string');
  });

  it('should keep collections apart', async () => {
    await store.insert('messages', { sessionId: 's1' });
    await store.insert('metrics', { sessionId: 's1' });

    expect(await store.count('messages', { sessionId: 's1' })).toBe(1);
    expect(await store.count('metrics')).toBe(1);
  });

  it('should use a caller-supplied _id and strip it from the body', async () => {
    const id = await store.insert('messages', { _id: 'fixed-id', content: 'x' });
    const doc = await store.findOne('messages', { content: 'x' });

    expect(id).toBe('fixed-id');
    expect(doc).toEqual({ _id: 'fixed-id', content: 'x' });
  });

  it('should sort and limit', async () => {
    for (const timestamp of [30, 10, 20]) {
      await store.insert('messages', { sessionId: 's1', timestamp });
    }

    const newest = await store.find('messages', { sessionId: 's1' }, {
      sort: { field: 'timestamp', direction: 'desc' },
      limit: 2,
    });

    expect(newest.map((d) => d.timestamp)).toEqual([30, 20]);
  });

  it('should match booleans and nulls', async () => {
    await store.insert('sessions', { sessionId: 'a', archived: true, summary: null });
    await store.insert('sessions', { sessionId: 'b', archived: false, summary: 'text' });

    expect((await store.find('sessions', { archived: true })).map((d) => d.sessionId)).toEqual(['a']);
    expect((await store.find('sessions', { summary: null })).map((d) => d.sessionId)).toEqual(['a']);
  });

  it('should return null from findOne when nothing matches', async () => {
    expect(await store.findOne('sessions', { sessionId: 'missing' })).toBeNull();
  });

  it('should roll back insertMany when one entry fails', async () => {
    await store.insert('messages', { _id: 'taken', content: 'first' });

    await expect(
      store.insertMany([
        { collection: 'messages', document: { _id: 'new-one', content: 'second' } },
        { collection: 'messages', document: { _id: 'taken', content: 'duplicate' } },
      ]),
    ).rejects.toBeInstanceOf(StoreError);

    expect(await store.count('messages')).toBe(1);
  });

  it('should insert with setOnInsert on upsert, then update only set fields', async () => {
    const created = await store.upsert(
      'sessions',
      { sessionId: 's1' },
      { summary: 'v1' },
      { userId: 'u1', createdAt: 'then' },
    );
    const updated = await store.upsert('sessions', { sessionId: 's1' }, { summary: 'v2' }, { userId: 'other' });

    expect(created.created).toBe(true);
    expect(updated).toEqual({ id: created.id, created: false });
    expect(await store.findOne('sessions', { sessionId: 's1' })).toEqual({
      _id: created.id,
      sessionId: 's1',
      userId: 'u1',
      createdAt: 'then',
      summary: 'v2',
    });
  });

  it('should aggregate count, sums and averages', async () => {
    await store.insert('metrics', { sessionId: 's1', toolCallCount: 1, ttftMs: 100, totalMs: 300 });
    await store.insert('metrics', { sessionId: 's1', toolCallCount: 2, ttftMs: null, totalMs: 500 });
    await store.insert('metrics', { sessionId: 's2', toolCallCount: 9, ttftMs: 1, totalMs: 1 });

    const result = await store.aggregate('metrics', {
      match: { sessionId: 's1' },
      sum: ['toolCallCount'],
      avg: ['ttftMs', 'totalMs'],
    });

    expect(result).toEqual({ count: 2, sum: { toolCallCount: 3 }, avg: { ttftMs: 100, totalMs: 400 } });
  });

  it('should report null averages and zero sums for empty matches', async () => {
    const result = await store.aggregate('metrics', { match: { sessionId: 'none' }, sum: ['x'], avg: ['y'] });
    expect(result).toEqual({ count: 0, sum: { x: 0 }, avg: { y: null } });
  });

  it('should reject unsafe field names', async () => {
    await expect(store.find('messages', { 'a.b': 1 })).rejects.toThrow('Invalid field name: a.b');
  });

  it('should fail operations after close and ping false', async () => {
    await store.close();

    expect(await store.ping()).toBe(false);
    await expect(store.count('messages')).rejects.toThrow('Store is closed');
  });
});
