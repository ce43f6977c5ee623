/**
 * Document store contract.
 *
 * The pipeline and the chat service see persistence only through this
 * interface: named collections of JSON documents, top-level equality
 * filters, a small aggregate, and an atomic multi-collection insert.
 */

import type { Document, Filter, StoredDocument } from '../../types.js';

export type SortDirection = 'asc' | 'desc';

export interface FindOptions {
  limit?: number;
  /** Defaults to insertion order */
  sort?: { field: string; direction: SortDirection };
}

export interface AggregateSpec {
  match?: Filter;
  /** Numeric fields to sum */
  sum?: string[];
  /** Numeric fields to average; non-numeric and missing values are skipped */
  avg?: string[];
}

export interface AggregateResult {
  count: number;
  sum: Record<string, number>;
  avg: Record<string, number | null>;
}

export interface InsertEntry {
  collection: string;
  document: Document;
}

export interface UpsertResult {
  id: string;
  created: boolean;
}

export interface DocumentStore {
  find(collection: string, filter?: Filter, options?: FindOptions): Promise<StoredDocument[]>;
  findOne(collection: string, filter: Filter): Promise<StoredDocument | null>;
  count(collection: string, filter?: Filter): Promise<number>;
  /** A string `_id` on the document is used as its id, otherwise one is generated */
  insert(collection: string, document: Document): Promise<string>;
  /** All or nothing, across collections */
  insertMany(entries: InsertEntry[]): Promise<string[]>;
  /**
   * Update the first document matching `filter` with `set`, or insert
   * `{...filter, ...setOnInsert, ...set}` when none matches.
   */
  upsert(collection: string, filter: Filter, set: Document, setOnInsert?: Document): Promise<UpsertResult>;
  aggregate(collection: string, spec: AggregateSpec): Promise<AggregateResult>;
  /** Liveness check for the health endpoint */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export const COLLECTIONS = {
  messages: 'messages',
  sessions: 'sessions',
  suggestions: 'suggestions',
  metrics: 'metrics',
  toolCalls: 'tool_calls',
} as const;
