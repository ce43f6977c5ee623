/**
 * Interfaces the pipeline depends on. Concrete implementations live under
 * providers/ and integrations/; the core only ever sees these.
 */

import type { CancellationToken } from '../integrations/cancellation.js';
import type { Filter, QueryResult, Turn } from '../types.js';

// =============================================================================
// TEXT GENERATION
// =============================================================================

export interface GenerateOptions {
  maxTokens: number;
  temperature: number;
  cancellationToken?: CancellationToken;
}

export interface TextGenerator {
  readonly name: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

// =============================================================================
// QUERIES
// =============================================================================

export interface TimedResult<T> {
  result: T;
  latencyMs: number;
}

export type InsertResult = { status: 'ok'; id: string } | { status: 'error'; error: string };

export type AggregateQueryResult =
  | { status: 'ok'; count: number; sum: Record<string, number>; avg: Record<string, number | null> }
  | { status: 'error'; error: string };

/**
 * Query access for the Executor. Failures come back as `status: 'error'`
 * results rather than rejections.
 */
export interface QueryCollaborator {
  find(collection: string, filter: Filter, limit: number): Promise<TimedResult<QueryResult>>;
  insert(collection: string, document: Record<string, unknown>): Promise<TimedResult<InsertResult>>;
  aggregate(
    collection: string,
    spec: { match?: Filter; sum?: string[]; avg?: string[] },
  ): Promise<TimedResult<AggregateQueryResult>>;
}

// =============================================================================
// MEMORY
// =============================================================================

export interface MemoryCollaborator {
  getSummary(sessionId: string): Promise<string | null>;
  /** Up to `limit` most recent turns, oldest first */
  getRecentTurns(sessionId: string, limit: number): Promise<Turn[]>;
  /** Every persisted turn, oldest first */
  getAllTurns(sessionId: string): Promise<Turn[]>;
  countTurns(sessionId: string): Promise<number>;
  setSummary(sessionId: string, summary: string, userId: string): Promise<void>;
}

export interface SummarizeOptions {
  targetTokens: number;
  cancellationToken?: CancellationToken;
}

export interface Summarizer {
  summarize(turns: readonly Turn[], options: SummarizeOptions): Promise<string>;
}
