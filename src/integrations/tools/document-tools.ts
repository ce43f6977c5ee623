/**
 * Document tools: the Executor's query collaborator.
 *
 * Wraps a `DocumentStore` so every call is timed and every failure comes
 * back as a `status: 'error'` result the Executor can record.
 */

import type {
  AggregateQueryResult,
  InsertResult,
  QueryCollaborator,
  TimedResult,
} from '../../core/collaborators.js';
import { formatErrorForLog } from '../../errors/index.js';
import type { Document, Filter, QueryResult } from '../../types.js';
import type { AggregateSpec, DocumentStore } from '../persistence/document-store.js';
import { createComponentLogger } from '../utilities/logger.js';

const log = createComponentLogger('DocumentTools');

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function timed<T>(fn: () => Promise<T>, onError: (message: string) => T): Promise<TimedResult<T>> {
  const start = performance.now();
  let result: T;
  try {
    result = await fn();
  } catch (err) {
    log.warn('Document tool call failed', { error: formatErrorForLog(err) });
    result = onError(errorMessage(err));
  }
  return { result, latencyMs: performance.now() - start };
}

export class DocumentTools implements QueryCollaborator {
  constructor(private readonly store: DocumentStore) {}

  find(collection: string, filter: Filter, limit: number): Promise<TimedResult<QueryResult>> {
    return timed<QueryResult>(
      async () => {
        const data = await this.store.find(collection, filter, { limit });
        return { status: 'ok', count: data.length, data };
      },
      (error) => ({ status: 'error', error }),
    );
  }

  insert(collection: string, document: Document): Promise<TimedResult<InsertResult>> {
    return timed<InsertResult>(
      async () => ({ status: 'ok', id: await this.store.insert(collection, document) }),
      (error) => ({ status: 'error', error }),
    );
  }

  aggregate(collection: string, spec: AggregateSpec): Promise<TimedResult<AggregateQueryResult>> {
    return timed<AggregateQueryResult>(
      async () => ({ status: 'ok', ...(await this.store.aggregate(collection, spec)) }),
      (error) => ({ status: 'error', error }),
    );
  }
}
