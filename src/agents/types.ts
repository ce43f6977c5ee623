/**
 * Stage agent contract. Each stage is an async transform from one
 * RequestState to the next, with its collaborators passed in.
 */

import type { QueryCollaborator, TextGenerator } from '../core/collaborators.js';
import type { CancellationToken } from '../integrations/cancellation.js';
import type { StructuredLogger } from '../integrations/utilities/logger.js';
import type { Clock } from '../integrations/utilities/time.js';
import type { RequestState, StageName } from '../types.js';

export interface StageDeps {
  generator: TextGenerator;
  query: QueryCollaborator;
  clock: Clock;
  /** Request-scoped logger (trace id bound) */
  logger: StructuredLogger;
  cancellationToken: CancellationToken;
  /** Documents fetched per data subtask */
  findLimit: number;
}

export type Stage = (state: RequestState, deps: StageDeps) => Promise<RequestState>;

export type StageRegistry = Record<StageName, Stage>;

/** Generation parameters per stage */
export const PLANNER_GENERATION = { maxTokens: 300, temperature: 0.5 } as const;
export const COMPOSER_GENERATION = { maxTokens: 500, temperature: 0.7 } as const;

export const MAX_SUBTASKS = 3;
export const SUGGESTION_COUNT = 3;
