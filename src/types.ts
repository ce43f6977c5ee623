/**
 * Core types shared across the pipeline, its collaborators and the HTTP layer.
 */

// =============================================================================
// DOCUMENTS
// =============================================================================

/** A JSON document as stored in a collection */
export type Document = Record<string, unknown>;

/** A document read back from the store, carrying its generated id */
export type StoredDocument = Document & { _id: string };

/** Top-level equality filter */
export type Filter = Record<string, string | number | boolean | null>;

// =============================================================================
// CONVERSATION
// =============================================================================

export type Role = 'user' | 'assistant';

/** One persisted message as seen by the Context Packer */
export interface Turn {
  role: Role;
  content: string;
  /** Epoch milliseconds */
  timestamp: number;
}

// =============================================================================
// PIPELINE
// =============================================================================

export type StageName = 'planner' | 'executor' | 'validator' | 'composer';

export type QueryResult =
  | { status: 'ok'; count: number; data: StoredDocument[] }
  | { status: 'error'; error: string };

export interface ToolCallRecord {
  tool: string;
  args: Record<string, unknown>;
  result: QueryResult;
  latencyMs: number;
  /** Epoch milliseconds */
  timestamp: number;
}

export type Finding =
  | { kind: 'query'; task: string; result: string; data: StoredDocument[] }
  | { kind: 'query_error'; task: string; result: string; data: string }
  | { kind: 'completion'; task: string; result: string }
  | { kind: 'retry'; task: 'retry_adjustment'; result: string; data: { retryAttempt: number } };

export type StageTimings = Readonly<Partial<Record<StageName, number>>>;

/**
 * The record threaded through the pipeline. Owned by one in-flight request;
 * stages return new values instead of mutating it.
 */
export interface RequestState {
  readonly sessionId: string;
  readonly userId: string;
  readonly userPrompt: string;

  readonly context: string;
  readonly summary: string | null;
  readonly recentTurns: readonly Turn[];

  readonly subtasks: readonly string[];
  readonly dataAccessPlan: string;

  readonly findings: readonly Finding[];
  readonly toolCalls: readonly ToolCallRecord[];

  readonly validationPassed: boolean;
  readonly validationFeedback: string;
  /** 0 before any failed validation, 1 afterwards */
  readonly retryCount: 0 | 1;

  readonly finalAnswer: string;
  readonly suggestions: readonly string[];

  /** Key order follows first execution */
  readonly timings: StageTimings;
  readonly requestStart: number;
  readonly firstTokenAt: number | null;
  readonly completedAt: number | null;

  readonly currentAgent: StageName | null;
}

/** Timing summary sent with `done` and persisted as metrics */
export interface RequestTimings {
  requestStart: number;
  firstTokenAt: number | null;
  completedAt: number;
  ttftMs: number | null;
  totalMs: number;
}
