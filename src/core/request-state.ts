/**
 * RequestState construction and the small immutable updates the stages share.
 */

import type { RequestState, StageName, StageTimings, Turn } from '../types.js';

export interface RequestStateInit {
  sessionId: string;
  userId: string;
  userPrompt: string;
  context: string;
  summary: string | null;
  recentTurns: readonly Turn[];
  requestStart: number;
}

export function createRequestState(init: RequestStateInit): RequestState {
  return {
    sessionId: init.sessionId,
    userId: init.userId,
    userPrompt: init.userPrompt,
    context: init.context,
    summary: init.summary,
    recentTurns: [...init.recentTurns],
    subtasks: [],
    dataAccessPlan: '',
    findings: [],
    toolCalls: [],
    validationPassed: false,
    validationFeedback: '',
    retryCount: 0,
    finalAnswer: '',
    suggestions: [],
    timings: {},
    requestStart: init.requestStart,
    firstTokenAt: null,
    completedAt: null,
    currentAgent: null,
  };
}

/**
 * Add a stage duration. A re-run accumulates into the existing entry, so
 * key order stays the order of first execution.
 */
export function addTiming(timings: StageTimings, stage: StageName, durationMs: number): StageTimings {
  return { ...timings, [stage]: (timings[stage] ?? 0) + durationMs };
}

/**
 * Stamp the stage as current and record its duration.
 */
export function completeStage(
  state: RequestState,
  stage: StageName,
  durationMs: number,
  patch: Partial<RequestState>,
): RequestState {
  return {
    ...state,
    ...patch,
    currentAgent: stage,
    timings: addTiming(state.timings, stage, durationMs),
  };
}
