/**
 * Planner: expands the request into 1-3 subtasks and a data-access plan.
 */

import { formatErrorForLog, isCancellationError } from '../errors/index.js';
import { completeStage } from '../core/request-state.js';
import { race } from '../integrations/cancellation.js';
import type { RequestState } from '../types.js';
import { heuristicPlan } from './heuristics.js';
import { parsePlan } from './parsing.js';
import { MAX_SUBTASKS, PLANNER_GENERATION, type StageDeps } from './types.js';

export const DEFAULT_DATA_PLAN = 'Determine data needs based on request context';

export function buildPlanningPrompt(context: string): string {
  return `You are a planning agent. Analyze the user's request considering conversation history.

${context}

Your task: Break down the current user request into 1-3 specific, actionable subtasks.
Also identify if any database queries are needed.

Format your response exactly like this:
SUBTASKS:
1. [First specific subtask]
2. [Second specific subtask]
3. [Third specific subtask if needed]

DATA_PLAN:
[Describe what data needs to be fetched, or write "No database access needed"]

Be specific and actionable. Each subtask should be clear.
`;
}

export async function runPlanner(state: RequestState, deps: StageDeps): Promise<RequestState> {
  const startedAt = deps.clock.now();
  const log = deps.logger.withContext({ stage: 'planner' });

  let subtasks: string[] = [];
  let dataAccessPlan = '';

  try {
    const response = await race(
      deps.generator.generate(buildPlanningPrompt(state.context), {
        ...PLANNER_GENERATION,
        cancellationToken: deps.cancellationToken,
      }),
      deps.cancellationToken,
    );
    const parsed = parsePlan(response);
    subtasks = parsed.subtasks.slice(0, MAX_SUBTASKS);
    dataAccessPlan = parsed.dataAccessPlan;
    if (subtasks.length === 0) {
      log.warn('No subtasks in planner output, using heuristic plan', {
        responsePreview: response.slice(0, 200),
      });
    }
  } catch (err) {
    if (isCancellationError(err)) throw err;
    log.warn('Planner generation failed, using heuristic plan', { error: formatErrorForLog(err) });
  }

  if (subtasks.length === 0) {
    const fallback = heuristicPlan(state.userPrompt);
    subtasks = fallback.subtasks;
    dataAccessPlan = fallback.dataAccessPlan;
  }
  if (!dataAccessPlan) {
    dataAccessPlan = DEFAULT_DATA_PLAN;
  }

  log.debug('Plan ready', { subtasks: subtasks.length, dataAccessPlan });

  return completeStage(state, 'planner', deps.clock.now() - startedAt, {
    subtasks,
    dataAccessPlan,
  });
}
