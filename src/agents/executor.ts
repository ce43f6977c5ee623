/**
 * Executor: runs each subtask. Subtasks that mention data issue one
 * `db.find` over the session's messages; the rest complete without I/O.
 *
 * Findings and tool calls are appended to those of any earlier pass.
 */

import { formatErrorForLog, isCancellationError } from '../errors/index.js';
import { completeStage } from '../core/request-state.js';
import { race } from '../integrations/cancellation.js';
import type { Finding, QueryResult, RequestState, ToolCallRecord } from '../types.js';
import { needsData } from './heuristics.js';
import type { StageDeps } from './types.js';

export const FIND_TOOL = 'db.find';
export const MESSAGES_COLLECTION = 'messages';
export const RETRY_TASK = 'retry_adjustment';

async function fetchHistory(
  task: string,
  state: RequestState,
  deps: StageDeps,
): Promise<{ finding: Finding; toolCall: ToolCallRecord }> {
  const filter = { sessionId: state.sessionId };
  const args = { collection: MESSAGES_COLLECTION, filter, limit: deps.findLimit };
  const timestamp = deps.clock.now();

  let result: QueryResult;
  let latencyMs: number;
  try {
    const timed = await race(
      deps.query.find(MESSAGES_COLLECTION, filter, deps.findLimit),
      deps.cancellationToken,
    );
    result = timed.result;
    latencyMs = timed.latencyMs;
  } catch (err) {
    if (isCancellationError(err)) throw err;
    deps.logger.warn('Query collaborator threw', { task, error: formatErrorForLog(err) });
    result = { status: 'error', error: err instanceof Error ? err.message : String(err) };
    latencyMs = deps.clock.now() - timestamp;
  }

  const toolCall: ToolCallRecord = { tool: FIND_TOOL, args, result, latencyMs, timestamp };

  const finding: Finding =
    result.status === 'ok'
      ? {
          kind: 'query',
          task,
          result: `Retrieved ${result.count} messages from conversation history`,
          data: result.data,
        }
      : {
          kind: 'query_error',
          task,
          result: `Error fetching data: ${result.error}`,
          data: result.error,
        };

  return { finding, toolCall };
}

export async function runExecutor(state: RequestState, deps: StageDeps): Promise<RequestState> {
  const startedAt = deps.clock.now();
  const log = deps.logger.withContext({ stage: 'executor' });

  const findings: Finding[] = [...state.findings];
  const toolCalls: ToolCallRecord[] = [...state.toolCalls];

  for (const task of state.subtasks) {
    deps.cancellationToken.throwIfCancellationRequested();

    if (needsData(task)) {
      const { finding, toolCall } = await fetchHistory(task, state, { ...deps, logger: log });
      findings.push(finding);
      toolCalls.push(toolCall);
    } else {
      findings.push({ kind: 'completion', task, result: `Completed: ${task}` });
    }
  }

  if (state.retryCount > 0) {
    findings.push({
      kind: 'retry',
      task: RETRY_TASK,
      result: 'Re-executed tasks with improved strategy',
      data: { retryAttempt: state.retryCount },
    });
  }

  log.debug('Subtasks executed', {
    findings: findings.length - state.findings.length,
    toolCalls: toolCalls.length - state.toolCalls.length,
    retry: state.retryCount > 0,
  });

  return completeStage(state, 'executor', deps.clock.now() - startedAt, { findings, toolCalls });
}
