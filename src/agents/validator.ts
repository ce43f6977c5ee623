/**
 * Validator: checks the Executor's output. Pure; no collaborator I/O.
 *
 * Checks run in order; a later failure replaces an earlier reason:
 *   1. at least one finding
 *   2. every tool call succeeded
 *   3. some leading prompt word appears in the findings
 */

import { completeStage } from '../core/request-state.js';
import type { Finding, RequestState, ToolCallRecord } from '../types.js';
import { relevanceScore } from './heuristics.js';
import type { StageDeps } from './types.js';

export const VALIDATION_PASSED = 'Findings validated successfully.';
export const NO_FINDINGS = 'No findings returned by the executor.';
export const NOT_RELEVANT = 'Findings may not be relevant to the request.';

export function toolFailureFeedback(count: number): string {
  return `Tool calls failed: ${count} failures detected.`;
}

export interface ValidationOutcome {
  passed: boolean;
  feedback: string;
}

export function validateFindings(
  prompt: string,
  findings: readonly Finding[],
  toolCalls: readonly ToolCallRecord[],
): ValidationOutcome {
  let passed = true;
  let feedback = VALIDATION_PASSED;

  if (findings.length === 0) {
    passed = false;
    feedback = NO_FINDINGS;
  }

  const failures = toolCalls.filter((call) => call.result.status !== 'ok').length;
  if (failures > 0) {
    passed = false;
    feedback = toolFailureFeedback(failures);
  }

  // Empty findings score zero here too.
  const findingsText = findings.map((f) => f.result).join(' ');
  if (relevanceScore(prompt, findingsText) === 0) {
    passed = false;
    feedback = NOT_RELEVANT;
  }

  return { passed, feedback };
}

export async function runValidator(state: RequestState, deps: StageDeps): Promise<RequestState> {
  const startedAt = deps.clock.now();
  const outcome = validateFindings(state.userPrompt, state.findings, state.toolCalls);

  deps.logger.debug('Validation finished', {
    stage: 'validator',
    passed: outcome.passed,
    feedback: outcome.feedback,
  });

  return completeStage(state, 'validator', deps.clock.now() - startedAt, {
    validationPassed: outcome.passed,
    validationFeedback: outcome.feedback,
    retryCount: outcome.passed ? state.retryCount : 1,
  });
}
