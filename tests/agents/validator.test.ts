import { describe, expect, it } from 'vitest';
import {
  NOT_RELEVANT,
  VALIDATION_PASSED,
  runValidator,
  toolFailureFeedback,
  validateFindings,
} from '../../src/agents/validator.js';
import type { Finding, ToolCallRecord } from '../../src/types.js';
import { makeDeps, makeState } from '../helpers/fakes.js';

const RELEVANT: Finding = {
  kind: 'query',
  task: 'Fetch data',
  result: 'Retrieved 3 messages from conversation history',
  data: [],
};

const QUERY_ERROR: Finding = {
  kind: 'query_error',
  task: 'Fetch data',
  result: 'Error fetching data: boom',
  data: 'boom',
};

function failedCall(): ToolCallRecord {
  return {
    tool: 'db.find',
    args: {},
    result: { status: 'error', error: 'boom' },
    latencyMs: 1,
    timestamp: 1_000,
  };
}

describe('validateFindings', () => {
  it('should report empty findings as not relevant', () => {
    expect(validateFindings('anything', [], [])).toEqual({ passed: false, feedback: NOT_RELEVANT });
  });

  it('should count failed tool calls', () => {
    expect(validateFindings('Show conversation history', [RELEVANT], [failedCall(), failedCall()])).toEqual({
      passed: false,
      feedback: 'Tool calls failed: 2 failures detected.',
    });
    expect(toolFailureFeedback(1)).toBe('Tool calls failed: 1 failures detected.');
  });

  it('should fail when no leading prompt word appears in the findings', () => {
    expect(validateFindings('zebra giraffe', [RELEVANT], [])).toEqual({ passed: false, feedback: NOT_RELEVANT });
  });

  it('should let the relevance failure replace a tool failure', () => {
    expect(validateFindings('zebra giraffe', [QUERY_ERROR], [failedCall()])).toEqual({
      passed: false,
      feedback: NOT_RELEVANT,
    });
  });

  it('should pass relevant findings', () => {
    expect(validateFindings('Show conversation history', [RELEVANT], [])).toEqual({
      passed: true,
      feedback: VALIDATION_PASSED,
    });
  });
});

describe('runValidator', () => {
  it('should mark a failed validation for retry', async () => {
    const next = await runValidator(makeState(), makeDeps());

    expect(next.validationPassed).toBe(false);
    expect(next.validationFeedback).toBe(NOT_RELEVANT);
    expect(next.retryCount).toBe(1);
    expect(next.currentAgent).toBe('validator');
    expect(next.timings).toEqual({ validator: 0 });
  });

  it('should leave the retry count alone when validation passes', async () => {
    const state = makeState({ userPrompt: 'Show conversation history', findings: [RELEVANT] });

    const next = await runValidator(state, makeDeps());

    expect(next.validationPassed).toBe(true);
    expect(next.retryCount).toBe(0);
  });
});
