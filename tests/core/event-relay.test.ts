import { describe, expect, it } from 'vitest';
import { EventRelay, computeTimings, splitTokens } from '../../src/core/event-relay.js';
import { PipelineController } from '../../src/core/pipeline-controller.js';
import { ChatRequestSchema, toServerSentEvent, type RelayEvent } from '../../src/core/protocol/index.js';
import { createCancellationTokenSource } from '../../src/integrations/cancellation.js';
import type { RequestState, RequestTimings } from '../../src/types.js';
import { collect, makeDeps, makeState } from '../helpers/fakes.js';
import { scriptedStages, type ScriptedStageOptions } from '../helpers/stages.js';

function relayFor(options: ScriptedStageOptions = {}, tokenDelayMs = 0): EventRelay {
  return new EventRelay(new PipelineController({ stages: scriptedStages(options) }), { tokenDelayMs });
}

describe('splitTokens', () => {
  it('should keep trailing whitespace on each unit', () => {
    expect(splitTokens('Hello there friend')).toEqual(['Hello ', 'there ', 'friend']);
    expect(splitTokens('line one\nline two ')).toEqual(['line ', 'one\n', 'line ', 'two ']);
  });

  it('should attach leading whitespace to the first unit', () => {
    expect(splitTokens('  Hi there')).toEqual(['  Hi ', 'there']);
  });

  it('should handle blank input', () => {
    expect(splitTokens('   ')).toEqual(['   ']);
    expect(splitTokens('')).toEqual([]);
  });
});

describe('computeTimings', () => {
  it('should derive ttft and total from the timestamps', () => {
    expect(computeTimings(1_000, 1_250, 1_400)).toEqual({
      requestStart: 1_000,
      firstTokenAt: 1_250,
      completedAt: 1_400,
      ttftMs: 250,
      totalMs: 400,
    });
  });

  it('should have no ttft without a first token', () => {
    expect(computeTimings(1_000, null, 1_100).ttftMs).toBeNull();
  });
});

describe('protocol helpers', () => {
  it('should split an event into SSE name and payload', () => {
    expect(toServerSentEvent({ type: 'token', text: 'Hi ' })).toEqual({ event: 'token', data: '{"text":"Hi "}' });
    expect(toServerSentEvent({ type: 'agent', name: 'planner' })).toEqual({
      event: 'agent',
      data: '{"name":"planner"}',
    });
  });

  it('should validate chat requests', () => {
    const result = ChatRequestSchema.safeParse({ sessionId: '', userId: 'u1', prompt: 'hi' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('sessionId must not be empty');
    }
  });
});

describe('EventRelay', () => {
  it('should stream stages, tool calls, tokens and done in order', async () => {
    const deps = makeDeps();
    deps.clock.set(1_050);

    const events = await collect(relayFor().stream(makeState(), deps));

    expect(events).toEqual([
      { type: 'agent', name: 'planner' },
      { type: 'agent', name: 'executor' },
      { type: 'tool_call_started', tool: 'db.find', args: { collection: 'messages' } },
      { type: 'tool_call_completed', tool: 'db.find', ok: true, latencyMs: 7 },
      { type: 'agent', name: 'validator' },
      { type: 'agent', name: 'composer' },
      { type: 'token', text: 'Hello ' },
      { type: 'token', text: 'there ' },
      { type: 'token', text: 'friend' },
      {
        type: 'done',
        fullText: 'Hello there friend',
        suggestions: ['First idea', 'Second idea', 'Third idea'],
        timings: { requestStart: 1_000, firstTokenAt: 1_050, completedAt: 1_050, ttftMs: 50, totalMs: 50 },
      },
    ]);
  });

  it('should report failed tool calls', async () => {
    const events = await collect(relayFor({ toolOk: false, verdicts: [true] }).stream(makeState(), makeDeps()));

    expect(events).toContainEqual({ type: 'tool_call_completed', tool: 'db.find', ok: false, latencyMs: 7 });
  });

  it('should emit tool events for both executor runs on retry', async () => {
    const events = await collect(relayFor({ verdicts: [false, true] }).stream(makeState(), makeDeps()));

    expect(events.filter((e) => e.type === 'tool_call_started')).toHaveLength(2);
    expect(events.filter((e) => e.type === 'agent').map((e) => (e.type === 'agent' ? e.name : ''))).toEqual([
      'planner',
      'executor',
      'validator',
      'executor',
      'validator',
      'composer',
    ]);
  });

  it('should emit no tokens for an empty answer', async () => {
    const events = await collect(relayFor({ answer: '' }).stream(makeState(), makeDeps()));
    const done = events[events.length - 1];

    expect(events.some((e) => e.type === 'token')).toBe(false);
    expect(done).toEqual({
      type: 'done',
      fullText: '',
      suggestions: ['First idea', 'Second idea', 'Third idea'],
      timings: { requestStart: 1_000, firstTokenAt: null, completedAt: 1_000, ttftMs: null, totalMs: 0 },
    });
  });

  it('should commit before done with the final timings', async () => {
    const order: string[] = [];
    const commits: Array<{ state: RequestState; timings: RequestTimings }> = [];
    const deps = makeDeps();
    deps.clock.set(1_200);

    for await (const event of relayFor().stream(makeState(), deps, {
      onCommit: async (state, timings) => {
        order.push('commit');
        commits.push({ state, timings });
      },
    })) {
      order.push(event.type);
    }

    expect(order.slice(-2)).toEqual(['commit', 'done']);
    expect(commits).toHaveLength(1);
    expect(commits[0].state.firstTokenAt).toBe(1_200);
    expect(commits[0].state.completedAt).toBe(1_200);
    expect(commits[0].timings.totalMs).toBe(200);
  });

  it('should end with a single error when the commit fails', async () => {
    const events = await collect(
      relayFor().stream(makeState(), makeDeps(), {
        onCommit: async () => {
          throw new Error('disk full');
        },
      }),
    );

    expect(events[events.length - 1]).toEqual({ type: 'error', error: 'disk full' });
    expect(events.some((e) => e.type === 'done')).toBe(false);
    expect(events.filter((e) => e.type === 'error')).toHaveLength(1);
  });

  it('should end with an error when a stage fails', async () => {
    const stages = scriptedStages();
    stages.validator = async () => {
      throw new Error('validator exploded');
    };
    const relay = new EventRelay(new PipelineController({ stages }), { tokenDelayMs: 0 });

    const events = await collect(relay.stream(makeState(), makeDeps()));

    expect(events.map((e) => e.type)).toEqual([
      'agent',
      'agent',
      'tool_call_started',
      'tool_call_completed',
      'error',
    ]);
    expect(events[4]).toEqual({ type: 'error', error: 'validator exploded' });
  });

  it('should stop silently when cancelled mid-answer', async () => {
    const source = createCancellationTokenSource();
    let commits = 0;
    const events: RelayEvent[] = [];

    for await (const event of relayFor().stream(makeState(), makeDeps({ cancellationToken: source.token }), {
      onCommit: async () => {
        commits++;
      },
    })) {
      events.push(event);
      if (event.type === 'token') source.cancel('client disconnected');
    }

    expect(events.filter((e) => e.type === 'token')).toEqual([{ type: 'token', text: 'Hello ' }]);
    expect(events.some((e) => e.type === 'done' || e.type === 'error')).toBe(false);
    expect(commits).toBe(0);
  });

  it('should pace tokens when a delay is configured', async () => {
    const events = await collect(relayFor({}, 1).stream(makeState(), makeDeps()));

    expect(events.filter((e) => e.type === 'token').map((e) => (e.type === 'token' ? e.text : ''))).toEqual([
      'Hello ',
      'there ',
      'friend',
    ]);
  });
});
