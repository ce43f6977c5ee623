/**
 * Context Packer tests: assembly order, budget handling and summary refresh.
 */

import { describe, expect, it } from 'vitest';
import type { MemoryCollaborator, Summarizer, SummarizeOptions } from '../../../src/core/collaborators.js';
import { CancellationError, createCancellationTokenSource } from '../../../src/integrations/cancellation.js';
import {
  CONTEXT_PREAMBLE,
  ContextPacker,
  assembleContext,
} from '../../../src/integrations/context/context-packer.js';
import { summarizeTurns } from '../../../src/integrations/context/summarizer.js';
import type { Turn } from '../../../src/types.js';

class FakeMemory implements MemoryCollaborator {
  countCalls = 0;
  summaryWrites: string[] = [];

  constructor(
    private turns: Turn[],
    private summary: string | null = null,
  ) {}

  async getSummary(): Promise<string | null> {
    return this.summary;
  }

  async getRecentTurns(_sessionId: string, limit: number): Promise<Turn[]> {
    return this.turns.slice(-limit);
  }

  async getAllTurns(): Promise<Turn[]> {
    return [...this.turns];
  }

  async countTurns(): Promise<number> {
    this.countCalls++;
    return this.turns.length;
  }

  async setSummary(_sessionId: string, summary: string): Promise<void> {
    this.summaryWrites.push(summary);
    this.summary = summary;
  }
}

class CountingSummarizer implements Summarizer {
  calls: { turns: number; targetTokens: number }[] = [];

  async summarize(turns: readonly Turn[], options: SummarizeOptions): Promise<string> {
    this.calls.push({ turns: turns.length, targetTokens: options.targetTokens });
    return summarizeTurns(turns, options.targetTokens);
  }
}

function makeTurns(count: number): Turn[] {
  return Array.from({ length: count }, (_, i): Turn => ({
    role: i % 2 === 0 ? 'user' : 'assistant',
    content: `message ${i + 1}`,
    timestamp: i + 1,
  }));
}

describe('assembleContext', () => {
  it('should place the request after the preamble when there is no history', () => {
    expect(assembleContext(null, [], 'hi')).toBe(`${CONTEXT_PREAMBLE}\n\n[Current Request]\nUSER: hi`);
  });

  it('should order summary, recent turns and request', () => {
    const turns: Turn[] = [
      { role: 'user', content: 'a', timestamp: 1 },
      { role: 'assistant', content: 'b', timestamp: 2 },
    ];
    expect(assembleContext('S', turns, 'hi')).toBe(
      `${CONTEXT_PREAMBLE}\n` +
        '\n[Session Summary]\nS\n' +
        '\n[Recent Conversation]\nUSER: a\nASSISTANT: b\n' +
        '\n[Current Request]\nUSER: hi',
    );
  });
});

describe('ContextPacker', () => {
  it('should return the context as is when under budget', async () => {
    const memory = new FakeMemory(makeTurns(3), 'earlier summary');
    const summarizer = new CountingSummarizer();
    const packer = new ContextPacker(memory, summarizer, { tokenBudget: 3000 });

    const packed = await packer.pack('s1', 'u1', 'next question');

    expect(packed.summaryUpdated).toBe(false);
    expect(packed.summary).toBe('earlier summary');
    expect(packed.recentTurns).toHaveLength(3);
    expect(packed.context).toBe(assembleContext('earlier summary', makeTurns(3), 'next question'));
    expect(memory.countCalls).toBe(0);
    expect(summarizer.calls).toHaveLength(0);
  });

  it('should keep only the last K turns', async () => {
    const memory = new FakeMemory(makeTurns(15));
    const packer = new ContextPacker(memory, new CountingSummarizer(), { recentTurns: 10, tokenBudget: 3000 });

    const packed = await packer.pack('s1', 'u1', 'q');

    expect(packed.recentTurns.map((t) => t.timestamp)).toEqual([6, 7, 8, 9, 10, 11, 12, 13, 14, 15]);
  });

  it('should not summarize when the history fits in the recent turns', async () => {
    const memory = new FakeMemory(makeTurns(4));
    const summarizer = new CountingSummarizer();
    const packer = new ContextPacker(memory, summarizer, { recentTurns: 10, tokenBudget: 5 });

    const packed = await packer.pack('s1', 'u1', 'q');

    expect(packed.summaryUpdated).toBe(false);
    expect(memory.countCalls).toBe(1);
    expect(summarizer.calls).toHaveLength(0);
  });

  it('should re-summarize the full history once when over budget', async () => {
    const memory = new FakeMemory(makeTurns(15), 'stale summary');
    const summarizer = new CountingSummarizer();
    const packer = new ContextPacker(memory, summarizer, {
      recentTurns: 10,
      tokenBudget: 50,
      summaryTargetTokens: 500,
    });

    const packed = await packer.pack('s1', 'u1', 'q');
    const expectedSummary =
      'Conversation history: 15 total messages | User asked about: 8 topics | ' +
      'Assistant provided: 7 responses | Initial topic: message 1... | Recent topic: message 15...';

    expect(summarizer.calls).toEqual([{ turns: 15, targetTokens: 500 }]);
    expect(memory.summaryWrites).toEqual([expectedSummary]);
    expect(packed.summaryUpdated).toBe(true);
    expect(packed.summary).toBe(expectedSummary);
    expect(packed.context).toContain(`[Session Summary]\n${expectedSummary}`);
    expect(packed.context).not.toContain('stale summary');
    expect(packed.context).toBe(assembleContext(expectedSummary, makeTurns(15).slice(-10), 'q'));
    expect(packed.tokenEstimate).toBe(Math.ceil(packed.context.length / 4));
  });

  it('should stop before summarizing when cancelled', async () => {
    const memory = new FakeMemory(makeTurns(15));
    const summarizer = new CountingSummarizer();
    const packer = new ContextPacker(memory, summarizer, { recentTurns: 10, tokenBudget: 50 });
    const source = createCancellationTokenSource();
    source.cancel('client disconnected');

    await expect(packer.pack('s1', 'u1', 'q', { cancellationToken: source.token })).rejects.toBeInstanceOf(
      CancellationError,
    );
    expect(summarizer.calls).toHaveLength(0);
    expect(memory.summaryWrites).toEqual([]);
  });
});
