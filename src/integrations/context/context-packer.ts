/**
 * Context Packer
 *
 * Builds the bounded context string every stage sees:
 *
 *   [preamble]
 *   [session summary, when one exists]
 *   [last K turns]
 *   [current request]
 *
 * When the estimate exceeds the token budget and the session holds more
 * than K turns, the summary is regenerated from the full history, persisted,
 * and the context rebuilt once with it. A context that is still over budget
 * after that pass is returned as is.
 */

import type { MemoryCollaborator, Summarizer } from '../../core/collaborators.js';
import { CancellationToken } from '../cancellation.js';
import type { Turn } from '../../types.js';
import { createComponentLogger } from '../utilities/logger.js';
import { estimateTokenCount } from '../utilities/token-estimate.js';

const log = createComponentLogger('ContextPacker');

export const CONTEXT_PREAMBLE =
  'You are a helpful AI assistant. Answer based on conversation history and current request.';

// =============================================================================
// TYPES
// =============================================================================

export interface ContextPackerConfig {
  /** Recent turns placed verbatim in the context (K) */
  recentTurns?: number;
  /** Estimated-token threshold that triggers re-summarization */
  tokenBudget?: number;
  summaryTargetTokens?: number;
}

export interface PackedContext {
  context: string;
  summary: string | null;
  recentTurns: Turn[];
  tokenEstimate: number;
  summaryUpdated: boolean;
}

export interface PackOptions {
  cancellationToken?: CancellationToken;
}

const DEFAULT_CONFIG: Required<ContextPackerConfig> = {
  recentTurns: 10,
  tokenBudget: 3000,
  summaryTargetTokens: 500,
};

// =============================================================================
// ASSEMBLY
// =============================================================================

export function summaryBlock(summary: string): string {
  return `\n[Session Summary]\n${summary}`;
}

export function turnsBlock(turns: readonly Turn[]): string {
  return '\n[Recent Conversation]' + turns.map((t) => `\n${t.role.toUpperCase()}: ${t.content}`).join('');
}

export function requestBlock(prompt: string): string {
  return `\n[Current Request]\nUSER: ${prompt}`;
}

export function assembleContext(summary: string | null, turns: readonly Turn[], prompt: string): string {
  const parts = [CONTEXT_PREAMBLE];
  if (summary) parts.push(summaryBlock(summary));
  if (turns.length > 0) parts.push(turnsBlock(turns));
  parts.push(requestBlock(prompt));
  return parts.join('\n');
}

// =============================================================================
// PACKER
// =============================================================================

export class ContextPacker {
  private config: Required<ContextPackerConfig>;

  constructor(
    private readonly memory: MemoryCollaborator,
    private readonly summarizer: Summarizer,
    config: ContextPackerConfig = {},
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async pack(
    sessionId: string,
    userId: string,
    currentPrompt: string,
    options: PackOptions = {},
  ): Promise<PackedContext> {
    const token = options.cancellationToken ?? CancellationToken.None;
    const { recentTurns: k, tokenBudget, summaryTargetTokens } = this.config;

    const [storedSummary, recentTurns] = await Promise.all([
      this.memory.getSummary(sessionId),
      this.memory.getRecentTurns(sessionId, k),
    ]);

    let summary = storedSummary;
    let context = assembleContext(summary, recentTurns, currentPrompt);
    let tokenEstimate = estimateTokenCount(context);

    if (tokenEstimate <= tokenBudget) {
      return { context, summary, recentTurns, tokenEstimate, summaryUpdated: false };
    }

    const totalTurns = await this.memory.countTurns(sessionId);
    if (totalTurns <= k) {
      log.debug('Context over budget but history fits in recent turns', {
        sessionId,
        tokenEstimate,
        tokenBudget,
      });
      return { context, summary, recentTurns, tokenEstimate, summaryUpdated: false };
    }

    token.throwIfCancellationRequested();
    const allTurns = await this.memory.getAllTurns(sessionId);
    summary = await this.summarizer.summarize(allTurns, {
      targetTokens: summaryTargetTokens,
      cancellationToken: token,
    });
    token.throwIfCancellationRequested();
    await this.memory.setSummary(sessionId, summary, userId);

    const before = tokenEstimate;
    context = assembleContext(summary, recentTurns, currentPrompt);
    tokenEstimate = estimateTokenCount(context);

    log.info('Session summary regenerated', {
      sessionId,
      totalTurns,
      tokensBefore: before,
      tokensAfter: tokenEstimate,
    });

    return { context, summary, recentTurns, tokenEstimate, summaryUpdated: true };
  }
}
