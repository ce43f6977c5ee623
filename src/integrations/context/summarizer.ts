/**
 * Conversation summarizers used by the Context Packer when a session's
 * context outgrows its token budget.
 */

import type { Summarizer, SummarizeOptions, TextGenerator } from '../../core/collaborators.js';
import { isCancellationError, formatErrorForLog } from '../../errors/index.js';
import type { Turn } from '../../types.js';
import { createComponentLogger } from '../utilities/logger.js';
import { tokensToChars } from '../utilities/token-estimate.js';

const log = createComponentLogger('Summarizer');

const TOPIC_PREVIEW_CHARS = 100;

function clampToTarget(summary: string, targetTokens: number): string {
  const maxChars = tokensToChars(targetTokens);
  return summary.length > maxChars ? `${summary.slice(0, maxChars)}...` : summary;
}

/**
 * Builds a summary from message counts and the first/last user topics.
 *
 * `Conversation history: 15 total messages | User asked about: 8 topics | ...`
 */
export function summarizeTurns(turns: readonly Turn[], targetTokens: number): string {
  if (turns.length === 0) return '';

  const userTurns = turns.filter((t) => t.role === 'user');
  const assistantTurns = turns.filter((t) => t.role === 'assistant');

  const parts = [
    `Conversation history: ${turns.length} total messages`,
    `User asked about: ${userTurns.length} topics`,
    `Assistant provided: ${assistantTurns.length} responses`,
  ];

  if (userTurns.length > 0) {
    parts.push(`Initial topic: ${userTurns[0].content.slice(0, TOPIC_PREVIEW_CHARS)}...`);
    if (userTurns.length > 1) {
      const last = userTurns[userTurns.length - 1];
      parts.push(`Recent topic: ${last.content.slice(0, TOPIC_PREVIEW_CHARS)}...`);
    }
  }

  return clampToTarget(parts.join(' | '), targetTokens);
}

export class HeuristicSummarizer implements Summarizer {
  async summarize(turns: readonly Turn[], options: SummarizeOptions): Promise<string> {
    return summarizeTurns(turns, options.targetTokens);
  }
}

/**
 * Asks the text generator for a summary, falling back to the heuristic
 * summary when generation fails or returns nothing.
 */
export class GenerativeSummarizer implements Summarizer {
  private fallback = new HeuristicSummarizer();

  constructor(private readonly generator: TextGenerator) {}

  async summarize(turns: readonly Turn[], options: SummarizeOptions): Promise<string> {
    if (turns.length === 0) return '';

    const transcript = turns.map((t) => `${t.role.toUpperCase()}: ${t.content}`).join('\n');
    const prompt = [
      `Summarize the following conversation in at most ${options.targetTokens} tokens.`,
      'Keep names, facts the user shared, decisions and open questions.',
      '',
      transcript,
      '',
      'SUMMARY:',
    ].join('\n');

    try {
      const text = await this.generator.generate(prompt, {
        maxTokens: options.targetTokens,
        temperature: 0.3,
        cancellationToken: options.cancellationToken,
      });
      const summary = text.replace(/^\s*SUMMARY:\s*/i, '').trim();
      if (summary.length > 0) {
        return clampToTarget(summary, options.targetTokens);
      }
      log.warn('Generator returned an empty summary, using heuristic summary');
    } catch (err) {
      if (isCancellationError(err)) throw err;
      log.warn('Summary generation failed, using heuristic summary', { error: formatErrorForLog(err) });
    }

    return this.fallback.summarize(turns, options);
  }
}
