/**
 * Event Relay
 *
 * Turns the controller's stage transitions into the streaming protocol:
 * one `agent` event per stage, tool call events for Executor runs, the
 * Composer's answer as paced `token` events, then `done` after the commit
 * hook has persisted the request. Fatal errors end the stream with a
 * single `error` event; cancellation ends it with nothing.
 */

import type { StageDeps } from '../agents/types.js';
import { formatError, formatErrorForLog } from '../errors/index.js';
import { isCancellationError, sleep } from '../integrations/cancellation.js';
import type { RequestState, RequestTimings } from '../types.js';
import type { PipelineController } from './pipeline-controller.js';
import type { RelayEvent } from './protocol/types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface EventRelayConfig {
  /** Pause between token events */
  tokenDelayMs: number;
}

/**
 * Persists a finished request. Runs before `done`; a throw becomes the
 * stream's `error` event.
 */
export type CommitHook = (state: RequestState, timings: RequestTimings) => Promise<void>;

export interface RelayRunOptions {
  onCommit?: CommitHook;
}

// =============================================================================
// TOKENIZING
// =============================================================================

/**
 * Split text into whitespace-delimited units, each keeping the whitespace
 * that follows it. Leading whitespace rides on the first unit, so the
 * units always concatenate back to `text`.
 */
export function splitTokens(text: string): string[] {
  const units = text.match(/\S+\s*/g);
  if (!units) {
    return text.length > 0 ? [text] : [];
  }

  const leading = /^\s+/.exec(text);
  if (leading) {
    units[0] = leading[0] + units[0];
  }
  return units;
}

export function computeTimings(
  requestStart: number,
  firstTokenAt: number | null,
  completedAt: number,
): RequestTimings {
  return {
    requestStart,
    firstTokenAt,
    completedAt,
    ttftMs: firstTokenAt === null ? null : firstTokenAt - requestStart,
    totalMs: completedAt - requestStart,
  };
}

// =============================================================================
// RELAY
// =============================================================================

export class EventRelay {
  constructor(
    private readonly controller: PipelineController,
    private readonly config: EventRelayConfig,
  ) {}

  async *stream(
    initial: RequestState,
    deps: StageDeps,
    options: RelayRunOptions = {},
  ): AsyncGenerator<RelayEvent, void, undefined> {
    const token = deps.cancellationToken;
    const log = deps.logger.withContext({ component: 'relay' });

    let final = initial;
    let firstTokenAt: number | null = null;
    let lastTokenAt: number | null = null;

    try {
      for await (const transition of this.controller.run(initial, deps)) {
        if (token.isCancellationRequested) break;
        final = transition.state;

        yield { type: 'agent', name: transition.stage };

        if (transition.stage === 'executor') {
          for (const call of transition.toolCalls) {
            yield { type: 'tool_call_started', tool: call.tool, args: call.args };
            yield {
              type: 'tool_call_completed',
              tool: call.tool,
              ok: call.result.status === 'ok',
              latencyMs: call.latencyMs,
            };
          }
        }

        if (transition.stage === 'composer') {
          const units = splitTokens(transition.state.finalAnswer);
          for (let i = 0; i < units.length; i++) {
            token.throwIfCancellationRequested();
            if (i > 0 && this.config.tokenDelayMs > 0) {
              await sleep(this.config.tokenDelayMs, token);
            }
            const now = deps.clock.now();
            if (firstTokenAt === null) firstTokenAt = now;
            lastTokenAt = now;
            yield { type: 'token', text: units[i] };
          }
        }
      }

      if (token.isCancellationRequested) {
        log.info('Request cancelled, nothing committed', { reason: token.cancellationReason });
        return;
      }

      const composedAt = final.completedAt ?? deps.clock.now();
      const completedAt = lastTokenAt === null ? composedAt : Math.max(composedAt, lastTokenAt);
      const timings = computeTimings(final.requestStart, firstTokenAt, completedAt);
      const committed: RequestState = { ...final, firstTokenAt, completedAt };

      if (options.onCommit) {
        await options.onCommit(committed, timings);
      }

      log.info('Request complete', {
        ttftMs: timings.ttftMs,
        totalMs: timings.totalMs,
        toolCalls: committed.toolCalls.length,
        retried: committed.retryCount > 0,
      });

      yield {
        type: 'done',
        fullText: committed.finalAnswer,
        suggestions: [...committed.suggestions],
        timings,
      };
    } catch (err) {
      if (isCancellationError(err)) {
        log.info('Request cancelled, nothing committed', { reason: err.message });
        return;
      }
      log.error('Request failed', { error: formatErrorForLog(err) });
      yield { type: 'error', error: formatError(err) };
    }
  }
}
