/**
 * Pipeline Controller
 *
 * Runs the stages in order and decides the one branch the pipeline has:
 * after the first failed validation the Executor runs again, otherwise the
 * Composer runs. Each completed stage is yielded as a StageTransition so
 * the relay can stream it while the next stage works.
 */

import { DEFAULT_STAGES } from '../agents/index.js';
import type { StageDeps, StageRegistry } from '../agents/types.js';
import { ErrorCategory, PipelineError } from '../errors/index.js';
import type { RequestState, StageName, ToolCallRecord } from '../types.js';
import {
  PHASE_STAGE,
  createPipelineStateMachine,
  type PipelinePhase,
  type PipelineStateListener,
} from './pipeline-state-machine.js';

// =============================================================================
// TYPES
// =============================================================================

export interface StageTransition {
  stage: StageName;
  /** State after the stage */
  state: RequestState;
  /** Tool calls produced by this run of the stage only */
  toolCalls: readonly ToolCallRecord[];
  durationMs: number;
}

export interface PipelineControllerOptions {
  stages?: Partial<StageRegistry>;
  onPhaseChange?: PipelineStateListener;
}

// =============================================================================
// CONTROLLER
// =============================================================================

export class PipelineController {
  private readonly stages: StageRegistry;
  private readonly onPhaseChange?: PipelineStateListener;

  constructor(options: PipelineControllerOptions = {}) {
    this.stages = { ...DEFAULT_STAGES, ...options.stages };
    this.onPhaseChange = options.onPhaseChange;
  }

  /**
   * Drive one request to completion. Yields after every stage; the
   * generator's return value is the final state.
   */
  async *run(
    initial: RequestState,
    deps: StageDeps,
  ): AsyncGenerator<StageTransition, RequestState, undefined> {
    const machine = createPipelineStateMachine({ now: () => deps.clock.now() });
    const unsubscribe = this.onPhaseChange ? machine.subscribe(this.onPhaseChange) : undefined;
    const log = deps.logger.withContext({ component: 'pipeline' });

    let state = initial;
    let validatorRuns = 0;

    try {
      for (;;) {
        const phase = machine.getPhase();
        if (phase === 'done') break;

        deps.cancellationToken.throwIfCancellationRequested();

        const stage = PHASE_STAGE[phase];
        const toolCallsBefore = state.toolCalls.length;
        const startedAt = deps.clock.now();

        state = await this.stages[stage](state, deps);

        const durationMs = deps.clock.now() - startedAt;
        if (stage === 'validator') validatorRuns++;

        yield {
          stage,
          state,
          toolCalls: state.toolCalls.slice(toolCallsBefore),
          durationMs,
        };

        const { next, reason } = nextPhase(phase, state, validatorRuns);
        if (!machine.transition(next, reason)) {
          throw new PipelineError(
            `Illegal pipeline transition ${phase} -> ${next}`,
            ErrorCategory.INTERNAL,
            false,
            { from: phase, to: next },
          );
        }
        log.debug('Pipeline transition', { from: phase, to: next, reason });
      }
    } finally {
      unsubscribe?.();
    }

    return state;
  }
}

// =============================================================================
// ROUTING
// =============================================================================

function nextPhase(
  phase: Exclude<PipelinePhase, 'done'>,
  state: RequestState,
  validatorRuns: number,
): { next: PipelinePhase; reason: string } {
  switch (phase) {
    case 'planning':
      return { next: 'executing', reason: 'Plan ready' };
    case 'executing':
      return { next: 'validating', reason: 'Subtasks executed' };
    case 'validating':
      if (!state.validationPassed && validatorRuns === 1) {
        return { next: 'executing', reason: `Retry: ${state.validationFeedback}` };
      }
      return {
        next: 'composing',
        reason: state.validationPassed ? 'Validation passed' : 'Retry exhausted',
      };
    case 'composing':
      return { next: 'done', reason: 'Answer composed' };
  }
}
