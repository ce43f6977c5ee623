/**
 * Pipeline State Machine
 *
 * Tracks which stage a request is in, with typed transitions, listener
 * notification and a transition history. The controller drives it; the
 * table below is the only place the legal stage order is written down.
 *
 * States:
 * - planning: breaking the prompt into subtasks
 * - executing: running subtasks, querying history
 * - validating: checking the executor's findings
 * - composing: writing the answer and suggestions
 * - done: terminal
 *
 * Valid transitions:
 *   planning   → executing
 *   executing  → validating
 *   validating → executing | composing
 *   composing  → done
 */

import type { StageName } from '../types.js';

// =============================================================================
// TYPES
// =============================================================================

export type PipelinePhase = 'planning' | 'executing' | 'validating' | 'composing' | 'done';

/** The stage that runs while the machine is in a given phase */
export const PHASE_STAGE: Record<Exclude<PipelinePhase, 'done'>, StageName> = {
  planning: 'planner',
  executing: 'executor',
  validating: 'validator',
  composing: 'composer',
};

export interface PhaseTransition {
  from: PipelinePhase;
  to: PipelinePhase;
  reason: string;
  timestamp: number;
}

export type PipelineStateEvent =
  | { type: 'phase.changed'; transition: PhaseTransition }
  | { type: 'phase.rejected'; from: PipelinePhase; to: PipelinePhase; reason: string };

export type PipelineStateListener = (event: PipelineStateEvent) => void;

export interface PipelineStateMachineOptions {
  initialPhase?: PipelinePhase;
  now?: () => number;
}

// =============================================================================
// VALID TRANSITIONS
// =============================================================================

const VALID_TRANSITIONS: Record<PipelinePhase, Set<PipelinePhase>> = {
  planning: new Set<PipelinePhase>(['executing']),
  executing: new Set<PipelinePhase>(['validating']),
  validating: new Set<PipelinePhase>(['executing', 'composing']),
  composing: new Set<PipelinePhase>(['done']),
  done: new Set<PipelinePhase>(),
};

export function isValidTransition(from: PipelinePhase, to: PipelinePhase): boolean {
  return VALID_TRANSITIONS[from].has(to);
}

// =============================================================================
// PIPELINE STATE MACHINE
// =============================================================================

export class PipelineStateMachine {
  private currentPhase: PipelinePhase;
  private readonly initialPhase: PipelinePhase;
  private readonly now: () => number;
  private listeners: PipelineStateListener[] = [];
  private transitions: PhaseTransition[] = [];
  private visits = new Map<PipelinePhase, number>();

  constructor(options: PipelineStateMachineOptions = {}) {
    this.initialPhase = options.initialPhase ?? 'planning';
    this.currentPhase = this.initialPhase;
    this.now = options.now ?? Date.now;
    this.visits.set(this.currentPhase, 1);
  }

  // ---------------------------------------------------------------------------
  // PUBLIC API
  // ---------------------------------------------------------------------------

  getPhase(): PipelinePhase {
    return this.currentPhase;
  }

  isTerminal(): boolean {
    return this.currentPhase === 'done';
  }

  /** How many times a phase has been entered, counting the initial one */
  getVisitCount(phase: PipelinePhase): number {
    return this.visits.get(phase) ?? 0;
  }

  getTransitions(): readonly PhaseTransition[] {
    return this.transitions;
  }

  /**
   * Attempt a transition.
   * Returns true if it was legal and executed, false if rejected.
   */
  transition(to: PipelinePhase, reason: string): boolean {
    const from = this.currentPhase;
    if (!isValidTransition(from, to)) {
      this.emit({ type: 'phase.rejected', from, to, reason });
      return false;
    }

    const transition: PhaseTransition = { from, to, reason, timestamp: this.now() };
    this.transitions.push(transition);
    this.currentPhase = to;
    this.visits.set(to, this.getVisitCount(to) + 1);

    this.emit({ type: 'phase.changed', transition });
    return true;
  }

  subscribe(listener: PipelineStateListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  reset(phase?: PipelinePhase): void {
    this.currentPhase = phase ?? this.initialPhase;
    this.transitions = [];
    this.visits = new Map([[this.currentPhase, 1]]);
  }

  // ---------------------------------------------------------------------------
  // PRIVATE
  // ---------------------------------------------------------------------------

  private emit(event: PipelineStateEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        // A listener must not break the pipeline
        process.stderr.write(
          `[pipeline-state] listener failed: ${err instanceof Error ? err.message : String(err)}\n`,
        );
      }
    }
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createPipelineStateMachine(options?: PipelineStateMachineOptions): PipelineStateMachine {
  return new PipelineStateMachine(options);
}
