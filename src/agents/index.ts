import { runComposer } from './composer.js';
import { runExecutor } from './executor.js';
import { runPlanner } from './planner.js';
import type { StageRegistry } from './types.js';
import { runValidator } from './validator.js';

export * from './types.js';
export * from './heuristics.js';
export * from './parsing.js';
export * from './planner.js';
export * from './executor.js';
export * from './validator.js';
export * from './composer.js';

export const DEFAULT_STAGES: StageRegistry = {
  planner: runPlanner,
  executor: runExecutor,
  validator: runValidator,
  composer: runComposer,
};
