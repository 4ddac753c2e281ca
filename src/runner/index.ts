/**
 * Depth-first step runner.
 *
 * @packageDocumentation
 */

export { StepRunner } from './runner.js';
export {
  PHASE_TRANSITIONS,
  PhaseTracker,
  StepPhaseError,
  canTransitionPhase,
  isFinalPhase,
} from './phases.js';
export type { StepPhase } from './phases.js';
export { flattenLeaves, formatSummary, summarize } from './report.js';
export type {
  BodyOutcome,
  CompositeOutcome,
  LeafOutcome,
  StageReport,
  StageSummary,
  StepOutcome,
} from './types.js';
