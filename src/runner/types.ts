/**
 * Result types produced by the step runner.
 *
 * @packageDocumentation
 */

import type { ProbeResult, StatusCode, StepBodyResult, StepDecision } from '../steps/index.js';
import type { StepPhase } from './phases.js';

/** What a leaf body produced; `Failed` when it threw. */
export type BodyOutcome = StepBodyResult | 'Failed';

/**
 * Outcome of one leaf invocation.
 */
export interface LeafOutcome {
  readonly kind: 'Leaf';
  readonly name: string;
  /** True when the operator aborted during this leaf. */
  readonly aborted: boolean;
  /** Every phase entered, starting at `Probing`. */
  readonly phases: readonly StepPhase[];
  readonly initial: ProbeResult | undefined;
  readonly decision: StepDecision | undefined;
  readonly bodyResult: BodyOutcome | undefined;
  readonly final: ProbeResult | undefined;
  /** Last known status: the reprobe when there was one, else the first probe. */
  readonly status: StatusCode | undefined;
}

/**
 * Outcome of a composite step.
 */
export interface CompositeOutcome {
  readonly kind: 'Composite';
  readonly name: string;
  readonly aborted: boolean;
  /** Outcomes of the children that were visited. */
  readonly children: readonly StepOutcome[];
}

export type StepOutcome = LeafOutcome | CompositeOutcome;

/**
 * Outcome of a stage.
 */
export interface StageReport {
  readonly stage: string;
  readonly aborted: boolean;
  readonly outcomes: readonly StepOutcome[];
}

/**
 * Counts derived from a stage report.
 */
export interface StageSummary {
  /** Leaves visited. */
  readonly visited: number;
  /** Leaves whose body ran. */
  readonly ran: number;
  /** Leaves skipped without running. */
  readonly skipped: number;
  /** Last known status of each visited leaf, counted. */
  readonly byStatus: Readonly<Record<StatusCode, number>>;
}
