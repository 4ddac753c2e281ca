/**
 * Per-step state machine of the runner.
 *
 * A leaf moves through `Probing -> Deciding -> Skipped` or
 * `Probing -> Deciding -> Running -> Reprobing -> Reported`, and may end in
 * `Aborted` from any phase in which it waits on the operator.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';

/**
 * Phase of one leaf invocation.
 */
export type StepPhase =
  | 'Probing'
  | 'Deciding'
  | 'Skipped'
  | 'Running'
  | 'Reprobing'
  | 'Reported'
  | 'Aborted';

/**
 * Valid transitions, keyed by source phase.
 */
export const PHASE_TRANSITIONS: ReadonlyMap<StepPhase, readonly StepPhase[]> = new Map<
  StepPhase,
  readonly StepPhase[]
>([
  ['Probing', ['Deciding', 'Aborted']],
  ['Deciding', ['Skipped', 'Running']],
  ['Running', ['Reprobing', 'Aborted']],
  ['Reprobing', ['Reported', 'Aborted']],
  ['Skipped', []],
  ['Reported', []],
  ['Aborted', []],
]);

/**
 * Error thrown on an invalid phase transition. Indicates a runner bug.
 */
export class StepPhaseError extends Error {
  /** The source phase. */
  public readonly from: StepPhase;
  /** The rejected target phase. */
  public readonly to: StepPhase;

  /**
   * Creates a new StepPhaseError.
   *
   * @param step - The step name.
   * @param from - The source phase.
   * @param to - The rejected target phase.
   */
  constructor(step: string, from: StepPhase, to: StepPhase) {
    super(`Invalid phase transition for step '${step}': ${from} -> ${to}`);
    this.name = 'StepPhaseError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Whether `from -> to` is a valid transition.
 *
 * @param from - The source phase.
 * @param to - The target phase.
 */
export function canTransitionPhase(from: StepPhase, to: StepPhase): boolean {
  return PHASE_TRANSITIONS.get(from)?.includes(to) ?? false;
}

/**
 * Whether a phase ends the invocation.
 *
 * @param phase - The phase.
 */
export function isFinalPhase(phase: StepPhase): boolean {
  return (PHASE_TRANSITIONS.get(phase)?.length ?? 0) === 0;
}

/**
 * Records the phases one leaf goes through and rejects invalid moves.
 */
export class PhaseTracker {
  private readonly step: string;
  private readonly logger: Logger;
  private readonly trace: StepPhase[] = ['Probing'];

  constructor(step: string, logger: Logger) {
    this.step = step;
    this.logger = logger;
    this.logger.debug('phase_entered', { step, phase: 'Probing' });
  }

  /** The current phase. */
  get current(): StepPhase {
    return this.trace[this.trace.length - 1] ?? 'Probing';
  }

  /** Every phase entered so far, in order. */
  get phases(): readonly StepPhase[] {
    return [...this.trace];
  }

  /**
   * Moves to `to`.
   *
   * @param to - The target phase.
   * @throws {StepPhaseError} If the transition is not in the table.
   */
  advance(to: StepPhase): void {
    const from = this.current;
    if (!canTransitionPhase(from, to)) {
      throw new StepPhaseError(this.step, from, to);
    }
    this.trace.push(to);
    this.logger.debug('phase_transition', { step: this.step, from, to });
  }
}
