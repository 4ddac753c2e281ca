/**
 * Step model for the installation tree.
 *
 * A step is either a composite, which delegates to an ordered list of
 * children, or a leaf, which owns a probe and a body.
 *
 * @packageDocumentation
 */

import type { PersistentStore } from '../store/index.js';
import type { Prompter } from '../prompt/index.js';
import type { SystemInspector } from '../system/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Verdict reported by a leaf step's probe.
 */
export type StatusCode =
  | 'Done'
  | 'NotDone'
  | 'UnknownPersistenceDisabled'
  | 'NeverRun'
  | 'Inapplicable'
  | 'Informational';

/**
 * Array of all status codes.
 */
export const STATUS_CODES: readonly StatusCode[] = [
  'Done',
  'NotDone',
  'UnknownPersistenceDisabled',
  'NeverRun',
  'Inapplicable',
  'Informational',
] as const;

/**
 * Result of probing a leaf step.
 */
export interface ProbeResult {
  /** The verdict. */
  readonly status: StatusCode;
  /** Human-readable explanation shown after `Status:`. May be empty. */
  readonly message: string;
}

/**
 * What a step body reports about its own run. Informational only: the
 * reprobe decides the step's final status.
 */
export type StepBodyResult = 'Completed' | 'Declined';

/**
 * Services shared by the runner, the prober and every step body.
 */
export interface EngineContext {
  /** Completion log and configuration store. */
  readonly store: PersistentStore;
  /** Operator prompts and output. */
  readonly prompter: Prompter;
  /** Read-only access to the machine being installed. */
  readonly system: SystemInspector;
  /** Structured logger. */
  readonly logger: Logger;
  /** Run every leaf regardless of a `Done` status. */
  readonly forceRun: boolean;
}

/**
 * Context handed to a leaf's probe and body.
 */
export interface StepContext extends EngineContext {
  /** Name of the step being probed or run. */
  readonly stepName: string;
}

/**
 * Probe function of a leaf step.
 */
export type StepProbe = (ctx: StepContext) => Promise<ProbeResult>;

/**
 * Body function of a leaf step.
 */
export type StepBody = (ctx: StepContext) => Promise<StepBodyResult>;

/**
 * A leaf step: has a probe and a body, no children.
 */
export interface LeafStep {
  readonly kind: 'Leaf';
  /** Stable identifier, also the completion-log key. */
  readonly name: string;
  readonly probe: StepProbe;
  readonly body: StepBody;
}

/**
 * A composite step: delegates to its children in order.
 */
export interface CompositeStep {
  readonly kind: 'Composite';
  /** Stable identifier. */
  readonly name: string;
  /** Ordered, non-empty list of children. */
  readonly children: readonly Step[];
}

/**
 * A node of the installation tree.
 */
export type Step = LeafStep | CompositeStep;

/**
 * A named, top-level sequence of steps selected on the command line.
 */
export interface Stage {
  /** Stage name as typed on the command line. */
  readonly name: string;
  /** One-line description for the usage text. */
  readonly description: string;
  /** Top-level steps, run in order. */
  readonly steps: readonly Step[];
  /** Warning printed after the stage finishes without abort. */
  readonly notice?: string;
}

/**
 * Creates a frozen leaf step.
 *
 * @param name - Stable step name.
 * @param probe - Status probe.
 * @param body - Interactive body.
 */
export function leaf(name: string, probe: StepProbe, body: StepBody): LeafStep {
  return Object.freeze({ kind: 'Leaf', name, probe, body });
}

/**
 * Creates a frozen composite step.
 *
 * @param name - Stable step name.
 * @param children - Ordered children.
 */
export function composite(name: string, children: readonly Step[]): CompositeStep {
  return Object.freeze({ kind: 'Composite', name, children: Object.freeze([...children]) });
}

/**
 * Type guard for leaf steps.
 *
 * @param step - The step to check.
 */
export function isLeaf(step: Step): step is LeafStep {
  return step.kind === 'Leaf';
}

/**
 * Type guard for composite steps.
 *
 * @param step - The step to check.
 */
export function isComposite(step: Step): step is CompositeStep {
  return step.kind === 'Composite';
}
