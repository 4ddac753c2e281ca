/**
 * Static, validated tree of installation stages and steps.
 *
 * @packageDocumentation
 */

import type { CompositeStep, LeafStep, Stage, Step } from './types.js';

/** Pattern every step name must match. */
export const STEP_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

/**
 * Error type for an invalid tree.
 */
export type StepRegistryErrorType =
  | 'empty_composite'
  | 'invalid_name'
  | 'duplicate_name'
  | 'duplicate_stage'
  | 'cycle'
  | 'unknown_stage';

/**
 * Error thrown when the tree violates a structural invariant.
 */
export class StepRegistryError extends Error {
  /** The type of registry error. */
  public readonly errorType: StepRegistryErrorType;
  /** The offending step or stage name. */
  public readonly subject: string;

  /**
   * Creates a new StepRegistryError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of registry error.
   * @param subject - The offending step or stage name.
   */
  constructor(message: string, errorType: StepRegistryErrorType, subject: string) {
    super(message);
    this.name = 'StepRegistryError';
    this.errorType = errorType;
    this.subject = subject;
  }
}

/**
 * Immutable registry of stages. Validates the whole tree on construction.
 *
 * The same step object may appear in several stages; two different objects
 * may not share a name, since the name keys the completion log.
 */
export class StepRegistry {
  private readonly stages: ReadonlyMap<string, Stage>;
  private readonly steps: ReadonlyMap<string, Step>;

  /**
   * @param stages - Stages in display order.
   * @throws {StepRegistryError} If the tree is invalid.
   */
  constructor(stages: readonly Stage[]) {
    const stageMap = new Map<string, Stage>();
    const stepMap = new Map<string, Step>();

    for (const stage of stages) {
      if (stageMap.has(stage.name)) {
        throw new StepRegistryError(
          `Duplicate stage name '${stage.name}'`,
          'duplicate_stage',
          stage.name
        );
      }
      stageMap.set(stage.name, Object.freeze({ ...stage, steps: Object.freeze([...stage.steps]) }));
      for (const step of stage.steps) {
        registerStep(step, stepMap, new Set<Step>());
      }
    }

    this.stages = stageMap;
    this.steps = stepMap;
  }

  /** Stage names in registration order. */
  stageNames(): string[] {
    return [...this.stages.keys()];
  }

  /** All stages in registration order. */
  allStages(): Stage[] {
    return [...this.stages.values()];
  }

  /**
   * Looks up a stage.
   *
   * @param name - Stage name.
   */
  stage(name: string): Stage | undefined {
    return this.stages.get(name);
  }

  /**
   * Looks up a stage, throwing when it does not exist.
   *
   * @param name - Stage name.
   * @throws {StepRegistryError} If there is no such stage.
   */
  requireStage(name: string): Stage {
    const stage = this.stages.get(name);
    if (stage === undefined) {
      throw new StepRegistryError(`Unknown stage '${name}'`, 'unknown_stage', name);
    }
    return stage;
  }

  /**
   * Looks up a step anywhere in the tree.
   *
   * @param name - Step name.
   */
  find(name: string): Step | undefined {
    return this.steps.get(name);
  }

  /**
   * Children of a step (empty for leaves).
   *
   * @param step - The step.
   */
  children(step: Step): readonly Step[] {
    return step.kind === 'Composite' ? step.children : [];
  }

  /**
   * Whether a step delegates to children.
   *
   * @param step - The step.
   */
  isComposite(step: Step): step is CompositeStep {
    return step.kind === 'Composite';
  }

  /**
   * Leaves in depth-first order, for one stage or the whole registry.
   * A leaf shared by several stages is listed once.
   *
   * @param stageName - Restrict to this stage.
   */
  leaves(stageName?: string): LeafStep[] {
    const roots =
      stageName === undefined
        ? this.allStages().flatMap((stage) => stage.steps)
        : this.requireStage(stageName).steps;
    const seen = new Set<LeafStep>();
    const result: LeafStep[] = [];
    const visit = (step: Step): void => {
      if (step.kind === 'Composite') {
        step.children.forEach(visit);
      } else if (!seen.has(step)) {
        seen.add(step);
        result.push(step);
      }
    };
    roots.forEach(visit);
    return result;
  }
}

function registerStep(step: Step, stepMap: Map<string, Step>, ancestors: Set<Step>): void {
  if (!STEP_NAME_PATTERN.test(step.name)) {
    throw new StepRegistryError(
      `Invalid step name '${step.name}': names must match ${STEP_NAME_PATTERN.source}`,
      'invalid_name',
      step.name
    );
  }
  if (ancestors.has(step)) {
    throw new StepRegistryError(`Step '${step.name}' contains itself`, 'cycle', step.name);
  }

  const existing = stepMap.get(step.name);
  if (existing !== undefined && existing !== step) {
    throw new StepRegistryError(
      `Two different steps are named '${step.name}'`,
      'duplicate_name',
      step.name
    );
  }
  stepMap.set(step.name, step);

  if (step.kind === 'Composite') {
    if (step.children.length === 0) {
      throw new StepRegistryError(
        `Composite step '${step.name}' has no children`,
        'empty_composite',
        step.name
      );
    }
    ancestors.add(step);
    for (const child of step.children) {
      registerStep(child, stepMap, ancestors);
    }
    ancestors.delete(step);
  }
}
