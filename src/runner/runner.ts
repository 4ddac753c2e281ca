/**
 * Step runner: walks the installation tree depth first.
 *
 * For every leaf it probes, decides, optionally runs the body and reprobes.
 * Composite steps only delegate to their children. An operator abort stops
 * the whole walk; any other body failure is shown and the walk continues.
 *
 * @packageDocumentation
 */

import { formatBanner, isOperatorAbort } from '../prompt/index.js';
import {
  bannerPad,
  bannerWeight,
  decideAction,
  probeStep,
  statusColor,
  type CompositeStep,
  type EngineContext,
  type LeafStep,
  type ProbeResult,
  type Stage,
  type Step,
  type StepContext,
  type StepDecision,
  type StepRegistry,
} from '../steps/index.js';
import { PhaseTracker } from './phases.js';
import type { BodyOutcome, CompositeOutcome, LeafOutcome, StageReport, StepOutcome } from './types.js';

/**
 * Runs stages and steps against one engine context.
 *
 * @example
 * ```typescript
 * const runner = new StepRunner(context, registry);
 * const report = await runner.runStage('start');
 * if (report.aborted) process.exitCode = 130;
 * ```
 */
export class StepRunner {
  private readonly context: EngineContext;
  private readonly registry: StepRegistry;

  constructor(context: EngineContext, registry: StepRegistry) {
    this.context = context;
    this.registry = registry;
  }

  /**
   * Runs a stage's top-level steps in order. Prints the stage notice when the
   * walk was not aborted.
   *
   * @param stageName - Name of a registered stage.
   * @throws {StepRegistryError} If the stage is unknown.
   */
  async runStage(stageName: string): Promise<StageReport> {
    const stage: Stage = this.registry.requireStage(stageName);
    const outcomes: StepOutcome[] = [];
    this.context.logger.debug('stage_started', { stage: stage.name, forceRun: this.context.forceRun });

    for (const step of stage.steps) {
      const outcome = await this.runStep(step);
      outcomes.push(outcome);
      if (outcome.aborted) {
        this.context.logger.debug('stage_aborted', { stage: stage.name, step: step.name });
        return { stage: stage.name, aborted: true, outcomes };
      }
    }

    if (stage.notice !== undefined) {
      this.context.prompter.blank();
      this.context.prompter.warn(stage.notice);
    }
    this.context.logger.debug('stage_finished', { stage: stage.name });
    return { stage: stage.name, aborted: false, outcomes };
  }

  /**
   * Runs one step and, for composites, its subtree.
   *
   * @param step - The step.
   * @param depth - Depth below the stage; only affects the banner.
   */
  async runStep(step: Step, depth = 0): Promise<StepOutcome> {
    this.printBanner(step, depth);
    return step.kind === 'Composite'
      ? this.runComposite(step, depth)
      : this.runLeaf(step);
  }

  private async runComposite(step: CompositeStep, depth: number): Promise<CompositeOutcome> {
    const children: StepOutcome[] = [];
    for (const child of step.children) {
      const outcome = await this.runStep(child, depth + 1);
      children.push(outcome);
      if (outcome.aborted) {
        return { kind: 'Composite', name: step.name, aborted: true, children };
      }
    }
    return { kind: 'Composite', name: step.name, aborted: false, children };
  }

  private async runLeaf(step: LeafStep): Promise<LeafOutcome> {
    const ctx: StepContext = { ...this.context, stepName: step.name };
    const tracker = new PhaseTracker(step.name, this.context.logger);
    let initial: ProbeResult | undefined;
    let decision: StepDecision | undefined;
    let bodyResult: BodyOutcome | undefined;
    let final: ProbeResult | undefined;

    const outcome = (aborted: boolean): LeafOutcome => ({
      kind: 'Leaf',
      name: step.name,
      aborted,
      phases: tracker.phases,
      initial,
      decision,
      bodyResult,
      final,
      status: (final ?? initial)?.status,
    });

    try {
      initial = await probeStep(step, ctx);
      this.printStatus(initial);

      tracker.advance('Deciding');
      decision = decideAction(initial.status, this.context.forceRun);
      if (decision === 'skip') {
        tracker.advance('Skipped');
        return outcome(false);
      }

      tracker.advance('Running');
      if (initial.message.length > 0) {
        this.context.prompter.blank();
      }
      bodyResult = await this.runBody(step, ctx);

      tracker.advance('Reprobing');
      final = await probeStep(step, ctx);
      if (final.message.length > 0) {
        this.context.prompter.blank();
        this.printStatus(final);
      }
      tracker.advance('Reported');
      return outcome(false);
    } catch (error) {
      if (!isOperatorAbort(error)) {
        throw error;
      }
      tracker.advance('Aborted');
      return outcome(true);
    }
  }

  private async runBody(step: LeafStep, ctx: StepContext): Promise<BodyOutcome> {
    try {
      return await step.body(ctx);
    } catch (error) {
      if (isOperatorAbort(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.context.logger.warn('step_body_failed', { step: step.name, error: reason });
      this.context.prompter.error(`Step '${step.name}' failed: ${reason}`);
      return 'Failed';
    }
  }

  private printBanner(step: Step, depth: number): void {
    const { prompter } = this.context;
    const pad = bannerPad(bannerWeight(step, depth));
    prompter.blank();
    prompter.line(formatBanner(step.name, pad, prompter.lineWidth));
    prompter.blank();
  }

  private printStatus(result: ProbeResult): void {
    if (result.message.length === 0) {
      return;
    }
    this.context.prompter.bullet(result.message, {
      marker: 'Status:',
      color: statusColor(result.status),
    });
  }
}
