/**
 * Status probing for leaf steps.
 *
 * @packageDocumentation
 */

import { isOperatorAbort } from '../prompt/index.js';
import type { LeafStep, ProbeResult, StepContext } from './types.js';

/** Message reported when the completion log cannot be consulted. */
export const PERSISTENCE_DISABLED_MESSAGE = 'Status unknown (persistence disabled).';

/**
 * Probes a leaf step. A probe that throws yields `NotDone`, so the runner
 * still offers to run the step. Operator aborts propagate.
 *
 * @param step - The leaf to probe.
 * @param ctx - The step context.
 */
export async function probeStep(step: LeafStep, ctx: StepContext): Promise<ProbeResult> {
  try {
    return await step.probe(ctx);
  } catch (error) {
    if (isOperatorAbort(error)) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    ctx.logger.warn('probe_failed', { step: step.name, error: reason });
    return { status: 'NotDone', message: `Could not determine status: ${reason}` };
  }
}

/**
 * Probe for steps with no reliable live signal: consults the completion log.
 *
 * @param ctx - The step context.
 */
export async function markedStatus(ctx: StepContext): Promise<ProbeResult> {
  if (!ctx.store.isEnabled()) {
    return { status: 'UnknownPersistenceDisabled', message: PERSISTENCE_DISABLED_MESSAGE };
  }
  if (await ctx.store.isComplete(ctx.stepName)) {
    return { status: 'Done', message: 'This step was marked as complete.' };
  }
  return { status: 'NotDone', message: 'This step has not been marked as complete yet.' };
}

/**
 * Asks the operator whether to record the current step as complete.
 *
 * @param ctx - The step context.
 * @returns Whether the step was recorded.
 */
export async function askMarkComplete(ctx: StepContext): Promise<boolean> {
  if (!ctx.store.isEnabled()) {
    ctx.prompter.warn(
      `Cannot mark this step (${ctx.stepName}) as complete, because persistence is disabled.`
    );
    return false;
  }

  if (!(await ctx.prompter.askYesNo(`Mark this step (${ctx.stepName}) as complete?`, 'yes'))) {
    return false;
  }

  const recorded = await ctx.store.markComplete(ctx.stepName);
  if (!recorded) {
    ctx.prompter.error(`Could not record this step (${ctx.stepName}) as complete.`);
  }
  return recorded;
}
