/**
 * Summaries of runner output.
 *
 * @packageDocumentation
 */

import { STATUS_CODES, type StatusCode } from '../steps/index.js';
import type { LeafOutcome, StageReport, StageSummary, StepOutcome } from './types.js';

/**
 * Leaf outcomes of a report in visiting order.
 *
 * @param outcomes - Top-level outcomes.
 */
export function flattenLeaves(outcomes: readonly StepOutcome[]): LeafOutcome[] {
  return outcomes.flatMap((outcome) =>
    outcome.kind === 'Leaf' ? [outcome] : flattenLeaves(outcome.children)
  );
}

/**
 * Counts visited, ran and skipped leaves, and leaves per last known status.
 *
 * @param report - The stage report.
 */
export function summarize(report: StageReport): StageSummary {
  const byStatus: Record<StatusCode, number> = {
    Done: 0,
    NotDone: 0,
    UnknownPersistenceDisabled: 0,
    NeverRun: 0,
    Inapplicable: 0,
    Informational: 0,
  };
  let ran = 0;
  let skipped = 0;
  const leaves = flattenLeaves(report.outcomes);

  for (const outcome of leaves) {
    if (outcome.decision === 'run') {
      ran += 1;
    } else if (outcome.decision === 'skip') {
      skipped += 1;
    }
    if (outcome.status !== undefined) {
      byStatus[outcome.status] += 1;
    }
  }

  return { visited: leaves.length, ran, skipped, byStatus };
}

/**
 * One-line rendering of a summary, e.g.
 * `Visited 3 steps (1 run, 2 skipped): 2 Done, 1 NotDone`.
 *
 * @param summary - The summary.
 */
export function formatSummary(summary: StageSummary): string {
  const counts = STATUS_CODES.filter((code) => summary.byStatus[code] > 0).map(
    (code) => `${summary.byStatus[code]} ${code}`
  );
  const noun = summary.visited === 1 ? 'step' : 'steps';
  const head = `Visited ${summary.visited} ${noun} (${summary.ran} run, ${summary.skipped} skipped)`;
  return counts.length > 0 ? `${head}: ${counts.join(', ')}` : head;
}
