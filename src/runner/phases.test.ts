import { describe, it, expect } from 'vitest';
import { Logger } from '../utils/logger.js';
import {
  PHASE_TRANSITIONS,
  PhaseTracker,
  StepPhaseError,
  canTransitionPhase,
  isFinalPhase,
  type StepPhase,
} from './phases.js';

const logger = new Logger({ component: 'test' });

describe('phase transitions', () => {
  it('allows the run and skip paths', () => {
    expect(canTransitionPhase('Probing', 'Deciding')).toBe(true);
    expect(canTransitionPhase('Deciding', 'Skipped')).toBe(true);
    expect(canTransitionPhase('Deciding', 'Running')).toBe(true);
    expect(canTransitionPhase('Running', 'Reprobing')).toBe(true);
    expect(canTransitionPhase('Reprobing', 'Reported')).toBe(true);
  });

  it('allows aborting only while waiting on the operator or a probe', () => {
    const abortable = [...PHASE_TRANSITIONS.keys()].filter((phase) =>
      canTransitionPhase(phase, 'Aborted')
    );
    expect(abortable).toEqual(['Probing', 'Running', 'Reprobing']);
  });

  it('rejects skipping the decision', () => {
    expect(canTransitionPhase('Probing', 'Running')).toBe(false);
    expect(canTransitionPhase('Running', 'Reported')).toBe(false);
  });

  it('treats Skipped, Reported and Aborted as final', () => {
    const final = [...PHASE_TRANSITIONS.keys()].filter(isFinalPhase);
    expect(final).toEqual<StepPhase[]>(['Skipped', 'Reported', 'Aborted']);
  });
});

describe('PhaseTracker', () => {
  it('starts in Probing and records every move', () => {
    const tracker = new PhaseTracker('x', logger);
    tracker.advance('Deciding');
    tracker.advance('Skipped');
    expect(tracker.current).toBe('Skipped');
    expect(tracker.phases).toEqual(['Probing', 'Deciding', 'Skipped']);
  });

  it('throws on an invalid move and stays put', () => {
    const tracker = new PhaseTracker('x', logger);
    expect(() => tracker.advance('Reported')).toThrow(StepPhaseError);
    expect(() => tracker.advance('Reported')).toThrow(
      "Invalid phase transition for step 'x': Probing -> Reported"
    );
    expect(tracker.current).toBe('Probing');
  });

  it('returns a copy of the phase list', () => {
    const tracker = new PhaseTracker('x', logger);
    const snapshot = tracker.phases;
    tracker.advance('Deciding');
    expect(snapshot).toEqual(['Probing']);
  });
});
