/**
 * Step model, status policy, probing and registry.
 *
 * @packageDocumentation
 */

export { STATUS_CODES, composite, isComposite, isLeaf, leaf } from './types.js';
export type {
  CompositeStep,
  EngineContext,
  LeafStep,
  ProbeResult,
  Stage,
  StatusCode,
  Step,
  StepBody,
  StepBodyResult,
  StepContext,
  StepProbe,
} from './types.js';
export {
  bannerPad,
  bannerWeight,
  decideAction,
  isTerminalStatus,
  statusColor,
} from './status.js';
export type { BannerWeight, StatusColor, StepDecision } from './status.js';
export {
  PERSISTENCE_DISABLED_MESSAGE,
  askMarkComplete,
  markedStatus,
  probeStep,
} from './prober.js';
export { STEP_NAME_PATTERN, StepRegistry, StepRegistryError } from './registry.js';
export type { StepRegistryErrorType } from './registry.js';
