/**
 * System inspection for probes.
 *
 * @packageDocumentation
 */

export {
  NodeSystemInspector,
  fileHasContent,
  hasSignificantContent,
  packageInstalled,
} from './inspector.js';
export type { CapturedOutput, SystemInspector } from './inspector.js';
