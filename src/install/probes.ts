/**
 * Probe builders for steps whose status is a property of one file.
 *
 * @packageDocumentation
 */

import { fileHasContent } from '../system/index.js';
import type { ProbeResult, StatusCode, StepProbe } from '../steps/index.js';

function verdict(done: boolean, doneMessage: string, notDoneMessage: string): ProbeResult {
  return done
    ? { status: 'Done', message: doneMessage }
    : { status: 'NotDone', message: notDoneMessage };
}

/**
 * Done iff `path` exists.
 */
export function existsProbe(path: string, doneMessage: string, notDoneMessage: string): StepProbe {
  return async (ctx) => verdict(await ctx.system.exists(path), doneMessage, notDoneMessage);
}

/**
 * Done iff `path` is a regular file.
 */
export function fileProbe(path: string, doneMessage: string, notDoneMessage: string): StepProbe {
  return async (ctx) => verdict(await ctx.system.isFile(path), doneMessage, notDoneMessage);
}

/**
 * Done iff `path` is a directory.
 */
export function directoryProbe(path: string, doneMessage: string, notDoneMessage: string): StepProbe {
  return async (ctx) => verdict(await ctx.system.isDirectory(path), doneMessage, notDoneMessage);
}

/**
 * Done iff `path` has lines other than blanks and comments.
 */
export function contentProbe(path: string, doneMessage: string, notDoneMessage: string): StepProbe {
  return async (ctx) => verdict(await fileHasContent(ctx.system, path), doneMessage, notDoneMessage);
}

/**
 * Always reports the same status.
 */
export function constantProbe(status: StatusCode, message: string): StepProbe {
  return () => Promise.resolve({ status, message });
}
