/**
 * @cellwatch/helpers
 *
 * Helpers that build on `@cellwatch/core` cells: a task supervisor that
 * provides cancellation, and combinators that wait for a cell to change.
 *
 * @example
 * ```ts
 * import {Cell} from '@cellwatch/core';
 * import {Stopper, doWhenChanged} from '@cellwatch/helpers';
 *
 * const config = new Cell({port: 8080});
 * const stopper = new Stopper();
 *
 * stopper.go((s) =>
 *   doWhenChanged(s.stopping, config.value, config, (old, next) => {
 *     restart(next);
 *   }).then(() => {}),
 * );
 *
 * config.set({port: 9090});  // restart() runs
 * stopper.stop();
 * await stopper.wait();
 * ```
 *
 * @packageDocumentation
 */

export {Stopper} from './lib/stopper.js';
export {
  waitForChange,
  waitForChangeOrTimeout,
  waitForValue,
} from './lib/wait.js';
export {doWhenChanged, doWhenChangedOrInterval} from './lib/loops.js';
export {firstOf} from './lib/race.js';
export type {Task, StopperOptions} from './lib/stopper.js';
export type {ChangeOutcome, WaitOptions} from './lib/wait.js';
export type {ChangeCallback, ChangeLoopOptions} from './lib/loops.js';
export type {WakeReason} from './lib/race.js';
