/**
 * Loops that run a callback each time a cell changes.
 *
 * @fileoverview Change loops.
 */

import {ChangeCallbackError, noopLogger} from '@cellwatch/core';
import type {Cell, Logger} from '@cellwatch/core';
import {
  waitForChange,
  waitForChangeOrTimeout,
  type ChangeOutcome,
  type WaitOptions,
} from './wait.js';

/**
 * Called with the last processed value and the new one.
 */
export type ChangeCallback<T> = (old: T, next: T) => void | Promise<void>;

export interface ChangeLoopOptions<T> extends WaitOptions<T> {
  /** Receives a debug entry for each invocation of the callback. */
  logger?: Logger;
}

/**
 * Invoke `fn` every time `cell` changes to a value different from the last
 * one processed, starting from `start`.
 *
 * Resolves with the last processed value once `cancel` aborts.
 *
 * @throws ChangeCallbackError if `fn` fails; its `last` property holds the
 *   last value that was processed successfully.
 */
export function doWhenChanged<T>(
  cancel: AbortSignal,
  start: T,
  cell: Cell<T>,
  fn: ChangeCallback<T>,
  options: ChangeLoopOptions<T> = {},
): Promise<T> {
  return runLoop(cancel, start, fn, options, (last) =>
    waitForChange(cancel, last, cell, options),
  );
}

/**
 * Like `doWhenChanged()`, but also invokes `fn(last, last)` whenever
 * `periodMs` passes without a change. Useful for work that should happen
 * in response to a change or at a somewhat regular interval.
 */
export function doWhenChangedOrInterval<T>(
  cancel: AbortSignal,
  start: T,
  cell: Cell<T>,
  periodMs: number,
  fn: ChangeCallback<T>,
  options: ChangeLoopOptions<T> = {},
): Promise<T> {
  return runLoop(cancel, start, fn, options, (last) =>
    waitForChangeOrTimeout(cancel, last, cell, periodMs, options),
  );
}

async function runLoop<T>(
  cancel: AbortSignal,
  start: T,
  fn: ChangeCallback<T>,
  options: ChangeLoopOptions<T>,
  next: (last: T) => Promise<ChangeOutcome<T>>,
): Promise<T> {
  const logger = options.logger ?? noopLogger;
  let last = start;
  for (;;) {
    const outcome = await next(last);
    if (cancel.aborted) {
      return last;
    }
    logger.debug('running change callback', {status: outcome.status});
    try {
      await fn(last, outcome.value);
    } catch (error: unknown) {
      throw new ChangeCallbackError(last, outcome.value, error);
    }
    last = outcome.value;
  }
}
