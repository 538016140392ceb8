/**
 * Wait helpers built on `Cell.get()`.
 *
 * Each helper re-reads the cell after every wake-up, so values that are set
 * and then set back while nobody is looking are not reported.
 *
 * @fileoverview Wait-for-change combinators.
 */

import {CancelledError, Latch, formatValue} from '@cellwatch/core';
import type {Cell, ChangeSignal} from '@cellwatch/core';
import {firstOf} from './race.js';

/**
 * Options shared by the wait helpers.
 */
export interface WaitOptions<T> {
  /**
   * Decides whether two values are the same. Defaults to `Object.is`.
   */
  equals?: (a: T, b: T) => boolean;
}

/**
 * The result of `waitForChange()` and `waitForChangeOrTimeout()`.
 *
 * `status` tells the caller why the wait returned. When it is not
 * `'changed'`, `value` is the value the caller passed in. `changed` is the
 * signal that fires when the cell next changes after `value` was read.
 */
export interface ChangeOutcome<T> {
  readonly status: 'changed' | 'cancelled' | 'elapsed';
  readonly value: T;
  readonly changed: ChangeSignal;
}

/**
 * Wait until `cell` holds a value different from `current`.
 *
 * Resolves with status `'cancelled'` if `cancel` aborts first.
 */
export async function waitForChange<T>(
  cancel: AbortSignal,
  current: T,
  cell: Cell<T>,
  options: WaitOptions<T> = {},
): Promise<ChangeOutcome<T>> {
  const equals = options.equals ?? Object.is;
  for (;;) {
    const [next, changed] = cell.get();
    if (!equals(current, next)) {
      return {status: 'changed', value: next, changed};
    }
    if ((await firstOf(changed, cancel)) === 'cancelled') {
      return {status: 'cancelled', value: current, changed};
    }
  }
}

/**
 * Wait until `cell` holds a value different from `current`, or until
 * `timeoutMs` has elapsed.
 *
 * The timer starts when this is called and is cleared however the wait
 * ends.
 */
export async function waitForChangeOrTimeout<T>(
  cancel: AbortSignal,
  current: T,
  cell: Cell<T>,
  timeoutMs: number,
  options: WaitOptions<T> = {},
): Promise<ChangeOutcome<T>> {
  const equals = options.equals ?? Object.is;
  const elapsed = new Latch();
  const timer = setTimeout(() => elapsed.fire(), timeoutMs);
  try {
    for (;;) {
      const [next, changed] = cell.get();
      if (!equals(current, next)) {
        return {status: 'changed', value: next, changed};
      }
      const reason = await firstOf(changed, cancel, elapsed);
      if (reason !== 'changed') {
        return {status: reason, value: current, changed};
      }
    }
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wait until `cell` holds `expected`. This is primarily intended for tests.
 *
 * @throws CancelledError if `cancel` aborts first.
 */
export async function waitForValue<T>(
  cancel: AbortSignal,
  expected: T,
  cell: Cell<T>,
  options: WaitOptions<T> = {},
): Promise<void> {
  const equals = options.equals ?? Object.is;
  for (;;) {
    const [found, changed] = cell.get();
    if (equals(found, expected)) {
      return;
    }
    if ((await firstOf(changed, cancel)) === 'cancelled') {
      const saw = formatValue(found);
      const wanted = formatValue(expected);
      throw new CancelledError(
        `stopping, last saw ${saw} while expecting ${wanted}`,
        {cause: cancel.reason},
      );
    }
  }
}
