/**
 * Wait for the first of a change signal, a cancellation signal and an
 * optional deadline.
 *
 * Every listener attached here is detached as soon as one of them wins.
 *
 * @packageDocumentation
 */

import type {ChangeSignal} from '@cellwatch/core';

/**
 * Why a wait returned.
 */
export type WakeReason = 'changed' | 'cancelled' | 'elapsed';

/**
 * Resolve with the reason of whichever of `changed`, `cancel` or `elapsed`
 * fires first. When several have already fired, a change wins, then
 * cancellation.
 */
export function firstOf(
  changed: ChangeSignal,
  cancel: AbortSignal,
  elapsed?: ChangeSignal,
): Promise<WakeReason> {
  if (changed.fired) {
    return Promise.resolve('changed');
  }
  if (cancel.aborted) {
    return Promise.resolve('cancelled');
  }
  if (elapsed?.fired === true) {
    return Promise.resolve('elapsed');
  }

  return new Promise((resolve) => {
    let settled = false;
    const detachers: Array<() => void> = [];
    const settle = (reason: WakeReason) => {
      if (settled) {
        return;
      }
      settled = true;
      for (const detach of detachers) {
        detach();
      }
      resolve(reason);
    };

    const onAbort = () => settle('cancelled');
    detachers.push(changed.subscribe(() => settle('changed')));
    cancel.addEventListener('abort', onAbort, {once: true});
    detachers.push(() => cancel.removeEventListener('abort', onAbort));
    if (elapsed !== undefined) {
      detachers.push(elapsed.subscribe(() => settle('elapsed')));
    }
  });
}
