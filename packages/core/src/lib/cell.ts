/**
 * Cell - a value plus a one-shot signal that fires when the value is
 * replaced.
 *
 * @fileoverview Reactive cell.
 */

import {Latch, type ChangeSignal} from './latch.js';
import {ReentrantUpdateError} from './errors.js';

/**
 * One (value, latch) pair. Generations are immutable; a change installs a
 * new one.
 */
interface Generation<T> {
  readonly value: T;
  readonly latch: Latch;
}

/**
 * The result of `Cell.update()`.
 *
 * When the transform threw, `error` holds what it threw and `value` and
 * `previous` are both the unchanged value.
 */
export interface UpdateResult<T> {
  readonly value: T;
  readonly previous: T;
  readonly error?: unknown;
}

/**
 * A holder for a value that lets readers wait for the value to change.
 *
 * `get()` returns the current value together with a signal that fires the
 * next time the cell changes. Every `set()` fires the current signal and
 * installs a fresh one, so a reader that waits on the signal it got with a
 * value can never miss the change that replaced that value.
 *
 * This is not a channel: a reader that is slow to react sees only the
 * latest value, not every value that was set in between.
 *
 * @example
 * ```ts
 * const config = new Cell({verbose: false});
 *
 * let [current, changed] = config.get();
 * while (!stopping.aborted) {
 *   apply(current);
 *   await changed.wait();
 *   [current, changed] = config.get();
 * }
 * ```
 */
export class Cell<T> {
  #current: Generation<T>;
  #updating = false;

  constructor(initial: T) {
    this.#current = {value: initial, latch: new Latch()};
  }

  /**
   * The current value and the signal that fires when it is replaced.
   */
  get(): readonly [value: T, changed: ChangeSignal] {
    const {value, latch} = this.#current;
    return [value, latch];
  }

  /**
   * The current value.
   */
  get value(): T {
    return this.#current.value;
  }

  /**
   * Replace the value and wake everyone waiting on the previous signal.
   *
   * Setting a value equal to the current one still counts as a change.
   */
  set(value: T): void {
    this.#checkReentrant('set');
    this.#advance(value);
  }

  /**
   * Apply a transform to the current value.
   *
   * If `transform` throws, nothing changes, no signal fires and the thrown
   * value is returned as `error`. Otherwise this behaves like
   * `set(transform(old))` and also returns the old value.
   */
  update(transform: (old: T) => T): UpdateResult<T> {
    this.#checkReentrant('update');
    const previous = this.#current.value;

    let next: T;
    this.#updating = true;
    try {
      next = transform(previous);
    } catch (error: unknown) {
      return {value: previous, previous, error};
    } finally {
      this.#updating = false;
    }

    this.#advance(next);
    return {value: next, previous};
  }

  /**
   * Start a new generation with the same value, waking every waiter.
   */
  notify(): void {
    this.#checkReentrant('notify');
    this.#advance(this.#current.value);
  }

  #checkReentrant(operation: 'set' | 'update' | 'notify'): void {
    if (this.#updating) {
      throw new ReentrantUpdateError(operation);
    }
  }

  #advance(value: T): void {
    const previous = this.#current;
    // Install the new generation first so listeners woken below read it.
    this.#current = {value, latch: new Latch()};
    previous.latch.fire();
  }
}
