/**
 * @fileoverview CellSignal - A read-only signal that follows a cell.
 *
 * CellSignal wraps a local Signal.State and exposes only read access.
 * Updates come from the cell's change signals.
 */

import {Signal} from 'signal-polyfill';
import type {Cell, ChangeSignal} from '@cellwatch/core';

/**
 * A read-only TC39 signal view of a cell.
 *
 * Reading it inside a `Signal.Computed` or under a `Signal.subtle.Watcher`
 * tracks the cell: every time the cell changes to a value that is not
 * `Object.is` equal to the previous one, dependents are invalidated.
 *
 * @example
 * ```ts
 * const count = new Cell(0);
 * const countSignal = new CellSignal(count);
 * const doubled = new Signal.Computed(() => countSignal.get() * 2);
 *
 * count.set(21);
 * doubled.get();  // 42
 * ```
 */
export class CellSignal<T> {
  // Mirror of the cell's value. Writes happen only from the cell's change
  // listener, so readers see the value of the newest generation.
  readonly #state: Signal.State<T>;

  readonly #cell: Cell<T>;

  #detach: (() => void) | undefined;

  constructor(cell: Cell<T>) {
    this.#cell = cell;
    const [value, changed] = cell.get();
    this.#state = new Signal.State(value);
    this.#follow(changed);
  }

  /**
   * The cell's value as of its latest change. Computeds and watchers that
   * call this depend on the cell.
   */
  get(): T {
    return this.#state.get();
  }

  /**
   * Throws an error - set the underlying cell instead.
   */
  set(_value: T): void {
    throw new Error(
      'CellSignal is read-only. Set the underlying cell instead.',
    );
  }

  /**
   * The cell this signal follows.
   */
  get cell(): Cell<T> {
    return this.#cell;
  }

  /**
   * Whether the signal still follows the cell.
   */
  get following(): boolean {
    return this.#detach !== undefined;
  }

  /**
   * Stop following the cell. The signal keeps its last value.
   */
  dispose(): void {
    this.#detach?.();
    this.#detach = undefined;
  }

  #follow(changed: ChangeSignal): void {
    this.#detach = changed.subscribe(() => {
      const [value, next] = this.#cell.get();
      this.#state.set(value);
      this.#follow(next);
    });
  }
}
