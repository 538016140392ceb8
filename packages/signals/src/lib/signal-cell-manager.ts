/**
 * @fileoverview SignalCellManager - Mirrors TC39 signals into cells.
 *
 * The SignalCellManager handles:
 * - Watching signals with a single Signal.subtle.Watcher
 * - Flushing every pending change in one microtask
 * - Writing new values into the cells it handed out
 *
 * Usage:
 * ```ts
 * const manager = new SignalCellManager();
 * const count = new Signal.State(0);
 * const countCell = manager.watch(count);
 *
 * agg.register(countCell);
 * count.set(1);  // countCell changes on the next microtask
 * ```
 */

import {Signal} from 'signal-polyfill';
import {Cell, noopLogger} from '@cellwatch/core';
import type {Logger, UntypedCell} from '@cellwatch/core';
import type {AnySignal} from './types.js';

export interface SignalCellManagerOptions {
  /**
   * Receives a debug entry for every flush, and an error entry for every
   * source signal that threw while being read.
   */
  logger?: Logger;
}

/**
 * Turns TC39 signals into cells, so that code that waits on cells (for
 * example through an Aggregation) can observe signal graphs.
 *
 * Each `watch()` call creates a new cell. Values are copied into cells
 * asynchronously: writes to the source signals are batched and applied in
 * one microtask. A value that is `Object.is` equal to the cell's current
 * one is not written. A source that throws while being read is logged and
 * its cell keeps its last value until the source recovers.
 */
export class SignalCellManager {
  readonly #logger: Logger;
  #watcher: Signal.subtle.Watcher | undefined;
  #flushScheduled = false;

  // Private wrapper Computeds - only we read these, so getPending() reliably
  // returns them even if the underlying signal was read elsewhere. Each maps
  // to the function that copies its value into its cell.
  #wrappers = new Map<AnySignal, () => void>();
  #cellToWrapper = new Map<UntypedCell, Signal.Computed<unknown>>();

  constructor(options: SignalCellManagerOptions = {}) {
    this.#logger = options.logger ?? noopLogger;
  }

  /**
   * Create a cell that follows `signal`.
   */
  watch<T>(signal: AnySignal<T>): Cell<T> {
    // Read first: a source that throws here is reported to the caller and
    // leaves nothing watched.
    const cell = new Cell(signal.get());
    const watcher = this.#ensureWatcher();

    // Wrap in a private Computed for reliable change detection: if we
    // watched the user's signal directly and someone else read it before
    // our flush, it would no longer be pending.
    const wrapper = new Signal.Computed<unknown>(() => signal.get());
    watcher.watch(wrapper);
    // Read the wrapper to establish the subscription
    wrapper.get();

    this.#wrappers.set(wrapper, () => {
      // Re-evaluate the wrapper to clear its dirty flag, then read the
      // typed value from the source.
      wrapper.get();
      const value = signal.get();
      if (!Object.is(value, cell.value)) {
        cell.set(value);
      }
    });
    this.#cellToWrapper.set(cell, wrapper);
    return cell;
  }

  /**
   * Stop updating a cell returned by `watch()`.
   *
   * @returns false if the cell was not being updated by this manager.
   */
  unwatch(cell: UntypedCell): boolean {
    const wrapper = this.#cellToWrapper.get(cell);
    if (wrapper === undefined) {
      return false;
    }
    this.#watcher?.unwatch(wrapper);
    this.#wrappers.delete(wrapper);
    this.#cellToWrapper.delete(cell);
    return true;
  }

  /**
   * The number of cells being updated.
   */
  get size(): number {
    return this.#cellToWrapper.size;
  }

  /**
   * Clean up resources. Cells keep their last values.
   */
  dispose(): void {
    if (this.#watcher !== undefined) {
      this.#watcher.unwatch(...this.#cellToWrapper.values());
    }
    this.#wrappers.clear();
    this.#cellToWrapper.clear();
  }

  /**
   * Ensure the watcher is created and return it.
   */
  #ensureWatcher(): Signal.subtle.Watcher {
    return (this.#watcher ??= new Signal.subtle.Watcher(() => {
      // Watcher callback - schedule a flush. Signals cannot be read or
      // written from inside this callback.
      if (!this.#flushScheduled) {
        this.#flushScheduled = true;
        queueMicrotask(this.#flush);
      }
    }));
  }

  /**
   * Copy pending signal values into their cells.
   */
  #flush = (): void => {
    this.#flushScheduled = false;

    if (this.#watcher === undefined) {
      return;
    }

    let applied = 0;
    let failed = 0;
    try {
      for (const wrapper of this.#watcher.getPending()) {
        const apply = this.#wrappers.get(wrapper);
        if (apply === undefined) {
          continue;
        }
        try {
          apply();
          applied++;
        } catch (error: unknown) {
          // A source that throws leaves its cell at the last good value.
          failed++;
          this.#logger.error('failed to apply signal change', error);
        }
      }
    } finally {
      // Re-watch to continue tracking
      this.#watcher.watch();
    }
    this.#logger.debug('flushed signal changes', {applied, failed});
  };
}
