/**
 * Aggregation - wait for any one of a dynamic set of cells to change.
 *
 * @fileoverview Aggregation of heterogeneously-typed cells.
 */

import type {Cell} from './cell.js';
import {Latch, type ChangeSignal} from './latch.js';
import {noopLogger, type Logger} from './logger.js';

/**
 * A type-erased cell, as returned from `Aggregation.choose()`.
 *
 * Callers recover the concrete type by comparing identity against the cells
 * they registered, or by inspecting the value.
 */
export type UntypedCell = Cell<unknown>;

export interface AggregationOptions {
  /** Receives debug-level entries for registrations and waits. */
  logger?: Logger;
}

/**
 * An Aggregation lets a caller wait for a change on any of an arbitrary
 * number of cells, which may hold different value types.
 *
 * Each registration captures the signal the cell had at registration time.
 * Once that signal has fired the registration can be taken with `choose()`,
 * which removes it; call `register()` again to keep watching the cell.
 *
 * @example
 * ```ts
 * const agg = new Aggregation();
 * for (const cell of cells) {
 *   agg.register(cell);
 * }
 * while (agg.size > 0) {
 *   await agg.updated(stopping).wait();
 *   const found = agg.choose();
 *   if (found === undefined) continue;
 *   handle(found.value);
 * }
 * ```
 */
export class Aggregation {
  readonly #armed = new Map<UntypedCell, ChangeSignal>();
  readonly #logger: Logger;

  constructor(options: AggregationOptions = {}) {
    this.#logger = options.logger ?? noopLogger;
  }

  /**
   * Add a cell to the aggregation and return its current value.
   *
   * Registering a cell that is already armed keeps the signal captured by
   * the first registration and returns the cell's live value.
   */
  register<T>(cell: Cell<T>): T {
    if (this.#armed.has(cell)) {
      return cell.value;
    }
    const [value, changed] = cell.get();
    this.#armed.set(cell, changed);
    this.#logger.debug('registered cell', {size: this.#armed.size});
    return value;
  }

  /**
   * The number of armed registrations.
   */
  get size(): number {
    return this.#armed.size;
  }

  /**
   * Whether the cell is currently armed.
   */
  has(cell: UntypedCell): boolean {
    return this.#armed.has(cell);
  }

  /**
   * Take one cell that has changed since it was registered.
   *
   * The cell is removed from the aggregation. Returns undefined when no
   * registered cell has changed, including when the aggregation is empty.
   * When several have changed, any one of them may be returned.
   */
  choose(): UntypedCell | undefined {
    for (const [cell, changed] of this.#armed) {
      if (changed.fired) {
        this.#armed.delete(cell);
        this.#logger.debug('chose changed cell', {size: this.#armed.size});
        return cell;
      }
    }
    return undefined;
  }

  /**
   * A signal that fires once any cell registered at call time changes, or
   * when `cancel` aborts.
   *
   * Cells registered after this call are not watched by the returned
   * signal; call `updated()` again after consuming a change. If a
   * registration has already fired, or `cancel` has already aborted, the
   * returned signal has already fired and no listeners are attached.
   * Several changes may be coalesced into one firing: drain them with
   * `choose()`.
   */
  updated(cancel: AbortSignal): ChangeSignal {
    const toWatch = [...this.#armed.values()];

    if (cancel.aborted || toWatch.some((changed) => changed.fired)) {
      return Latch.fired();
    }

    const result = new Latch();
    const detachers: Array<() => void> = [];
    const onFire = () => {
      if (result.fired) {
        return;
      }
      for (const detach of detachers) {
        detach();
      }
      cancel.removeEventListener('abort', onFire);
      result.fire();
    };

    for (const changed of toWatch) {
      detachers.push(changed.subscribe(onFire));
    }
    cancel.addEventListener('abort', onFire, {once: true});
    this.#logger.debug('waiting for update', {watching: toWatch.length});
    return result;
  }
}
