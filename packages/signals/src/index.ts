/**
 * @fileoverview TC39 Signals integration for cellwatch.
 *
 * This package connects cells to TC39 Signals in both directions:
 * - `CellSignal` exposes a cell as a read-only signal that computeds and
 *   watchers can track.
 * - `SignalCellManager` mirrors signals into cells that can be waited on
 *   or registered with an Aggregation.
 *
 * @example
 * ```ts
 * import {Aggregation} from '@cellwatch/core';
 * import {SignalCellManager} from '@cellwatch/signals';
 * import {Signal} from 'signal-polyfill';
 *
 * const manager = new SignalCellManager();
 * const a = new Signal.State(1);
 * const b = new Signal.Computed(() => a.get() * 2);
 *
 * const agg = new Aggregation();
 * agg.register(manager.watch(a));
 * agg.register(manager.watch(b));
 *
 * a.set(2);
 * await agg.updated(stopping).wait();  // both cells change together
 * ```
 *
 * @packageDocumentation
 */

export {CellSignal} from './lib/cell-signal.js';
export {SignalCellManager} from './lib/signal-cell-manager.js';
export type {SignalCellManagerOptions} from './lib/signal-cell-manager.js';
export type {AnySignal} from './lib/types.js';
