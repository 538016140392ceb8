/**
 * @fileoverview Type definitions for @cellwatch/signals.
 */

import type {Signal} from 'signal-polyfill';

/**
 * A signal type - either State or Computed.
 */
export type AnySignal<T = unknown> = Signal.State<T> | Signal.Computed<T>;
