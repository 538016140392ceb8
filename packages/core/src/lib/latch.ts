/**
 * One-shot change signals.
 *
 * A Latch starts unfired and fires exactly once. Listeners that are attached
 * before it fires run synchronously inside `fire()`; listeners attached after
 * it fired run immediately. There is no way to re-arm a latch: a new
 * generation always gets a new Latch.
 *
 * @fileoverview Latch and the read-only ChangeSignal view.
 */

/**
 * The read-only side of a one-shot signal.
 *
 * Returned from `Cell.get()` and `Aggregation.updated()`. Consumers can
 * observe it but never fire it.
 */
export interface ChangeSignal {
  /** Whether the signal has fired. Once true, it stays true. */
  readonly fired: boolean;

  /**
   * Attach a listener that runs once when the signal fires.
   *
   * @returns A function that detaches the listener. Calling it after the
   *   listener ran is a no-op.
   */
  subscribe(listener: () => void): () => void;

  /**
   * A promise that resolves once the signal has fired.
   */
  wait(): Promise<void>;
}

/**
 * A one-shot signal that can be fired by its owner.
 */
export class Latch implements ChangeSignal {
  #fired = false;
  #listeners: Set<() => void> | undefined = new Set();
  #promise: Promise<void> | undefined;

  /**
   * Create a latch that has already fired.
   */
  static fired(): Latch {
    const latch = new Latch();
    latch.fire();
    return latch;
  }

  get fired(): boolean {
    return this.#fired;
  }

  subscribe(listener: () => void): () => void {
    if (this.#listeners === undefined) {
      listener();
      return noop;
    }
    // Wrap so the same function can be subscribed twice and detached
    // independently.
    const entry = () => listener();
    this.#listeners.add(entry);
    return () => {
      this.#listeners?.delete(entry);
    };
  }

  wait(): Promise<void> {
    return (this.#promise ??= this.#fired
      ? Promise.resolve()
      : new Promise<void>((resolve) => {
          this.subscribe(() => resolve());
        }));
  }

  /**
   * Fire the latch, running every attached listener.
   *
   * A listener that throws does not stop the others, and its error never
   * reaches the caller of `fire()`: it goes to the handler installed with
   * `setListenerErrorHandler()`.
   *
   * @returns true if this call fired the latch, false if it had already
   *   fired.
   */
  fire(): boolean {
    const listeners = this.#listeners;
    if (listeners === undefined) {
      return false;
    }
    this.#fired = true;
    this.#listeners = undefined;

    for (const listener of listeners) {
      try {
        listener();
      } catch (error: unknown) {
        listenerErrorHandler(error);
      }
    }
    return true;
  }

  /**
   * Number of listeners waiting for this latch.
   * @internal Exposed for tests that check listeners are detached.
   */
  get _listenerCount(): number {
    return this.#listeners?.size ?? 0;
  }
}

const noop = (): void => {};

/**
 * Receives errors thrown by latch listeners.
 */
export type ListenerErrorHandler = (error: unknown) => void;

// Rethrown from a fresh microtask, so the error surfaces as uncaught
// without unwinding whoever fired the latch.
const rethrowLater: ListenerErrorHandler = (error) => {
  queueMicrotask(() => {
    throw error;
  });
};

let listenerErrorHandler: ListenerErrorHandler = rethrowLater;

/**
 * Replace the handler for errors thrown by latch listeners. Passing
 * undefined restores the default, which rethrows each error from its own
 * microtask.
 *
 * @returns The handler that was installed before.
 */
export function setListenerErrorHandler(
  handler: ListenerErrorHandler | undefined,
): ListenerErrorHandler {
  const previous = listenerErrorHandler;
  listenerErrorHandler = handler ?? rethrowLater;
  return previous;
}
