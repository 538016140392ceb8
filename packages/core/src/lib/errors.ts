/**
 * Error classes shared by the cellwatch packages.
 *
 * @fileoverview Error types.
 */

/**
 * Render an arbitrary value for an error message.
 *
 * `String()` throws for objects without a usable `toString`, such as
 * `Object.create(null)`; those fall back to their `[object Tag]` form.
 */
export function formatValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Thrown when a cell is mutated from inside one of its own `update()`
 * transforms.
 *
 * When the inner call lets the error escape the transform, the outer
 * `update()` returns it as its `error` and leaves the cell unchanged.
 */
export class ReentrantUpdateError extends Error {
  constructor(public readonly operation: 'set' | 'update' | 'notify') {
    super(
      `Cannot ${operation}() a cell from inside its own update() transform. ` +
        'Return the new value from the transform instead.',
    );
    this.name = 'ReentrantUpdateError';
  }
}

/**
 * Raised when a wait is abandoned because its cancellation signal aborted
 * before the awaited condition was met.
 */
export class CancelledError extends Error {
  constructor(message = 'Wait was cancelled', options?: {cause?: unknown}) {
    super(message, options);
    this.name = 'CancelledError';
  }
}

/**
 * Raised by the change loops when the user callback fails.
 *
 * `last` holds the last value that was processed successfully, so the
 * caller can resume from it.
 */
export class ChangeCallbackError<T = unknown> extends Error {
  constructor(
    public readonly last: T,
    public readonly next: T,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : formatValue(cause);
    super(
      `changed [${formatValue(last)} -> ${formatValue(next)}]: ${reason}`,
      {cause},
    );
    this.name = 'ChangeCallbackError';
  }
}

/**
 * Thrown when a task is started on a Stopper that is already stopping.
 */
export class StoppedError extends Error {
  constructor() {
    super('Stopper is stopping; no new tasks can be started');
    this.name = 'StoppedError';
  }
}
