/**
 * Stopper - supervises a group of asynchronous tasks that share a
 * cooperative stop signal.
 *
 * @fileoverview Task lifecycle manager.
 */

import {Latch, StoppedError, noopLogger} from '@cellwatch/core';
import type {Logger} from '@cellwatch/core';

/**
 * A task run by `Stopper.go()`. It should return promptly once
 * `stopper.stopping` aborts.
 */
export type Task = (stopper: Stopper) => void | Promise<void>;

export interface StopperOptions {
  /** Stopping the parent signal stops this stopper. */
  parent?: AbortSignal;
  /**
   * Default grace period for `stop()`, in milliseconds. After it elapses
   * `done` aborts even if tasks are still running. Unset means tasks are
   * given as long as they need.
   */
  gracePeriodMs?: number;
  logger?: Logger;
}

/**
 * Runs tasks and lets them be stopped together.
 *
 * Two signals describe the lifecycle:
 * - `stopping` aborts when `stop()` is called or a task fails. Tasks pass
 *   it to waits so that they return promptly.
 * - `done` aborts when every task has finished after stopping, or when the
 *   grace period runs out.
 *
 * @example
 * ```ts
 * const stopper = new Stopper();
 * stopper.go(async (s) => {
 *   await doWhenChanged(s.stopping, config.value, config, apply);
 * });
 * // ...
 * stopper.stop(1000);
 * await stopper.wait();
 * ```
 */
export class Stopper {
  readonly #stopping = new AbortController();
  readonly #done = new AbortController();
  readonly #finished = new Latch();
  readonly #logger: Logger;
  readonly #gracePeriodMs: number | undefined;
  readonly #parent: AbortSignal | undefined;
  #running = 0;
  #failure: {error: unknown} | undefined;
  #graceTimer: ReturnType<typeof setTimeout> | undefined;

  constructor(options: StopperOptions = {}) {
    this.#logger = options.logger ?? noopLogger;
    this.#gracePeriodMs = options.gracePeriodMs;
    this.#parent = options.parent;
    if (this.#parent !== undefined) {
      if (this.#parent.aborted) {
        this.stop();
      } else {
        this.#parent.addEventListener('abort', this.#onParentAbort, {
          once: true,
        });
      }
    }
  }

  /**
   * Aborts when the stopper begins stopping.
   */
  get stopping(): AbortSignal {
    return this.#stopping.signal;
  }

  /**
   * Aborts when the stopper has stopped, or the grace period ran out.
   */
  get done(): AbortSignal {
    return this.#done.signal;
  }

  get isStopping(): boolean {
    return this.#stopping.signal.aborted;
  }

  /**
   * The number of tasks still running.
   */
  get len(): number {
    return this.#running;
  }

  /**
   * Run a task under this stopper.
   *
   * If the task throws or rejects, the first such error is kept for
   * `wait()` and the stopper begins stopping.
   *
   * @throws StoppedError if the stopper is already stopping.
   */
  go(task: Task): void {
    if (this.isStopping) {
      throw new StoppedError();
    }
    this.#running++;
    void this.#run(task);
  }

  /**
   * Begin stopping. Only the first call has an effect.
   *
   * @param gracePeriodMs - How long to wait for tasks before `done` aborts
   *   anyway. Defaults to the constructor option.
   */
  stop(gracePeriodMs = this.#gracePeriodMs): void {
    if (this.isStopping) {
      return;
    }
    this.#logger.debug('stopping', {running: this.#running});
    this.#stopping.abort();
    if (this.#running === 0) {
      this.#finish();
      return;
    }
    if (gracePeriodMs !== undefined) {
      this.#graceTimer = setTimeout(() => {
        this.#logger.warn('grace period elapsed', {running: this.#running});
        this.#done.abort();
      }, gracePeriodMs);
    }
  }

  /**
   * Resolves once the stopper has stopped and every task has finished.
   *
   * @throws The first error raised by a task.
   */
  async wait(): Promise<void> {
    await this.#finished.wait();
    if (this.#failure !== undefined) {
      throw this.#failure.error;
    }
  }

  async #run(task: Task): Promise<void> {
    try {
      await task(this);
    } catch (error: unknown) {
      this.#logger.error('task failed', error);
      this.#failure ??= {error};
      this.stop();
    } finally {
      this.#running--;
      if (this.#running === 0 && this.isStopping) {
        this.#finish();
      }
    }
  }

  #finish(): void {
    clearTimeout(this.#graceTimer);
    this.#parent?.removeEventListener('abort', this.#onParentAbort);
    this.#done.abort();
    this.#finished.fire();
    this.#logger.debug('stopped');
  }

  #onParentAbort = (): void => {
    this.stop();
  };
}
