/**
 * Execution contexts decide where an exchange callback runs.
 *
 * A context only promises that submitted work runs eventually.
 * Ordering between submissions is whatever the context provides:
 * SerialQueue is FIFO, microtaskContext follows the microtask queue.
 */

export interface ExecutionContext {
  submit(work: () => void): void;
}

/** Run `work` inline, or hand it to `context` when one is given. */
export function deliver(work: () => void, context?: ExecutionContext): void {
  if (context) {
    context.submit(work);
    return;
  }
  work();
}

export const microtaskContext: ExecutionContext = {
  submit: (work) => queueMicrotask(work),
};

/** Surface `error` as an uncaught exception on a later microtask. */
export function rethrowAsync(error: unknown): void {
  queueMicrotask(() => {
    throw error;
  });
}

/**
 * FIFO queue drained on a microtask. A throwing work item is
 * reported through `onError` and does not stop the queue.
 */
export class SerialQueue implements ExecutionContext {
  private queue: Array<() => void> = [];
  private draining = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private onError: (error: unknown) => void = rethrowAsync) {}

  get pending(): number {
    return this.queue.length;
  }

  submit(work: () => void): void {
    this.queue.push(work);
    if (!this.draining) {
      this.draining = true;
      queueMicrotask(() => this.drain());
    }
  }

  /** Resolves once every submitted item has run. */
  onIdle(): Promise<void> {
    if (!this.draining && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    let work = this.queue.shift();
    while (work) {
      try {
        work();
      } catch (e) {
        this.onError(e);
      }
      work = this.queue.shift();
    }
    this.draining = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
