/**
 * Runs async tasks one at a time, in the order they were enqueued.
 * A failed task rejects its own promise and does not stop the queue.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);

    this.tail = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );

    return run;
  }

  /**
   * For work whose caller can be answered before the work itself ends, such
   * as a request that timed out but is still in flight. The caller gets
   * `result`; the next task starts only once `settled` resolves.
   */
  enqueueUntilSettled<T>(start: () => Attempt<T>): Promise<T> {
    this.pending++;
    const started = this.tail.then(start);
    const done = (): void => {
      this.pending--;
    };

    this.tail = started.then(attempt => attempt.settled).then(done, done);
    return started.then(attempt => attempt.result);
  }

  /**
   * Resolves once every task enqueued so far has settled.
   */
  onIdle(): Promise<void> {
    return this.tail;
  }
}

/**
 * An answer for the caller plus a promise that resolves, never rejects, once
 * the underlying work has finished.
 */
export interface Attempt<T> {
  result: Promise<T>;
  settled: Promise<void>;
}

/**
 * Run `task` with a signal that is aborted after `ms`. `result` rejects with
 * `onTimeout()` at that point even if the task ignores the signal; `settled`
 * still waits for the task.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error
): Attempt<T> {
  const controller = new AbortController();
  const work = task(controller.signal);

  const result = new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, ms);

    work.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });

  return {
    result,
    settled: work.then(
      () => undefined,
      () => undefined
    ),
  };
}
