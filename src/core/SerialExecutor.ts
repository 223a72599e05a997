// SerialExecutor - default designated context: one task at a time, in submission order

import type { Executor } from './interfaces/executor.interface.js';

export class SerialExecutor implements Executor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run(task: () => void): Promise<void> {
    this.pending++;
    const done = this.tail.then(
      () =>
        new Promise<void>((resolve, reject) => {
          setImmediate(() => {
            this.pending--;
            try {
              task();
              resolve();
            } catch (error) {
              reject(error);
            }
          });
        }),
    );
    // The queue moves on whether or not the task threw
    this.tail = done.catch(() => undefined);
    return done;
  }

  get queued(): number {
    return this.pending;
  }
}
