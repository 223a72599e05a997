// Executor - the designated context that callbacks run on (a UI thread, an output pane, ...)

export interface Executor {
  /**
   * Queue a task and resolve once it has run.
   * Rejects with the task's error if it throws; the executor itself keeps running.
   */
  run(task: () => void): Promise<void>;
}
