export type CancelTask = () => void;

/** Deferred execution on the engine's single logical thread. */
export interface Scheduler {
  schedule(delayMs: number, task: () => void): CancelTask;
}

export const timerScheduler: Scheduler = {
  schedule(delayMs, task) {
    const timer = setTimeout(task, Math.max(0, delayMs));
    return () => clearTimeout(timer);
  }
};
