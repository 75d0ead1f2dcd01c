import type { CancelTask, Scheduler } from '../../src/scheduler/Scheduler.js';

type Task = { due: number; seq: number; run: () => void; cancelled: boolean };

/** Scheduler on simulated time. Nothing runs until `advance()` or `flush()`. */
export class ManualScheduler implements Scheduler {
  now = 0;
  private tasks: Task[] = [];
  private seq = 0;

  schedule(delayMs: number, run: () => void): CancelTask {
    const task: Task = { due: this.now + Math.max(0, delayMs), seq: this.seq++, run, cancelled: false };
    this.tasks.push(task);
    return () => {
      task.cancelled = true;
    };
  }

  get pendingCount(): number {
    return this.tasks.filter((t) => !t.cancelled).length;
  }

  /** Moves time forward, running due tasks in (due, scheduling) order, including ones they schedule. */
  advance(ms: number): void {
    const target = this.now + ms;
    for (;;) {
      const next = this.nextDue(target);
      if (!next) break;
      this.tasks.splice(this.tasks.indexOf(next), 1);
      this.now = next.due;
      if (!next.cancelled) next.run();
    }
    this.now = target;
  }

  /** Runs whatever is due right now. */
  flush(): void {
    this.advance(0);
  }

  private nextDue(limit: number): Task | undefined {
    let best: Task | undefined;
    for (const task of this.tasks) {
      if (task.due > limit) continue;
      if (!best || task.due < best.due || (task.due === best.due && task.seq < best.seq)) best = task;
    }
    return best;
  }
}
