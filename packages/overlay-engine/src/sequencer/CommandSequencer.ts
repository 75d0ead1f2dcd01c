import type { Logger } from "../logging/logger.js";
import type { Scheduler } from "../scheduler/Scheduler.js";

export type QueuedCommand = {
  callId: number;
  name: string;
  args: unknown[];
};

export type CommandSequencerOptions = {
  scheduler: Scheduler;
  logger: Logger;
  isBarrier(name: string): boolean;
  execute(command: QueuedCommand): void;
  /** Called for every command whose execution threw. The drain continues afterwards. */
  onFault(command: QueuedCommand, error: unknown): void;
};

/**
 * Orders sequenced commands by call id. Plain commands run as soon as they reach the
 * head of the queue; barrier commands wait until the call id right before them has
 * been processed.
 */
export class CommandSequencer {
  private pending: QueuedCommand[] = [];
  private lastCallId: number | null = null;
  private drainScheduled = false;
  private draining = false;

  constructor(private readonly options: CommandSequencerOptions) {}

  get lastProcessedCallId(): number | null {
    return this.lastCallId;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  pendingCallIds(): number[] {
    return this.pending.map((c) => c.callId);
  }

  enqueue(command: QueuedCommand): void {
    // Upper bound keeps arrival order among equal call ids.
    let lo = 0;
    let hi = this.pending.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const midCommand = this.pending[mid];
      if (midCommand && midCommand.callId <= command.callId) lo = mid + 1;
      else hi = mid;
    }
    this.pending.splice(lo, 0, command);
    this.scheduleDrain();
  }

  /** Drops pending work and forgets the last processed call id. Returns the number dropped. */
  reset(): number {
    const dropped = this.pending.length;
    this.pending = [];
    this.lastCallId = null;
    return dropped;
  }

  drain(): void {
    this.drainScheduled = false;
    if (this.draining) return;
    this.draining = true;

    try {
      while (this.pending.length > 0) {
        const head = this.pending[0];
        if (!head) break;

        if (
          this.options.isBarrier(head.name) &&
          this.lastCallId !== null &&
          head.callId !== this.lastCallId + 1
        ) {
          this.options.logger.debug("barrier waiting for predecessor", {
            callId: head.callId,
            command: head.name,
            lastProcessedCallId: this.lastCallId
          });
          return;
        }

        this.pending.shift();
        this.lastCallId = head.callId;
        try {
          this.options.execute(head);
        } catch (error) {
          this.options.onFault(head, error);
        }
      }
    } finally {
      this.draining = false;
    }
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    this.options.scheduler.schedule(0, () => this.drain());
  }
}
