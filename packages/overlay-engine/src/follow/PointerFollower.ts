import { Topics, type EventBus, type InputPointerMovePayload, type Unsubscribe } from "@hudlink/event-bus";
import type { IWindowTracker, Point } from "@hudlink/rendering-core";
import type { Logger } from "../logging/logger.js";

export type FollowTarget = {
  /** Where the group goes: the pointer relative to the window centre. */
  position: Point;
  /** The pointer relative to the window's top-left corner. */
  pointer: Point;
};

export type PointerFollowerDeps = {
  bus: EventBus;
  windowTracker: IWindowTracker;
  logger: Logger;
  /** Applies one pointer move to the named group. Throwing stops following it. */
  move(name: string, target: FollowTarget): void;
};

/** Keeps named groups under the pointer while following is enabled. */
export class PointerFollower {
  private listeners = new Map<string, Unsubscribe>();

  constructor(private readonly deps: PointerFollowerDeps) {}

  follow(name: string): void {
    this.stop(name);
    const unsubscribe = this.deps.bus.subscribe(Topics.INPUT_POINTER_MOVE, (payload) => {
      this.onPointerMove(name, payload);
    });
    this.listeners.set(name, unsubscribe);
  }

  stop(name: string): boolean {
    const unsubscribe = this.listeners.get(name);
    if (!unsubscribe) return false;
    unsubscribe();
    this.listeners.delete(name);
    return true;
  }

  stopAll(): void {
    for (const unsubscribe of this.listeners.values()) unsubscribe();
    this.listeners.clear();
  }

  isFollowing(name: string): boolean {
    return this.listeners.has(name);
  }

  private onPointerMove(name: string, pointer: InputPointerMovePayload): void {
    try {
      const window = this.deps.windowTracker.windowRect();
      const halfW = Math.trunc(window.width / 2);
      const halfH = Math.trunc(window.height / 2);
      const position = {
        x: pointer.x - window.x - halfW,
        y: pointer.y - window.y - halfH
      };
      this.deps.move(name, {
        position,
        pointer: { x: position.x + halfW, y: position.y + halfH }
      });
    } catch (error) {
      this.deps.logger.warn("stopped following pointer", {
        name,
        error: error instanceof Error ? error.message : String(error)
      });
      this.stop(name);
    }
  }
}
