import { Topics, type EventBus, type GroupState } from "@hudlink/event-bus";
import type { GroupHandle, IRenderSurface, SceneHandle } from "@hudlink/rendering-core";
import type { ResolvedEngineOptions } from "../config/options.js";
import type { Logger } from "../logging/logger.js";
import type { Scheduler } from "../scheduler/Scheduler.js";

type GroupEntry = {
  handle: GroupHandle;
  timeout: number;
};

export type UngroupResult = {
  primitives: SceneHandle[];
  timeout: number;
};

export type GroupSummary = {
  name: string;
  state: GroupState;
  timeoutMs: number;
  primitiveCount: number;
};

export type GroupRegistryDeps = {
  surface: IRenderSurface;
  scheduler: Scheduler;
  bus: EventBus;
  logger: Logger;
  options: Pick<ResolvedEngineOptions, "defaultTimeoutMs" | "minTimeoutMs" | "maxTimeoutMs">;
};

/**
 * Named groups of scene items. A name lives in exactly one of two registries:
 * active groups expire after their timeout, frozen groups stay until released.
 * Moving between the two always disbands and rebuilds the group.
 */
export class GroupRegistry {
  private active = new Map<string, GroupEntry>();
  private frozen = new Map<string, GroupEntry>();

  constructor(private readonly deps: GroupRegistryDeps) {}

  has(name: string): boolean {
    return this.active.has(name) || this.frozen.has(name);
  }

  isActive(name: string): boolean {
    return this.active.has(name);
  }

  isFrozen(name: string): boolean {
    return this.frozen.has(name);
  }

  get(name: string): GroupHandle | undefined {
    return (this.active.get(name) ?? this.frozen.get(name))?.handle;
  }

  timeoutOf(name: string): number | undefined {
    return (this.active.get(name) ?? this.frozen.get(name))?.timeout;
  }

  activeNames(): string[] {
    return Array.from(this.active.keys());
  }

  frozenNames(): string[] {
    return Array.from(this.frozen.keys());
  }

  clampTimeout(timeout: number): number {
    const { minTimeoutMs, maxTimeoutMs } = this.deps.options;
    return Math.min(maxTimeoutMs, Math.max(timeout, minTimeoutMs));
  }

  /**
   * Adds `primitives` to the group called `name`, creating it when absent. A new
   * group with `timeout <= 0` is frozen, otherwise active with a clamped timeout.
   */
  group(name: string, timeout: number, primitives: readonly SceneHandle[]): GroupHandle {
    const { surface } = this.deps;
    const existing = this.active.get(name) ?? this.frozen.get(name);
    if (existing) {
      for (const primitive of primitives) {
        surface.addToGroup(existing.handle, primitive);
      }
      return existing.handle;
    }

    const handle = surface.group(primitives);
    if (timeout <= 0) {
      this.frozen.set(name, { handle, timeout: 0 });
    } else {
      this.active.set(name, { handle, timeout: this.clampTimeout(timeout) });
    }
    this.notifyChanged();
    return handle;
  }

  /** `group()` plus the expiry timer for active timeouts. */
  finalize(name: string, primitives: readonly SceneHandle[], timeout: number): GroupHandle {
    const handle = this.group(name, timeout, primitives);
    if (timeout > 0) {
      this.deps.scheduler.schedule(this.clampTimeout(timeout), () => {
        // Only the group this timer was armed for; a rebuilt or frozen group is left alone.
        if (this.active.get(name)?.handle === handle) {
          this.deps.logger.debug("group expired", { name });
          this.hide(name);
        }
      });
    }
    return handle;
  }

  hide(name: string): void {
    const entry = this.active.get(name);
    if (!entry) return;

    this.active.delete(name);
    this.deps.surface.removeFromScene(entry.handle);
    this.deps.bus.publish(Topics.OVERLAY_GROUP_HIDDEN, { name });
    this.notifyChanged();
  }

  ungroup(name: string): UngroupResult | undefined {
    let entry = this.active.get(name);
    if (entry) {
      this.active.delete(name);
    } else {
      entry = this.frozen.get(name);
      if (!entry) return undefined;
      this.frozen.delete(name);
    }

    const primitives = this.deps.surface.disbandGroup(entry.handle);
    this.notifyChanged();
    return { primitives, timeout: entry.timeout };
  }

  /** Active → frozen. Returns false (and changes nothing) for any other state. */
  freeze(name: string): boolean {
    if (this.frozen.has(name) || !this.active.has(name)) return false;

    const released = this.ungroup(name);
    this.finalize(name, released?.primitives ?? [], 0);
    return true;
  }

  /** Frozen → active with the default timeout. Returns false for any other state. */
  continue(name: string): boolean {
    if (this.active.has(name) || !this.frozen.has(name)) return false;

    const released = this.ungroup(name);
    this.finalize(name, released?.primitives ?? [], this.deps.options.defaultTimeoutMs);
    return true;
  }

  /** Rebuilds a frozen group in place. */
  refresh(name: string): boolean {
    if (!this.frozen.has(name)) return false;

    this.continue(name);
    this.freeze(name);
    return true;
  }

  clear(name: string): void {
    if (this.frozen.has(name)) {
      this.continue(name);
    }
    this.hide(name);
  }

  setZ(name: string, z: number): void {
    const entry = this.active.get(name);
    if (!entry) return;
    this.deps.surface.setZ(entry.handle, z);
  }

  summaries(): GroupSummary[] {
    const summarize = (state: GroupState) => ([name, entry]: [string, GroupEntry]): GroupSummary => ({
      name,
      state,
      timeoutMs: entry.timeout,
      primitiveCount: this.deps.surface.childrenOf(entry.handle).length
    });
    return [
      ...Array.from(this.active.entries()).map(summarize("active")),
      ...Array.from(this.frozen.entries()).map(summarize("frozen"))
    ];
  }

  /** Removes every group from the surface. Returns the names that were dropped. */
  reset(): string[] {
    const removed: string[] = [];
    for (const registry of [this.active, this.frozen]) {
      for (const [name, entry] of registry) {
        removed.push(name);
        try {
          this.deps.surface.removeFromScene(entry.handle);
        } catch (error) {
          this.deps.logger.warn("group already gone from surface", {
            name,
            error: error instanceof Error ? error.message : String(error)
          });
        }
      }
      registry.clear();
    }
    if (removed.length > 0) this.notifyChanged();
    return removed;
  }

  private notifyChanged(): void {
    this.deps.bus.publish(Topics.OVERLAY_GROUPS_CHANGED, {
      active: this.activeNames(),
      frozen: this.frozenNames()
    });
  }
}
