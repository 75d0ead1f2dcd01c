import { Topics, type EventBus } from "@hudlink/event-bus";
import type { IRenderSurface, IWindowTracker } from "@hudlink/rendering-core";
import { PrimitiveBuilders } from "../builders/PrimitiveBuilders.js";
import { resolveEngineOptions, type OverlayEngineOptions, type ResolvedEngineOptions } from "../config/options.js";
import { describeError } from "../errors.js";
import { PointerFollower, type FollowTarget } from "../follow/PointerFollower.js";
import { GroupContextStack } from "../groups/GroupContextStack.js";
import { GroupRegistry } from "../groups/GroupRegistry.js";
import { createBusLogger, type Logger } from "../logging/logger.js";
import { ModelBindings } from "../model/ModelBindings.js";
import { TextTemplates } from "../model/TextTemplates.js";
import { toModelValue, withNumberFields } from "../model/textModel.js";
import type { BatchEntry } from "../protocol/args.js";
import {
  isBarrierCommand,
  resolveCommand,
  type ImageParams,
  type LineParams,
  type RectParams,
  type ResolvedCommand,
  type TextParams
} from "../protocol/commandTable.js";
import { previewArgs } from "../protocol/preview.js";
import { timerScheduler, type Scheduler } from "../scheduler/Scheduler.js";
import { CommandSequencer, type QueuedCommand } from "../sequencer/CommandSequencer.js";
import type { EnqueueResult, IOverlayEngine, OverlaySnapshot } from "./IOverlayEngine.js";

export type OverlayEngineConfig = {
  bus: EventBus;
  scheduler?: Scheduler;
  windowTracker?: IWindowTracker;
  logger?: Logger;
  options?: OverlayEngineOptions;
  surface?: IRenderSurface;
};

type Attachment = {
  surface: IRenderSurface;
  registry: GroupRegistry;
  builders: PrimitiveBuilders;
};

export class OverlayEngine implements IOverlayEngine {
  private readonly bus: EventBus;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly options: ResolvedEngineOptions;

  private readonly sequencer: CommandSequencer;
  private readonly contextStack = new GroupContextStack();
  private readonly bindings = new ModelBindings();
  private readonly templates = new TextTemplates();
  private readonly follower: PointerFollower | null;

  private attachment: Attachment | null = null;

  constructor(config: OverlayEngineConfig) {
    this.bus = config.bus;
    this.scheduler = config.scheduler ?? timerScheduler;
    this.options = resolveEngineOptions(config.options);
    this.logger = config.logger ?? createBusLogger(this.bus, "overlay", { level: this.options.logLevel });

    this.sequencer = new CommandSequencer({
      scheduler: this.scheduler,
      logger: this.logger.child("sequencer"),
      isBarrier: isBarrierCommand,
      execute: (command) => this.execute(command),
      onFault: (command, error) => this.reportFault(command.callId, command.name, command.args, error)
    });

    this.follower = config.windowTracker
      ? new PointerFollower({
          bus: this.bus,
          windowTracker: config.windowTracker,
          logger: this.logger.child("follow"),
          move: (name, target) => this.followPointer(name, target)
        })
      : null;

    if (config.surface) this.attachSurface(config.surface);
  }

  attachSurface(surface: IRenderSurface): void {
    if (this.attachment) this.detachSurface();

    const registry = new GroupRegistry({
      surface,
      scheduler: this.scheduler,
      bus: this.bus,
      logger: this.logger.child("groups"),
      options: this.options
    });
    const builders = new PrimitiveBuilders({
      surface,
      registry,
      contextStack: this.contextStack,
      bindings: this.bindings,
      templates: this.templates,
      options: this.options
    });
    this.attachment = { surface, registry, builders };
    this.logger.info("surface attached");
  }

  detachSurface(): void {
    if (!this.attachment) return;
    this.reset();
    this.attachment = null;
    this.logger.info("surface detached");
  }

  isAttached(): boolean {
    return this.attachment !== null;
  }

  enqueue(callId: number, name: string, args: readonly unknown[] = []): EnqueueResult {
    if (!Number.isInteger(callId)) {
      return this.reject(null, name, `call id must be an integer, got ${String(callId)}`);
    }
    if (!this.attachment) {
      return this.reject(callId, name, "no surface attached");
    }

    let command: ResolvedCommand;
    try {
      command = resolveCommand(name);
    } catch (error) {
      return this.reject(callId, name, describeError(error).message);
    }

    if (callId === 0) this.reset();

    this.logger.info("enqueue", {
      callId,
      command: command.name,
      args: previewArgs(args, this.options.argPreviewLength)
    });
    this.sequencer.enqueue({ callId, name: command.name, args: [...args] });
    return { accepted: true };
  }

  reset(): void {
    const droppedCommands = this.sequencer.reset();
    const removedGroups = this.attachment?.registry.reset() ?? [];
    this.contextStack.clear();
    this.bindings.clear();
    this.follower?.stopAll();

    this.logger.info("reset", { droppedCommands, removedGroups: removedGroups.length });
    this.bus.publish(Topics.OVERLAY_RESET, { droppedCommands, removedGroups });
  }

  batch(commands: readonly BatchEntry[]): void {
    for (const entry of commands) {
      let command: ResolvedCommand;
      try {
        command = resolveCommand(entry.name);
      } catch (error) {
        this.logger.warn("batch entry skipped", { command: entry.name, reason: describeError(error).message });
        continue;
      }

      try {
        command.invoke(this, entry.args);
      } catch (error) {
        this.reportFault(null, entry.name, entry.args, error);
      }
    }
  }

  drawRect(params: RectParams): void {
    this.attachment?.builders.drawRect(params);
  }

  drawLine(params: LineParams): void {
    this.attachment?.builders.drawLine(params);
  }

  drawText(params: TextParams): void {
    this.attachment?.builders.drawText(params);
  }

  drawImage(params: ImageParams): void {
    this.attachment?.builders.drawImage(params);
  }

  setGroup(name: string, model?: unknown): void {
    if (!this.attachment) return;
    this.contextStack.push(name);
    if (model === undefined) return;

    const value = toModelValue(model);
    this.bindings.bind(name, value);
    const handle = this.attachment.registry.get(name);
    if (handle) this.templates.refresh(this.attachment.surface, handle, value);
  }

  setGroupZ(name: string, z: number): void {
    this.attachment?.registry.setZ(name, z);
  }

  moveGroup(name: string, enable: boolean): void {
    if (!this.attachment) return;
    if (!enable) {
      this.follower?.stop(name);
      return;
    }
    if (!this.attachment.registry.isFrozen(name)) return;
    if (!this.follower) {
      this.logger.warn("pointer follow needs a window tracker", { name });
      return;
    }
    this.follower.follow(name);
  }

  clearGroup(name: string): void {
    if (!this.attachment) return;
    this.follower?.stop(name);
    this.attachment.registry.clear(name);
  }

  freezeGroup(name: string): void {
    if (!this.attachment) return;
    if (!this.attachment.registry.freeze(name)) {
      this.contextStack.push(name);
    }
  }

  continueGroup(name: string): void {
    if (!this.attachment) return;
    if (!this.attachment.registry.continue(name)) {
      this.contextStack.push(name);
    }
  }

  refreshGroup(name: string): void {
    const attachment = this.attachment;
    if (!attachment?.registry.refresh(name)) return;

    const model = this.bindings.get(name);
    const handle = attachment.registry.get(name);
    if (model && handle) this.templates.refresh(attachment.surface, handle, model);
  }

  snapshot(): OverlaySnapshot {
    const groups = this.attachment?.registry.summaries() ?? [];
    return {
      attached: this.attachment !== null,
      groups: groups.map((group) => ({
        ...group,
        hasModel: this.bindings.has(group.name),
        followingPointer: this.follower?.isFollowing(group.name) ?? false
      })),
      contextStack: this.contextStack.toArray(),
      pendingCallIds: this.sequencer.pendingCallIds(),
      lastProcessedCallId: this.sequencer.lastProcessedCallId
    };
  }

  private execute(command: QueuedCommand): void {
    resolveCommand(command.name).invoke(this, command.args);
  }

  private followPointer(name: string, target: FollowTarget): void {
    const attachment = this.attachment;
    if (!attachment) throw new Error("no surface attached");

    const handle = attachment.registry.isFrozen(name) ? attachment.registry.get(name) : undefined;
    if (!handle) throw new Error(`group "${name}" is not frozen`);

    const { surface } = attachment;
    const current = surface.positionOf(handle);
    if (current.x === target.position.x && current.y === target.position.y) return;

    surface.setPosition(handle, target.position);
    const model = withNumberFields(this.bindings.get(name), {
      mouse_x: target.pointer.x,
      mouse_y: target.pointer.y
    });
    this.bindings.bind(name, model);
    this.templates.refresh(surface, handle, model);
  }

  private reject(callId: number | null, command: string, reason: string): EnqueueResult {
    this.logger.warn("command rejected", { callId, command, reason });
    this.bus.publish(Topics.OVERLAY_COMMAND_REJECTED, { callId, command, reason });
    return { accepted: false, reason };
  }

  private reportFault(callId: number | null, command: string, args: readonly unknown[], error: unknown): void {
    const { message, code } = describeError(error);
    const preview = previewArgs(args, this.options.argPreviewLength);
    this.logger.error("command failed", { callId, command, args: preview, error: message, ...(code ? { code } : {}) });
    this.bus.publish(Topics.OVERLAY_COMMAND_FAILED, {
      callId,
      command,
      args: preview,
      message,
      ...(code ? { code } : {})
    });
  }
}
