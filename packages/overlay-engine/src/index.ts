export type { EnqueueResult, IOverlayEngine, OverlayGroupSnapshot, OverlaySnapshot } from "./kernel/IOverlayEngine.js";
export { OverlayEngine, type OverlayEngineConfig } from "./kernel/OverlayEngine.js";

export {
  DEFAULT_ENGINE_OPTIONS,
  resolveEngineOptions,
  type OverlayEngineOptions,
  type ResolvedEngineOptions
} from "./config/options.js";
export {
  OverlayError,
  OverlayProtocolError,
  OverlayTemplateError,
  describeError,
  type OverlayErrorCode
} from "./errors.js";
export { createBusLogger, type Logger } from "./logging/logger.js";
export { timerScheduler, type CancelTask, type Scheduler } from "./scheduler/Scheduler.js";

export type { ArgList, BatchEntry, ImagePayload } from "./protocol/args.js";
export { expectArity, readBatch, readBool, readInt, readNumber, readOptional, readString } from "./protocol/args.js";
export {
  INTERNAL_MARKER,
  commandNames,
  isBarrierCommand,
  isCommandName,
  resolveCommand,
  type OverlayCommandName,
  type OverlayCommandTarget,
  type ResolvedCommand
} from "./protocol/commandTable.js";
export { previewArgs } from "./protocol/preview.js";

export { CommandSequencer, type QueuedCommand } from "./sequencer/CommandSequencer.js";
export { GroupContextStack } from "./groups/GroupContextStack.js";
export { GroupRegistry, type GroupSummary, type UngroupResult } from "./groups/GroupRegistry.js";

export type { ModelValue } from "./model/textModel.js";
export { ANIMATE_KEY, hasAnimateFlag, toModelValue, toPlain } from "./model/textModel.js";
export { MODEL_ROOT, compileTemplate, formatTemplate, type CompiledTemplate } from "./model/template.js";

export { decodeColor, resolveFont, strokeWidth, TEXT_SHADOW } from "./builders/PrimitiveBuilders.js";
export { PointerFollower, type FollowTarget } from "./follow/PointerFollower.js";
