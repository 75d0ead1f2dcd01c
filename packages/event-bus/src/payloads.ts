export type GroupState = "active" | "frozen";

export type OverlayGroupHiddenPayload = {
  name: string;
};

export type OverlayGroupsChangedPayload = {
  active: string[];
  frozen: string[];
};

export type OverlayCommandRejectedPayload = {
  callId: number | null;
  command: string;
  reason: string;
};

export type OverlayCommandFailedPayload = {
  callId: number | null;
  command: string;
  args: string;
  message: string;
  code?: string;
};

export type OverlayResetPayload = {
  droppedCommands: number;
  removedGroups: string[];
};

export type InputPointerMovePayload = {
  x: number;
  y: number;
  timestamp: number;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type EngineLogPayload = {
  level: LogLevel;
  source: string;
  message: string;
  data?: Record<string, unknown>;
  timestamp: number;
};

export type LogEventPayload = {
  topic: string;
  payload: unknown;
};

type TopicsConst = typeof import("./topics.js").Topics;

export type TopicPayloadMap = {
  [K in TopicsConst["OVERLAY_GROUP_HIDDEN"]]: OverlayGroupHiddenPayload;
} & {
  [K in TopicsConst["OVERLAY_GROUPS_CHANGED"]]: OverlayGroupsChangedPayload;
} & {
  [K in TopicsConst["OVERLAY_COMMAND_REJECTED"]]: OverlayCommandRejectedPayload;
} & {
  [K in TopicsConst["OVERLAY_COMMAND_FAILED"]]: OverlayCommandFailedPayload;
} & {
  [K in TopicsConst["OVERLAY_RESET"]]: OverlayResetPayload;
} & {
  [K in TopicsConst["INPUT_POINTER_MOVE"]]: InputPointerMovePayload;
} & {
  [K in TopicsConst["ENGINE_LOG"]]: EngineLogPayload;
} & {
  [K in TopicsConst["LOG_EVENT"]]: LogEventPayload;
};

export type KnownTopic = keyof TopicPayloadMap;
