export const Topics = {
  OVERLAY_GROUP_HIDDEN: "overlay:group-hidden",
  OVERLAY_GROUPS_CHANGED: "overlay:groups-changed",
  OVERLAY_COMMAND_REJECTED: "overlay:command-rejected",
  OVERLAY_COMMAND_FAILED: "overlay:command-failed",
  OVERLAY_RESET: "overlay:reset",

  INPUT_POINTER_MOVE: "input:pointer-move",

  ENGINE_LOG: "engine:log",
  LOG_EVENT: "log:event"
} as const;

export type TopicsConst = typeof Topics;
