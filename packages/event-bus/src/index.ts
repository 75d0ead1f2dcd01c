export type {
  EngineLogPayload,
  GroupState,
  InputPointerMovePayload,
  KnownTopic,
  LogEventPayload,
  LogLevel,
  OverlayCommandFailedPayload,
  OverlayCommandRejectedPayload,
  OverlayGroupHiddenPayload,
  OverlayGroupsChangedPayload,
  OverlayResetPayload,
  TopicPayloadMap
} from "./payloads.js";
export type {
  EventBusHandler,
  EventBusMiddleware,
  EventBusTopic,
  RpcMethod,
  RpcRequestPayload,
  RpcResponsePayload,
  Unsubscribe
} from "./eventBus.js";
export { EventBus, createEventBus, createEventLoggerMiddleware } from "./eventBus.js";
export { Topics } from "./topics.js";
