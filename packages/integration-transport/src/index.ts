export { OverlayTransportMediator } from "./OverlayTransportMediator.js";
export { OVERLAY_SERVICE, type HostPush, type HostPushEvent, type OverlayRpcMethod } from "./contracts.js";
