/** Events pushed from the engine to the script host. */
export type HostPushEvent = {
  type: "hide-group";
  name: string;
};

export type HostPush = (event: HostPushEvent) => void;

export const OVERLAY_SERVICE = "overlay";

export type OverlayRpcMethod =
  | "enqueue"
  | "batch"
  | "setGroup"
  | "clearGroup"
  | "freezeGroup"
  | "continueGroup"
  | "refreshGroup"
  | "moveGroup"
  | "setGroupZ"
  | "reset"
  | "snapshot";
