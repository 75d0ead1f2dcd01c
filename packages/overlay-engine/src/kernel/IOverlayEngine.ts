import type { IRenderSurface } from "@hudlink/rendering-core";
import type { GroupSummary } from "../groups/GroupRegistry.js";
import type { OverlayCommandTarget } from "../protocol/commandTable.js";

export type EnqueueResult = { accepted: true } | { accepted: false; reason: string };

export type OverlayGroupSnapshot = GroupSummary & {
  hasModel: boolean;
  followingPointer: boolean;
};

export type OverlaySnapshot = {
  attached: boolean;
  groups: OverlayGroupSnapshot[];
  /** Most recent first; the head is the target of draw commands. */
  contextStack: string[];
  pendingCallIds: number[];
  lastProcessedCallId: number | null;
};

export interface IOverlayEngine extends OverlayCommandTarget {
  /** Queues a sequenced command. Rejected commands never reach the queue. */
  enqueue(callId: number, name: string, args?: readonly unknown[]): EnqueueResult;
  /** Drops every group, pending command, bound model and pointer follower. */
  reset(): void;

  attachSurface(surface: IRenderSurface): void;
  detachSurface(): void;
  isAttached(): boolean;

  snapshot(): OverlaySnapshot;
}
