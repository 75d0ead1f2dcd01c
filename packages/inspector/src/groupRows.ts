import type { GroupState } from "@hudlink/event-bus";
import type { OverlaySnapshot } from "@hudlink/overlay-engine";

export type GroupRow = {
  name: string;
  state: GroupState;
  timeoutLabel: string;
  primitiveCount: number;
  hasModel: boolean;
  followingPointer: boolean;
  /** Head of the context stack, where draw commands land. */
  current: boolean;
};

export function toGroupRows(snapshot: OverlaySnapshot): GroupRow[] {
  const head = snapshot.contextStack[0];
  return snapshot.groups.map((group) => ({
    name: group.name,
    state: group.state,
    timeoutLabel: group.state === "frozen" ? "pinned" : `${group.timeoutMs} ms`,
    primitiveCount: group.primitiveCount,
    hasModel: group.hasModel,
    followingPointer: group.followingPointer,
    current: group.name === head
  }));
}
