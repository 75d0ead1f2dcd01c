import { Topics, type EventBus } from "@hudlink/event-bus";
import type { IOverlayEngine, OverlaySnapshot } from "@hudlink/overlay-engine";
import { useEffect, useState } from "react";

export type SnapshotSource = Pick<IOverlayEngine, "snapshot">;

/** Re-reads the engine snapshot whenever the group registry or the engine resets. */
export function useOverlaySnapshot(bus: EventBus, source: SnapshotSource): OverlaySnapshot {
  const [snapshot, setSnapshot] = useState<OverlaySnapshot>(() => source.snapshot());

  useEffect(() => {
    const refresh = () => setSnapshot(source.snapshot());
    refresh();
    const unsubscribes = [
      bus.subscribe(Topics.OVERLAY_GROUPS_CHANGED, refresh),
      bus.subscribe(Topics.OVERLAY_RESET, refresh)
    ];
    return () => {
      for (const unsub of unsubscribes) unsub();
    };
  }, [bus, source]);

  return snapshot;
}
