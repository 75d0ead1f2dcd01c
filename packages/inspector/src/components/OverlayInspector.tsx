import type { EventBus } from "@hudlink/event-bus";
import { useOverlaySnapshot, type SnapshotSource } from "../hooks/useOverlaySnapshot.js";
import { GroupPanel } from "./GroupPanel.js";
import { LogPanel } from "./LogPanel.js";

export type OverlayInspectorProps = {
  bus: EventBus;
  engine: SnapshotSource;
};

export function OverlayInspector({ bus, engine }: OverlayInspectorProps) {
  const snapshot = useOverlaySnapshot(bus, engine);

  return (
    <div style={{ height: "100%", display: "flex", flexDirection: "column" }}>
      <div style={{ flex: 1, minHeight: 0 }}>
        <GroupPanel snapshot={snapshot} />
      </div>
      <LogPanel bus={bus} />
    </div>
  );
}
