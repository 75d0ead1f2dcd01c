export { OverlayInspector } from "./components/OverlayInspector.js";
export { GroupPanel } from "./components/GroupPanel.js";
export { LogPanel, MAX_LOG_ENTRIES } from "./components/LogPanel.js";
export { useOverlaySnapshot } from "./hooks/useOverlaySnapshot.js";
export { appendBounded, formatLogLine, safeStringify } from "./logFormat.js";
export { toGroupRows } from "./groupRows.js";
export { subscribeLogEntries } from "./logSource.js";
export type { OverlayInspectorProps } from "./components/OverlayInspector.js";
export type { GroupPanelProps } from "./components/GroupPanel.js";
export type { LogPanelProps } from "./components/LogPanel.js";
export type { SnapshotSource } from "./hooks/useOverlaySnapshot.js";
export type { LogEntry } from "./logFormat.js";
export type { GroupRow } from "./groupRows.js";
