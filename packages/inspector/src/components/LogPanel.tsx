import { Button, Typography } from "antd";
import type { EventBus } from "@hudlink/event-bus";
import { useEffect, useMemo, useRef, useState } from "react";
import { appendBounded, formatLogLine, type LogEntry } from "../logFormat.js";
import { subscribeLogEntries } from "../logSource.js";

export const MAX_LOG_ENTRIES = 200;

export type LogPanelProps = {
  bus: EventBus;
  maxEntries?: number;
  defaultCollapsed?: boolean;
};

/** Engine log records always show; other topics show once the host installs the logger middleware. */
export function LogPanel({ bus, maxEntries = MAX_LOG_ENTRIES, defaultCollapsed = true }: LogPanelProps) {
  const [collapsed, setCollapsed] = useState<boolean>(defaultCollapsed);
  const [logs, setLogs] = useState<LogEntry[]>([]);
  const scrollRef = useRef<HTMLDivElement | null>(null);
  const nextId = useRef(0);

  const visibleLogs = useMemo(() => (collapsed ? [] : logs), [collapsed, logs]);

  useEffect(() => {
    return subscribeLogEntries(bus, (topic, payload) => {
      const entry: LogEntry = { id: nextId.current++, time: Date.now(), topic, payload };
      setLogs((prev) => appendBounded(prev, entry, maxEntries));
    });
  }, [bus, maxEntries]);

  useEffect(() => {
    const el = scrollRef.current;
    if (!el) return;
    el.scrollTop = el.scrollHeight;
  }, [visibleLogs]);

  return (
    <div style={{ height: collapsed ? 28 : 200, display: "flex", flexDirection: "column" }}>
      <div
        style={{
          height: 28,
          display: "flex",
          alignItems: "center",
          justifyContent: "space-between",
          padding: "0 10px"
        }}
      >
        <Typography.Text style={{ color: "rgba(255,255,255,0.65)" }}>Log</Typography.Text>
        <Button size="small" onClick={() => setCollapsed((v) => !v)}>
          {collapsed ? "Expand" : "Collapse"}
        </Button>
      </div>

      {!collapsed && (
        <div
          ref={scrollRef}
          style={{
            flex: 1,
            overflow: "auto",
            padding: "8px 10px",
            fontFamily: "ui-monospace, SFMono-Regular, Menlo, Monaco, Consolas, monospace",
            fontSize: 12,
            color: "rgba(255,255,255,0.7)"
          }}
        >
          {visibleLogs.map((log) => (
            <div key={log.id} style={{ whiteSpace: "pre-wrap", marginBottom: 6 }}>
              {formatLogLine(log)}
            </div>
          ))}
        </div>
      )}
    </div>
  );
}
