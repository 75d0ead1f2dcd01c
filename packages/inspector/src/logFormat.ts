import { Topics, type EngineLogPayload } from "@hudlink/event-bus";

export type LogEntry = {
  id: number;
  time: number;
  topic: string;
  payload: unknown;
};

export function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function isEngineLog(payload: unknown): payload is EngineLogPayload {
  if (typeof payload !== "object" || payload === null) return false;
  return "level" in payload && "source" in payload && "message" in payload;
}

/** UTC wall-clock time with milliseconds. */
function clock(time: number): string {
  return new Date(time).toISOString().slice(11, 23);
}

export function formatLogLine(entry: LogEntry): string {
  const prefix = `[${clock(entry.time)}]`;
  const { payload } = entry;
  if (entry.topic === Topics.ENGINE_LOG && isEngineLog(payload)) {
    const data = payload.data ? ` ${safeStringify(payload.data)}` : "";
    return `${prefix} ${payload.level.toUpperCase()} ${payload.source} ${payload.message}${data}`;
  }
  return `${prefix} ${entry.topic} ${safeStringify(payload)}`;
}

/** Appends and keeps only the newest `max` items. */
export function appendBounded<T>(list: readonly T[], item: T, max: number): T[] {
  const next = [...list, item];
  return next.length <= max ? next : next.slice(next.length - max);
}
