import { Topics, type EventBus, type LogLevel } from "@hudlink/event-bus";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(source: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

/** Logger that publishes records on the bus as `engine:log`. */
export function createBusLogger(
  bus: EventBus,
  source: string,
  options?: { level?: LogLevel; now?: () => number },
): Logger {
  const minRank = LEVEL_RANK[options?.level ?? "info"];
  const now = options?.now ?? (() => Date.now());

  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < minRank) return;
    bus.publish(Topics.ENGINE_LOG, {
      level,
      source,
      message,
      ...(data ? { data } : {}),
      timestamp: now()
    });
  };

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
    child: (child) => createBusLogger(bus, `${source}.${child}`, options)
  };
}
