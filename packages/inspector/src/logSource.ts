import { Topics, type EventBus } from "@hudlink/event-bus";

/**
 * Feeds `onEntry` with engine log records from `engine:log` and with whatever a
 * logger middleware mirrors onto `log:event`. Mirrored copies of engine records
 * are skipped so each record shows once with or without the middleware.
 */
export function subscribeLogEntries(
  bus: EventBus,
  onEntry: (topic: string, payload: unknown) => void
): () => void {
  const offEngine = bus.subscribe(Topics.ENGINE_LOG, (payload) => onEntry(Topics.ENGINE_LOG, payload));
  const offMirror = bus.subscribe(Topics.LOG_EVENT, (payload) => {
    if (payload.topic === Topics.ENGINE_LOG) return;
    onEntry(payload.topic, payload.payload);
  });
  return () => {
    offEngine();
    offMirror();
  };
}
