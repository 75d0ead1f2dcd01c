import type { KnownTopic, TopicPayloadMap } from "./payloads.js";

export type EventBusTopic = KnownTopic | (string & {});

export type EventBusHandler<TPayload = unknown> = (payload: TPayload) => void;

export type Unsubscribe = () => void;

export type EventBusMiddleware = (
  event: {
    topic: EventBusTopic;
    payload: unknown;
  },
  next: () => void,
  bus: EventBus,
) => void;

export type RpcMethod = (...args: unknown[]) => unknown;

export interface RpcRequestPayload {
  requestId: string;
  args: unknown[];
}

export type RpcResponsePayload<T = unknown> =
  | { requestId: string; ok: true; result: T }
  | { requestId: string; ok: false; error: string };

function isRpcRequest(payload: unknown): payload is RpcRequestPayload {
  if (typeof payload !== "object" || payload === null) return false;
  const candidate = payload as Partial<RpcRequestPayload>;
  return typeof candidate.requestId === "string" && Array.isArray(candidate.args);
}

function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  return String(error);
}

export class EventBus {
  private handlersByTopic = new Map<EventBusTopic, Set<EventBusHandler>>();
  private readonly middlewares: EventBusMiddleware[];

  constructor(options?: { middlewares?: EventBusMiddleware[] }) {
    this.middlewares = options?.middlewares ?? [];
  }

  /**
   * Exposes `methods` under `rpc:request:<service>:<method>`. Results and thrown
   * errors travel back on a per-request response topic.
   */
  rpcService(service: string, methods: Record<string, RpcMethod>): Unsubscribe {
    const unsubscribes: Unsubscribe[] = [];

    for (const [methodName, methodImpl] of Object.entries(methods)) {
      const requestTopic = `rpc:request:${service}:${methodName}`;

      unsubscribes.push(
        this.subscribe(requestTopic, (payload: unknown) => {
          if (!isRpcRequest(payload)) return;
          const { requestId, args } = payload;
          const responseTopic = `rpc:response:${service}:${methodName}:${requestId}`;

          void Promise.resolve()
            .then(() => methodImpl(...args))
            .then(
              (result) => {
                this.publish<RpcResponsePayload>(responseTopic, { requestId, ok: true, result });
              },
              (error: unknown) => {
                this.publish<RpcResponsePayload>(responseTopic, { requestId, ok: false, error: errorMessage(error) });
              },
            );
        }),
      );
    }

    return () => {
      for (const unsub of unsubscribes) unsub();
    };
  }

  rpcCall<TResult = unknown>(service: string, method: string, ...args: unknown[]): Promise<TResult> {
    return new Promise((resolve, reject) => {
      const requestId = Math.random().toString(36).substring(2, 15);
      const requestTopic = `rpc:request:${service}:${method}`;
      const responseTopic = `rpc:response:${service}:${method}:${requestId}`;

      const unsubscribe = this.subscribe<RpcResponsePayload<TResult>>(responseTopic, (payload) => {
        unsubscribe();

        if (payload.ok) {
          resolve(payload.result);
        } else {
          reject(new Error(payload.error));
        }
      });

      this.publish<RpcRequestPayload>(requestTopic, { requestId, args });
    });
  }

  subscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): Unsubscribe;
  subscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): Unsubscribe;
  subscribe(topic: EventBusTopic, handler: EventBusHandler<never>): Unsubscribe {
    const set = this.handlersByTopic.get(topic) ?? new Set<EventBusHandler>();
    set.add(handler as EventBusHandler);
    this.handlersByTopic.set(topic, set);

    return () => {
      this.unsubscribe(topic, handler);
    };
  }

  unsubscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): void;
  unsubscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): void;
  unsubscribe(topic: EventBusTopic, handler: EventBusHandler<never>): void {
    const set = this.handlersByTopic.get(topic);
    if (!set) return;
    set.delete(handler as EventBusHandler);
    if (set.size === 0) this.handlersByTopic.delete(topic);
  }

  listenerCount(topic: EventBusTopic): number {
    return this.handlersByTopic.get(topic)?.size ?? 0;
  }

  publish<TTopic extends KnownTopic>(topic: TTopic, payload: TopicPayloadMap[TTopic]): void;
  publish<TPayload>(topic: EventBusTopic, payload: TPayload): void;
  publish(topic: EventBusTopic, payload: unknown): void {
    const event = { topic, payload };

    const dispatch = () => {
      const set = this.handlersByTopic.get(topic);
      if (!set) return;
      for (const handler of [...set]) {
        handler(payload);
      }
    };

    if (this.middlewares.length === 0) {
      dispatch();
      return;
    }

    let index = -1;
    const run = (i: number) => {
      if (i <= index) return;
      index = i;
      const middleware = this.middlewares[i];
      if (!middleware) {
        dispatch();
        return;
      }
      middleware(event, () => run(i + 1), this);
    };

    run(0);
  }
}

export function createEventBus(options?: { middlewares?: EventBusMiddleware[] }): EventBus {
  return new EventBus(options);
}

export function createEventLoggerMiddleware(options: {
  ignoreTopics?: EventBusTopic[];
  logTopic: EventBusTopic;
}): EventBusMiddleware {
  const ignore = new Set(options.ignoreTopics ?? []);

  return (event, next, bus) => {
    next();

    if (ignore.has(event.topic) || event.topic === options.logTopic) return;

    bus.publish(options.logTopic, { topic: event.topic, payload: event.payload });
  };
}
