import { Topics, type EventBus, type RpcMethod, type Unsubscribe } from "@hudlink/event-bus";
import {
  OverlayProtocolError,
  expectArity,
  readBatch,
  readBool,
  readInt,
  readNumber,
  readOptional,
  readString,
  type ArgList,
  type IOverlayEngine
} from "@hudlink/overlay-engine";
import { OVERLAY_SERVICE, type HostPush, type OverlayRpcMethod } from "./contracts.js";

function readArgList(args: ArgList, index: number): unknown[] {
  const value = readOptional(args, index);
  if (value === undefined) return [];
  if (Array.isArray(value)) return [...value];
  throw new OverlayProtocolError("BAD_ARGUMENT", `argument ${index} (args) must be a list`);
}

/**
 * Exposes the engine to the script host over bus RPC and forwards the engine
 * notifications the host reacts to.
 */
export class OverlayTransportMediator {
  private unsubscribes: Unsubscribe[] = [];

  constructor(
    private readonly bus: EventBus,
    private readonly engine: IOverlayEngine,
    private readonly push: HostPush
  ) {}

  attach() {
    if (this.unsubscribes.length > 0) return;

    const engine = this.engine;
    const methods: Record<OverlayRpcMethod, RpcMethod> = {
      enqueue: (...args) => {
        expectArity(args, 2, 3);
        return engine.enqueue(readNumber(args, 0, "callId"), readString(args, 1, "name"), readArgList(args, 2));
      },
      batch: (...args) => {
        expectArity(args, 1, 1);
        engine.batch(readBatch(args, 0, "commands"));
      },
      setGroup: (...args) => {
        expectArity(args, 1, 2);
        engine.setGroup(readString(args, 0, "name"), readOptional(args, 1));
      },
      clearGroup: (...args) => {
        expectArity(args, 1, 1);
        engine.clearGroup(readString(args, 0, "name"));
      },
      freezeGroup: (...args) => {
        expectArity(args, 1, 1);
        engine.freezeGroup(readString(args, 0, "name"));
      },
      continueGroup: (...args) => {
        expectArity(args, 1, 1);
        engine.continueGroup(readString(args, 0, "name"));
      },
      refreshGroup: (...args) => {
        expectArity(args, 1, 1);
        engine.refreshGroup(readString(args, 0, "name"));
      },
      moveGroup: (...args) => {
        expectArity(args, 2, 2);
        engine.moveGroup(readString(args, 0, "name"), readBool(args, 1, "enable"));
      },
      setGroupZ: (...args) => {
        expectArity(args, 2, 2);
        engine.setGroupZ(readString(args, 0, "name"), readInt(args, 1, "z"));
      },
      reset: (...args) => {
        expectArity(args, 0, 0);
        engine.reset();
      },
      snapshot: (...args) => {
        expectArity(args, 0, 0);
        return engine.snapshot();
      }
    };

    this.unsubscribes.push(
      this.bus.rpcService(OVERLAY_SERVICE, methods),
      this.bus.subscribe(Topics.OVERLAY_GROUP_HIDDEN, (payload) => {
        this.push({ type: "hide-group", name: payload.name });
      })
    );
  }

  detach() {
    for (const unsub of this.unsubscribes) unsub();
    this.unsubscribes = [];
  }
}
