import { OverlayProtocolError } from "../errors.js";
import {
  expectArity,
  readBatch,
  readBool,
  readImage,
  readInt,
  readNumber,
  readOptional,
  readString,
  type ArgList,
  type BatchEntry,
  type ImagePayload
} from "./args.js";

/** Names starting with this character are reserved for the engine itself. */
export const INTERNAL_MARKER = "_";

export type RectParams = {
  color: number;
  x: number;
  y: number;
  width: number;
  height: number;
  timeout: number;
  lineWidth: number;
};

export type LineParams = {
  color: number;
  lineWidth: number;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  timeout: number;
};

export type TextParams = {
  message: string;
  color: number;
  size: number;
  x: number;
  y: number;
  timeout: number;
  fontName: string;
  centered: boolean;
  shadow: boolean;
};

export type ImageParams = {
  image: ImagePayload;
  x: number;
  y: number;
  timeout: number;
};

type GroupParams = { name: string };

export type CommandParamsMap = {
  overlay_rect: RectParams;
  overlay_line: LineParams;
  overlay_text: TextParams;
  overlay_image: ImageParams;
  overlay_set_group: GroupParams & { model?: unknown };
  overlay_set_group_z: GroupParams & { z: number };
  overlay_move_group: GroupParams & { enable: boolean };
  overlay_batch: { commands: BatchEntry[] };
  overlay_clear_group: GroupParams;
  overlay_freeze_group: GroupParams;
  overlay_continue_group: GroupParams;
  overlay_refresh_group: GroupParams;
};

export type OverlayCommandName = keyof CommandParamsMap;

/** Operations a dispatched command may call. */
export interface OverlayCommandTarget {
  drawRect(params: RectParams): void;
  drawLine(params: LineParams): void;
  drawText(params: TextParams): void;
  drawImage(params: ImageParams): void;
  setGroup(name: string, model?: unknown): void;
  setGroupZ(name: string, z: number): void;
  moveGroup(name: string, enable: boolean): void;
  batch(commands: readonly BatchEntry[]): void;
  clearGroup(name: string): void;
  freezeGroup(name: string): void;
  continueGroup(name: string): void;
  refreshGroup(name: string): void;
}

type CommandDefinition<P> = {
  /** Must wait until the preceding call id has been processed. */
  barrier: boolean;
  parse(args: ArgList): P;
  run(target: OverlayCommandTarget, params: P): void;
};

function groupName(args: ArgList): GroupParams {
  expectArity(args, 1, 1);
  return { name: readString(args, 0, "name") };
}

const COMMANDS: { [N in OverlayCommandName]: CommandDefinition<CommandParamsMap[N]> } = {
  overlay_rect: {
    barrier: false,
    parse: (args) => {
      expectArity(args, 7, 7);
      return {
        color: readInt(args, 0, "color"),
        x: readNumber(args, 1, "x"),
        y: readNumber(args, 2, "y"),
        width: readNumber(args, 3, "w"),
        height: readNumber(args, 4, "h"),
        timeout: readNumber(args, 5, "timeout"),
        lineWidth: readNumber(args, 6, "line_width")
      };
    },
    run: (target, params) => target.drawRect(params)
  },
  overlay_line: {
    barrier: false,
    parse: (args) => {
      expectArity(args, 7, 7);
      return {
        color: readInt(args, 0, "color"),
        lineWidth: readNumber(args, 1, "line_width"),
        x1: readNumber(args, 2, "x1"),
        y1: readNumber(args, 3, "y1"),
        x2: readNumber(args, 4, "x2"),
        y2: readNumber(args, 5, "y2"),
        timeout: readNumber(args, 6, "timeout")
      };
    },
    run: (target, params) => target.drawLine(params)
  },
  overlay_text: {
    barrier: false,
    parse: (args) => {
      expectArity(args, 9, 9);
      return {
        message: readString(args, 0, "message"),
        color: readInt(args, 1, "color"),
        size: readNumber(args, 2, "size"),
        x: readNumber(args, 3, "x"),
        y: readNumber(args, 4, "y"),
        timeout: readNumber(args, 5, "timeout"),
        fontName: readString(args, 6, "font_name"),
        centered: readBool(args, 7, "centered"),
        shadow: readBool(args, 8, "shadow")
      };
    },
    run: (target, params) => target.drawText(params)
  },
  overlay_image: {
    barrier: false,
    parse: (args) => {
      expectArity(args, 4, 4);
      return {
        image: readImage(args, 0, "img"),
        x: readNumber(args, 1, "x"),
        y: readNumber(args, 2, "y"),
        timeout: readNumber(args, 3, "timeout")
      };
    },
    run: (target, params) => target.drawImage(params)
  },
  overlay_set_group: {
    barrier: false,
    parse: (args) => {
      expectArity(args, 1, 2);
      return { name: readString(args, 0, "name"), model: readOptional(args, 1) };
    },
    run: (target, params) => target.setGroup(params.name, params.model)
  },
  overlay_set_group_z: {
    barrier: false,
    parse: (args) => {
      expectArity(args, 2, 2);
      return { name: readString(args, 0, "name"), z: readInt(args, 1, "z_index") };
    },
    run: (target, params) => target.setGroupZ(params.name, params.z)
  },
  overlay_move_group: {
    barrier: false,
    parse: (args) => {
      expectArity(args, 2, 2);
      return { name: readString(args, 0, "name"), enable: readBool(args, 1, "enable") };
    },
    run: (target, params) => target.moveGroup(params.name, params.enable)
  },
  overlay_batch: {
    barrier: false,
    parse: (args) => {
      expectArity(args, 1, 1);
      return { commands: readBatch(args, 0, "commands") };
    },
    run: (target, params) => target.batch(params.commands)
  },
  overlay_clear_group: {
    barrier: true,
    parse: groupName,
    run: (target, params) => target.clearGroup(params.name)
  },
  overlay_freeze_group: {
    barrier: true,
    parse: groupName,
    run: (target, params) => target.freezeGroup(params.name)
  },
  overlay_continue_group: {
    barrier: true,
    parse: groupName,
    run: (target, params) => target.continueGroup(params.name)
  },
  overlay_refresh_group: {
    barrier: true,
    parse: groupName,
    run: (target, params) => target.refreshGroup(params.name)
  }
};

export type ResolvedCommand = {
  readonly name: OverlayCommandName;
  readonly barrier: boolean;
  /** Validates `args` and runs the command; throws on malformed arguments. */
  invoke(target: OverlayCommandTarget, args: ArgList): void;
};

export function isCommandName(name: string): name is OverlayCommandName {
  return Object.prototype.hasOwnProperty.call(COMMANDS, name);
}

export function isBarrierCommand(name: string): boolean {
  return isCommandName(name) && COMMANDS[name].barrier;
}

function bind<N extends OverlayCommandName>(name: N): ResolvedCommand {
  const definition: CommandDefinition<CommandParamsMap[N]> = COMMANDS[name];
  return {
    name,
    barrier: definition.barrier,
    invoke: (target, args) => definition.run(target, definition.parse(args))
  };
}

/**
 * Looks a wire command name up in the closed command table. Reserved and unknown names
 * throw `OverlayProtocolError`; nothing is ever executed for them.
 */
export function resolveCommand(name: string): ResolvedCommand {
  if (name.startsWith(INTERNAL_MARKER)) {
    throw new OverlayProtocolError("RESERVED_COMMAND", `command "${name}" is reserved`);
  }
  if (!isCommandName(name)) {
    throw new OverlayProtocolError("UNKNOWN_COMMAND", `unknown command "${name}"`);
  }
  return bind(name);
}

export function commandNames(): OverlayCommandName[] {
  return Object.keys(COMMANDS).filter(isCommandName);
}
