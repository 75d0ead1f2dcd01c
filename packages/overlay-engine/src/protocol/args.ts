import { OverlayProtocolError } from "../errors.js";

export type ArgList = readonly unknown[];

/** Image payloads arrive as raw bytes or as base64 text. */
export type ImagePayload = Uint8Array | string;

export type BatchEntry = {
  name: string;
  args: unknown[];
};

function describe(value: unknown): string {
  if (value === undefined) return "nothing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  if (value instanceof Uint8Array) return "bytes";
  return `a ${typeof value}`;
}

function badArgument(label: string, index: number, expected: string, value: unknown): OverlayProtocolError {
  return new OverlayProtocolError(
    "BAD_ARGUMENT",
    `argument ${index} (${label}) must be ${expected}, got ${describe(value)}`
  );
}

export function expectArity(args: ArgList, min: number, max: number): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw new OverlayProtocolError("BAD_ARGUMENT", `expected ${expected} arguments, got ${args.length}`);
  }
}

export function readInt(args: ArgList, index: number, label: string): number {
  const value = args[index];
  if (typeof value === "number" && Number.isInteger(value)) return value;
  throw badArgument(label, index, "an integer", value);
}

export function readNumber(args: ArgList, index: number, label: string): number {
  const value = args[index];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  throw badArgument(label, index, "a finite number", value);
}

export function readString(args: ArgList, index: number, label: string): string {
  const value = args[index];
  if (typeof value === "string") return value;
  throw badArgument(label, index, "a string", value);
}

export function readBool(args: ArgList, index: number, label: string): boolean {
  const value = args[index];
  if (typeof value === "boolean") return value;
  if (value === 0 || value === 1) return value === 1;
  throw badArgument(label, index, "a boolean", value);
}

export function readImage(args: ArgList, index: number, label: string): ImagePayload {
  const value = args[index];
  if (typeof value === "string" || value instanceof Uint8Array) return value;
  if (Array.isArray(value) && value.every((b) => Number.isInteger(b) && b >= 0 && b <= 255)) {
    return Uint8Array.from(value);
  }
  throw badArgument(label, index, "base64 text or bytes", value);
}

/** Absent and null both mean "not given". */
export function readOptional(args: ArgList, index: number): unknown {
  const value = args[index];
  return value === null ? undefined : value;
}

export function readBatch(args: ArgList, index: number, label: string): BatchEntry[] {
  const value = args[index];
  if (!Array.isArray(value)) throw badArgument(label, index, "a list of [command, args] pairs", value);

  return value.map((entry: unknown, position) => {
    if (Array.isArray(entry) && typeof entry[0] === "string") {
      const rest: unknown = entry[1];
      if (rest === undefined || Array.isArray(rest)) {
        return { name: entry[0], args: rest === undefined ? [] : [...rest] };
      }
    }
    throw new OverlayProtocolError("BAD_ARGUMENT", `batch entry ${position} must be a [command, args] pair`);
  });
}
