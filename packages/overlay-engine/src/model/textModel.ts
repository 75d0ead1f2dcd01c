import { OverlayProtocolError } from "../errors.js";

/** Model values bound to a group and read by its text templates. */
export type ModelValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" }
  | { kind: "map"; entries: Map<string, ModelValue> }
  | { kind: "list"; items: ModelValue[] };

export type ModelMap = Extract<ModelValue, { kind: "map" }>;

/** Presence of this key (any value) makes changed texts animate. */
export const ANIMATE_KEY = "__animate";

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function convert(input: unknown, path: string, seen: Set<object>): ModelValue {
  if (input === null) return { kind: "null" };
  switch (typeof input) {
    case "string":
      return { kind: "string", value: input };
    case "boolean":
      return { kind: "boolean", value: input };
    case "number":
      if (Number.isFinite(input)) return { kind: "number", value: input };
      break;
    case "object": {
      if (seen.has(input)) {
        throw new OverlayProtocolError("BAD_ARGUMENT", `model at ${path} refers to itself`);
      }
      seen.add(input);
      try {
        if (Array.isArray(input)) {
          return { kind: "list", items: input.map((item, i) => convert(item, `${path}[${i}]`, seen)) };
        }
        if (isPlainObject(input)) {
          const entries = new Map<string, ModelValue>();
          for (const [key, value] of Object.entries(input)) {
            entries.set(key, convert(value, `${path}.${key}`, seen));
          }
          return { kind: "map", entries };
        }
      } finally {
        seen.delete(input);
      }
      break;
    }
    default:
      break;
  }
  throw new OverlayProtocolError("BAD_ARGUMENT", `model at ${path} is not JSON data`);
}

/** Converts decoded JSON into a model tree. Anything that is not JSON data is rejected. */
export function toModelValue(input: unknown): ModelValue {
  return convert(input, "self", new Set());
}

export function toPlain(value: ModelValue): unknown {
  switch (value.kind) {
    case "null":
      return null;
    case "list":
      return value.items.map(toPlain);
    case "map": {
      const out: Record<string, unknown> = {};
      for (const [key, entry] of value.entries) out[key] = toPlain(entry);
      return out;
    }
    default:
      return value.value;
  }
}

export function hasAnimateFlag(model: ModelValue): boolean {
  return model.kind === "map" && model.entries.has(ANIMATE_KEY);
}

/**
 * Copy of `model` with numeric fields set at the top level. A missing or non-map model
 * is replaced by a fresh map.
 */
export function withNumberFields(model: ModelValue | undefined, fields: Record<string, number>): ModelMap {
  const entries = new Map<string, ModelValue>(model?.kind === "map" ? model.entries : []);
  for (const [key, value] of Object.entries(fields)) {
    entries.set(key, { kind: "number", value });
  }
  return { kind: "map", entries };
}
