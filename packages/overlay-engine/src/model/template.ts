import { OverlayTemplateError } from "../errors.js";
import { formatValue, parseFormatSpec, type FormatSpec } from "./formatSpec.js";
import type { ModelValue } from "./textModel.js";

/** Name under which the bound model is visible inside a template. */
export const MODEL_ROOT = "self";

type Accessor = { kind: "attr"; name: string } | { kind: "index"; key: string };

type Segment =
  | { kind: "literal"; text: string }
  | { kind: "field"; path: Accessor[]; conversion?: "s" | "r"; spec: FormatSpec };

export type CompiledTemplate = {
  readonly source: string;
  /** False for plain text, which renders unchanged. */
  readonly hasFields: boolean;
  render(model: ModelValue): string;
};

function parseFieldName(name: string, source: string): Accessor[] {
  const root = /^[^.[]*/.exec(name)?.[0] ?? "";
  if (root === "" || /^\d+$/.test(root)) {
    throw new OverlayTemplateError("positional fields are not supported", source);
  }
  if (root !== MODEL_ROOT) {
    throw new OverlayTemplateError(`unknown name "${root}", fields start with "${MODEL_ROOT}"`, source);
  }

  const path: Accessor[] = [];
  let i = root.length;
  while (i < name.length) {
    const ch = name.charAt(i);
    if (ch === ".") {
      const attr = /^[^.[]*/.exec(name.slice(i + 1))?.[0] ?? "";
      if (attr === "") throw new OverlayTemplateError(`empty attribute in "${name}"`, source);
      path.push({ kind: "attr", name: attr });
      i += 1 + attr.length;
    } else if (ch === "[") {
      const close = name.indexOf("]", i);
      if (close === -1) throw new OverlayTemplateError(`missing "]" in "${name}"`, source);
      const key = name.slice(i + 1, close);
      if (key === "") throw new OverlayTemplateError(`empty index in "${name}"`, source);
      path.push({ kind: "index", key });
      i = close + 1;
    } else {
      throw new OverlayTemplateError(`unexpected "${ch}" in "${name}"`, source);
    }
  }
  return path;
}

function parseField(body: string, source: string): Segment {
  let end = 0;
  let depth = 0;
  for (; end < body.length; end++) {
    const ch = body.charAt(end);
    if (ch === "[") depth++;
    else if (ch === "]") depth--;
    else if (depth === 0 && (ch === "!" || ch === ":")) break;
  }

  const path = parseFieldName(body.slice(0, end), source);
  let rest = body.slice(end);
  let conversion: "s" | "r" | undefined;
  if (rest.startsWith("!")) {
    const code = rest.charAt(1);
    if (code !== "s" && code !== "r") {
      throw new OverlayTemplateError(`unknown conversion "!${code}"`, source);
    }
    conversion = code;
    rest = rest.slice(2);
    if (rest !== "" && !rest.startsWith(":")) {
      throw new OverlayTemplateError(`expected ":" after conversion`, source);
    }
  }

  const spec = parseFormatSpec(rest.startsWith(":") ? rest.slice(1) : "", source);
  return conversion ? { kind: "field", path, conversion, spec } : { kind: "field", path, spec };
}

function parse(source: string): Segment[] {
  const segments: Segment[] = [];
  let literal = "";
  const flush = () => {
    if (literal !== "") segments.push({ kind: "literal", text: literal });
    literal = "";
  };

  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);
    const next = source.charAt(i + 1);
    if (ch === "{") {
      if (next === "{") {
        literal += "{";
        i += 2;
        continue;
      }
      const close = source.indexOf("}", i + 1);
      if (close === -1) throw new OverlayTemplateError(`unclosed "{" at ${i}`, source);
      const body = source.slice(i + 1, close);
      if (body.includes("{")) throw new OverlayTemplateError("nested fields are not supported", source);
      flush();
      segments.push(parseField(body, source));
      i = close + 1;
    } else if (ch === "}") {
      if (next !== "}") throw new OverlayTemplateError(`single "}" at ${i}`, source);
      literal += "}";
      i += 2;
    } else {
      literal += ch;
      i += 1;
    }
  }
  flush();
  return segments;
}

function lookup(model: ModelValue, path: readonly Accessor[], source: string): ModelValue {
  let current = model;
  let where = MODEL_ROOT;
  for (const step of path) {
    let found: ModelValue | undefined;
    if (step.kind === "attr") {
      if (current.kind !== "map") {
        throw new OverlayTemplateError(`${where} is a ${current.kind}, not a map`, source);
      }
      found = current.entries.get(step.name);
      where = `${where}.${step.name}`;
    } else if (current.kind === "list") {
      if (!/^\d+$/.test(step.key)) {
        throw new OverlayTemplateError(`${where} is a list, index "${step.key}" is not a number`, source);
      }
      found = current.items[Number(step.key)];
      where = `${where}[${step.key}]`;
    } else if (current.kind === "map") {
      found = current.entries.get(step.key);
      where = `${where}[${step.key}]`;
    } else {
      throw new OverlayTemplateError(`${where} is a ${current.kind} and cannot be indexed`, source);
    }

    if (!found) throw new OverlayTemplateError(`${where} is not set`, source);
    current = found;
  }
  return current;
}

/** Parses a brace template once; throws `OverlayTemplateError` on bad syntax. */
export function compileTemplate(source: string): CompiledTemplate {
  const segments = parse(source);
  return {
    source,
    hasFields: segments.some((s) => s.kind === "field"),
    render(model) {
      let out = "";
      for (const segment of segments) {
        out +=
          segment.kind === "literal"
            ? segment.text
            : formatValue(lookup(model, segment.path, source), segment.conversion, segment.spec, source);
      }
      return out;
    }
  };
}

export function formatTemplate(source: string, model: ModelValue): string {
  return compileTemplate(source).render(model);
}
