import { OverlayTemplateError } from "../errors.js";
import type { ModelValue } from "./textModel.js";

type Align = "<" | ">" | "=" | "^";
type Sign = "+" | "-" | " ";
type Grouping = "," | "_";
type PresentationType = "b" | "c" | "d" | "e" | "E" | "f" | "F" | "g" | "G" | "n" | "o" | "s" | "x" | "X" | "%";

/** `[[fill]align][sign][#][0][width][grouping][.precision][type]` */
export type FormatSpec = {
  raw: string;
  fill?: string;
  align?: Align;
  sign?: Sign;
  alternate: boolean;
  zero: boolean;
  width: number;
  grouping?: Grouping;
  precision?: number;
  type?: PresentationType;
};

const SPEC_PATTERN = /^(?:([\s\S])?([<>=^]))?([-+ ])?(#)?(0)?(\d+)?([,_])?(?:\.(\d+))?([bcdeEfFgGnosxX%])?$/;
const MAX_PRECISION = 100;
const INTEGER_TYPES = new Set<PresentationType>(["b", "c", "d", "o", "x", "X"]);
const RADIX: Partial<Record<PresentationType, number>> = { b: 2, o: 8, x: 16, X: 16 };

function isAlign(text: string | undefined): text is Align {
  return text === "<" || text === ">" || text === "=" || text === "^";
}

function isSign(text: string | undefined): text is Sign {
  return text === "+" || text === "-" || text === " ";
}

function isGrouping(text: string | undefined): text is Grouping {
  return text === "," || text === "_";
}

function isPresentationType(text: string | undefined): text is PresentationType {
  return text !== undefined && text.length === 1 && "bcdeEfFgGnosxX%".includes(text);
}

function fail(message: string, source: string): never {
  throw new OverlayTemplateError(message, source);
}

export function parseFormatSpec(text: string, source: string): FormatSpec {
  const match = SPEC_PATTERN.exec(text);
  if (!match) fail(`invalid format spec "${text}"`, source);

  const [, fill, align, sign, alternate, zero, width, grouping, precision, type] = match;
  const spec: FormatSpec = {
    raw: text,
    alternate: alternate === "#",
    zero: zero === "0",
    width: width ? Number(width) : 0
  };
  if (fill !== undefined) spec.fill = fill;
  if (isAlign(align)) spec.align = align;
  if (isSign(sign)) spec.sign = sign;
  if (isGrouping(grouping)) spec.grouping = grouping;
  if (isPresentationType(type)) spec.type = type;
  if (precision !== undefined) {
    spec.precision = Number(precision);
    if (spec.precision > MAX_PRECISION) fail(`precision ${precision} is too large`, source);
  }
  return spec;
}

/** Quoted the way a script author sees text repr'd: single quotes unless the text holds one. */
function quoteText(text: string): string {
  const quote = text.includes("'") && !text.includes('"') ? '"' : "'";
  let out = quote;
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === "\\" || ch === quote) out += `\\${ch}`;
    else if (ch === "\n") out += "\\n";
    else if (ch === "\r") out += "\\r";
    else if (ch === "\t") out += "\\t";
    else if (code < 0x20 || (code >= 0x7f && code < 0xa0)) out += `\\x${code.toString(16).padStart(2, "0")}`;
    else out += ch;
  }
  return out + quote;
}

function splitExponential(text: string): { digits: string; exponent: number } {
  const [mantissa = "0", exponent = "0"] = text.split("e");
  return { digits: mantissa.replace(".", ""), exponent: Number(exponent) };
}

function stripZeros(digits: string): string {
  return digits.replace(/0+$/, "") || "0";
}

function fixedLayout(digits: string, pointAt: number): string {
  if (pointAt <= 0) return `0.${"0".repeat(-pointAt)}${digits}`;
  if (pointAt >= digits.length) return digits + "0".repeat(pointAt - digits.length);
  return `${digits.slice(0, pointAt)}.${digits.slice(pointAt)}`;
}

function exponentLayout(digits: string, exponent: number, alternate: boolean): string {
  const head = digits.charAt(0);
  const mantissa = digits.length > 1 ? `${head}.${digits.slice(1)}` : alternate ? `${head}.` : head;
  const sign = exponent < 0 ? "-" : "+";
  return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
}

/** Shortest round-trip text; exponent form below 1e-4 and from 1e16. */
function floatRepr(abs: number): string {
  const { digits, exponent } = splitExponential(abs.toExponential());
  const pointAt = exponent + 1;
  if (pointAt <= -4 || pointAt > 16) return exponentLayout(digits, exponent, false);
  const fixed = fixedLayout(digits, pointAt);
  return fixed.includes(".") ? fixed : `${fixed}.0`;
}

function fixedPoint(abs: number, precision: number, alternate: boolean): string {
  const text =
    abs < 1e21
      ? abs.toFixed(precision)
      : `${BigInt(abs).toString()}${precision > 0 ? `.${"0".repeat(precision)}` : ""}`;
  return alternate && precision === 0 ? `${text}.` : text;
}

function scientific(abs: number, precision: number, alternate: boolean): string {
  const { digits, exponent } = splitExponential(abs.toExponential(precision));
  return exponentLayout(digits, exponent, alternate);
}

/**
 * `g` formatting. With `keepPoint` (no type, explicit precision) fixed results always
 * carry a fraction and exponent form starts one digit earlier.
 */
function general(abs: number, precision: number, alternate: boolean, keepPoint: boolean): string {
  const significant = Math.max(1, precision);
  const split = splitExponential(abs.toExponential(significant - 1));
  const digits = alternate ? split.digits : stripZeros(split.digits);
  const pointAt = split.exponent + 1;
  const limit = keepPoint ? significant - 1 : significant;
  if (pointAt <= -4 || pointAt > limit) return exponentLayout(digits, split.exponent, alternate);

  const fixed = fixedLayout(digits, pointAt);
  if (fixed.includes(".")) return fixed;
  return alternate ? `${fixed}.` : keepPoint ? `${fixed}.0` : fixed;
}

/** Inserts separators, growing with zeros up to `minWidth` when the padding is zeros. */
function groupDigits(digits: string, separator: string, size: number, minWidth: number): string {
  let rest = digits;
  let out = "";
  for (;;) {
    const cut = Math.max(0, rest.length - size);
    let chunk = rest.slice(cut);
    rest = rest.slice(0, cut);
    if (rest === "") chunk = chunk.padStart(Math.max(1, Math.min(size, minWidth - out.length)), "0");
    out = chunk + out;
    if (rest === "" && out.length >= minWidth) return out;
    out = separator + out;
  }
}

function padTo(text: string, fill: string, alignment: Align, width: number): string {
  const gap = width - Array.from(text).length;
  if (gap <= 0) return text;
  switch (alignment) {
    case "<":
      return text + fill.repeat(gap);
    case ">":
    case "=":
      return fill.repeat(gap) + text;
    case "^": {
      const left = Math.floor(gap / 2);
      return fill.repeat(left) + text + fill.repeat(gap - left);
    }
  }
}

function formatText(text: string, spec: FormatSpec, source: string): string {
  if (spec.type !== undefined && spec.type !== "s") fail(`"${spec.type}" cannot format text`, source);
  if (spec.sign) fail("sign is not allowed with text", source);
  if (spec.alternate) fail('"#" is not allowed with text', source);
  if (spec.grouping) fail(`"${spec.grouping}" is not allowed with text`, source);
  if (spec.align === "=") fail('"=" alignment is not allowed with text', source);

  const shown = spec.precision === undefined ? text : Array.from(text).slice(0, spec.precision).join("");
  return padTo(shown, spec.fill ?? (spec.zero ? "0" : " "), spec.align ?? "<", spec.width);
}

function integerBody(value: number, spec: FormatSpec, source: string): { body: string; prefix: string } {
  const type = spec.type;
  if (spec.precision !== undefined) fail("precision is not allowed with integer formats", source);
  if (type === "c") {
    if (spec.sign) fail('sign is not allowed with "c"', source);
    if (spec.alternate) fail('"#" is not allowed with "c"', source);
    if (spec.grouping) fail(`"${spec.grouping}" is not allowed with "c"`, source);
    if (value < 0 || value > 0x10ffff) fail(`"c" needs a code point, got ${value}`, source);
    return { body: String.fromCodePoint(value), prefix: "" };
  }

  const radix = type === undefined ? 10 : RADIX[type] ?? 10;
  if (radix !== 10 && spec.grouping === ",") fail(`"," is not allowed with "${type ?? ""}"`, source);
  if (type === "n" && spec.grouping) fail(`"${spec.grouping}" is not allowed with "n"`, source);

  const digits = BigInt(Math.abs(value)).toString(radix);
  const body = type === "X" ? digits.toUpperCase() : digits;
  const prefix = spec.alternate && radix !== 10 ? `0${type ?? ""}` : "";
  return { body, prefix };
}

function floatBody(abs: number, spec: FormatSpec, source: string): string {
  const { precision, alternate, type } = spec;
  switch (type) {
    case "e":
    case "E":
      return scientific(abs, precision ?? 6, alternate);
    case "f":
    case "F":
      return fixedPoint(abs, precision ?? 6, alternate);
    case "g":
    case "G":
    case "n":
      if (type === "n" && spec.grouping) fail(`"${spec.grouping}" is not allowed with "n"`, source);
      return general(abs, precision ?? 6, alternate, false);
    case "%":
      return `${fixedPoint(abs * 100, precision ?? 6, alternate)}%`;
    default:
      return precision === undefined ? floatRepr(abs) : general(abs, precision, alternate, true);
  }
}

function formatNumber(value: number, spec: FormatSpec, source: string): string {
  const type = spec.type;
  if (type === "s") fail(`"s" cannot format the number ${value}`, source);

  const integral = Number.isInteger(value);
  const integerStyle =
    type === undefined
      ? integral && spec.precision === undefined
      : INTEGER_TYPES.has(type) || (type === "n" && integral);
  if (integerStyle && !integral) fail(`"${type ?? ""}" needs an integer, got ${value}`, source);

  let body: string;
  let prefix = "";
  let negative = value < 0;
  if (integerStyle) {
    ({ body, prefix } = integerBody(value, spec, source));
  } else {
    if (Object.is(value, -0)) negative = true;
    const text = floatBody(Math.abs(value), spec, source);
    body = type === "E" || type === "F" || type === "G" ? text.toUpperCase() : text;
  }

  const sign = negative ? "-" : spec.sign === "+" ? "+" : spec.sign === " " ? " " : "";
  const fill = spec.fill ?? (spec.zero ? "0" : " ");
  const alignment = spec.align ?? (spec.zero ? "=" : ">");

  if (spec.grouping && type !== "c") {
    const lead = integerStyle ? body : /^\d*/.exec(body)?.[0] ?? "";
    const rest = body.slice(lead.length);
    const minWidth = fill === "0" && alignment === "=" ? spec.width - sign.length - prefix.length - rest.length : 0;
    const size = integerStyle && type !== undefined && RADIX[type] !== undefined ? 4 : 3;
    body = groupDigits(lead, spec.grouping, size, minWidth) + rest;
  }

  const head = sign + prefix;
  if (alignment === "=") {
    const gap = spec.width - head.length - body.length;
    return head + (gap > 0 ? fill.repeat(gap) : "") + body;
  }
  return padTo(head + body, fill, alignment, spec.width);
}

function numberText(value: number): string {
  if (Number.isInteger(value)) return BigInt(value).toString();
  return (value < 0 ? "-" : "") + floatRepr(Math.abs(value));
}

/** Text of a value as `str()` shows it: `True`, `None`, nested values repr'd. */
function modelText(value: ModelValue): string {
  switch (value.kind) {
    case "string":
      return value.value;
    case "number":
      return numberText(value.value);
    case "boolean":
      return value.value ? "True" : "False";
    case "null":
      return "None";
    case "list":
      return `[${value.items.map(modelRepr).join(", ")}]`;
    case "map":
      return `{${Array.from(value.entries, ([key, item]) => `${quoteText(key)}: ${modelRepr(item)}`).join(", ")}}`;
  }
}

function modelRepr(value: ModelValue): string {
  return value.kind === "string" ? quoteText(value.value) : modelText(value);
}

/** Applies an optional `!s`/`!r` conversion, then the format spec. */
export function formatValue(
  value: ModelValue,
  conversion: "s" | "r" | undefined,
  spec: FormatSpec,
  source: string
): string {
  if (conversion) return formatText(conversion === "r" ? modelRepr(value) : modelText(value), spec, source);

  switch (value.kind) {
    case "string":
      return formatText(value.value, spec, source);
    case "number":
      return formatNumber(value.value, spec, source);
    case "boolean":
      // Booleans print as words only without a spec; any spec formats them as 1 or 0.
      return spec.raw === "" ? modelText(value) : formatNumber(value.value ? 1 : 0, spec, source);
    default:
      if (spec.raw !== "") fail(`a ${value.kind} cannot take the format spec "${spec.raw}"`, source);
      return modelText(value);
  }
}
