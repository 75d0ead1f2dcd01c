import type { ArgList } from "./args.js";

function replaceBytes(_key: string, value: unknown): unknown {
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  return value;
}

/** Compact, bounded rendering of command arguments for logs. */
export function previewArgs(args: ArgList, maxLength: number): string {
  let text: string;
  try {
    text = JSON.stringify(
      args.map((arg) => replaceBytes("", arg)),
      replaceBytes
    );
  } catch {
    text = String(args);
  }
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}
