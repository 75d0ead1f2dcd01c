export type OverlayErrorCode =
  | "RESERVED_COMMAND"
  | "UNKNOWN_COMMAND"
  | "BAD_ARGUMENT"
  | "TEMPLATE"
  | "IMAGE_DECODE";

export class OverlayError extends Error {
  constructor(
    readonly code: OverlayErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "OverlayError";
  }
}

/** The command itself is malformed: wrong name or argument shape. */
export class OverlayProtocolError extends OverlayError {
  constructor(code: "RESERVED_COMMAND" | "UNKNOWN_COMMAND" | "BAD_ARGUMENT", message: string) {
    super(code, message);
    this.name = "OverlayProtocolError";
  }
}

export class OverlayTemplateError extends OverlayError {
  constructor(
    message: string,
    readonly template: string,
  ) {
    super("TEMPLATE", message);
    this.name = "OverlayTemplateError";
  }
}

export function describeError(error: unknown): { message: string; code?: string } {
  if (error instanceof OverlayError) return { message: error.message, code: error.code };
  if (error instanceof Error) return { message: error.message || error.name };
  return { message: String(error) };
}
