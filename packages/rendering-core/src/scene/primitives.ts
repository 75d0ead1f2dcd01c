import type { Point, Rect, RgbaColor } from "../math/types.js";

export type PrimitiveKind = "rect" | "line" | "text" | "image";

export type StrokeStyle = {
  color: RgbaColor;
  width: number;
};

export type FontSpec = {
  family: string;
  size: number;
  styleHint: "sans-serif" | "monospace";
};

export type TextShadow = {
  color: RgbaColor;
  offset: Point;
  blurRadius: number;
};

export type DecodedImage = {
  format: "png";
  width: number;
  height: number;
  bytes: Uint8Array;
};

export type RectSpec = {
  kind: "rect";
  rect: Rect;
  stroke: StrokeStyle;
};

export type LineSpec = {
  kind: "line";
  a: Point;
  b: Point;
  stroke: StrokeStyle;
};

export type TextSpec = {
  kind: "text";
  text: string;
  color: RgbaColor;
  font: FontSpec;
  shadow?: TextShadow;
};

export type ImageSpec = {
  kind: "image";
  image: DecodedImage;
  position: Point;
};

export type PrimitiveSpec = RectSpec | LineSpec | TextSpec | ImageSpec;

/**
 * Opaque reference to something the surface owns. Identity is the handle object
 * itself; `id` exists for logs and diagnostics.
 */
export interface PrimitiveHandle {
  readonly id: number;
  readonly kind: PrimitiveKind;
}

export interface GroupHandle {
  readonly id: number;
  readonly kind: "group";
}

export type SceneHandle = PrimitiveHandle | GroupHandle;

export function isGroupHandle(handle: SceneHandle): handle is GroupHandle {
  return handle.kind === "group";
}
