export type {
  DecodedImage,
  FontSpec,
  GroupHandle,
  ImageSpec,
  LineSpec,
  PrimitiveHandle,
  PrimitiveKind,
  PrimitiveSpec,
  RectSpec,
  SceneHandle,
  StrokeStyle,
  TextShadow,
  TextSpec
} from "./scene/primitives.js";
export { isGroupHandle } from "./scene/primitives.js";

export type { Point, Rect, RgbaColor } from "./math/types.js";

export type { IRenderSurface } from "./surface/IRenderSurface.js";
export type { IWindowTracker } from "./surface/IWindowTracker.js";
