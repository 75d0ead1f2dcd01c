export { Canvas2DSurface, approxTextSize, cssColor, cssFont } from "./surface/Canvas2DSurface.js";
export type {
  Canvas2DContext,
  Canvas2DSurfaceOptions,
  SurfaceError,
  SurfaceRenderStats,
  TextMeasure
} from "./surface/Canvas2DSurface.js";
