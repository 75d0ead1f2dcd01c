import type { Rect } from "../math/types.js";

/** Geometry of the tracked application window, in screen pixels. */
export interface IWindowTracker {
  windowRect(): Rect;
}
