import type { Point, Rect } from "../math/types.js";
import type {
  DecodedImage,
  GroupHandle,
  ImageSpec,
  LineSpec,
  PrimitiveHandle,
  RectSpec,
  SceneHandle,
  TextSpec
} from "../scene/primitives.js";

/**
 * Retained scene the overlay engine draws into. Creating a primitive adds it to the
 * scene; grouping re-parents existing items without moving them on screen.
 */
export interface IRenderSurface {
  createRect(spec: RectSpec): PrimitiveHandle;
  createLine(spec: LineSpec): PrimitiveHandle;
  createText(spec: TextSpec): PrimitiveHandle;
  createImage(spec: ImageSpec): PrimitiveHandle;
  /** Returns null when the bytes are not an image the surface can draw. */
  decodeImage(bytes: Uint8Array): DecodedImage | null;

  group(handles: readonly SceneHandle[]): GroupHandle;
  addToGroup(group: GroupHandle, handle: SceneHandle): void;
  /** Dissolves the group; children keep their scene position and stay in the scene. */
  disbandGroup(group: GroupHandle): SceneHandle[];
  childrenOf(group: GroupHandle): SceneHandle[];
  removeFromScene(handle: SceneHandle): void;

  setZ(handle: SceneHandle, z: number): void;
  setPosition(handle: SceneHandle, position: Point): void;
  positionOf(handle: SceneHandle): Point;
  /** Bounds in the item's own coordinates. */
  boundingBox(handle: SceneHandle): Rect;
  mapFromScene(handle: SceneHandle, point: Point): Point;
  setTransformOrigin(handle: SceneHandle, origin: Point): void;

  textOf(handle: PrimitiveHandle): string | null;
  setText(handle: PrimitiveHandle, text: string): void;
  animateText(handle: PrimitiveHandle): void;
}
