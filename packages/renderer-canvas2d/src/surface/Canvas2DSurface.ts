import type {
  DecodedImage,
  FontSpec,
  GroupHandle,
  ImageSpec,
  IRenderSurface,
  LineSpec,
  Point,
  PrimitiveHandle,
  PrimitiveSpec,
  Rect,
  RectSpec,
  RgbaColor,
  SceneHandle,
  TextSpec
} from "@hudlink/rendering-core";
import { isGroupHandle } from "@hudlink/rendering-core";

export type Canvas2DContext = Pick<
  CanvasRenderingContext2D,
  | "save"
  | "restore"
  | "translate"
  | "scale"
  | "beginPath"
  | "rect"
  | "moveTo"
  | "lineTo"
  | "stroke"
  | "fillText"
  | "drawImage"
  | "clearRect"
  | "globalAlpha"
  | "lineWidth"
  | "strokeStyle"
  | "fillStyle"
  | "font"
  | "textBaseline"
  | "shadowColor"
  | "shadowOffsetX"
  | "shadowOffsetY"
  | "shadowBlur"
>;

export type SurfaceError = {
  message: string;
  handleId?: number;
  cause?: unknown;
};

export type TextMeasure = (text: string, font: FontSpec) => { width: number; height: number };

export type Canvas2DSurfaceOptions = {
  measureText?: TextMeasure;
  createImageSource?: (image: DecodedImage) => CanvasImageSource | null;
  clock?: () => number;
  animationDurationMs?: number;
  onError?: (error: SurfaceError) => void;
};

export type SurfaceRenderStats = {
  drawCalls: number;
  items: number;
};

type SceneNode = {
  handle: SceneHandle;
  spec: PrimitiveSpec | null;
  parent: GroupHandle | null;
  children: SceneHandle[];
  position: Point;
  origin: Point;
  z: number;
  order: number;
  animationStartedAt: number | null;
};

const PNG_SIGNATURE = [137, 80, 78, 71, 13, 10, 26, 10];
const WHITE: RgbaColor = { r: 255, g: 255, b: 255, a: 255 };

export function approxTextSize(text: string, font: FontSpec): { width: number; height: number } {
  return { width: Math.max(0, text.length) * font.size * 0.6, height: font.size };
}

export function cssColor(color: RgbaColor): string {
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${+(color.a / 255).toFixed(3)})`;
}

export function cssFont(font: FontSpec): string {
  const family = font.family ? `"${font.family}", ${font.styleHint}` : font.styleHint;
  return `${font.size}px ${family}`;
}

function lerpColor(from: RgbaColor, to: RgbaColor, t: number): RgbaColor {
  const mix = (a: number, b: number) => Math.round(a + (b - a) * t);
  return { r: mix(from.r, to.r), g: mix(from.g, to.g), b: mix(from.b, to.b), a: mix(from.a, to.a) };
}

function unionRect(a: Rect, b: Rect): Rect {
  const x1 = Math.min(a.x, b.x);
  const y1 = Math.min(a.y, b.y);
  const x2 = Math.max(a.x + a.width, b.x + b.width);
  const y2 = Math.max(a.y + a.height, b.y + b.height);
  return { x: x1, y: y1, width: x2 - x1, height: y2 - y1 };
}

function readUint32BE(bytes: Uint8Array, offset: number): number {
  return (
    ((bytes[offset] ?? 0) * 0x1000000) +
    (((bytes[offset + 1] ?? 0) << 16) | ((bytes[offset + 2] ?? 0) << 8) | (bytes[offset + 3] ?? 0))
  );
}

/**
 * Retained-mode scene painted onto a 2D canvas context. Positions are relative to the
 * parent group; groups have no geometry of their own.
 */
export class Canvas2DSurface implements IRenderSurface {
  private nodes = new Map<SceneHandle, SceneNode>();
  private roots = new Set<SceneHandle>();
  private nextId = 1;
  private nextOrder = 0;
  private readonly measure: TextMeasure;
  private readonly clock: () => number;
  private readonly animationDurationMs: number;

  constructor(private readonly options: Canvas2DSurfaceOptions = {}) {
    this.measure = options.measureText ?? approxTextSize;
    this.clock = options.clock ?? (() => Date.now());
    this.animationDurationMs = options.animationDurationMs ?? 500;
  }

  createRect(spec: RectSpec): PrimitiveHandle {
    return this.addPrimitive(spec, { x: 0, y: 0 });
  }

  createLine(spec: LineSpec): PrimitiveHandle {
    return this.addPrimitive(spec, { x: 0, y: 0 });
  }

  createText(spec: TextSpec): PrimitiveHandle {
    return this.addPrimitive({ ...spec }, { x: 0, y: 0 });
  }

  createImage(spec: ImageSpec): PrimitiveHandle {
    return this.addPrimitive(spec, { ...spec.position });
  }

  decodeImage(bytes: Uint8Array): DecodedImage | null {
    if (bytes.length < 24) return null;
    for (let i = 0; i < PNG_SIGNATURE.length; i++) {
      if (bytes[i] !== PNG_SIGNATURE[i]) return null;
    }
    const chunkType = String.fromCharCode(bytes[12] ?? 0, bytes[13] ?? 0, bytes[14] ?? 0, bytes[15] ?? 0);
    if (chunkType !== "IHDR") return null;

    const width = readUint32BE(bytes, 16);
    const height = readUint32BE(bytes, 20);
    if (width === 0 || height === 0) return null;
    return { format: "png", width, height, bytes };
  }

  group(handles: readonly SceneHandle[]): GroupHandle {
    const handle: GroupHandle = { id: this.nextId++, kind: "group" };
    this.nodes.set(handle, this.createNode(handle, null, { x: 0, y: 0 }));
    this.roots.add(handle);
    for (const child of handles) {
      this.addToGroup(handle, child);
    }
    return handle;
  }

  addToGroup(group: GroupHandle, handle: SceneHandle): void {
    const groupNode = this.require(group);
    const node = this.require(handle);
    if (node.parent === group) return;

    const scenePos = this.scenePosition(handle);
    this.detach(node);

    const groupPos = this.scenePosition(group);
    node.parent = group;
    node.position = { x: scenePos.x - groupPos.x, y: scenePos.y - groupPos.y };
    groupNode.children.push(handle);
  }

  disbandGroup(group: GroupHandle): SceneHandle[] {
    const groupNode = this.require(group);
    const children = [...groupNode.children];
    const parent = groupNode.parent;
    const parentPos = parent ? this.scenePosition(parent) : { x: 0, y: 0 };

    for (const child of children) {
      const node = this.require(child);
      const scenePos = this.scenePosition(child);
      node.parent = parent;
      node.position = { x: scenePos.x - parentPos.x, y: scenePos.y - parentPos.y };
      if (parent) {
        this.require(parent).children.push(child);
      } else {
        this.roots.add(child);
      }
    }

    groupNode.children = [];
    this.detach(groupNode);
    this.nodes.delete(group);
    return children;
  }

  childrenOf(group: GroupHandle): SceneHandle[] {
    return [...this.require(group).children];
  }

  removeFromScene(handle: SceneHandle): void {
    const node = this.require(handle);
    this.detach(node);
    this.forget(node);
  }

  setZ(handle: SceneHandle, z: number): void {
    this.require(handle).z = z;
  }

  setPosition(handle: SceneHandle, position: Point): void {
    this.require(handle).position = { ...position };
  }

  positionOf(handle: SceneHandle): Point {
    return { ...this.require(handle).position };
  }

  boundingBox(handle: SceneHandle): Rect {
    const node = this.require(handle);
    const spec = node.spec;
    if (!spec) {
      let bounds: Rect | null = null;
      for (const child of node.children) {
        const childNode = this.require(child);
        const local = this.boundingBox(child);
        const moved = {
          x: local.x + childNode.position.x,
          y: local.y + childNode.position.y,
          width: local.width,
          height: local.height
        };
        bounds = bounds ? unionRect(bounds, moved) : moved;
      }
      return bounds ?? { x: 0, y: 0, width: 0, height: 0 };
    }

    switch (spec.kind) {
      case "rect":
        return { ...spec.rect };
      case "line": {
        const x = Math.min(spec.a.x, spec.b.x);
        const y = Math.min(spec.a.y, spec.b.y);
        return { x, y, width: Math.abs(spec.b.x - spec.a.x), height: Math.abs(spec.b.y - spec.a.y) };
      }
      case "text": {
        const size = this.measure(spec.text, spec.font);
        return { x: 0, y: 0, width: size.width, height: size.height };
      }
      case "image":
        return { x: 0, y: 0, width: spec.image.width, height: spec.image.height };
    }
  }

  mapFromScene(handle: SceneHandle, point: Point): Point {
    const pos = this.scenePosition(handle);
    return { x: point.x - pos.x, y: point.y - pos.y };
  }

  setTransformOrigin(handle: SceneHandle, origin: Point): void {
    this.require(handle).origin = { ...origin };
  }

  textOf(handle: PrimitiveHandle): string | null {
    const spec = this.require(handle).spec;
    return spec?.kind === "text" ? spec.text : null;
  }

  setText(handle: PrimitiveHandle, text: string): void {
    const spec = this.require(handle).spec;
    if (spec?.kind !== "text") return;
    spec.text = text;
  }

  animateText(handle: PrimitiveHandle): void {
    const node = this.require(handle);
    if (node.spec?.kind !== "text") return;
    node.animationStartedAt = this.clock();
  }

  has(handle: SceneHandle): boolean {
    return this.nodes.has(handle);
  }

  parentOf(handle: SceneHandle): GroupHandle | null {
    return this.require(handle).parent;
  }

  scenePosition(handle: SceneHandle): Point {
    let node: SceneNode | undefined = this.require(handle);
    let x = 0;
    let y = 0;
    while (node) {
      x += node.position.x;
      y += node.position.y;
      node = node.parent ? this.nodes.get(node.parent) : undefined;
    }
    return { x, y };
  }

  zOf(handle: SceneHandle): number {
    return this.require(handle).z;
  }

  originOf(handle: SceneHandle): Point {
    return { ...this.require(handle).origin };
  }

  specOf(handle: PrimitiveHandle): PrimitiveSpec | null {
    return this.require(handle).spec;
  }

  isAnimating(handle: PrimitiveHandle): boolean {
    const startedAt = this.require(handle).animationStartedAt;
    return startedAt !== null && this.clock() - startedAt < this.animationDurationMs;
  }

  /** Handles drawn at the top level of the scene, in paint order. */
  rootHandles(): SceneHandle[] {
    return this.sortForPaint([...this.roots]);
  }

  itemCount(): number {
    return this.nodes.size;
  }

  clear(): void {
    this.nodes.clear();
    this.roots.clear();
  }

  render(ctx: Canvas2DContext, viewport: { width: number; height: number }): SurfaceRenderStats {
    ctx.clearRect(0, 0, viewport.width, viewport.height);
    const stats: SurfaceRenderStats = { drawCalls: 0, items: 0 };
    for (const handle of this.sortForPaint([...this.roots])) {
      this.paint(ctx, handle, stats);
    }
    return stats;
  }

  private addPrimitive(spec: PrimitiveSpec, position: Point): PrimitiveHandle {
    const handle: PrimitiveHandle = { id: this.nextId++, kind: spec.kind };
    this.nodes.set(handle, this.createNode(handle, spec, position));
    this.roots.add(handle);
    return handle;
  }

  private createNode(handle: SceneHandle, spec: PrimitiveSpec | null, position: Point): SceneNode {
    return {
      handle,
      spec,
      parent: null,
      children: [],
      position,
      origin: { x: 0, y: 0 },
      z: 0,
      order: this.nextOrder++,
      animationStartedAt: null
    };
  }

  private require(handle: SceneHandle): SceneNode {
    const node = this.nodes.get(handle);
    if (!node) {
      throw new Error(`Unknown scene handle #${handle.id}`);
    }
    return node;
  }

  private detach(node: SceneNode): void {
    if (node.parent) {
      const parentNode = this.nodes.get(node.parent);
      if (parentNode) {
        parentNode.children = parentNode.children.filter((c) => c !== node.handle);
      }
      node.parent = null;
    } else {
      this.roots.delete(node.handle);
    }
  }

  private forget(node: SceneNode): void {
    for (const child of node.children) {
      const childNode = this.nodes.get(child);
      if (childNode) this.forget(childNode);
    }
    this.nodes.delete(node.handle);
  }

  private sortForPaint(handles: SceneHandle[]): SceneHandle[] {
    const entries = handles.map((handle) => this.require(handle));
    entries.sort((a, b) => (a.z !== b.z ? a.z - b.z : a.order - b.order));
    return entries.map((n) => n.handle);
  }

  private paint(ctx: Canvas2DContext, handle: SceneHandle, stats: SurfaceRenderStats): void {
    const node = this.require(handle);
    ctx.save();
    try {
      ctx.translate(node.position.x, node.position.y);
      if (isGroupHandle(handle)) {
        for (const child of this.sortForPaint(node.children)) {
          this.paint(ctx, child, stats);
        }
        return;
      }
      if (node.spec) {
        stats.items++;
        stats.drawCalls += this.drawOne(ctx, node, node.spec);
      }
    } catch (cause) {
      this.options.onError?.({ message: "Scene item render failed", handleId: handle.id, cause });
    } finally {
      ctx.restore();
    }
  }

  private drawOne(ctx: Canvas2DContext, node: SceneNode, spec: PrimitiveSpec): number {
    switch (spec.kind) {
      case "rect": {
        ctx.lineWidth = spec.stroke.width;
        ctx.strokeStyle = cssColor(spec.stroke.color);
        ctx.beginPath();
        ctx.rect(spec.rect.x, spec.rect.y, spec.rect.width, spec.rect.height);
        ctx.stroke();
        return 1;
      }
      case "line": {
        ctx.lineWidth = spec.stroke.width;
        ctx.strokeStyle = cssColor(spec.stroke.color);
        ctx.beginPath();
        ctx.moveTo(spec.a.x, spec.a.y);
        ctx.lineTo(spec.b.x, spec.b.y);
        ctx.stroke();
        return 1;
      }
      case "text": {
        let color = spec.color;
        const startedAt = node.animationStartedAt;
        if (startedAt !== null) {
          const t = (this.clock() - startedAt) / this.animationDurationMs;
          if (t < 1) {
            const scale = 3 - 2 * Math.max(0, t);
            ctx.translate(node.origin.x, node.origin.y);
            ctx.scale(scale, scale);
            ctx.translate(-node.origin.x, -node.origin.y);
            color = lerpColor(WHITE, spec.color, Math.max(0, t));
          } else {
            node.animationStartedAt = null;
          }
        }
        ctx.font = cssFont(spec.font);
        ctx.textBaseline = "top";
        if (spec.shadow) {
          ctx.shadowColor = cssColor(spec.shadow.color);
          ctx.shadowOffsetX = spec.shadow.offset.x;
          ctx.shadowOffsetY = spec.shadow.offset.y;
          ctx.shadowBlur = spec.shadow.blurRadius;
        }
        ctx.fillStyle = cssColor(color);
        ctx.fillText(spec.text, 0, 0);
        return 1;
      }
      case "image": {
        const source = this.options.createImageSource?.(spec.image);
        if (!source) return 0;
        ctx.drawImage(source, 0, 0, spec.image.width, spec.image.height);
        return 1;
      }
    }
  }
}
