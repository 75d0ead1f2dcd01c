import { Buffer } from "node:buffer";
import type {
  DecodedImage,
  FontSpec,
  IRenderSurface,
  PrimitiveHandle,
  RgbaColor,
  TextShadow
} from "@hudlink/rendering-core";
import type { ResolvedEngineOptions } from "../config/options.js";
import { OverlayError } from "../errors.js";
import type { GroupContextStack } from "../groups/GroupContextStack.js";
import type { GroupRegistry } from "../groups/GroupRegistry.js";
import type { ModelBindings } from "../model/ModelBindings.js";
import type { TextTemplates } from "../model/TextTemplates.js";
import { formatTemplate } from "../model/template.js";
import type { ImagePayload } from "../protocol/args.js";
import type { ImageParams, LineParams, RectParams, TextParams } from "../protocol/commandTable.js";
import { ImageCache } from "./ImageCache.js";

/** Unpacks a 32-bit ARGB integer. */
export function decodeColor(packed: number): RgbaColor {
  const value = packed >>> 0;
  return {
    r: (value >>> 16) & 0xff,
    g: (value >>> 8) & 0xff,
    b: value & 0xff,
    a: (value >>> 24) & 0xff
  };
}

/** Wire line widths are in tenths of a pixel. */
export function strokeWidth(lineWidth: number): number {
  return Math.max(1, lineWidth / 10);
}

export function resolveFont(
  fontName: string,
  size: number,
  options: Pick<ResolvedEngineOptions, "maxFontSize" | "fallbackFont" | "platform">,
): FontSpec {
  const family = fontName === "" && options.platform === "darwin" ? options.fallbackFont : fontName;
  return {
    family,
    size: Math.min(options.maxFontSize, Math.max(1, size)),
    styleHint: "sans-serif"
  };
}

export const TEXT_SHADOW: TextShadow = {
  color: { r: 0, g: 0, b: 0, a: 255 },
  offset: { x: 1, y: 1 },
  blurRadius: 0
};

export function imageBytes(payload: ImagePayload): Uint8Array {
  return typeof payload === "string" ? Buffer.from(payload, "base64") : payload;
}

export type PrimitiveBuildersDeps = {
  surface: IRenderSurface;
  registry: GroupRegistry;
  contextStack: GroupContextStack;
  bindings: ModelBindings;
  templates: TextTemplates;
  options: ResolvedEngineOptions;
};

/**
 * Turns draw commands into surface primitives and files each one under the current
 * group with the command's timeout.
 */
export class PrimitiveBuilders {
  private readonly images: ImageCache<DecodedImage>;

  constructor(private readonly deps: PrimitiveBuildersDeps) {
    this.images = new ImageCache(deps.options.imageCacheSize);
  }

  get cachedImageCount(): number {
    return this.images.size;
  }

  drawRect(params: RectParams): PrimitiveHandle {
    const handle = this.deps.surface.createRect({
      kind: "rect",
      rect: { x: params.x, y: params.y, width: params.width, height: params.height },
      stroke: { color: decodeColor(params.color), width: strokeWidth(params.lineWidth) }
    });
    return this.finalize(handle, params.timeout);
  }

  drawLine(params: LineParams): PrimitiveHandle {
    const handle = this.deps.surface.createLine({
      kind: "line",
      a: { x: params.x1, y: params.y1 },
      b: { x: params.x2, y: params.y2 },
      stroke: { color: decodeColor(params.color), width: strokeWidth(params.lineWidth) }
    });
    return this.finalize(handle, params.timeout);
  }

  drawText(params: TextParams): PrimitiveHandle {
    const { surface, bindings, templates, contextStack, options } = this.deps;
    const model = bindings.get(contextStack.peek());
    const text = model ? formatTemplate(params.message, model) : params.message;

    const handle = surface.createText({
      kind: "text",
      text,
      color: decodeColor(params.color),
      font: resolveFont(params.fontName, params.size, options),
      ...(params.shadow ? { shadow: TEXT_SHADOW } : {})
    });
    templates.remember(handle, params.message);

    // (x, y) is the centre for centred text and the top-left corner otherwise.
    const bounds = surface.boundingBox(handle);
    const halfW = bounds.width / 2;
    const halfH = bounds.height / 2;
    if (params.centered) {
      surface.setPosition(handle, { x: params.x - halfW, y: params.y - halfH });
      surface.setTransformOrigin(handle, surface.mapFromScene(handle, { x: params.x, y: params.y }));
    } else {
      surface.setPosition(handle, { x: params.x, y: params.y });
      surface.setTransformOrigin(
        handle,
        surface.mapFromScene(handle, { x: params.x + halfW, y: params.y + halfH })
      );
    }

    return this.finalize(handle, params.timeout);
  }

  drawImage(params: ImageParams): PrimitiveHandle {
    const handle = this.deps.surface.createImage({
      kind: "image",
      image: this.loadImage(params.image),
      position: { x: params.x, y: params.y }
    });
    return this.finalize(handle, params.timeout);
  }

  /** Decodes through the surface, memoised by byte content. */
  loadImage(payload: ImagePayload): DecodedImage {
    const bytes = imageBytes(payload);
    const key = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
    const cached = this.images.get(key);
    if (cached) return cached;

    const decoded = this.deps.surface.decodeImage(bytes);
    if (!decoded) {
      throw new OverlayError("IMAGE_DECODE", `image of ${bytes.byteLength} bytes could not be decoded`);
    }
    this.images.set(key, decoded);
    return decoded;
  }

  private finalize(handle: PrimitiveHandle, timeout: number): PrimitiveHandle {
    this.deps.registry.finalize(this.deps.contextStack.peek(), [handle], timeout);
    return handle;
  }
}
