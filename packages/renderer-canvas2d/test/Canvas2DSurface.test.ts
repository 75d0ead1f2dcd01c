import test from "node:test";
import assert from "node:assert/strict";
import { Canvas2DSurface, cssColor, cssFont } from "../src/index.js";
import type { FontSpec, RgbaColor } from "@hudlink/rendering-core";

class MockContext2D {
  calls: string[] = [];
  scales: number[] = [];
  fills: string[] = [];

  globalAlpha = 1;
  lineWidth = 1;
  font = "12px sans-serif";
  textBaseline: CanvasTextBaseline = "alphabetic";
  strokeStyle: string | CanvasGradient | CanvasPattern = "#000";
  fillStyle: string | CanvasGradient | CanvasPattern = "#000";
  shadowColor = "transparent";
  shadowOffsetX = 0;
  shadowOffsetY = 0;
  shadowBlur = 0;

  save(): void {
    this.calls.push("save");
  }
  restore(): void {
    this.calls.push("restore");
  }
  translate(): void {
    this.calls.push("translate");
  }
  scale(x: number): void {
    this.calls.push("scale");
    this.scales.push(x);
  }
  beginPath(): void {
    this.calls.push("beginPath");
  }
  rect(): void {
    this.calls.push("rect");
  }
  moveTo(): void {
    this.calls.push("moveTo");
  }
  lineTo(): void {
    this.calls.push("lineTo");
  }
  stroke(): void {
    this.calls.push("stroke");
  }
  fillText(text: string): void {
    this.calls.push("fillText");
    this.fills.push(`${text}:${String(this.fillStyle)}`);
  }
  drawImage(): void {
    this.calls.push("drawImage");
  }
  clearRect(): void {
    this.calls.push("clearRect");
  }
}

const RED: RgbaColor = { r: 255, g: 0, b: 0, a: 255 };
const FONT: FontSpec = { family: "", size: 10, styleHint: "sans-serif" };

function pngHeader(width: number, height: number): Uint8Array {
  const bytes = new Uint8Array(33);
  bytes.set([137, 80, 78, 71, 13, 10, 26, 10], 0);
  bytes.set([0, 0, 0, 13], 8);
  bytes.set([73, 72, 68, 82], 12);
  bytes.set([0, 0, 0, width], 16);
  bytes.set([0, 0, 0, height], 20);
  return bytes;
}

test("disbanding a moved group keeps children at their scene position", () => {
  const surface = new Canvas2DSurface();
  const rect = surface.createRect({
    kind: "rect",
    rect: { x: 0, y: 0, width: 4, height: 4 },
    stroke: { color: RED, width: 1 }
  });
  const group = surface.group([rect]);
  surface.setPosition(group, { x: 10, y: 20 });

  assert.deepEqual(surface.scenePosition(rect), { x: 10, y: 20 });

  const children = surface.disbandGroup(group);
  assert.deepEqual(children, [rect]);
  assert.deepEqual(surface.positionOf(rect), { x: 10, y: 20 });
  assert.equal(surface.has(group), false);
  assert.equal(surface.parentOf(rect), null);
});

test("text bounds fall back to the approximate measure", () => {
  const surface = new Canvas2DSurface();
  const text = surface.createText({ kind: "text", text: "Hi", color: RED, font: FONT });

  assert.deepEqual(surface.boundingBox(text), { x: 0, y: 0, width: 12, height: 10 });
});

test("group bounds are the union of child bounds at their offsets", () => {
  const surface = new Canvas2DSurface();
  const a = surface.createRect({ kind: "rect", rect: { x: 0, y: 0, width: 10, height: 10 }, stroke: { color: RED, width: 1 } });
  const b = surface.createLine({ kind: "line", a: { x: 20, y: 5 }, b: { x: 30, y: 25 }, stroke: { color: RED, width: 1 } });
  const group = surface.group([a, b]);

  assert.deepEqual(surface.boundingBox(group), { x: 0, y: 0, width: 30, height: 25 });
});

test("removeFromScene forgets the group and its children", () => {
  const surface = new Canvas2DSurface();
  const text = surface.createText({ kind: "text", text: "x", color: RED, font: FONT });
  const group = surface.group([text]);

  surface.removeFromScene(group);

  assert.equal(surface.itemCount(), 0);
  assert.throws(() => surface.setPosition(group, { x: 1, y: 1 }), /Unknown scene handle/);
});

test("decodeImage reads PNG dimensions and rejects other payloads", () => {
  const surface = new Canvas2DSurface();

  const decoded = surface.decodeImage(pngHeader(3, 2));
  assert.equal(decoded?.width, 3);
  assert.equal(decoded?.height, 2);
  assert.equal(surface.decodeImage(new Uint8Array([1, 2, 3])), null);
});

test("render() paints roots in z order", () => {
  const surface = new Canvas2DSurface();
  const text = surface.createText({ kind: "text", text: "top", color: RED, font: FONT });
  surface.createRect({ kind: "rect", rect: { x: 0, y: 0, width: 5, height: 5 }, stroke: { color: RED, width: 1 } });
  surface.setZ(text, 1);

  const ctx = new MockContext2D();
  const stats = surface.render(ctx, { width: 100, height: 100 });

  const drawOps = ctx.calls.filter((c) => c === "stroke" || c === "fillText");
  assert.deepEqual(drawOps, ["stroke", "fillText"]);
  assert.deepEqual(stats, { drawCalls: 2, items: 2 });
});

test("animated text starts large and white, then settles", () => {
  let now = 0;
  const surface = new Canvas2DSurface({ clock: () => now });
  const text = surface.createText({ kind: "text", text: "42", color: RED, font: FONT });

  surface.animateText(text);
  now = 250;
  const mid = new MockContext2D();
  surface.render(mid, { width: 10, height: 10 });
  assert.deepEqual(mid.scales, [2]);
  assert.deepEqual(mid.fills, ["42:rgba(255, 128, 128, 1)"]);
  assert.equal(surface.isAnimating(text), true);

  now = 600;
  const done = new MockContext2D();
  surface.render(done, { width: 10, height: 10 });
  assert.deepEqual(done.scales, []);
  assert.deepEqual(done.fills, [`42:${cssColor(RED)}`]);
  assert.equal(surface.isAnimating(text), false);
});

test("cssFont names the family before the generic fallback", () => {
  assert.equal(cssFont({ family: "Menlo", size: 12, styleHint: "sans-serif" }), '12px "Menlo", sans-serif');
  assert.equal(cssFont(FONT), "10px sans-serif");
});
