/**
 * Tests for engines/canvasRenderer.ts and the shared BaseRenderer behavior
 * it inherits, driven through a recording Canvas2D stand-in.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { Canvas2DRenderer, computeRenderStyle, drawPolygon } from "../engines/canvasRenderer";
import {
  RendererInitError,
  fitViewportToBounds,
  screenToWorld,
  worldToScreen,
} from "../engines/layoutRenderer";
import type { Viewport } from "../engines/sceneGraph";
import { FakeContext2D, fakeTarget, label, library, node, rect, structure, wire } from "./fixtures";

// ── Helpers ──

// TOP_0 boundary (layer 1), TOP_1 wire (layer 2), TOP_2 node (layer 3), TOP_3 label (layer 4)
const lib = library(
  structure(
    "TOP",
    rect(1, 0, 0, 10, 10),
    wire(2, [[0, 0], [10, 0]], 1),
    node(3, [[1, 1], [2, 2]]),
    label(4, "VDD", 5, 5),
  ),
);

// world → screen: x·4 + 80, 70 − y·4
const VIEW: Viewport = { center: { x: 5, y: 5 }, width: 200, height: 100, zoom: 4 };
const AWAY: Viewport = { center: { x: 500, y: 500 }, width: 200, height: 100, zoom: 4 };

async function setup(): Promise<{ ctx: FakeContext2D; renderer: Canvas2DRenderer }> {
  const ctx = new FakeContext2D();
  const renderer = new Canvas2DRenderer(fakeTarget({ ctx }));
  await renderer.initialize();
  renderer.setLibrary(lib);
  return { ctx, renderer };
}

const defaultStyle = { color: "#ff0000", opacity: 0.2, fill: true, stroke: true, lineWidth: 2 };

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

// ══════════════════════════════════════════════════════════════════════
// View math
// ══════════════════════════════════════════════════════════════════════

describe("view math", () => {
  it("maps world to screen with y pointing up", () => {
    expect(worldToScreen({ x: 5, y: 5 }, VIEW)).toEqual({ x: 100, y: 50 });
    expect(worldToScreen({ x: 0, y: 0 }, VIEW)).toEqual({ x: 80, y: 70 });
  });

  it("screenToWorld inverts worldToScreen", () => {
    expect(screenToWorld({ x: 80, y: 70 }, VIEW)).toEqual({ x: 0, y: 0 });
    expect(screenToWorld({ x: 120, y: 30 }, VIEW)).toEqual({ x: 10, y: 10 });
  });

  it("fits bounds into the viewport", () => {
    expect(fitViewportToBounds({ minX: 0, minY: 0, maxX: 100, maxY: 50 }, 200, 100, 1)).toEqual({
      center: { x: 50, y: 25 },
      width: 200,
      height: 100,
      zoom: 2,
    });
    expect(fitViewportToBounds(null, 200, 100).zoom).toBe(1);
  });
});

// ══════════════════════════════════════════════════════════════════════
// Primitives
// ══════════════════════════════════════════════════════════════════════

describe("computeRenderStyle", () => {
  it("derives fill and stroke colors from the layer style", () => {
    expect(computeRenderStyle(defaultStyle, { showFill: true, showStroke: true })).toEqual({
      fillColor: "rgba(255, 0, 0, 0.2)",
      strokeColor: "rgba(255, 0, 0, 0.5)",
      lineWidth: 2,
      fill: true,
      stroke: true,
    });
  });

  it("honors the frame toggles", () => {
    const s = computeRenderStyle(defaultStyle, { showFill: false, showStroke: true });
    expect(s.fill).toBe(false);
    expect(s.stroke).toBe(true);
  });
});

describe("drawPolygon", () => {
  it("fills and strokes a closed outline", () => {
    const ctx = new FakeContext2D();
    const style = computeRenderStyle(defaultStyle, { showFill: true, showStroke: true });
    const ops = drawPolygon(ctx, [{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 4 }], style);
    expect(ops).toBe(2);
    expect(ctx.calls.map((c) => c.name)).toEqual([
      "beginPath", "moveTo", "lineTo", "lineTo", "closePath", "fill", "stroke",
    ]);
  });

  it("skips outlines with fewer than three points", () => {
    const ctx = new FakeContext2D();
    const style = computeRenderStyle(defaultStyle, { showFill: true, showStroke: true });
    expect(drawPolygon(ctx, [{ x: 0, y: 0 }, { x: 1, y: 1 }], style)).toBe(0);
    expect(ctx.calls).toEqual([]);
  });
});

// ══════════════════════════════════════════════════════════════════════
// Renderer
// ══════════════════════════════════════════════════════════════════════

describe("Canvas2DRenderer", () => {
  it("counts one operation per fill, stroke, marker and label", async () => {
    const { renderer } = await setup();
    renderer.render(VIEW);
    // boundary 2 + wire 1 + node 2 + label 1
    expect(renderer.getStatistics().drawCalls).toBe(6);
    expect(renderer.getStatistics().elementsRendered).toBe(4);
    expect(renderer.getStatistics().elementsCulled).toBe(0);
  });

  it("draws in screen coordinates", async () => {
    const { ctx, renderer } = await setup();
    renderer.render(VIEW);
    expect(ctx.argsOf("moveTo")[0]).toEqual([80, 70]);
    expect(ctx.argsOf("fillText")).toEqual([["VDD", 100, 50]]);
    expect(ctx.argsOf("arc")[0]).toEqual([84, 66, 3, 0, Math.PI * 2]);
  });

  it("clears to the background before drawing", async () => {
    const { ctx, renderer } = await setup();
    renderer.setRenderOptions({ backgroundColor: "#000000" });
    renderer.render(AWAY);
    expect(ctx.calls.slice(0, 3).map((c) => c.name)).toEqual(["setTransform", "clearRect", "fillRect"]);
    expect(ctx.argsOf("fillRect")).toEqual([[0, 0, 200, 100]]);
    expect(ctx.fillStyle).toBe("#000000");
  });

  it("culls elements outside the viewport", async () => {
    const { renderer } = await setup();
    renderer.render(AWAY);
    expect(renderer.getStatistics()).toMatchObject({ drawCalls: 0, elementsRendered: 0, elementsCulled: 4 });
  });

  it("wraps each layer in save/restore, in ascending layer order", async () => {
    const { ctx, renderer } = await setup();
    renderer.render(VIEW);
    expect(ctx.count("save")).toBe(4);
    expect(ctx.count("restore")).toBe(4);
    const names = ctx.calls.map((c) => c.name);
    expect(names.indexOf("closePath")).toBeLessThan(names.indexOf("arc"));
    expect(names.indexOf("arc")).toBeLessThan(names.indexOf("fillText"));
  });

  it("applies render option toggles", async () => {
    const { renderer } = await setup();
    renderer.setRenderOptions({ showText: false });
    renderer.render(VIEW);
    expect(renderer.getStatistics().drawCalls).toBe(5);

    renderer.setRenderOptions({ showText: true, showStroke: false });
    renderer.render(VIEW);
    expect(renderer.getStatistics().drawCalls).toBe(5);
  });

  it("skips hidden layers", async () => {
    const { renderer } = await setup();
    renderer.setLayerVisible(1, 0, false);
    renderer.render(VIEW);
    expect(renderer.getStatistics().drawCalls).toBe(4);
    expect(renderer.getStatistics().elementsCulled).toBe(1);
  });

  it("uses the layer style", async () => {
    const { ctx, renderer } = await setup();
    renderer.setLayerStyle(1, 0, { color: "#00ff00", opacity: 0.2, stroke: false });
    renderer.render(VIEW);
    expect(ctx.argsOf("stroke")).toHaveLength(1); // the wire only
    expect(renderer.getLayerStyle(1, 0).color).toBe("#00ff00");
  });

  it("adds a text overlay in debug mode", async () => {
    const { ctx, renderer } = await setup();
    renderer.setDebugMode(true);
    renderer.render(VIEW);
    expect(ctx.count("fillText")).toBe(4);
    expect(renderer.getStatistics().drawCalls).toBe(6);
  });

  it("picks elements under a point", async () => {
    const { renderer } = await setup();
    const keys = (els: { key: string }[]) => els.map((e) => e.key).sort();
    expect(keys(renderer.pick({ x: 5, y: 5 }))).toEqual(["TOP_0", "TOP_3"]);
    expect(keys(renderer.pickScreen({ x: 100, y: 50 }, VIEW))).toEqual(["TOP_0", "TOP_3"]);
    expect(keys(renderer.getElementsInRegion({ minX: 0.75, minY: 0.75, maxX: 3, maxY: 3 }))).toEqual(["TOP_0", "TOP_2"]);
  });

  it("ignores render before initialize and degenerate viewports", async () => {
    const ctx = new FakeContext2D();
    const renderer = new Canvas2DRenderer(fakeTarget({ ctx }));
    renderer.render(VIEW);
    expect(ctx.calls).toEqual([]);

    await renderer.initialize();
    renderer.render({ ...VIEW, zoom: 0 });
    renderer.render({ ...VIEW, width: 0 });
    expect(ctx.calls).toEqual([]);
  });

  it("renders an empty scene", async () => {
    const ctx = new FakeContext2D();
    const renderer = new Canvas2DRenderer(fakeTarget({ ctx }));
    await renderer.initialize();
    renderer.render(VIEW);
    expect(renderer.getStatistics()).toMatchObject({ drawCalls: 0, elementsRendered: 0, elementsCulled: 0 });
  });

  it("clearScene drops the library", async () => {
    const { renderer } = await setup();
    renderer.clearScene();
    expect(renderer.getLibrary()).toBeNull();
    renderer.render(VIEW);
    expect(renderer.getStatistics().elementsRendered).toBe(0);
  });

  it("resetStatistics zeroes the counters", async () => {
    const { renderer } = await setup();
    renderer.render(VIEW);
    renderer.resetStatistics();
    expect(renderer.getStatistics()).toEqual({
      frameTime: 0,
      fps: 0,
      elementsRendered: 0,
      elementsCulled: 0,
      drawCalls: 0,
    });
  });

  it("fails to initialize without a 2d context", async () => {
    const renderer = new Canvas2DRenderer(fakeTarget({ ctx: null }));
    await expect(renderer.initialize()).rejects.toBeInstanceOf(RendererInitError);
  });

  it("cannot be re-initialized after dispose", async () => {
    const { renderer } = await setup();
    renderer.dispose();
    expect(renderer.isReady()).toBe(false);
    await expect(renderer.initialize()).rejects.toThrow("Renderer already disposed");
    expect(renderer.getSceneGraph().getElementCount()).toBe(4);
  });

  it("reports direct capabilities", () => {
    expect(new Canvas2DRenderer(fakeTarget({})).getCapabilities()).toEqual({
      backend: "canvas2d",
      batched: false,
      maxTextureSize: 0,
    });
  });
});
