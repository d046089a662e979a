/**
 * canvasRenderer.ts — direct Canvas2D backend.
 *
 * Draws every visible element one by one, layer by layer. No setup cost
 * and available everywhere; draw calls grow with the visible element
 * count, so this is the fallback when WebGL2 is missing.
 *
 * Screen coordinates are computed here rather than through a canvas
 * transform so that line widths stay in device pixels.
 */

import type { GeometryElement, Point } from "./layoutModel";
import type { Viewport } from "./sceneGraph";
import {
  BaseRenderer,
  RendererInitError,
  type FrameResult,
  type LayerDrawList,
  type RendererCapabilities,
  type RendererOptions,
  type ViewTransform,
} from "./layoutRenderer";
import type { DrawingSurface2D, RenderTarget } from "./renderTarget";
import type { LayerStyle } from "../stores/layerStyleStore";
import { hexToRgba } from "../utils/color";

// ── Types ────────────────────────────────────────────────────────────

export interface RenderStyle {
  fillColor: string;
  strokeColor: string;
  lineWidth: number;
  fill: boolean;
  stroke: boolean;
}

const NODE_RADIUS_PX = 3;
const DEFAULT_TEXT_PX = 12;

/**
 * Resolve a layer style against the frame's render options.
 */
export function computeRenderStyle(
  style: LayerStyle,
  options: { showFill: boolean; showStroke: boolean },
): RenderStyle {
  return {
    fillColor: hexToRgba(style.color, style.opacity),
    strokeColor: hexToRgba(style.color, Math.min(1, style.opacity + 0.3)),
    lineWidth: style.lineWidth,
    fill: options.showFill && style.fill,
    stroke: options.showStroke && style.stroke,
  };
}

// ── Primitives ───────────────────────────────────────────────────────
// Each returns the number of fill/stroke operations it issued.

function tracePath(ctx: DrawingSurface2D, screenPoints: Point[]): void {
  ctx.beginPath();
  ctx.moveTo(screenPoints[0].x, screenPoints[0].y);
  for (let i = 1; i < screenPoints.length; i++) {
    ctx.lineTo(screenPoints[i].x, screenPoints[i].y);
  }
}

/**
 * Draw a closed polygon: one fill, one outline stroke.
 */
export function drawPolygon(ctx: DrawingSurface2D, screenPoints: Point[], style: RenderStyle): number {
  if (screenPoints.length < 3) return 0;
  let ops = 0;

  tracePath(ctx, screenPoints);
  ctx.closePath();

  if (style.fill) {
    ctx.fillStyle = style.fillColor;
    ctx.fill();
    ops++;
  }
  if (style.stroke) {
    ctx.strokeStyle = style.strokeColor;
    ctx.lineWidth = style.lineWidth;
    ctx.stroke();
    ops++;
  }
  return ops;
}

/**
 * Draw a path (routing wire) as a single wide stroke.
 */
export function drawPath(
  ctx: DrawingSurface2D,
  screenPoints: Point[],
  pathWidth: number,
  style: RenderStyle,
  roundEnds: boolean,
): number {
  if (screenPoints.length < 2 || (!style.fill && !style.stroke)) return 0;

  ctx.strokeStyle = style.fill ? style.fillColor : style.strokeColor;
  ctx.lineWidth = Math.max(style.lineWidth, pathWidth);
  ctx.lineCap = roundEnds ? "round" : "butt";
  ctx.lineJoin = "round";
  tracePath(ctx, screenPoints);
  ctx.stroke();
  return 1;
}

/** Node markers: one filled dot per point. */
export function drawNode(ctx: DrawingSurface2D, screenPoints: Point[], style: RenderStyle): number {
  ctx.fillStyle = style.strokeColor;
  for (const p of screenPoints) {
    ctx.beginPath();
    ctx.arc(p.x, p.y, NODE_RADIUS_PX, 0, Math.PI * 2);
    ctx.fill();
  }
  return screenPoints.length;
}

export function drawLabel(ctx: DrawingSurface2D, text: string, at: Point, px: number, color: string): number {
  ctx.font = `${px}px 'JetBrains Mono', monospace`;
  ctx.textAlign = "left";
  ctx.textBaseline = "alphabetic";
  ctx.fillStyle = color;
  ctx.fillText(text, at.x, at.y);
  return 1;
}

// ══════════════════════════════════════════════════════════════════════
// Renderer
// ══════════════════════════════════════════════════════════════════════

export class Canvas2DRenderer extends BaseRenderer {
  readonly backend = "canvas2d" as const;
  private readonly target: RenderTarget;
  private ctx: DrawingSurface2D | null = null;

  constructor(target: RenderTarget, options: RendererOptions = {}) {
    super(options, "Canvas2D");
    this.target = target;
  }

  getCapabilities(): RendererCapabilities {
    return { backend: "canvas2d", batched: false, maxTextureSize: 0 };
  }

  protected initializeBackend(): void {
    const ctx = this.target.getContext2D();
    if (!ctx) throw new RendererInitError("canvas2d", "Cannot get 2d context");
    this.ctx = ctx;
  }

  protected disposeBackend(): void {
    this.ctx = null;
  }

  protected drawLayers(layers: LayerDrawList[], view: ViewTransform, viewport: Viewport): FrameResult {
    const ctx = this.ctx;
    if (!ctx) return { drawCalls: 0 };

    ctx.setTransform(1, 0, 0, 1, 0, 0);
    ctx.clearRect(0, 0, view.width, view.height);
    ctx.fillStyle = this.renderOptions.backgroundColor;
    ctx.fillRect(0, 0, view.width, view.height);

    let drawCalls = 0;
    for (const layer of layers) {
      const style = computeRenderStyle(layer.style, this.renderOptions);
      ctx.save();
      for (const el of layer.elements) {
        drawCalls += this.drawElement(ctx, el.element, style, view);
      }
      ctx.restore();
    }

    if (this.debugMode) this.drawDebugOverlay(ctx, viewport, drawCalls);
    return { drawCalls };
  }

  private drawElement(ctx: DrawingSurface2D, element: GeometryElement, style: RenderStyle, view: ViewTransform): number {
    const toScreen = (p: Point): Point => ({
      x: view.scale * p.x + view.offsetX,
      y: view.offsetY - view.scale * p.y,
    });

    switch (element.type) {
      case "boundary": {
        let ops = 0;
        for (const poly of element.polygons) ops += drawPolygon(ctx, poly.map(toScreen), style);
        return ops;
      }
      case "box":
        return drawPolygon(ctx, element.points.map(toScreen), style);
      case "path": {
        let ops = 0;
        const width = Math.abs(element.width) * view.scale;
        for (const path of element.paths) {
          ops += drawPath(ctx, path.map(toScreen), width, style, element.pathType === 1);
        }
        return ops;
      }
      case "node":
        return drawNode(ctx, element.points.map(toScreen), style);
      case "text": {
        if (!this.renderOptions.showText) return 0;
        const px = element.height !== undefined
          ? Math.min(64, Math.max(8, element.height * view.scale))
          : DEFAULT_TEXT_PX;
        return drawLabel(ctx, element.text, toScreen(element.position), px, style.strokeColor);
      }
    }
  }

  private drawDebugOverlay(ctx: DrawingSurface2D, viewport: Viewport, drawCalls: number): void {
    const prev = this.getStatistics();
    const lines = [
      `zoom ${viewport.zoom.toFixed(3)} @ (${viewport.center.x.toFixed(1)}, ${viewport.center.y.toFixed(1)})`,
      `elements ${this.sceneGraph.getElementCount()} | draw calls ${drawCalls}`,
      `last frame ${prev.frameTime.toFixed(2)}ms | ${prev.fps.toFixed(0)} fps`,
    ];
    ctx.save();
    ctx.font = "11px 'JetBrains Mono', monospace";
    ctx.textAlign = "left";
    ctx.textBaseline = "top";
    ctx.fillStyle = "rgba(255,255,255,0.6)";
    lines.forEach((line, i) => ctx.fillText(line, 8, 8 + i * 14));
    ctx.restore();
  }
}
