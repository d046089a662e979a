/**
 * Render target — where a backend gets its drawing context from.
 *
 * Decouples the renderers from HTMLCanvasElement so they can be driven by
 * an OffscreenCanvas or a test double.
 */

import type { GpuContext } from "./gpuContext";

/** The Canvas2D calls the direct backend issues. */
export type DrawingSurface2D = Pick<
  CanvasRenderingContext2D,
  | "save"
  | "restore"
  | "setTransform"
  | "clearRect"
  | "fillRect"
  | "strokeRect"
  | "beginPath"
  | "closePath"
  | "moveTo"
  | "lineTo"
  | "arc"
  | "fill"
  | "stroke"
  | "fillText"
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "lineCap"
  | "lineJoin"
  | "globalAlpha"
  | "font"
  | "textAlign"
  | "textBaseline"
>;

/**
 * A drawing surface. Like a canvas, a target is bound to the first context
 * kind it hands out: once `getWebGL2()` returned a context, `getContext2D()`
 * returns null, and the other way round.
 */
export interface RenderTarget {
  /** Device pixels. */
  readonly width: number;
  readonly height: number;
  getContext2D(): DrawingSurface2D | null;
  getWebGL2(): GpuContext | null;
  /** A throwaway surface of the same kind, for trying a backend without binding this one. */
  createScratch?(): RenderTarget;
}

export function canvasTarget(canvas: HTMLCanvasElement): RenderTarget {
  return {
    get width() {
      return canvas.width;
    },
    get height() {
      return canvas.height;
    },
    getContext2D: () => canvas.getContext("2d"),
    getWebGL2: () => canvas.getContext("webgl2", { antialias: true, premultipliedAlpha: false }),
    createScratch: () => canvasTarget(canvas.ownerDocument.createElement("canvas")),
  };
}
