/**
 * Shared builders and in-process stand-ins for renderer tests.
 */

import type {
  BoundaryElement,
  GeometryElement,
  GridReferenceElement,
  LayoutElement,
  Library,
  LibraryUnits,
  NodeElement,
  PathElement,
  PathEndType,
  Point,
  SingleReferenceElement,
  Structure,
  TextElement,
  Transformation,
} from "../engines/layoutModel";
import { layerKeyString } from "../engines/layoutModel";
import type { SpatialElement } from "../engines/sceneGraph";
import type { GpuContext } from "../engines/gpuContext";
import type { DrawingSurface2D, RenderTarget } from "../engines/renderTarget";
import { computeElementBounds } from "../engines/hierarchyResolver";

// ── Library builders ──

export const TEST_UNITS: LibraryUnits = { userUnitsPerDbUnit: 0.001, metersPerDbUnit: 1e-9 };

/** Closed ring, first vertex repeated, as layout files store it. */
export function rectRing(x0: number, y0: number, x1: number, y1: number): Point[] {
  return [
    { x: x0, y: y0 },
    { x: x1, y: y0 },
    { x: x1, y: y1 },
    { x: x0, y: y1 },
    { x: x0, y: y0 },
  ];
}

export function rect(layer: number, x0: number, y0: number, x1: number, y1: number, dataType = 0): BoundaryElement {
  return { type: "boundary", layer, dataType, polygons: [rectRing(x0, y0, x1, y1)] };
}

export function polygon(layer: number, points: [number, number][], dataType = 0): BoundaryElement {
  return { type: "boundary", layer, dataType, polygons: [points.map(([x, y]) => ({ x, y }))] };
}

export function wire(layer: number, points: [number, number][], width: number, pathType?: PathEndType): PathElement {
  return {
    type: "path",
    layer,
    dataType: 0,
    paths: [points.map(([x, y]) => ({ x, y }))],
    width,
    ...(pathType !== undefined ? { pathType } : {}),
  };
}

export function node(layer: number, points: [number, number][]): NodeElement {
  return { type: "node", layer, dataType: 0, points: points.map(([x, y]) => ({ x, y })) };
}

export function label(layer: number, text: string, x: number, y: number, height?: number): TextElement {
  return {
    type: "text",
    layer,
    dataType: 0,
    text,
    position: { x, y },
    ...(height !== undefined ? { height } : {}),
  };
}

export function sref(structureName: string, x: number, y: number, transformation?: Transformation): SingleReferenceElement {
  return {
    type: "sref",
    structureName,
    positions: [{ x, y }],
    ...(transformation ? { transformation } : {}),
  };
}

export function aref(
  structureName: string,
  columns: number,
  rows: number,
  corners: [[number, number], [number, number], [number, number]],
): GridReferenceElement {
  const [o, c, r] = corners;
  return {
    type: "aref",
    structureName,
    columns,
    rows,
    corners: [{ x: o[0], y: o[1] }, { x: c[0], y: c[1] }, { x: r[0], y: r[1] }],
  };
}

export function structure(name: string, ...elements: LayoutElement[]): Structure {
  return { name, elements };
}

export function library(...structures: Structure[]): Library {
  return { name: "TESTLIB", units: TEST_UNITS, structures };
}

/** Hand-built scene element (bounds taken from the geometry as given). */
export function spatial(key: string, element: GeometryElement): SpatialElement {
  const bounds = computeElementBounds(element) ?? { minX: 0, minY: 0, maxX: 0, maxY: 0 };
  return {
    key,
    element: { ...element, bounds },
    bounds,
    structureName: "TOP",
    elementIndex: 0,
    source: { structureName: "TOP", elementIndex: 0 },
    layerKey: layerKeyString(element.layer, element.dataType),
  };
}

// ── Render targets ──

export function fakeTarget(options: {
  ctx?: DrawingSurface2D | null;
  gl?: GpuContext | null;
  width?: number;
  height?: number;
}): RenderTarget {
  return {
    width: options.width ?? 200,
    height: options.height ?? 100,
    getContext2D: () => options.ctx ?? null,
    getWebGL2: () => options.gl ?? null,
  };
}

export type BoundTarget = RenderTarget & { readonly bound: "2d" | "webgl2" | null };

/** Like a canvas element: bound to the first context kind it hands out. */
export function boundTarget(options: {
  ctx?: DrawingSurface2D | null;
  gl?: GpuContext | null;
  scratch?: () => RenderTarget;
}): BoundTarget {
  let bound: "2d" | "webgl2" | null = null;
  return {
    width: 200,
    height: 100,
    get bound() {
      return bound;
    },
    getContext2D: () => {
      if (bound === "webgl2" || !options.ctx) return null;
      bound = "2d";
      return options.ctx;
    },
    getWebGL2: () => {
      if (bound === "2d" || !options.gl) return null;
      bound = "webgl2";
      return options.gl;
    },
    ...(options.scratch ? { createScratch: options.scratch } : {}),
  };
}

// ── Canvas2D stand-in ──

export interface RecordedCall {
  name: string;
  args: unknown[];
}

export class FakeContext2D implements DrawingSurface2D {
  fillStyle: string | CanvasGradient | CanvasPattern = "#000000";
  strokeStyle: string | CanvasGradient | CanvasPattern = "#000000";
  lineWidth = 1;
  lineCap: CanvasLineCap = "butt";
  lineJoin: CanvasLineJoin = "miter";
  globalAlpha = 1;
  font = "10px sans-serif";
  textAlign: CanvasTextAlign = "start";
  textBaseline: CanvasTextBaseline = "alphabetic";

  readonly calls: RecordedCall[] = [];

  count(name: string): number {
    return this.calls.filter((c) => c.name === name).length;
  }

  argsOf(name: string): unknown[][] {
    return this.calls.filter((c) => c.name === name).map((c) => c.args);
  }

  reset(): void {
    this.calls.length = 0;
  }

  private record(name: string, args: unknown[]): void {
    this.calls.push({ name, args });
  }

  save(): void { this.record("save", []); }
  restore(): void { this.record("restore", []); }
  setTransform(...args: unknown[]): void { this.record("setTransform", args); }
  clearRect(...args: unknown[]): void { this.record("clearRect", args); }
  fillRect(...args: unknown[]): void { this.record("fillRect", args); }
  strokeRect(...args: unknown[]): void { this.record("strokeRect", args); }
  beginPath(): void { this.record("beginPath", []); }
  closePath(): void { this.record("closePath", []); }
  moveTo(...args: unknown[]): void { this.record("moveTo", args); }
  lineTo(...args: unknown[]): void { this.record("lineTo", args); }
  arc(...args: unknown[]): void { this.record("arc", args); }
  fill(...args: unknown[]): void { this.record("fill", args); }
  stroke(...args: unknown[]): void { this.record("stroke", args); }
  fillText(...args: unknown[]): void { this.record("fillText", args); }
}

// ── WebGL2 stand-in ──

export class FakeGL implements GpuContext {
  readonly ARRAY_BUFFER = 0x8892;
  readonly ELEMENT_ARRAY_BUFFER = 0x8893;
  readonly STATIC_DRAW = 0x88e4;
  readonly FLOAT = 0x1406;
  readonly UNSIGNED_INT = 0x1405;
  readonly TRIANGLES = 0x0004;
  readonly VERTEX_SHADER = 0x8b31;
  readonly FRAGMENT_SHADER = 0x8b30;
  readonly COMPILE_STATUS = 0x8b81;
  readonly LINK_STATUS = 0x8b82;
  readonly COLOR_BUFFER_BIT = 0x4000;
  readonly BLEND = 0x0be2;
  readonly SRC_ALPHA = 0x0302;
  readonly ONE_MINUS_SRC_ALPHA = 0x0303;
  readonly MAX_TEXTURE_SIZE = 0x0d33;

  drawingBufferWidth = 400;
  drawingBufferHeight = 400;

  compileOk = true;
  linkOk = true;
  allocOk = true;

  buffersCreated = 0;
  buffersDeleted = 0;
  bufferUploads = 0;
  clears = 0;
  programsDeleted = 0;
  /** Index count of every drawElements call. */
  readonly draws: number[] = [];
  readonly colors: number[][] = [];
  viewMatrix: Float32Array | null = null;

  createShader(_type: number): WebGLShader | null { return {}; }
  shaderSource(_shader: WebGLShader, _source: string): void {}
  compileShader(_shader: WebGLShader): void {}
  getShaderParameter(_shader: WebGLShader, _pname: number): unknown { return this.compileOk; }
  getShaderInfoLog(_shader: WebGLShader): string | null { return "ERROR: 0:1: syntax error"; }
  deleteShader(_shader: WebGLShader | null): void {}
  createProgram(): WebGLProgram | null { return {}; }
  attachShader(_program: WebGLProgram, _shader: WebGLShader): void {}
  linkProgram(_program: WebGLProgram): void {}
  getProgramParameter(_program: WebGLProgram, _pname: number): unknown { return this.linkOk; }
  getProgramInfoLog(_program: WebGLProgram): string | null { return "link error"; }
  deleteProgram(_program: WebGLProgram | null): void { this.programsDeleted++; }
  useProgram(_program: WebGLProgram | null): void {}
  getUniformLocation(_program: WebGLProgram, _name: string): WebGLUniformLocation | null { return {}; }
  getAttribLocation(_program: WebGLProgram, _name: string): number { return 0; }

  uniformMatrix3fv(_location: WebGLUniformLocation | null, _transpose: boolean, data: Float32Array): void {
    this.viewMatrix = data;
  }
  uniform4f(_location: WebGLUniformLocation | null, x: number, y: number, z: number, w: number): void {
    this.colors.push([x, y, z, w]);
  }
  uniform1f(_location: WebGLUniformLocation | null, _x: number): void {}

  createBuffer(): WebGLBuffer | null {
    if (!this.allocOk) return null;
    this.buffersCreated++;
    return {};
  }
  bindBuffer(_target: number, _buffer: WebGLBuffer | null): void {}
  bufferData(_target: number, _data: Float32Array | Uint32Array, _usage: number): void {
    this.bufferUploads++;
  }
  deleteBuffer(buffer: WebGLBuffer | null): void {
    if (buffer) this.buffersDeleted++;
  }
  enableVertexAttribArray(_index: number): void {}
  vertexAttribPointer(_i: number, _s: number, _t: number, _n: boolean, _st: number, _o: number): void {}

  viewport(_x: number, _y: number, _w: number, _h: number): void {}
  clearColor(_r: number, _g: number, _b: number, _a: number): void {}
  clear(_mask: number): void { this.clears++; }
  enable(_cap: number): void {}
  blendFunc(_s: number, _d: number): void {}
  drawElements(_mode: number, count: number, _type: number, _offset: number): void {
    this.draws.push(count);
  }
  getParameter(pname: number): unknown {
    return pname === this.MAX_TEXTURE_SIZE ? 4096 : null;
  }
  isContextLost(): boolean { return false; }
}
