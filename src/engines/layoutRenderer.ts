/**
 * Layout Renderer — backend-agnostic contract plus the shared base class.
 *
 * The base owns the scene graph, layer styles, view math and frame
 * statistics. A backend implements `initializeBackend`, `drawLayers` and
 * `disposeBackend`; `render()` hands it the visible elements grouped by
 * layer key in ascending (layer, dataType) order.
 */

import type { BBox, Library, Point } from "./layoutModel";
import { compareLayerKeys } from "./layoutModel";
import { SceneGraph, type SpatialElement, type Viewport } from "./sceneGraph";
import {
  createLayerStyleStore,
  type LayerStyle,
  type LayerStyleStore,
} from "../stores/layerStyleStore";
import { createLogger, type Logger } from "../utils/logger";

// ══════════════════════════════════════════════════════════════════════
// Public interface
// ══════════════════════════════════════════════════════════════════════

export type RendererBackend = "canvas2d" | "webgl2";

export interface RenderStatistics {
  /** Milliseconds spent in the last `render()`. */
  frameTime: number;
  fps: number;
  elementsRendered: number;
  /** Scene elements not drawn last frame (off-screen or on hidden layers). */
  elementsCulled: number;
  drawCalls: number;
  /** Batched backend only. */
  triangles?: number;
}

export interface RenderOptions {
  showFill: boolean;
  showStroke: boolean;
  showText: boolean;
  backgroundColor: string;
}

export interface RendererCapabilities {
  backend: RendererBackend;
  /** One draw call per layer rather than per element. */
  batched: boolean;
  maxTextureSize: number;
}

export interface RendererOptions extends Partial<RenderOptions> {
  capacity?: number;
  maxDepth?: number;
  boundsPadding?: number;
  defaultOpacity?: number;
  /** Attach an existing scene graph instead of creating one. */
  sceneGraph?: SceneGraph;
}

export interface LayoutRenderer {
  readonly backend: RendererBackend;

  initialize(): Promise<void>;
  isReady(): boolean;
  dispose(): void;

  setLibrary(library: Library, startStructure?: string): void;
  updateSceneGraph(): void;
  clearScene(): void;
  getSceneGraph(): SceneGraph;
  getLibrary(): Library | null;
  /** Re-attach a scene built by another renderer, without rebuilding it. */
  adoptSceneGraph(sceneGraph: SceneGraph): void;

  render(viewport: Viewport): void;

  setLayerVisible(layer: number, dataType: number, visible: boolean): void;
  setLayerStyle(layer: number, dataType: number, style: Partial<LayerStyle>): void;
  getLayerStyle(layer: number, dataType: number): LayerStyle;

  /** World-space point. */
  pick(point: Point): SpatialElement[];
  pickScreen(screen: Point, viewport: Viewport): SpatialElement[];
  /** World-space box. */
  getElementsInRegion(box: BBox): SpatialElement[];

  setRenderOptions(options: Partial<RenderOptions>): void;
  getRenderOptions(): RenderOptions;
  getCapabilities(): RendererCapabilities;
  setDebugMode(enabled: boolean): void;

  getStatistics(): RenderStatistics;
  resetStatistics(): void;

  screenToWorld(screen: Point, viewport: Viewport): Point;
  worldToScreen(world: Point, viewport: Viewport): Point;
}

/** Backend initialization failure; the factory falls back on it. */
export class RendererInitError extends Error {
  readonly backend: RendererBackend;

  constructor(backend: RendererBackend, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RendererInitError";
    this.backend = backend;
  }
}

// ══════════════════════════════════════════════════════════════════════
// View math
// ══════════════════════════════════════════════════════════════════════

/**
 * World → screen mapping for a viewport: `sx = scale·x + offsetX`,
 * `sy = -scale·y + offsetY` (y grows downward on screen).
 */
export interface ViewTransform {
  scale: number;
  offsetX: number;
  offsetY: number;
  width: number;
  height: number;
}

export function computeViewTransform(viewport: Viewport): ViewTransform {
  const { center, zoom, width, height } = viewport;
  return {
    scale: zoom,
    offsetX: width / 2 - center.x * zoom,
    offsetY: height / 2 + center.y * zoom,
    width,
    height,
  };
}

export function screenToWorld(screen: Point, viewport: Viewport): Point {
  return {
    x: (screen.x - viewport.width / 2) / viewport.zoom + viewport.center.x,
    y: -(screen.y - viewport.height / 2) / viewport.zoom + viewport.center.y,
  };
}

export function worldToScreen(world: Point, viewport: Viewport): Point {
  return {
    x: (world.x - viewport.center.x) * viewport.zoom + viewport.width / 2,
    y: viewport.height / 2 - (world.y - viewport.center.y) * viewport.zoom,
  };
}

/**
 * Viewport centered on `bounds` with the whole box visible, scaled up by
 * `padding`. No bounds (empty scene) gives center (0,0) at zoom 1.
 */
export function fitViewportToBounds(
  bounds: BBox | null,
  width: number,
  height: number,
  padding = 1.1,
): Viewport {
  if (!bounds || width <= 0 || height <= 0) {
    return { center: { x: 0, y: 0 }, width, height, zoom: 1 };
  }
  const spanX = (bounds.maxX - bounds.minX) * padding;
  const spanY = (bounds.maxY - bounds.minY) * padding;
  const zx = spanX > 0 ? width / spanX : Infinity;
  const zy = spanY > 0 ? height / spanY : Infinity;
  const zoom = Math.min(zx, zy);
  return {
    center: { x: (bounds.minX + bounds.maxX) / 2, y: (bounds.minY + bounds.maxY) / 2 },
    width,
    height,
    zoom: Number.isFinite(zoom) ? zoom : 1,
  };
}

// ══════════════════════════════════════════════════════════════════════
// Base renderer
// ══════════════════════════════════════════════════════════════════════

/** Visible elements of one layer, as handed to a backend. */
export interface LayerDrawList {
  key: string;
  layer: number;
  dataType: number;
  style: LayerStyle;
  elements: SpatialElement[];
}

export interface FrameResult {
  drawCalls: number;
  triangles?: number;
}

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = Object.freeze({
  showFill: true,
  showStroke: true,
  showText: true,
  backgroundColor: "#1a1a1a",
});

function emptyStatistics(): RenderStatistics {
  return { frameTime: 0, fps: 0, elementsRendered: 0, elementsCulled: 0, drawCalls: 0 };
}

export abstract class BaseRenderer implements LayoutRenderer {
  abstract readonly backend: RendererBackend;

  protected sceneGraph: SceneGraph;
  protected library: Library | null = null;
  protected startStructure: string | undefined;
  protected readonly styles: LayerStyleStore;
  protected renderOptions: RenderOptions;
  protected debugMode = false;
  protected readonly log: Logger;

  private ready = false;
  private disposed = false;
  private stats: RenderStatistics = emptyStatistics();
  private lastFrameStart: number | null = null;

  constructor(options: RendererOptions = {}, logNamespace = "Renderer") {
    this.log = createLogger(logNamespace);
    this.sceneGraph = options.sceneGraph ?? new SceneGraph({
      capacity: options.capacity,
      maxDepth: options.maxDepth,
      boundsPadding: options.boundsPadding,
    });
    this.styles = createLayerStyleStore(options.defaultOpacity);
    this.renderOptions = {
      showFill: options.showFill ?? DEFAULT_RENDER_OPTIONS.showFill,
      showStroke: options.showStroke ?? DEFAULT_RENDER_OPTIONS.showStroke,
      showText: options.showText ?? DEFAULT_RENDER_OPTIONS.showText,
      backgroundColor: options.backgroundColor ?? DEFAULT_RENDER_OPTIONS.backgroundColor,
    };
    this.library = this.sceneGraph.getLibrary();
    this.startStructure = this.sceneGraph.getStartStructure();
  }

  // ── Backend hooks ──

  /** Acquire the drawing context and GPU resources. Throw RendererInitError on failure. */
  protected abstract initializeBackend(): Promise<void> | void;
  /** Draw one frame. `layers` holds only visible layers with visible elements. */
  protected abstract drawLayers(layers: LayerDrawList[], view: ViewTransform, viewport: Viewport): FrameResult;
  protected abstract disposeBackend(): void;
  abstract getCapabilities(): RendererCapabilities;

  /** Called after the scene graph was rebuilt, cleared or replaced. */
  protected onSceneChanged(): void {}

  // ── Lifecycle ──

  async initialize(): Promise<void> {
    if (this.disposed) throw new RendererInitError(this.backend, "Renderer already disposed");
    if (this.ready) return;
    await this.initializeBackend();
    this.ready = true;
    this.onSceneChanged();
    this.log.info(`${this.backend} renderer ready`);
  }

  isReady(): boolean {
    return this.ready && !this.disposed;
  }

  /** Release backend resources. The scene graph survives for adoption by another backend. */
  dispose(): void {
    if (this.disposed) return;
    if (this.ready) this.disposeBackend();
    this.ready = false;
    this.disposed = true;
  }

  // ── Scene binding ──

  setLibrary(library: Library, startStructure?: string): void {
    this.library = library;
    this.startStructure = startStructure;
    this.updateSceneGraph();
  }

  updateSceneGraph(): void {
    if (!this.library) {
      this.log.warn("updateSceneGraph() called without a library");
      return;
    }
    this.sceneGraph.buildFromLibrary(this.library, this.startStructure);
    this.styles.getState().ensureStyles(this.sceneGraph.getLayerGroups());
    if (this.isReady()) this.onSceneChanged();
  }

  clearScene(): void {
    this.library = null;
    this.startStructure = undefined;
    this.sceneGraph.clear();
    if (this.isReady()) this.onSceneChanged();
  }

  getSceneGraph(): SceneGraph {
    return this.sceneGraph;
  }

  getLibrary(): Library | null {
    return this.library;
  }

  adoptSceneGraph(sceneGraph: SceneGraph): void {
    this.sceneGraph = sceneGraph;
    this.library = sceneGraph.getLibrary();
    this.startStructure = sceneGraph.getStartStructure();
    this.styles.getState().ensureStyles(sceneGraph.getLayerGroups());
    if (this.isReady()) this.onSceneChanged();
  }

  // ── Frame ──

  render(viewport: Viewport): void {
    if (!this.isReady()) {
      this.log.warn("render() called before initialize() or after dispose()");
      return;
    }
    if (!(viewport.zoom > 0) || viewport.width <= 0 || viewport.height <= 0) {
      this.log.warn("Ignoring degenerate viewport", viewport);
      return;
    }

    const t0 = performance.now();
    const visible = this.sceneGraph.queryViewport(viewport);
    const layers = this.groupByLayer(visible);
    const view = computeViewTransform(viewport);
    const frame = this.drawLayers(layers, view, viewport);
    const t1 = performance.now();

    const total = this.sceneGraph.getElementCount();
    const frameTime = t1 - t0;
    const interval = this.lastFrameStart !== null ? t0 - this.lastFrameStart : frameTime;
    this.lastFrameStart = t0;

    this.stats = {
      frameTime,
      fps: interval > 0 ? 1000 / interval : 0,
      elementsRendered: visible.length,
      elementsCulled: Math.max(0, total - visible.length),
      drawCalls: frame.drawCalls,
      ...(frame.triangles !== undefined ? { triangles: frame.triangles } : {}),
    };
  }

  private groupByLayer(elements: SpatialElement[]): LayerDrawList[] {
    const groups = new Map<string, LayerDrawList>();
    const { getStyle } = this.styles.getState();
    for (const el of elements) {
      let group = groups.get(el.layerKey);
      if (!group) {
        const { layer, dataType } = el.element;
        group = { key: el.layerKey, layer, dataType, style: getStyle(layer, dataType), elements: [] };
        groups.set(el.layerKey, group);
      }
      group.elements.push(el);
    }
    return [...groups.values()].sort(compareLayerKeys);
  }

  // ── Layers & styles ──

  setLayerVisible(layer: number, dataType: number, visible: boolean): void {
    this.sceneGraph.setLayerVisible(layer, dataType, visible);
  }

  setLayerStyle(layer: number, dataType: number, style: Partial<LayerStyle>): void {
    this.styles.getState().setStyle(layer, dataType, style);
  }

  getLayerStyle(layer: number, dataType: number): LayerStyle {
    return this.styles.getState().getStyle(layer, dataType);
  }

  // ── Interaction ──

  pick(point: Point): SpatialElement[] {
    return this.sceneGraph.queryPoint(point);
  }

  pickScreen(screen: Point, viewport: Viewport): SpatialElement[] {
    return this.pick(this.screenToWorld(screen, viewport));
  }

  getElementsInRegion(box: BBox): SpatialElement[] {
    return this.sceneGraph.queryRegion(box);
  }

  screenToWorld(screen: Point, viewport: Viewport): Point {
    return screenToWorld(screen, viewport);
  }

  worldToScreen(world: Point, viewport: Viewport): Point {
    return worldToScreen(world, viewport);
  }

  // ── Options & diagnostics ──

  setRenderOptions(options: Partial<RenderOptions>): void {
    this.renderOptions = { ...this.renderOptions, ...options };
  }

  getRenderOptions(): RenderOptions {
    return { ...this.renderOptions };
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  getStatistics(): RenderStatistics {
    return { ...this.stats };
  }

  resetStatistics(): void {
    this.stats = emptyStatistics();
    this.lastFrameStart = null;
  }
}
