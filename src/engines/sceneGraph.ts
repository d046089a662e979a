/**
 * Scene Graph — resolves a library into world-space spatial elements,
 * indexes them, and groups them by layer key.
 *
 * Every query result is deduplicated by identity key, since the spatial
 * index may hold one element in several nodes.
 */

import type { BBox, GeometryElement, Library, Point } from "./layoutModel";
import { compareLayerKeys, layerKeyString } from "./layoutModel";
import {
  createResolveCache,
  findTopStructures,
  resolveStructure,
  type ElementSource,
  type ResolveReport,
} from "./hierarchyResolver";
import {
  SpatialIndex,
  DEFAULT_CAPACITY,
  DEFAULT_MAX_DEPTH,
  type SpatialIndexStatistics,
} from "./spatialIndex";
import { mergeBBoxes, scaleBBox, zeroBBox } from "../utils/bbox";
import { createLogger } from "../utils/logger";

const log = createLogger("SceneGraph");

// ══════════════════════════════════════════════════════════════════════
// Types
// ══════════════════════════════════════════════════════════════════════

export interface Viewport {
  center: Point;
  /** Device pixels. */
  width: number;
  height: number;
  /** Device pixels per world unit. */
  zoom: number;
}

export interface SpatialElement {
  /** `${structureName}_${elementIndex}`, unique within a scene. */
  key: string;
  element: GeometryElement;
  bounds: BBox;
  /** Root structure the scene was built from. */
  structureName: string;
  /** Position in that root's flattened element list. */
  elementIndex: number;
  /** Structure and index the element was defined at. */
  source: ElementSource;
  layerKey: string;
}

export interface LayerGroup {
  key: string;
  layer: number;
  dataType: number;
  visible: boolean;
  elements: SpatialElement[];
}

export interface QueryOptions {
  /** Include elements on hidden layers. */
  includeHidden?: boolean;
}

export interface SceneGraphOptions {
  capacity?: number;
  maxDepth?: number;
  /** Factor applied to the scene bounds to size the index root. */
  boundsPadding?: number;
}

export interface SceneStatistics {
  totalElements: number;
  totalStructures: number;
  totalLayers: number;
  visibleLayers: number;
  rootStructures: string[];
  bounds: BBox;
  spatialIndex: SpatialIndexStatistics;
}

export interface CullingReport {
  total: number;
  visible: number;
  culled: number;
  /** culled / total, 0 for an empty scene. */
  efficiency: number;
}

export function identityKey(structureName: string, elementIndex: number): string {
  return `${structureName}_${elementIndex}`;
}

/** World-space window covered by a viewport. */
export function viewportBounds(viewport: Viewport): BBox {
  const halfW = viewport.width / (2 * viewport.zoom);
  const halfH = viewport.height / (2 * viewport.zoom);
  return {
    minX: viewport.center.x - halfW,
    minY: viewport.center.y - halfH,
    maxX: viewport.center.x + halfW,
    maxY: viewport.center.y + halfH,
  };
}

/** First occurrence wins. */
export function dedupeByKey(elements: SpatialElement[]): SpatialElement[] {
  const seen = new Map<string, SpatialElement>();
  for (const el of elements) {
    if (!seen.has(el.key)) seen.set(el.key, el);
  }
  return [...seen.values()];
}

// ══════════════════════════════════════════════════════════════════════
// Scene Graph
// ══════════════════════════════════════════════════════════════════════

export class SceneGraph {
  private index: SpatialIndex<SpatialElement>;
  private elements: SpatialElement[] = [];
  private layers = new Map<string, LayerGroup>();
  /** Survives rebuilds so toggles stick across library reloads. */
  private visibility = new Map<string, boolean>();
  private bounds: BBox = zeroBBox();
  private library: Library | null = null;
  private startStructure: string | undefined;
  private rootStructures: string[] = [];
  private report: ResolveReport = { cycles: [], missingReferences: [] };
  private readonly options: Required<SceneGraphOptions>;

  constructor(options: SceneGraphOptions = {}) {
    this.options = {
      capacity: options.capacity ?? DEFAULT_CAPACITY,
      maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
      boundsPadding: Math.max(1, options.boundsPadding ?? 1.1),
    };
    this.index = this.createIndex(zeroBBox());
  }

  /**
   * Resolve `startStructure` (or every top-level structure) and rebuild the
   * index and layer groups from scratch.
   */
  buildFromLibrary(library: Library, startStructure?: string): void {
    const t0 = performance.now();
    this.library = library;
    this.startStructure = startStructure;

    const roots = startStructure !== undefined
      ? [startStructure]
      : findTopStructures(library).map((s) => s.name);

    const cache = createResolveCache(library);
    const report: ResolveReport = { cycles: [], missingReferences: [] };
    const elements: SpatialElement[] = [];
    let skipped = 0;

    for (const root of roots) {
      const result = resolveStructure(library, root, { cache });
      report.cycles.push(...result.cycles);
      report.missingReferences.push(...result.missingReferences);

      result.elements.forEach((r, i) => {
        const { bounds } = r.element;
        if (!bounds) {
          skipped++;
          return;
        }
        elements.push({
          key: identityKey(root, i),
          element: r.element,
          bounds,
          structureName: root,
          elementIndex: i,
          source: r.source,
          layerKey: layerKeyString(r.element.layer, r.element.dataType),
        });
      });
    }

    this.elements = elements;
    this.rootStructures = roots;
    this.report = report;
    this.bounds = mergeBBoxes(elements.map((e) => e.bounds)) ?? zeroBBox();
    this.index = this.createIndex(scaleBBox(this.bounds, this.options.boundsPadding));
    for (const el of elements) this.index.insert(el);
    this.rebuildLayers();

    if (skipped > 0) log.debug(`${skipped} elements without geometry were not indexed`);
    log.info(
      `Built scene from ${roots.join(", ") || "(none)"}: ${elements.length} elements, ` +
        `${this.layers.size} layers in ${(performance.now() - t0).toFixed(1)}ms`,
    );
  }

  // ── Queries ──

  queryViewport(viewport: Viewport, options?: QueryOptions): SpatialElement[] {
    return this.queryRegion(viewportBounds(viewport), options);
  }

  queryRegion(region: BBox, options?: QueryOptions): SpatialElement[] {
    return this.filterVisible(dedupeByKey(this.index.query(region)), options);
  }

  queryPoint(point: Point, options?: QueryOptions): SpatialElement[] {
    return this.filterVisible(dedupeByKey(this.index.queryPoint(point)), options);
  }

  // ── Layers ──

  setLayerVisible(layer: number, dataType: number, visible: boolean): void {
    const key = layerKeyString(layer, dataType);
    this.visibility.set(key, visible);
    const group = this.layers.get(key);
    if (group) group.visible = visible;
  }

  isLayerVisible(layer: number, dataType: number): boolean {
    return this.visibility.get(layerKeyString(layer, dataType)) ?? true;
  }

  /** All layer groups, ascending by (layer, dataType). */
  getLayerGroups(): LayerGroup[] {
    return [...this.layers.values()].sort(compareLayerKeys);
  }

  getLayerElements(layer: number, dataType: number): SpatialElement[] {
    return this.layers.get(layerKeyString(layer, dataType))?.elements ?? [];
  }

  // ── Accessors ──

  /** Aggregate element bounds; a zero box at the origin for an empty scene. */
  getBounds(): BBox {
    return { ...this.bounds };
  }

  getAllElements(): SpatialElement[] {
    return this.elements;
  }

  getElementCount(): number {
    return this.elements.length;
  }

  getLibrary(): Library | null {
    return this.library;
  }

  /** The structure passed to the last build; undefined when all top structures were used. */
  getStartStructure(): string | undefined {
    return this.startStructure;
  }

  getLastResolveReport(): ResolveReport {
    return this.report;
  }

  getStatistics(): SceneStatistics {
    let visibleLayers = 0;
    for (const g of this.layers.values()) if (g.visible) visibleLayers++;
    return {
      totalElements: this.elements.length,
      totalStructures: this.library?.structures.length ?? 0,
      totalLayers: this.layers.size,
      visibleLayers,
      rootStructures: [...this.rootStructures],
      bounds: this.getBounds(),
      spatialIndex: this.index.getStatistics(),
    };
  }

  testCullingEfficiency(viewport: Viewport): CullingReport {
    const total = this.elements.length;
    const visible = this.queryViewport(viewport, { includeHidden: true }).length;
    const culled = total - visible;
    return { total, visible, culled, efficiency: total > 0 ? culled / total : 0 };
  }

  /** Drop all geometry. Layer visibility is kept. */
  clear(): void {
    this.elements = [];
    this.layers.clear();
    this.library = null;
    this.startStructure = undefined;
    this.rootStructures = [];
    this.report = { cycles: [], missingReferences: [] };
    this.bounds = zeroBBox();
    this.index.clear(zeroBBox());
  }

  // ── Internals ──

  private createIndex(bounds: BBox): SpatialIndex<SpatialElement> {
    return new SpatialIndex<SpatialElement>(bounds, {
      capacity: this.options.capacity,
      maxDepth: this.options.maxDepth,
    });
  }

  private rebuildLayers(): void {
    this.layers.clear();
    for (const el of this.elements) {
      let group = this.layers.get(el.layerKey);
      if (!group) {
        group = {
          key: el.layerKey,
          layer: el.element.layer,
          dataType: el.element.dataType,
          visible: this.visibility.get(el.layerKey) ?? true,
          elements: [],
        };
        this.layers.set(el.layerKey, group);
      }
      group.elements.push(el);
    }
  }

  private filterVisible(elements: SpatialElement[], options?: QueryOptions): SpatialElement[] {
    if (options?.includeHidden) return elements;
    return elements.filter((el) => this.visibility.get(el.layerKey) ?? true);
  }
}
