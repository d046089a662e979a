/**
 * Layer batches — one triangulated, GPU-resident geometry set per layer key.
 *
 * A batch covers the layer's whole membership, not just what is on screen,
 * so pan and zoom never invalidate it. It is re-triangulated only when the
 * membership fingerprint changes after a scene rebuild.
 */

import type { GeometryElement, Point } from "./layoutModel";
import type { LayerGroup, SpatialElement } from "./sceneGraph";
import type { GpuContext } from "./gpuContext";
import type { BufferPool, GeometryBuffer } from "./geometryBuffer";
import {
  appendTriangulation,
  emptyTriangulation,
  pathToQuads,
  triangulateMultiple,
  triangulatePolygon,
  type Triangulation,
} from "./triangulator";
import { createLogger, warnOnce } from "../utils/logger";

const log = createLogger("WebGL");

// ══════════════════════════════════════════════════════════════════════
// Membership fingerprint
// ══════════════════════════════════════════════════════════════════════

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(hash: number, text: string): number {
  let h = hash;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, FNV_PRIME);
  }
  return h >>> 0;
}

function hashPoints(hash: number, points: readonly Point[]): number {
  let h = hash;
  for (const p of points) h = fnv1a(h, `${p.x},${p.y};`);
  return fnv1a(h, "|");
}

function hashElement(hash: number, el: SpatialElement): number {
  const e = el.element;
  let h = fnv1a(hash, `${e.type}:`);
  switch (e.type) {
    case "boundary":
      for (const poly of e.polygons) h = hashPoints(h, poly);
      break;
    case "path":
      h = fnv1a(h, `${e.width},${e.pathType ?? 0}:`);
      for (const path of e.paths) h = hashPoints(h, path);
      break;
    case "box":
    case "node":
      h = hashPoints(h, e.points);
      break;
    case "text":
      h = hashPoints(fnv1a(h, e.text), [e.position]);
      break;
  }
  return h;
}

/**
 * Order-sensitive digest of the members' world-space geometry. Identity keys
 * are left out: they carry the flattened index, which shifts for every later
 * element when one is inserted elsewhere in the structure.
 */
export function membershipFingerprint(elements: readonly SpatialElement[]): string {
  let h = FNV_OFFSET;
  for (const el of elements) h = hashElement(h, el);
  return `${elements.length}:${h.toString(16)}`;
}

// ══════════════════════════════════════════════════════════════════════
// Element → triangles
// ══════════════════════════════════════════════════════════════════════

/** Filled triangles for one element; node markers and text are not batched. */
export function triangulateElement(element: GeometryElement, id: string): Triangulation | null {
  switch (element.type) {
    case "boundary":
      return triangulateMultiple(element.polygons, id);
    case "box":
      return triangulatePolygon(element.points, id);
    case "path": {
      if (element.width === 0) {
        warnOnce(log, `zero-width:${id}`, `Zero-width path ${id} is not drawn by the batched backend`);
        return null;
      }
      const out = emptyTriangulation();
      element.paths.forEach((path, i) => {
        const quads = pathToQuads(path, element.width, element.pathType === 2);
        appendTriangulation(out, triangulateMultiple(quads, `${id}/${i}`));
      });
      return out;
    }
    case "node":
    case "text":
      return null;
  }
}

// ══════════════════════════════════════════════════════════════════════
// Layer batch
// ══════════════════════════════════════════════════════════════════════

export class LayerBatch {
  readonly key: string;
  readonly layer: number;
  readonly dataType: number;

  private elements: readonly SpatialElement[] = [];
  private fingerprint = "";
  private dirty = true;
  private buffer: GeometryBuffer | null = null;
  private _rebuildCount = 0;
  private _vertexCount = 0;
  private _indexCount = 0;

  constructor(key: string, layer: number, dataType: number) {
    this.key = key;
    this.layer = layer;
    this.dataType = dataType;
  }

  /** Replace the membership. Returns true (and marks dirty) only when the geometry changed. */
  setElements(elements: readonly SpatialElement[]): boolean {
    const fp = membershipFingerprint(elements);
    this.elements = elements;
    if (fp === this.fingerprint) return false;
    this.fingerprint = fp;
    this.dirty = true;
    return true;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  get rebuildCount(): number {
    return this._rebuildCount;
  }

  get vertexCount(): number {
    return this._vertexCount;
  }

  get indexCount(): number {
    return this._indexCount;
  }

  get triangleCount(): number {
    return this._indexCount / 3;
  }

  /**
   * Re-triangulate every member and upload into a pooled buffer pair.
   * Returns false when no buffer could be allocated; the batch then stays
   * dirty and the next frame tries again.
   */
  rebuild(pool: BufferPool): boolean {
    const geometry = emptyTriangulation();
    for (const el of this.elements) {
      const t = triangulateElement(el.element, el.key);
      if (t) appendTriangulation(geometry, t);
    }

    if (geometry.indices.length === 0) {
      this.releaseBuffer(pool);
    } else {
      let buffer = this.buffer;
      if (!buffer) {
        try {
          buffer = pool.acquire();
        } catch (err) {
          warnOnce(log, `alloc:${this.key}`, `Batch ${this.key} not uploaded:`, err instanceof Error ? err.message : err);
          return false;
        }
        this.buffer = buffer;
      }
      buffer.upload(new Float32Array(geometry.vertices), new Uint32Array(geometry.indices));
    }

    this._vertexCount = geometry.vertices.length / 2;
    this._indexCount = geometry.indices.length;
    this._rebuildCount++;
    this.dirty = false;
    log.debug(`Batch ${this.key} rebuilt: ${this.elements.length} elements, ${this.triangleCount} triangles`);
    return true;
  }

  /** One drawElements over the whole batch. Returns the number of draw calls issued. */
  draw(gl: GpuContext, positionLocation: number): number {
    if (!this.buffer || this._indexCount === 0) return 0;
    if (!this.buffer.bind(positionLocation)) return 0;
    gl.drawElements(gl.TRIANGLES, this._indexCount, gl.UNSIGNED_INT, 0);
    return 1;
  }

  dispose(pool: BufferPool): void {
    this.releaseBuffer(pool);
    this.elements = [];
    this.fingerprint = "";
    this.dirty = true;
  }

  private releaseBuffer(pool: BufferPool): void {
    if (this.buffer) pool.release(this.buffer);
    this.buffer = null;
  }
}

// ══════════════════════════════════════════════════════════════════════
// Batch manager
// ══════════════════════════════════════════════════════════════════════

export interface BatchSyncResult {
  created: string[];
  changed: string[];
  removed: string[];
}

export interface BatchStatistics {
  batchCount: number;
  dirtyCount: number;
  totalVertices: number;
  totalIndices: number;
  totalTriangles: number;
  /** Rebuilds over the manager's lifetime. */
  rebuilds: number;
}

export class LayerBatchManager {
  private readonly pool: BufferPool;
  private readonly batches = new Map<string, LayerBatch>();
  private retiredRebuilds = 0;

  constructor(pool: BufferPool) {
    this.pool = pool;
  }

  /**
   * Align batches with the scene's layer groups: create batches for new
   * layers, mark changed memberships dirty, dispose batches of vanished layers.
   */
  sync(groups: readonly LayerGroup[]): BatchSyncResult {
    const result: BatchSyncResult = { created: [], changed: [], removed: [] };
    const live = new Set<string>();

    for (const group of groups) {
      live.add(group.key);
      let batch = this.batches.get(group.key);
      if (!batch) {
        batch = new LayerBatch(group.key, group.layer, group.dataType);
        this.batches.set(group.key, batch);
        batch.setElements(group.elements);
        result.created.push(group.key);
      } else if (batch.setElements(group.elements)) {
        result.changed.push(group.key);
      }
    }

    for (const [key, batch] of this.batches) {
      if (live.has(key)) continue;
      this.retiredRebuilds += batch.rebuildCount;
      batch.dispose(this.pool);
      this.batches.delete(key);
      result.removed.push(key);
    }

    return result;
  }

  get(key: string): LayerBatch | undefined {
    return this.batches.get(key);
  }

  /** The batch for `key`, rebuilt first if dirty. Undefined when the rebuild could not upload. */
  prepare(key: string): LayerBatch | undefined {
    const batch = this.batches.get(key);
    if (batch?.isDirty() && !batch.rebuild(this.pool)) return undefined;
    return batch;
  }

  getStatistics(): BatchStatistics {
    const stats: BatchStatistics = {
      batchCount: this.batches.size,
      dirtyCount: 0,
      totalVertices: 0,
      totalIndices: 0,
      totalTriangles: 0,
      rebuilds: this.retiredRebuilds,
    };
    for (const b of this.batches.values()) {
      if (b.isDirty()) stats.dirtyCount++;
      stats.totalVertices += b.vertexCount;
      stats.totalIndices += b.indexCount;
      stats.totalTriangles += b.triangleCount;
      stats.rebuilds += b.rebuildCount;
    }
    return stats;
  }

  dispose(): void {
    for (const b of this.batches.values()) b.dispose(this.pool);
    this.batches.clear();
    this.retiredRebuilds = 0;
  }
}
